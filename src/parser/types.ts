/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause

  Node in the markup tree: attributes, child keys and child nodes live in
  separate maps so tag and attribute names never clash with bookkeeping.
*/

import type { Logger } from '../common/logger';

export interface MarkupNode {
  /** Tag name; empty for the synthetic root. */
  readonly name: string;
  /** Entity-decoded attribute values in source order. */
  readonly attributes: ReadonlyMap<string, string>;
  /** Child keys in document order (`item`, `item_1`, `item_2`, ...). */
  readonly children: readonly string[];
  /** Child key → child node. */
  readonly childMap: ReadonlyMap<string, MarkupNode>;
  /** Trimmed, entity-decoded text captured right before the matching close tag. */
  readonly text: string;
}

/** Builder-side view of a node while it is still on the stack. */
export interface MutableMarkupNode extends MarkupNode {
  readonly attributes: Map<string, string>;
  readonly children: string[];
  readonly childMap: Map<string, MutableMarkupNode>;
  text: string;
}

export type TagKind = 'open' | 'close' | 'self-closing' | 'processing-instruction';

export type ParseIssueKind =
  | 'unterminated-tag'
  | 'unterminated-attribute-value'
  | 'malformed-attribute'
  | 'duplicate-attribute'
  | 'mismatched-close-tag'
  | 'unclosed-element'
  | 'empty-tag-name'
  | 'malformed-processing-instruction'
  | 'trailing-text'
  | 'reserved-name';

export interface ParseIssue {
  kind: ParseIssueKind;
  message: string;
  /** Character offset in the trimmed input. */
  offset: number;
  /** 1-based. */
  line: number;
  /** 1-based. */
  column: number;
}

/**
 * How a close tag that does not match the innermost open element is handled.
 * - `ignore`: drop the close tag and keep the element open.
 * - `backtrack`: close every element up to the nearest open one with that name.
 */
export type MismatchPolicy = 'ignore' | 'backtrack';

export interface ParseOptions {
  /** Stop at the first issue and return a failed result. */
  strict?: boolean;
  mismatch?: MismatchPolicy;
  /** Report names that would clash in the flat legacy record view. */
  checkReservedNames?: boolean;
  logger?: Logger;
}

export type MarkupParseResult =
  | { ok: true; root: MarkupNode; issues: ParseIssue[] }
  | { ok: false; root: MarkupNode; issues: ParseIssue[]; error: ParseIssue };

/** Callback the scanning stages use to record an issue at a source offset. */
export type ReportIssue = (kind: ParseIssueKind, message: string, offset: number) => void;
