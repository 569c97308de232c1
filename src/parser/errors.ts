/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import type { ParseIssue, ParseIssueKind } from './types';

/**
 * Raised by strict parsing when the input is not well-formed enough to continue.
 */
export class MarkupSyntaxError extends SyntaxError {
  readonly kind: ParseIssueKind;
  readonly offset: number;
  readonly line: number;
  readonly column: number;

  constructor(issue: ParseIssue) {
    super(`${issue.message} (line ${issue.line}, column ${issue.column})`);
    this.name = 'MarkupSyntaxError';
    this.kind = issue.kind;
    this.offset = issue.offset;
    this.line = issue.line;
    this.column = issue.column;
  }
}

export type MarkupErrorKind = ParseIssueKind | 'unserializable-value';

/** Failure while working on an already built tree (no source position). */
export class MarkupError extends Error {
  readonly kind: MarkupErrorKind;

  constructor(kind: MarkupErrorKind, message: string) {
    super(message);
    this.name = 'MarkupError';
    this.kind = kind;
  }
}
