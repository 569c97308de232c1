/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause

  Locates `<...>` spans and works out what kind of tag each one is.
*/

import type { ReportIssue, TagKind } from './types';

export type ScanResult =
  | { kind: 'tag'; start: number; close: number }
  | { kind: 'unterminated'; start: number };

export interface ClassifiedTag {
  kind: TagKind;
  name: string;
  /** Index of `<`. */
  start: number;
  /** Index of `>`. */
  close: number;
  /** Attribute region, from the end of the name up to (excluding) a trailing `/`, `?` or the `>`. */
  attrStart: number;
  attrEnd: number;
}

export function isMarkupWhitespace(ch: string | undefined): boolean {
  return ch === ' ' || ch === '\t' || ch === '\n' || ch === '\v' || ch === '\r';
}

/**
 * Find the next tag at or after `offset`. Quotes are not understood, so the
 * first `>` after the `<` ends the tag even inside an attribute value.
 * Returns undefined when no `<` is left.
 */
export function findNextTag(source: string, offset: number): ScanResult | undefined {
  const start = source.indexOf('<', offset);
  if (start < 0) return undefined;
  const close = source.indexOf('>', start + 1);
  if (close < 0) return { kind: 'unterminated', start };
  return { kind: 'tag', start, close };
}

/**
 * Classify the tag spanning `start..close` and extract its name.
 * Returns undefined (after reporting) when the tag has no name.
 */
export function classifyTag(
  source: string,
  start: number,
  close: number,
  report: ReportIssue
): ClassifiedTag | undefined {
  const marker = source[start + 1];
  let kind: TagKind;
  let nameStart: number;
  let bodyEnd = close;

  if (marker === '/') {
    kind = 'close';
    nameStart = start + 2;
  } else if (marker === '?') {
    kind = 'processing-instruction';
    nameStart = start + 2;
    if (close - 1 >= nameStart && source[close - 1] === '?') {
      bodyEnd = close - 1;
    } else {
      report('malformed-processing-instruction', 'Processing instruction does not end with "?>"', start);
    }
  } else {
    nameStart = start + 1;
    if (close - 1 >= nameStart && source[close - 1] === '/') {
      kind = 'self-closing';
      bodyEnd = close - 1;
    } else {
      kind = 'open';
    }
  }

  let nameEnd = nameStart;
  while (nameEnd < bodyEnd && !isMarkupWhitespace(source[nameEnd])) nameEnd++;

  if (nameEnd === nameStart) {
    report('empty-tag-name', 'Tag has no name', start);
    return undefined;
  }

  return {
    kind,
    name: source.slice(nameStart, nameEnd),
    start,
    close,
    attrStart: nameEnd,
    attrEnd: bodyEnd,
  };
}
