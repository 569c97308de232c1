/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import type { MarkupParseResult, ParseIssue } from './types';

export interface SourcePosition {
  line: number;
  column: number;
}

/**
 * Index the line starts of `source` once and return a function converting a
 * character offset into a 1-based line and column.
 */
export function createOffsetLocator(source: string): (offset: number) => SourcePosition {
  const lineStarts = [0];
  for (let i = source.indexOf('\n'); i >= 0; i = source.indexOf('\n', i + 1)) {
    lineStarts.push(i + 1);
  }
  return (offset) => {
    // last line start at or before offset
    let lo = 0;
    let hi = lineStarts.length - 1;
    while (lo < hi) {
      const mid = (lo + hi + 1) >> 1;
      if (lineStarts[mid] <= offset) lo = mid;
      else hi = mid - 1;
    }
    return { line: lo + 1, column: offset - lineStarts[lo] + 1 };
  };
}

/**
 * Convert a character offset into a 1-based line and column.
 */
export function locateOffset(source: string, offset: number): SourcePosition {
  return createOffsetLocator(source)(offset);
}

export function formatIssue(issue: ParseIssue): string {
  return `${issue.line}:${issue.column} ${issue.kind}: ${issue.message}`;
}

/**
 * Whether the parse result can be used as-is (no issues, at least one top-level element).
 */
export function isParseUsable(parseResult: MarkupParseResult): boolean {
  return (
    parseResult.ok &&
    parseResult.issues.length === 0 &&
    parseResult.root.children.length > 0
  );
}
