/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import { isMarkupWhitespace } from './scanner';
import type { ReportIssue } from './types';

export enum AttributeState {
  SeekingName,
  InName,
  AfterName,
  AfterEquals,
  InDoubleQuote,
  InSingleQuote,
  InUnquoted,
}

/**
 * Read `name="value"` pairs from `source[start..end)`.
 *
 * Values may be double-quoted, single-quoted or unquoted (unquoted values end
 * at whitespace or at the end of the region). Inside quotes a backslash keeps
 * the next character from closing the value; the backslash itself stays in
 * the raw value. Values are returned raw, entity decoding is up to the caller.
 * A repeated name keeps its first position and takes the last value.
 */
export function tokenizeAttributes(
  source: string,
  start: number,
  end: number,
  report: ReportIssue
): Map<string, string> {
  const attributes = new Map<string, string>();
  let state = AttributeState.SeekingName;
  let nameStart = start;
  // undefined while a value has no name to be stored under
  let name: string | undefined;
  let valueStart = start;
  let escaped = false;

  const commit = (value: string): void => {
    if (name === undefined) return;
    if (attributes.has(name)) {
      report('duplicate-attribute', `Attribute "${name}" is repeated`, nameStart);
    }
    attributes.set(name, value);
    name = undefined;
  };

  const missingValue = (): void => {
    report('malformed-attribute', `Attribute "${name ?? ''}" has no value`, nameStart);
    name = undefined;
  };

  for (let i = start; i < end; i++) {
    const ch = source[i];
    switch (state) {
      case AttributeState.SeekingName:
        if (isMarkupWhitespace(ch)) break;
        if (ch === '=') {
          report('malformed-attribute', 'Attribute value has no name', i);
          name = undefined;
          state = AttributeState.AfterEquals;
        } else {
          nameStart = i;
          state = AttributeState.InName;
        }
        break;

      case AttributeState.InName:
        if (isMarkupWhitespace(ch)) {
          name = source.slice(nameStart, i);
          state = AttributeState.AfterName;
        } else if (ch === '=') {
          name = source.slice(nameStart, i);
          state = AttributeState.AfterEquals;
        }
        break;

      case AttributeState.AfterName:
        if (isMarkupWhitespace(ch)) break;
        if (ch === '=') {
          state = AttributeState.AfterEquals;
        } else {
          missingValue();
          nameStart = i;
          state = AttributeState.InName;
        }
        break;

      case AttributeState.AfterEquals:
        if (isMarkupWhitespace(ch)) break;
        escaped = false;
        if (ch === '"') {
          valueStart = i + 1;
          state = AttributeState.InDoubleQuote;
        } else if (ch === "'") {
          valueStart = i + 1;
          state = AttributeState.InSingleQuote;
        } else {
          valueStart = i;
          state = AttributeState.InUnquoted;
        }
        break;

      case AttributeState.InDoubleQuote:
      case AttributeState.InSingleQuote: {
        const quote = state === AttributeState.InDoubleQuote ? '"' : "'";
        if (escaped) {
          escaped = false;
        } else if (ch === '\\') {
          escaped = true;
        } else if (ch === quote) {
          commit(source.slice(valueStart, i));
          state = AttributeState.SeekingName;
        }
        break;
      }

      case AttributeState.InUnquoted:
        if (isMarkupWhitespace(ch)) {
          commit(source.slice(valueStart, i));
          state = AttributeState.SeekingName;
        }
        break;
    }
  }

  switch (state) {
    case AttributeState.InName:
      name = source.slice(nameStart, end);
      missingValue();
      break;
    case AttributeState.AfterName:
    case AttributeState.AfterEquals:
      missingValue();
      break;
    case AttributeState.InDoubleQuote:
    case AttributeState.InSingleQuote:
      report('unterminated-attribute-value', `Value of attribute "${name ?? ''}" is not closed`, valueStart - 1);
      commit(source.slice(valueStart, end));
      break;
    case AttributeState.InUnquoted:
      commit(source.slice(valueStart, end));
      break;
    case AttributeState.SeekingName:
      break;
  }

  return attributes;
}
