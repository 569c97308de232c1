/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause

  Flat record view for consumers of the old array format, where bookkeeping,
  attribute values and child records share one key space per node.
*/

import { MarkupError } from './errors';
import type { MarkupNode } from './types';

export interface LegacyRecord {
  [key: string]: string | string[] | LegacyRecord;
}

/**
 * Build the flat record for `node`:
 * `NodeName`, `Contents`, `Children` (child keys), `Parameters` (attribute
 * names), then every attribute value and every child record under its key.
 * The synthetic root only carries `Children` and the child records.
 *
 * Throws a `reserved-name` {@link MarkupError} when two entries would land on
 * the same key.
 */
export function toLegacyRecord(node: MarkupNode): LegacyRecord {
  const entries: Array<[string, string | string[] | LegacyRecord]> = node.name
    ? [
        ['NodeName', node.name],
        ['Contents', node.text],
        ['Children', [...node.children]],
        ['Parameters', [...node.attributes.keys()]],
      ]
    : [['Children', [...node.children]]];
  const used = new Set(entries.map(([key]) => key));

  const add = (key: string, value: string | LegacyRecord, what: string): void => {
    if (used.has(key)) {
      throw new MarkupError('reserved-name', `${what} "${key}" of <${node.name}> clashes with another entry`);
    }
    used.add(key);
    entries.push([key, value]);
  };

  for (const [name, value] of node.attributes) add(name, value, 'Attribute');
  for (const key of node.children) {
    const child = node.childMap.get(key);
    if (child) add(key, toLegacyRecord(child), 'Child');
  }
  return Object.fromEntries(entries);
}
