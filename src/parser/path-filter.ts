/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import { parsePathSegment, splitPathSegments } from '../common/path-utils';
import type { MarkupNode } from './types';

/**
 * One segment of a XPATH-style path.
 */
export interface PathSegment {
  name: string;
  keys?: Record<string, string>;
}

export interface PathMatch {
  /** Child keys from the root, joined with `/` (e.g. `r/c_1`). */
  path: string;
  node: MarkupNode;
}

export function parsePath(pathStr: string): PathSegment[] {
  const trimmed = pathStr.trim();
  if (!trimmed) return [];
  return splitPathSegments(trimmed).map((part) => {
    const { name, predicates } = parsePathSegment(part);
    if (predicates.length === 0) return { name };
    const keys: Record<string, string> = {};
    for (const { key, value } of predicates) keys[key] = value;
    return { name, keys };
  });
}

/**
 * Value a predicate key refers to: an attribute of `node`, or the text of the
 * child reached by following `a/b` or `a.b` child keys.
 */
function getValueAtPath(node: MarkupNode, pathKey: string): string | undefined {
  const parts = pathKey.split(/[/.]/).map((s) => s.trim()).filter(Boolean);
  if (parts.length === 0) return undefined;
  if (parts.length === 1) {
    const attribute = node.attributes.get(parts[0]);
    if (attribute !== undefined) return attribute;
  }
  let current: MarkupNode | undefined = node;
  for (const part of parts) {
    current = current.childMap.get(part);
    if (!current) return undefined;
  }
  return current.text;
}

function nodeMatchesKeys(node: MarkupNode, keys: Record<string, string> | undefined): boolean {
  if (!keys) return true;
  for (const [k, v] of Object.entries(keys)) {
    const resolved = getValueAtPath(node, k);
    if (resolved === v) continue;
    if (!resolved && v === '') continue;
    return false;
  }
  return true;
}

/**
 * Follow child keys from `root`; `item_2` addresses the third `<item>`.
 * Predicates on a segment must hold for the node it reaches.
 */
export function resolvePath(root: MarkupNode, pathStr: string): MarkupNode | undefined {
  let current: MarkupNode | undefined = root;
  for (const segment of parsePath(pathStr)) {
    current = current.childMap.get(segment.name);
    if (!current || !nodeMatchesKeys(current, segment.keys)) return undefined;
  }
  return current;
}

/**
 * All nodes whose chain of tag names from the root equals the path, whatever
 * key they are stored under, in document order.
 */
export function findByPath(root: MarkupNode, pathStr: string): PathMatch[] {
  let frontier: Array<{ node: MarkupNode; keys: string[] }> = [{ node: root, keys: [] }];
  for (const segment of parsePath(pathStr)) {
    const next: typeof frontier = [];
    for (const { node, keys } of frontier) {
      for (const key of node.children) {
        const child = node.childMap.get(key);
        if (child && child.name === segment.name && nodeMatchesKeys(child, segment.keys)) {
          next.push({ node: child, keys: [...keys, key] });
        }
      }
    }
    frontier = next;
  }
  return frontier.map(({ node, keys }) => ({ path: keys.join('/'), node }));
}
