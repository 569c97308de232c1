/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import xmlFormat from 'xml-formatter';
import { encodeEntities } from './entities';
import { MarkupError } from './errors';
import type { MarkupNode } from './types';

export interface SerializeOptions {
  /** Indent with xml-formatter; needs a single top-level element. */
  pretty?: boolean;
}

function trailingBackslashes(value: string): number {
  let count = 0;
  while (count < value.length && value[value.length - 1 - count] === '\\') count++;
  return count;
}

function serializeAttributes(node: MarkupNode): string {
  let out = '';
  for (const [name, value] of node.attributes) {
    // an unpaired final backslash would escape the closing quote
    if (trailingBackslashes(value) % 2 === 1) {
      throw new MarkupError(
        'unserializable-value',
        `Value of attribute "${name}" on <${node.name}> ends with an unpaired backslash`
      );
    }
    out += ` ${name}="${encodeEntities(value)}"`;
  }
  return out;
}

function serializeNode(node: MarkupNode): string {
  const open = `<${node.name}${serializeAttributes(node)}`;
  if (node.children.length === 0 && !node.text) return `${open}/>`;
  // text goes last: only the text right before a close tag is read back
  return `${open}>${serializeChildren(node)}${encodeEntities(node.text)}</${node.name}>`;
}

function serializeChildren(node: MarkupNode): string {
  let out = '';
  for (const key of node.children) {
    const child = node.childMap.get(key);
    if (child) out += serializeNode(child);
  }
  return out;
}

/**
 * Write a tree back as markup. Given the synthetic root, its top-level
 * elements are written one after the other. Parsing the output yields a tree
 * with the same names, keys, attributes and text.
 */
export function serializeMarkup(node: MarkupNode, options: SerializeOptions = {}): string {
  const markup = node.name ? serializeNode(node) : serializeChildren(node);
  if (!options.pretty) return markup;
  return xmlFormat(markup, {
    indentation: '  ',
    collapseContent: true,
    lineSeparator: '\n',
    whiteSpaceAtEndOfSelfclosingTag: true,
  });
}
