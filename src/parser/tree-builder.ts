/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import { decodeEntities } from './entities';
import type { MarkupNode, MismatchPolicy, MutableMarkupNode, ReportIssue } from './types';

/** Bookkeeping names of the flat legacy record (see legacy-record.ts). */
export const RESERVED_NAMES: ReadonlySet<string> = new Set(['Contents', 'Children', 'NodeName', 'Parameters']);

interface Frame {
  node: MutableMarkupNode;
  /** Offset of the start tag. */
  offset: number;
  /** Tag name → next `_N` suffix to try among this node's children. */
  suffixes: Map<string, number>;
}

export interface TreeBuilderOptions {
  /** Leave the stack alone on a mismatch; the parse is about to stop. */
  strict: boolean;
  mismatch: MismatchPolicy;
  checkReservedNames: boolean;
  report: ReportIssue;
}

export function createNode(name: string, attributes: Map<string, string> = new Map()): MutableMarkupNode {
  return { name, attributes, children: [], childMap: new Map<string, MutableMarkupNode>(), text: '' };
}

/**
 * Link `child` into `parent` and return the key it was stored under: the bare
 * tag name for its first occurrence, `name_1`, `name_2`, ... afterwards.
 *
 * `suffixes` remembers, per tag name, where the search for a free suffix
 * resumes. Keys are never removed, so the smallest free suffix never lies
 * below it. Pass the same map for every child of `parent`.
 */
export function attachChild(
  parent: MutableMarkupNode,
  child: MutableMarkupNode,
  suffixes: Map<string, number> = new Map()
): string {
  let key = child.name;
  if (parent.childMap.has(key)) {
    let n = suffixes.get(child.name) ?? 1;
    while (parent.childMap.has(`${child.name}_${n}`)) n++;
    key = `${child.name}_${n}`;
    suffixes.set(child.name, n + 1);
  }
  parent.childMap.set(key, child);
  parent.children.push(key);
  return key;
}

/**
 * Assembles the tree from open/close events on an explicit stack. The bottom
 * frame holds the synthetic root; a node leaves the stack only to be linked
 * into the frame below it.
 */
export class TreeBuilder {
  readonly root: MutableMarkupNode = createNode('');
  private readonly stack: Frame[] = [{ node: this.root, offset: 0, suffixes: new Map() }];
  private readonly options: TreeBuilderOptions;
  private created = 0;

  constructor(options: TreeBuilderOptions) {
    this.options = options;
  }

  get depth(): number {
    return this.stack.length - 1;
  }

  get nodeCount(): number {
    return this.created;
  }

  open(name: string, attributes: Map<string, string>, offset: number): void {
    const node = this.create(name, attributes, offset);
    this.stack.push({ node, offset, suffixes: new Map() });
  }

  /** Self-closing tags and processing instructions: created and linked at once. */
  leaf(name: string, attributes: Map<string, string>, offset: number): void {
    const node = this.create(name, attributes, offset);
    this.link(this.top(), node, offset);
  }

  /**
   * Handle `</name>`. `rawText` is the source between the previous tag and
   * this one.
   */
  close(name: string, rawText: string, offset: number): void {
    const top = this.top();
    if (this.stack.length > 1 && top.node.name === name) {
      this.setText(top.node, rawText);
      this.fold();
      return;
    }

    const { strict, mismatch, report } = this.options;
    const target = this.findOpen(name);
    report(
      'mismatched-close-tag',
      this.stack.length > 1
        ? `Close tag </${name}> does not match open element <${top.node.name}>`
        : `Close tag </${name}> has no open element`,
      offset
    );
    if (strict || mismatch === 'ignore' || target < 0) return;

    this.setText(top.node, rawText);
    while (this.stack.length - 1 > target) this.fold();
    this.fold();
  }

  /** Close whatever is still open and return the root. */
  finish(): MarkupNode {
    while (this.stack.length > 1) {
      const { node, offset } = this.top();
      this.options.report('unclosed-element', `Element <${node.name}> is never closed`, offset);
      this.fold();
    }
    return this.root;
  }

  private top(): Frame {
    return this.stack[this.stack.length - 1];
  }

  private findOpen(name: string): number {
    for (let i = this.stack.length - 1; i > 0; i--) {
      if (this.stack[i].node.name === name) return i;
    }
    return -1;
  }

  private create(name: string, attributes: Map<string, string>, offset: number): MutableMarkupNode {
    if (this.options.checkReservedNames) {
      for (const attribute of attributes.keys()) {
        if (RESERVED_NAMES.has(attribute)) {
          this.options.report('reserved-name', `Attribute name "${attribute}" is reserved`, offset);
        }
      }
    }
    this.created++;
    return createNode(name, attributes);
  }

  /** Pop the top frame and link its node into the frame below. */
  private fold(): void {
    if (this.stack.length < 2) return;
    const frame = this.stack.pop();
    if (!frame) return;
    this.link(this.top(), frame.node, frame.offset);
  }

  private link(target: Frame, child: MutableMarkupNode, offset: number): void {
    const parent = target.node;
    const key = attachChild(parent, child, target.suffixes);
    if (!this.options.checkReservedNames) return;
    if (RESERVED_NAMES.has(child.name)) {
      this.options.report('reserved-name', `Tag name "${child.name}" is reserved`, offset);
    }
    if (parent.attributes.has(key)) {
      this.options.report('reserved-name', `Child key "${key}" clashes with an attribute of <${parent.name}>`, offset);
    }
  }

  private setText(node: MutableMarkupNode, rawText: string): void {
    const text = rawText.trim();
    if (text) node.text = decodeEntities(text);
  }
}
