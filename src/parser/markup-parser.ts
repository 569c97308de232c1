/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import { ConsoleLogger } from '../common/console-logger';
import type { Logger } from '../common/logger';
import { tokenizeAttributes } from './attribute-tokenizer';
import { createOffsetLocator, formatIssue } from './diagnostics';
import { decodeEntities } from './entities';
import { MarkupSyntaxError } from './errors';
import { classifyTag, findNextTag } from './scanner';
import { TreeBuilder } from './tree-builder';
import type {
  MarkupNode,
  MarkupParseResult,
  MismatchPolicy,
  ParseIssue,
  ParseOptions,
  ReportIssue,
} from './types';

export interface ResolvedParseOptions {
  strict: boolean;
  mismatch: MismatchPolicy;
  checkReservedNames: boolean;
  logger: Logger;
}

export function resolveParseOptions(options: ParseOptions = {}): ResolvedParseOptions {
  const logger = options.logger ? options.logger.clone() : new ConsoleLogger();
  logger.setContext('[markup]');
  return {
    strict: options.strict ?? false,
    mismatch: options.mismatch ?? 'ignore',
    checkReservedNames: options.checkReservedNames ?? false,
    logger,
  };
}

/**
 * Parse markup into a tree hanging off a synthetic, nameless root.
 *
 * The input is trimmed first. In the default lenient mode every problem is
 * recorded in `issues` and parsing continues, so the result is always `ok`.
 * With `strict` the parse stops at the first issue and the result carries it
 * as `error` next to the partial tree built so far.
 */
export function parseMarkup(text: string, options?: ParseOptions): MarkupParseResult {
  const { strict, mismatch, checkReservedNames, logger } = resolveParseOptions(options);
  const source = text.trim();
  const issues: ParseIssue[] = [];
  const locate = createOffsetLocator(source);

  const report: ReportIssue = (kind, message, offset) => {
    const issue: ParseIssue = { kind, message, offset, ...locate(offset) };
    issues.push(issue);
    logger.debug(formatIssue(issue));
  };
  const failed = (): boolean => strict && issues.length > 0;

  const builder = new TreeBuilder({ strict, mismatch, checkReservedNames, report });
  logger.debug(`parsing ${source.length} characters`);

  // first character after the previous tag
  let offset = 0;
  while (offset < source.length && !failed()) {
    const span = findNextTag(source, offset);
    if (!span) {
      if (source.slice(offset).trim()) {
        report('trailing-text', 'Text after the last tag is ignored', offset);
      }
      break;
    }
    if (span.kind === 'unterminated') {
      report('unterminated-tag', 'Tag has no closing ">"', span.start);
      break;
    }

    const tag = classifyTag(source, span.start, span.close, report);
    if (tag && tag.kind === 'close') {
      builder.close(tag.name, source.slice(offset, tag.start), tag.start);
    } else if (tag) {
      const attributes = new Map<string, string>();
      for (const [name, value] of tokenizeAttributes(source, tag.attrStart, tag.attrEnd, report)) {
        attributes.set(name, decodeEntities(value));
      }
      if (tag.kind === 'open') builder.open(tag.name, attributes, tag.start);
      else builder.leaf(tag.name, attributes, tag.start);
    }
    offset = span.close + 1;
  }

  if (!failed()) builder.finish();
  const root: MarkupNode = builder.root;
  logger.debug(`parsed ${builder.nodeCount} nodes with ${issues.length} issues`);

  const [error] = issues;
  if (strict && error) {
    logger.warn(`strict parse stopped: ${formatIssue(error)}`);
    return { ok: false, root, issues, error };
  }
  return { ok: true, root, issues };
}

/**
 * Strict parse that throws {@link MarkupSyntaxError} on the first issue.
 */
export function parseMarkupOrThrow(text: string, options?: Omit<ParseOptions, 'strict'>): MarkupNode {
  const result = parseMarkup(text, { ...options, strict: true });
  if (!result.ok) throw new MarkupSyntaxError(result.error);
  return result.root;
}
