/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

export { parseMarkup, parseMarkupOrThrow, resolveParseOptions } from './markup-parser';
export { createOffsetLocator, isParseUsable, formatIssue, locateOffset } from './diagnostics';
export type { SourcePosition } from './diagnostics';
export { decodeEntities, encodeEntities } from './entities';
export { MarkupError, MarkupSyntaxError } from './errors';
export { findByPath, resolvePath, parsePath } from './path-filter';
export { serializeMarkup } from './serializer';
export { toLegacyRecord } from './legacy-record';
export { RESERVED_NAMES } from './tree-builder';
export { ConsoleLogger } from '../common/console-logger';
export type { Logger, LogLevel } from '../common/logger';
export type { MarkupErrorKind } from './errors';
export type { PathMatch, PathSegment } from './path-filter';
export type { SerializeOptions } from './serializer';
export type { LegacyRecord } from './legacy-record';
export type { ResolvedParseOptions } from './markup-parser';
export type {
  MarkupNode,
  MarkupParseResult,
  MismatchPolicy,
  ParseIssue,
  ParseIssueKind,
  ParseOptions,
  TagKind,
} from './types';
