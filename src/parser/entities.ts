/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

const NAMED_ENTITIES: Record<string, string> = {
  amp: '&',
  lt: '<',
  gt: '>',
  apos: "'",
  quot: '"',
};

const ENTITY_RE = /&(amp|lt|gt|apos|quot);/g;
const SPECIAL_CHARS_RE = /[&<>'"]/g;

const CHAR_TO_ENTITY: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  "'": '&apos;',
  '"': '&quot;',
};

/**
 * Replace the five predefined entities in one left-to-right pass.
 * Replacements are never rescanned, so `&amp;lt;` becomes `&lt;`.
 * Numeric and other named references are left as they are.
 */
export function decodeEntities(text: string): string {
  if (!text.includes('&')) return text;
  return text.replace(ENTITY_RE, (match: string, name: string) => NAMED_ENTITIES[name] ?? match);
}

/** Escape `& < > ' "` so the result decodes back to `text`. */
export function encodeEntities(text: string): string {
  return text.replace(SPECIAL_CHARS_RE, (ch: string) => CHAR_TO_ENTITY[ch] ?? ch);
}
