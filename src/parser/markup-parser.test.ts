/*
  @author Sven Wisotzky
  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import { describe, it, expect } from 'vitest';
import { ConsoleLogger } from '../common/console-logger';
import type { Logger } from '../common/logger';
import { MarkupSyntaxError } from './errors';
import { parseMarkup, parseMarkupOrThrow, resolveParseOptions } from './markup-parser';
import type { MarkupNode } from './types';

class RecordingLogger implements Logger {
  readonly lines: string[] = [];
  context: string | undefined;
  clone(): RecordingLogger {
    return this;
  }
  setContext(context: string | undefined): void {
    this.context = context;
  }
  trace(message: string): void {
    this.lines.push(`trace ${message}`);
  }
  debug(message: string): void {
    this.lines.push(`debug ${message}`);
  }
  info(message: string): void {
    this.lines.push(`info ${message}`);
  }
  warn(message: string): void {
    this.lines.push(`warn ${message}`);
  }
  error(message: string): void {
    this.lines.push(`error ${message}`);
  }
}

const quiet = { logger: new ConsoleLogger('error') };

function child(node: MarkupNode | undefined, key: string): MarkupNode | undefined {
  return node?.childMap.get(key);
}

describe('parseMarkup', () => {
  it('captures the text of a single element', () => {
    const result = parseMarkup('<a>text</a>', quiet);
    expect(result.ok).toBe(true);
    expect(result.issues).toEqual([]);
    expect(result.root.name).toBe('');
    expect(result.root.children).toEqual(['a']);
    const a = child(result.root, 'a');
    expect(a?.text).toBe('text');
    expect(a?.children).toEqual([]);
  });

  it('treats a self-closing tag like an empty element', () => {
    const selfClosing = child(parseMarkup('<a/>', quiet).root, 'a');
    const empty = child(parseMarkup('<a></a>', quiet).root, 'a');
    expect(selfClosing?.text).toBe('');
    expect(empty?.text).toBe('');
    expect(selfClosing?.children).toEqual(empty?.children);
    expect([...(selfClosing?.attributes ?? [])]).toEqual([...(empty?.attributes ?? [])]);
  });

  it('keeps attributes in source order', () => {
    const a = child(parseMarkup(`<a x="1" y='2'/>`, quiet).root, 'a');
    expect([...(a?.attributes ?? [])]).toEqual([
      ['x', '1'],
      ['y', '2'],
    ]);
  });

  it('gives repeated siblings suffixed keys', () => {
    const r = child(parseMarkup('<r><c>1</c><c>2</c></r>', quiet).root, 'r');
    expect(r?.children).toEqual(['c', 'c_1']);
    expect(child(r, 'c')?.text).toBe('1');
    expect(child(r, 'c_1')?.text).toBe('2');
  });

  it('decodes entities in text and attribute values', () => {
    const root = parseMarkup('<a title="&quot;q&quot; &amp; more">&lt;x&gt;</a>', quiet).root;
    const a = child(root, 'a');
    expect(a?.text).toBe('<x>');
    expect(a?.attributes.get('title')).toBe('"q" & more');
  });

  it('builds nested structure', () => {
    const a = child(parseMarkup('<a><b/><c><d>z</d></c></a>', quiet).root, 'a');
    expect(a?.children).toEqual(['b', 'c']);
    expect(child(child(a, 'c'), 'd')?.text).toBe('z');
  });

  it('treats processing instructions as self-closing elements', () => {
    const result = parseMarkup('<?xml version="1.0"?><root/>', quiet);
    expect(result.issues).toEqual([]);
    expect(result.root.children).toEqual(['xml', 'root']);
    expect(child(result.root, 'xml')?.attributes.get('version')).toBe('1.0');
  });

  it('only captures the text right before the close tag', () => {
    const r = child(parseMarkup('lead <r>lost<a/>kept</r> ', quiet).root, 'r');
    expect(r?.text).toBe('kept');
    expect(r?.children).toEqual(['a']);
  });

  it('trims the input before computing offsets', () => {
    const result = parseMarkup('  \n<a>', quiet);
    expect(result.issues).toEqual([
      { kind: 'unclosed-element', message: 'Element <a> is never closed', offset: 0, line: 1, column: 1 },
    ]);
  });

  it('returns an empty root for blank input', () => {
    const result = parseMarkup('   ', quiet);
    expect(result.ok).toBe(true);
    expect(result.root.children).toEqual([]);
    expect(result.issues).toEqual([]);
  });

  describe('lenient recovery', () => {
    it('ignores a mismatched close tag by default', () => {
      const result = parseMarkup('<a><b>x</c></b></a>', quiet);
      expect(result.ok).toBe(true);
      expect(result.issues).toEqual([
        {
          kind: 'mismatched-close-tag',
          message: 'Close tag </c> does not match open element <b>',
          offset: 7,
          line: 1,
          column: 8,
        },
      ]);
      const a = child(result.root, 'a');
      expect(a?.children).toEqual(['b']);
      expect(child(a, 'b')?.text).toBe('');
    });

    it('closes open elements at the end of input', () => {
      const result = parseMarkup('<a><b>hi</a>', quiet);
      expect(result.issues.map((issue) => [issue.kind, issue.offset])).toEqual([
        ['mismatched-close-tag', 8],
        ['unclosed-element', 3],
        ['unclosed-element', 0],
      ]);
      const a = child(result.root, 'a');
      expect(a?.children).toEqual(['b']);
      expect(child(a, 'b')?.text).toBe('');
    });

    it('backtracks to the nearest open element with the same name', () => {
      const result = parseMarkup('<a><b>hi</a>', { ...quiet, mismatch: 'backtrack' });
      expect(result.issues.map((issue) => issue.kind)).toEqual(['mismatched-close-tag']);
      const a = child(result.root, 'a');
      expect(a?.text).toBe('');
      expect(child(a, 'b')?.text).toBe('hi');
    });

    it('drops a close tag without any open element', () => {
      const result = parseMarkup('</x><a/>', { ...quiet, mismatch: 'backtrack' });
      expect(result.issues).toHaveLength(1);
      expect(result.issues[0].message).toBe('Close tag </x> has no open element');
      expect(result.root.children).toEqual(['a']);
    });

    it('reports line and column of issues', () => {
      const result = parseMarkup('<r>\n  <a>\n</r>', quiet);
      expect(result.issues[0]).toMatchObject({ kind: 'mismatched-close-tag', offset: 10, line: 3, column: 1 });
    });

    it('stops at a tag without ">"', () => {
      const result = parseMarkup('<a>x</a><b', quiet);
      expect(result.issues.map((issue) => [issue.kind, issue.offset])).toEqual([['unterminated-tag', 8]]);
      expect(result.root.children).toEqual(['a']);
    });

    it('reports text after the last tag', () => {
      const result = parseMarkup('<a/>tail', quiet);
      expect(result.issues.map((issue) => [issue.kind, issue.offset])).toEqual([['trailing-text', 4]]);
      expect(result.root.children).toEqual(['a']);
    });

    it('skips tags without a name', () => {
      const result = parseMarkup('<r><></r>', quiet);
      expect(result.issues.map((issue) => issue.kind)).toEqual(['empty-tag-name']);
      expect(child(result.root, 'r')?.children).toEqual([]);
    });
  });

  describe('reserved names', () => {
    it('is silent unless asked', () => {
      const result = parseMarkup('<r Children="x"><Contents/></r>', quiet);
      expect(result.issues).toEqual([]);
      expect(child(result.root, 'r')?.attributes.get('Children')).toBe('x');
    });

    it('reports reserved attribute and tag names', () => {
      const result = parseMarkup('<r Children="x"><Contents/></r>', { ...quiet, checkReservedNames: true });
      expect(result.issues.map((issue) => [issue.kind, issue.offset])).toEqual([
        ['reserved-name', 0],
        ['reserved-name', 16],
      ]);
    });

    it('reports a child key equal to an attribute name', () => {
      const result = parseMarkup('<r id="1"><id/></r>', { ...quiet, checkReservedNames: true });
      expect(result.issues.map((issue) => issue.message)).toEqual([
        'Child key "id" clashes with an attribute of <r>',
      ]);
    });
  });

  describe('strict mode', () => {
    it('fails on the first issue', () => {
      const result = parseMarkup('<a><b></a>', { ...quiet, strict: true });
      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.kind).toBe('mismatched-close-tag');
      expect(result.error.offset).toBe(6);
      expect(result.root.children).toEqual([]);
    });

    it('leaves the tree unfolded when backtracking is also requested', () => {
      const result = parseMarkup('<a><b></a>', { ...quiet, strict: true, mismatch: 'backtrack' });
      expect(result.ok).toBe(false);
      expect(result.issues.map((issue) => issue.kind)).toEqual(['mismatched-close-tag']);
      expect(result.root.children).toEqual([]);
    });

    it('succeeds on well-formed input', () => {
      const result = parseMarkup('<a><b/></a>', { ...quiet, strict: true });
      expect(result.ok).toBe(true);
    });

    it('throws from parseMarkupOrThrow', () => {
      expect(() => parseMarkupOrThrow('<a>', quiet)).toThrow(MarkupSyntaxError);
      try {
        parseMarkupOrThrow('<a>', quiet);
      } catch (err) {
        expect(err).toBeInstanceOf(MarkupSyntaxError);
        if (!(err instanceof MarkupSyntaxError)) return;
        expect(err.kind).toBe('unclosed-element');
        expect(err.message).toBe('Element <a> is never closed (line 1, column 1)');
      }
    });

    it('returns the root from parseMarkupOrThrow', () => {
      expect(parseMarkupOrThrow('<a>1</a>', quiet).childMap.get('a')?.text).toBe('1');
    });
  });

  describe('logging', () => {
    it('logs progress and issues at debug level', () => {
      const logger = new RecordingLogger();
      parseMarkup('<a></b></a>', { logger });
      expect(logger.context).toBe('[markup]');
      expect(logger.lines).toEqual([
        'debug parsing 11 characters',
        'debug 1:4 mismatched-close-tag: Close tag </b> does not match open element <a>',
        'debug parsed 1 nodes with 1 issues',
      ]);
    });

    it('warns when a strict parse stops', () => {
      const logger = new RecordingLogger();
      parseMarkup('<a></b></a>', { logger, strict: true });
      expect(logger.lines[logger.lines.length - 1]).toBe(
        'warn strict parse stopped: 1:4 mismatched-close-tag: Close tag </b> does not match open element <a>'
      );
    });
  });
});

describe('resolveParseOptions', () => {
  it('fills in defaults', () => {
    const options = resolveParseOptions();
    expect(options.strict).toBe(false);
    expect(options.mismatch).toBe('ignore');
    expect(options.checkReservedNames).toBe(false);
    expect(options.logger).toBeInstanceOf(ConsoleLogger);
  });

  it('works on a clone of the given logger', () => {
    const logger = new ConsoleLogger('warn');
    expect(resolveParseOptions({ logger }).logger).not.toBe(logger);
  });
});
