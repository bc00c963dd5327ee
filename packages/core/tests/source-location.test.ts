/**
 * Source Index Tests
 * Offset to line/column mapping and line helpers.
 */

import { describe, it, expect } from 'vitest';
import { LineIndex, rangesOverlap } from '../src/index.js';

describe('LineIndex', () => {
  describe('locate', () => {
    it('maps offsets on the first line to 1-indexed columns', () => {
      const index = LineIndex.fromSource('int a;');

      expect(index.locate(0)).toEqual({ line: 1, column: 1, offset: 0 });
      expect(index.locate(4)).toEqual({ line: 1, column: 5, offset: 4 });
    });

    it('starts a new line after each newline', () => {
      const index = LineIndex.fromSource('a\nbc\n\nd');

      expect(index.lineCount).toBe(4);
      expect(index.locate(2)).toEqual({ line: 2, column: 1, offset: 2 });
      expect(index.locate(3)).toEqual({ line: 2, column: 2, offset: 3 });
      expect(index.locate(5)).toEqual({ line: 3, column: 1, offset: 5 });
      expect(index.locate(6)).toEqual({ line: 4, column: 1, offset: 6 });
    });

    it('treats CRLF as one terminator', () => {
      const index = LineIndex.fromSource('a\r\nb');

      expect(index.lineCount).toBe(2);
      expect(index.locate(1)).toEqual({ line: 1, column: 2, offset: 1 });
      expect(index.locate(3)).toEqual({ line: 2, column: 1, offset: 3 });
    });

    it('clamps offsets outside the source', () => {
      const index = LineIndex.fromSource('ab');

      expect(index.locate(-4)).toEqual({ line: 1, column: 1, offset: 0 });
      expect(index.locate(99)).toEqual({ line: 1, column: 3, offset: 2 });
    });
  });

  describe('span', () => {
    it('locates both ends of a range', () => {
      const index = LineIndex.fromSource('x\nyz');

      expect(index.span({ start: 0, end: 4 })).toEqual({
        start: { line: 1, column: 1, offset: 0 },
        end: { line: 2, column: 3, offset: 4 },
      });
    });
  });

  describe('lineText', () => {
    it('returns a line without its terminator', () => {
      const index = LineIndex.fromSource('first\r\n  second\nthird');

      expect(index.lineText(1)).toBe('first');
      expect(index.lineText(2)).toBe('  second');
      expect(index.lineText(3)).toBe('third');
    });

    it('returns empty string for lines out of range', () => {
      const index = LineIndex.fromSource('only');

      expect(index.lineText(0)).toBe('');
      expect(index.lineText(2)).toBe('');
    });
  });

  describe('indentOf', () => {
    it('returns leading spaces and tabs', () => {
      const index = LineIndex.fromSource('class A {\n\t  int a;\n}');

      expect(index.indentOf(2)).toBe('\t  ');
      expect(index.indentOf(1)).toBe('');
    });
  });
});

describe('rangesOverlap', () => {
  it('detects shared offsets', () => {
    expect(rangesOverlap({ start: 0, end: 5 }, { start: 4, end: 8 })).toBe(
      true
    );
  });

  it('treats touching ranges as disjoint', () => {
    expect(rangesOverlap({ start: 0, end: 4 }, { start: 4, end: 8 })).toBe(
      false
    );
  });
});
