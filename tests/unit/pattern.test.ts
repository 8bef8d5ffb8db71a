import { describe, it, expect } from 'vitest';
import {
  ANY,
  literal,
  symbol,
  wildcard,
  parseDimension,
  parsePattern,
  parsePatterns,
  patternToString,
  dimensionToString,
} from '../../src/pattern/index.js';
import { PatternError } from '../../src/error.js';

describe('Pattern', () => {
  describe('parseDimension', () => {
    it('parses non-negative integers as literals', () => {
      expect(parseDimension(3)).toEqual({ kind: 'literal', size: 3 });
      expect(parseDimension(0)).toEqual({ kind: 'literal', size: 0 });
    });

    it('parses strings as symbols', () => {
      expect(parseDimension('B')).toEqual({ kind: 'symbol', name: 'B' });
    });

    it('keeps numeric-looking strings as symbols', () => {
      expect(parseDimension('3')).toEqual({ kind: 'symbol', name: '3' });
    });

    it('parses ANY as a wildcard', () => {
      expect(ANY).toBe(-1);
      expect(parseDimension(ANY)).toEqual({ kind: 'wildcard' });
    });

    it('throws on negative literals', () => {
      expect(() => parseDimension(-2)).toThrow(PatternError);
      expect(() => parseDimension(-2)).toThrow('negative literal -2');
    });

    it('throws on unsupported specifiers', () => {
      for (const bad of [2.5, NaN, Infinity, true, null, undefined, {}, [2]]) {
        expect(() => parseDimension(bad)).toThrow(PatternError);
      }
    });

    it('throws on empty symbol names', () => {
      expect(() => parseDimension('')).toThrow('symbol name must not be empty');
    });

    it('records where the specifier was found', () => {
      try {
        parseDimension(1.5, 2, 1);
        expect.unreachable();
      } catch (err) {
        if (!(err instanceof PatternError)) throw err;
        expect(err.arrayIndex).toBe(1);
        expect(err.position).toBe(2);
        expect(err.specifier).toBe(1.5);
        expect(err.message).toBe(
          'Pattern for array 1, dimension 2: unsupported dimension specifier 1.5'
        );
      }
    });
  });

  describe('parsePattern', () => {
    it('parses mixed patterns', () => {
      expect(parsePattern(['B', ANY, 3])).toEqual([symbol('B'), wildcard(), literal(3)]);
    });

    it('parses the empty pattern', () => {
      expect(parsePattern([])).toEqual([]);
    });

    it('returns a frozen pattern', () => {
      expect(Object.isFrozen(parsePattern(['B', 2]))).toBe(true);
    });

    it('rejects empty slots', () => {
      try {
        parsePattern(new Array(2), 0);
        expect.unreachable();
      } catch (err) {
        if (!(err instanceof PatternError)) throw err;
        expect(err.arrayIndex).toBe(0);
        expect(err.position).toBe(0);
        expect(err.message).toBe(
          'Pattern for array 0, dimension 0: unsupported dimension specifier undefined'
        );
      }
    });

    it('rejects string patterns', () => {
      expect(() => parsePattern('BD')).toThrow(
        'Pattern: pattern must be a list of dimensions, got string "BD"'
      );
    });

    it('rejects non-list patterns', () => {
      expect(() => parsePattern(3, 0)).toThrow(
        'Pattern for array 0: pattern must be a list of dimensions, got 3'
      );
    });
  });

  describe('parsePatterns', () => {
    it('parses every pattern in order', () => {
      expect(parsePatterns([['B', 2], [ANY]])).toEqual([
        [symbol('B'), literal(2)],
        [wildcard()],
      ]);
    });

    it('names the pattern that failed', () => {
      expect(() => parsePatterns([['B'], ['B', -5]])).toThrow(
        'Pattern for array 1, dimension 1: negative literal -5 (use ANY for a wildcard)'
      );
    });
  });

  describe('formatting', () => {
    it('formats each dimension kind', () => {
      expect(dimensionToString(literal(2))).toBe('2');
      expect(dimensionToString(symbol('B'))).toBe('B');
      expect(dimensionToString(wildcard())).toBe('*');
    });

    it('quotes symbol names that are not identifiers', () => {
      expect(dimensionToString(symbol('3'))).toBe('"3"');
      expect(dimensionToString(symbol('batch size'))).toBe('"batch size"');
    });

    it('formats patterns', () => {
      expect(patternToString(parsePattern(['B', 'D', 2, ANY]))).toBe('(B, D, 2, *)');
      expect(patternToString([])).toBe('()');
    });
  });
});
