/**
 * Error reporter.
 *
 * Turns mismatch records into one ShapeError whose message names the
 * array, the dimension, the expected and actual sizes, the pattern and
 * the shape of every mismatch.
 */
import {
  ShapeError,
  RankMismatchError,
  LiteralMismatchError,
  SymbolConflictError,
} from '../error.js';
import type { MismatchRecord } from '../match/mismatch.js';
import { patternToString } from '../pattern/dimension.js';
import { shapeToString } from '../shape/shape.js';

/** Sort order of a record within its array; rank mismatches come first */
function dimensionOf(record: MismatchRecord): number {
  return record.kind === 'rank' ? -1 : record.dimension;
}

/**
 * Sort mismatches by array, then by dimension.
 */
export function sortMismatches(records: readonly MismatchRecord[]): MismatchRecord[] {
  return [...records].sort(
    (a, b) => a.arrayIndex - b.arrayIndex || dimensionOf(a) - dimensionOf(b)
  );
}

/**
 * Describe one mismatch on a single line.
 *
 * @example
 * ```ts
 * formatMismatch(record);
 * // 'Array 0, dimension 2: expected 2, got 9 (pattern (B, D, 2), shape (4, 3, 9))'
 * ```
 */
export function formatMismatch(record: MismatchRecord): string {
  const context = `(pattern ${patternToString(record.pattern)}, shape ${shapeToString(record.shape)})`;
  switch (record.kind) {
    case 'rank':
      return `Array ${record.arrayIndex}: expected rank ${record.expectedRank}, got rank ${record.actualRank} ${context}`;
    case 'literal':
      return `Array ${record.arrayIndex}, dimension ${record.dimension}: expected ${record.expected}, got ${record.actual} ${context}`;
    case 'symbol':
      return `Array ${record.arrayIndex}, dimension ${record.dimension}: symbol ${record.symbol} is bound to ${record.expected}, got ${record.actual} ${context}`;
  }
}

/**
 * Build the error for a set of mismatches.
 *
 * The error's class follows the first mismatch in report order; all
 * mismatches are kept on `mismatches`.
 *
 * @returns undefined when there is nothing to report
 */
export function reportMismatches(records: readonly MismatchRecord[]): ShapeError | undefined {
  const sorted = sortMismatches(records);
  const first = sorted[0];
  if (first === undefined) return undefined;

  const message =
    sorted.length === 1
      ? formatMismatch(first)
      : [`${sorted.length} shape mismatches:`, ...sorted.map((r) => `  ${formatMismatch(r)}`)].join('\n');
  const expected = patternToString(first.pattern);
  const got = shapeToString(first.shape);

  switch (first.kind) {
    case 'rank':
      return new RankMismatchError(message, expected, got, first, sorted);
    case 'literal':
      return new LiteralMismatchError(message, expected, got, first, sorted);
    case 'symbol':
      return new SymbolConflictError(message, expected, got, first, sorted);
  }
}
