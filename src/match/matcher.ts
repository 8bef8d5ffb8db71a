/**
 * Binding resolver and matcher.
 *
 * Walks (shape, pattern) pairs in order, array by array and dimension by
 * dimension, binding symbols on first sight and comparing every later
 * occurrence against the binding.
 */
import type { ShapePattern } from '../pattern/dimension.js';
import type { ActualShape } from '../shape/shape.js';
import { BindingTable } from '../binding/table.js';
import { InputLengthError } from '../error.js';
import type { MismatchRecord } from './mismatch.js';

/**
 * When to stop matching.
 *
 * - fail-fast: stop at the first mismatch
 * - collect-all: check everything; an array with the wrong rank has no
 *   dimension checked
 */
export type FailurePolicy = 'fail-fast' | 'collect-all';

/**
 * Match one array's shape against its pattern.
 *
 * Symbols seen for the first time are bound in `table`. A conflicting
 * occurrence leaves the earlier binding in place.
 *
 * @returns Mismatches found, in dimension order (at most one under fail-fast)
 */
export function matchShape(
  shape: ActualShape,
  pattern: ShapePattern,
  arrayIndex: number,
  table: BindingTable,
  policy: FailurePolicy = 'fail-fast'
): MismatchRecord[] {
  if (shape.length !== pattern.length) {
    return [
      {
        kind: 'rank',
        arrayIndex,
        expectedRank: pattern.length,
        actualRank: shape.length,
        pattern,
        shape,
      },
    ];
  }

  const mismatches: MismatchRecord[] = [];
  for (let dimension = 0; dimension < pattern.length; dimension++) {
    const dim = pattern[dimension]!;
    const actual = shape[dimension]!;

    switch (dim.kind) {
      case 'wildcard':
        break;
      case 'literal':
        if (actual !== dim.size) {
          mismatches.push({
            kind: 'literal',
            arrayIndex,
            dimension,
            expected: dim.size,
            actual,
            pattern,
            shape,
          });
        }
        break;
      case 'symbol': {
        const bound = table.get(dim.name);
        if (bound === undefined) {
          table.bind(dim.name, actual);
        } else if (bound !== actual) {
          mismatches.push({
            kind: 'symbol',
            arrayIndex,
            dimension,
            symbol: dim.name,
            expected: bound,
            actual,
            pattern,
            shape,
          });
        }
        break;
      }
    }

    if (policy === 'fail-fast' && mismatches.length > 0) break;
  }
  return mismatches;
}

/**
 * Options for resolving a whole call.
 */
export interface ResolveOptions {
  /** Defaults to 'fail-fast' */
  policy?: FailurePolicy;
  /** Table to bind into; a fresh one by default */
  table?: BindingTable;
}

/**
 * Result of resolving a call.
 */
export interface Resolution {
  /** Every mismatch found, in array then dimension order */
  readonly mismatches: readonly MismatchRecord[];
  /** Bindings made (and seeded) during the call */
  readonly bindings: BindingTable;
}

/**
 * Match every array of one call, sharing one binding table.
 *
 * @throws InputLengthError if shapes and patterns differ in number
 */
export function resolveShapes(
  shapes: readonly ActualShape[],
  patterns: readonly ShapePattern[],
  options: ResolveOptions = {}
): Resolution {
  if (shapes.length !== patterns.length) {
    throw new InputLengthError(shapes.length, patterns.length);
  }

  const policy = options.policy ?? 'fail-fast';
  const table = options.table ?? new BindingTable();
  const mismatches: MismatchRecord[] = [];

  for (let arrayIndex = 0; arrayIndex < shapes.length; arrayIndex++) {
    mismatches.push(...matchShape(shapes[arrayIndex]!, patterns[arrayIndex]!, arrayIndex, table, policy));
    if (policy === 'fail-fast' && mismatches.length > 0) break;
  }

  return { mismatches, bindings: table };
}
