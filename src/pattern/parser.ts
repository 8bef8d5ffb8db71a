/**
 * Pattern parser.
 *
 * Turns what a caller writes for each array, e.g. `['B', 'D', 2]`, into a
 * ShapePattern of literal, symbolic and wildcard dimensions.
 *
 * Specifiers:
 * - non-negative integer: literal size
 * - ANY (-1): wildcard
 * - non-empty string: symbol, identified by exact string equality
 */
import { z } from 'zod';
import { PatternError } from '../error.js';
import { describeValue } from '../format.js';
import { ANY, type DimensionSpec, type ShapePattern, literal, symbol, wildcard } from './dimension.js';

export const DimensionSpecifierSchema = z.union([
  z.literal(ANY).transform(() => wildcard()),
  z.number().int().nonnegative().transform((size) => literal(size)),
  z.string().min(1).transform((name) => symbol(name)),
]);

/**
 * Parse one dimension specifier.
 *
 * @param position - Position of the dimension in its pattern
 * @param arrayIndex - Position of the pattern in the call
 */
export function parseDimension(
  specifier: unknown,
  position?: number,
  arrayIndex?: number
): DimensionSpec {
  const result = DimensionSpecifierSchema.safeParse(specifier);
  if (!result.success) {
    throw new PatternError(rejectReason(specifier), specifier, { arrayIndex, position });
  }
  return result.data;
}

function rejectReason(specifier: unknown): string {
  if (typeof specifier === 'number' && Number.isInteger(specifier) && specifier < 0) {
    return `negative literal ${specifier} (use ANY for a wildcard)`;
  }
  if (specifier === '') {
    return 'symbol name must not be empty';
  }
  return `unsupported dimension specifier ${describeValue(specifier)}`;
}

/**
 * Parse the pattern for one array.
 *
 * @example
 * ```ts
 * parsePattern(['B', ANY, 3]);
 * // [{ kind: 'symbol', name: 'B' }, { kind: 'wildcard' }, { kind: 'literal', size: 3 }]
 * ```
 */
export function parsePattern(spec: unknown, arrayIndex?: number): ShapePattern {
  if (typeof spec === 'string') {
    throw new PatternError(
      `pattern must be a list of dimensions, got string ${JSON.stringify(spec)}`,
      spec,
      { arrayIndex }
    );
  }
  if (!Array.isArray(spec)) {
    throw new PatternError(
      `pattern must be a list of dimensions, got ${describeValue(spec)}`,
      spec,
      { arrayIndex }
    );
  }
  // Array.from visits holes, which map skips
  return Object.freeze(
    Array.from(spec, (specifier: unknown, position) => parseDimension(specifier, position, arrayIndex))
  );
}

/** Parse the patterns of every array in a call, in order */
export function parsePatterns(specs: readonly unknown[]): ShapePattern[] {
  return specs.map((spec, arrayIndex) => parsePattern(spec, arrayIndex));
}
