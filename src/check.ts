import { z } from 'zod';
import { BindingTable } from './binding/table.js';
import { InputLengthError, OptionsError } from './error.js';
import { resolveShapes, type FailurePolicy } from './match/matcher.js';
import type { PatternSpec } from './pattern/dimension.js';
import { parsePatterns } from './pattern/parser.js';
import { reportMismatches } from './report/reporter.js';
import { shapeOf, validateShape, type ShapeAdapter } from './shape/shape.js';

/**
 * Options for a shape check.
 */
export interface CheckOptions<T = unknown> {
  /** Stop at the first mismatch, or report all of them (default 'fail-fast') */
  policy?: FailurePolicy;
  /** Symbol sizes known before the check */
  bindings?: Readonly<Record<string, number>>;
  /** Reads an array's shape (default: shapeOf) */
  shapeOf?: ShapeAdapter<T>;
}

/**
 * Result of a successful check.
 */
export interface MatchResult<A> {
  /** The arrays that were checked */
  readonly arrays: A;
  /** Size of every symbol, including the initial bindings */
  readonly bindings: Readonly<Record<string, number>>;
}

const CheckOptionsSchema = z.object({
  policy: z.enum(['fail-fast', 'collect-all']).default('fail-fast'),
  bindings: z.record(z.string(), z.number().int().nonnegative()).default({}),
});

function resolveOptions<T>(options: CheckOptions<T>) {
  const result = CheckOptionsSchema.safeParse({
    policy: options.policy,
    bindings: options.bindings,
  });
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
    throw new OptionsError(`Invalid check options: ${details}`);
  }
  return result.data;
}

/**
 * Check arrays against shape patterns and return the symbol bindings.
 *
 * Checks, in order: equal numbers of arrays and patterns, every pattern
 * parses, then every shape matches with one binding per symbol across
 * all patterns.
 *
 * @example
 * ```ts
 * const { bindings } = matchShapes([x, w], [['B', 'D'], ['D', 8]]);
 * bindings.D;  // inner dimension shared by x and w
 * ```
 *
 * @throws InputLengthError if arrays and patterns differ in number
 * @throws PatternError if a pattern is malformed
 * @throws ShapeReadError if a shape cannot be read
 * @throws ShapeError (RankMismatchError, LiteralMismatchError or
 *   SymbolConflictError) if a shape does not match
 */
export function matchShapes<A extends readonly unknown[]>(
  arrays: A,
  patterns: readonly PatternSpec[],
  options: CheckOptions<A[number]> = {}
): MatchResult<A> {
  if (arrays.length !== patterns.length) {
    throw new InputLengthError(arrays.length, patterns.length);
  }

  const { policy, bindings } = resolveOptions(options);
  const parsed = parsePatterns(patterns);
  const adapter: ShapeAdapter<A[number]> = options.shapeOf ?? shapeOf;
  const items: readonly A[number][] = arrays;
  const shapes = items.map((array, index) => validateShape(adapter(array), index));

  const resolution = resolveShapes(shapes, parsed, {
    policy,
    table: new BindingTable(bindings),
  });
  const error = reportMismatches(resolution.mismatches);
  if (error) throw error;

  return { arrays, bindings: resolution.bindings.toRecord() };
}

/**
 * Check arrays against shape patterns.
 *
 * A symbol ('B') takes its size from the first array it appears in, and
 * every later occurrence must agree. ANY matches any size.
 *
 * @returns The same arrays, for chaining
 *
 * @example
 * ```ts
 * checkShapes([x, y], [['B', 'D', 2], ['B', 5, 'D']]);
 * checkShapes([x, y], [['B', ANY], ['B']], { policy: 'collect-all' });
 * ```
 */
export function checkShapes<A extends readonly unknown[]>(
  arrays: A,
  patterns: readonly PatternSpec[],
  options?: CheckOptions<A[number]>
): A {
  return matchShapes(arrays, patterns, options).arrays;
}

/**
 * Check a single array against a shape pattern.
 *
 * @example
 * ```ts
 * const image = checkShape(input, [ANY, 3, 'H', 'W']);
 * ```
 */
export function checkShape<T>(array: T, pattern: PatternSpec, options?: CheckOptions<T>): T {
  matchShapes([array], [pattern], options);
  return array;
}
