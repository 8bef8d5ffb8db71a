/**
 * Actual shapes of array-like values.
 *
 * Shapes are immutable lists of non-negative sizes, one per dimension.
 * - Scalar: []
 * - Vector: [n]
 * - Matrix: [rows, cols]
 */
import { z } from 'zod';
import { ShapeReadError } from '../error.js';
import { describeValue } from '../format.js';

export type ActualShape = readonly number[];

/**
 * Reads the shape of one array. Supplied by the caller for array types
 * the default adapter does not know.
 *
 * @example
 * ```ts
 * const ofMatrix: ShapeAdapter<Matrix> = (m) => [m.rows, m.cols];
 * ```
 */
export type ShapeAdapter<T> = (array: T) => ActualShape;

export const ShapeSchema = z.array(z.number().int().nonnegative());

/**
 * Check that a value is a list of non-negative integer sizes.
 *
 * @param arrayIndex - Position of the array in the call, for the message
 */
export function validateShape(value: unknown, arrayIndex?: number): ActualShape {
  const result = ShapeSchema.safeParse(value);
  if (!result.success) {
    throw new ShapeReadError(
      `shape must be a list of non-negative integers, got ${describeValue(value)}`,
      arrayIndex
    );
  }
  return Object.freeze(result.data);
}

/**
 * Default shape adapter.
 *
 * Accepts:
 * - objects with a `shape` list (ndarray-style tensors)
 * - typed arrays, as vectors
 * - rectangular nested JS arrays, whose rows may be typed arrays
 */
export function shapeOf(value: unknown): ActualShape {
  const rows = rowShape(value);
  if (rows !== undefined) {
    return Object.freeze(rows);
  }
  if (typeof value === 'object' && value !== null && 'shape' in value) {
    return validateShape(value.shape);
  }
  throw new ShapeReadError(`Cannot read a shape from ${describeValue(value)}`);
}

/** Shape of a nested JS array or typed array; undefined for anything else */
function rowShape(value: unknown): number[] | undefined {
  if (Array.isArray(value)) {
    return nestedShape(value);
  }
  if (ArrayBuffer.isView(value) && 'length' in value && typeof value.length === 'number') {
    return [value.length];
  }
  return undefined;
}

function nestedShape(value: readonly unknown[]): number[] {
  const [first, ...rest] = value;
  const inner = rowShape(first);
  if (inner === undefined) {
    if (rest.some((item) => rowShape(item) !== undefined)) {
      throw new ShapeReadError('Cannot read a shape from a ragged nested array');
    }
    return [value.length];
  }

  for (const item of rest) {
    const shape = rowShape(item);
    if (shape === undefined || !shapeEquals(shape, inner)) {
      throw new ShapeReadError('Cannot read a shape from a ragged nested array');
    }
  }
  return [value.length, ...inner];
}

/** Check if two shapes are equal */
export function shapeEquals(a: ActualShape, b: ActualShape): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return false;
  }
  return true;
}

/** Format shape as string for error messages, e.g. `(4, 3, 2)` */
export function shapeToString(shape: ActualShape): string {
  return `(${shape.join(', ')})`;
}
