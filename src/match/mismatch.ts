import type { ShapePattern } from '../pattern/dimension.js';
import type { ActualShape } from '../shape/shape.js';

interface MismatchBase {
  /** Position of the array in the call */
  readonly arrayIndex: number;
  /** The pattern the array was checked against */
  readonly pattern: ShapePattern;
  /** The array's shape */
  readonly shape: ActualShape;
}

/**
 * The array's rank differs from the pattern's length.
 * No dimension of the array was compared.
 */
export interface RankMismatch extends MismatchBase {
  readonly kind: 'rank';
  readonly expectedRank: number;
  readonly actualRank: number;
}

/** A dimension differs from the pattern's literal size */
export interface LiteralMismatch extends MismatchBase {
  readonly kind: 'literal';
  readonly dimension: number;
  readonly expected: number;
  readonly actual: number;
}

/** A dimension differs from the size its symbol is bound to */
export interface SymbolMismatch extends MismatchBase {
  readonly kind: 'symbol';
  readonly dimension: number;
  readonly symbol: string;
  /** The size the symbol was bound to */
  readonly expected: number;
  readonly actual: number;
}

/**
 * One shape mismatch.
 *
 * - rank: wrong number of dimensions
 * - literal: dimension differs from a fixed size
 * - symbol: dimension conflicts with an earlier binding
 */
export type MismatchRecord = RankMismatch | LiteralMismatch | SymbolMismatch;
