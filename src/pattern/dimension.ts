/**
 * Dimension specs for shape patterns.
 *
 * A pattern dimension is one of:
 * - Literal: a fixed size, e.g. 3
 * - Symbol: a named size, e.g. 'B', bound on first sight
 * - Wildcard: any size, never bound
 */
export type DimensionSpec = LiteralDim | SymbolDim | WildcardDim;

export interface LiteralDim {
  readonly kind: 'literal';
  readonly size: number;
}

export interface SymbolDim {
  readonly kind: 'symbol';
  readonly name: string;
}

export interface WildcardDim {
  readonly kind: 'wildcard';
}

/** A parsed pattern: one spec per dimension */
export type ShapePattern = readonly DimensionSpec[];

/**
 * Marker for a dimension of any size.
 *
 * @example
 * ```ts
 * checkShape(x, [ANY, 'D']);  // any batch size, D bound
 * ```
 */
export const ANY = -1;

/** What a caller writes for one dimension: a size, a symbol name or ANY */
export type DimensionSpecifier = number | string;

/** What a caller writes for one array */
export type PatternSpec = readonly DimensionSpecifier[];

/** Create a literal dimension */
export function literal(size: number): LiteralDim {
  return { kind: 'literal', size };
}

/** Create a symbolic dimension */
export function symbol(name: string): SymbolDim {
  return { kind: 'symbol', name };
}

const WILDCARD: WildcardDim = Object.freeze({ kind: 'wildcard' });

/** Create a wildcard dimension */
export function wildcard(): WildcardDim {
  return WILDCARD;
}

/** Format one dimension spec; symbol names that are not identifiers are quoted */
export function dimensionToString(dim: DimensionSpec): string {
  switch (dim.kind) {
    case 'literal':
      return String(dim.size);
    case 'symbol':
      return /^[A-Za-z_$][\w$]*$/.test(dim.name) ? dim.name : JSON.stringify(dim.name);
    case 'wildcard':
      return '*';
  }
}

/** Format a pattern for error messages, e.g. `(B, D, 2, *)` */
export function patternToString(pattern: ShapePattern): string {
  return `(${pattern.map(dimensionToString).join(', ')})`;
}
