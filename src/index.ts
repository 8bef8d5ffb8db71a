/**
 * shapecheck - Shape patterns for arrays and tensors
 *
 * @example
 * ```ts
 * import { checkShapes, ANY } from 'shapecheck';
 *
 * // x: (4, 3, 2), y: (4, 5, 3)
 * checkShapes([x, y], [['B', 'D', 2], ['B', 5, 'D']]);  // B = 4, D = 3
 *
 * // Wildcards match any size
 * checkShapes([x], [[ANY, 'D', 2]]);
 *
 * // Report every mismatch instead of the first
 * checkShapes([x, y], [['B', 3, 2], ['B', 3, 'D']], { policy: 'collect-all' });
 * ```
 *
 * @packageDocumentation
 */

// === Checking ===
export { checkShapes, checkShape, matchShapes } from './check.js';
export type { CheckOptions, MatchResult } from './check.js';

// === Patterns ===
export type {
  DimensionSpec,
  LiteralDim,
  SymbolDim,
  WildcardDim,
  ShapePattern,
  DimensionSpecifier,
  PatternSpec,
} from './pattern/index.js';
export {
  ANY,
  literal,
  symbol,
  wildcard,
  dimensionToString,
  patternToString,
  parseDimension,
  parsePattern,
  parsePatterns,
} from './pattern/index.js';

// === Shapes ===
export type { ActualShape, ShapeAdapter } from './shape/index.js';
export { shapeOf, validateShape, shapeEquals, shapeToString } from './shape/index.js';

// === Bindings and Matching ===
export { BindingTable } from './binding/index.js';
export { matchShape, resolveShapes } from './match/index.js';
export type {
  FailurePolicy,
  ResolveOptions,
  Resolution,
  MismatchRecord,
  RankMismatch,
  LiteralMismatch,
  SymbolMismatch,
} from './match/index.js';

// === Reporting ===
export { sortMismatches, formatMismatch, reportMismatches } from './report/index.js';

// === Errors ===
export {
  ShapeCheckError,
  InputLengthError,
  PatternError,
  ShapeReadError,
  OptionsError,
  ShapeError,
  RankMismatchError,
  LiteralMismatchError,
  SymbolConflictError,
} from './error.js';
export type { PatternLocation } from './error.js';
