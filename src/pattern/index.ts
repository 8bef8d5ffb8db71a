export type {
  DimensionSpec,
  LiteralDim,
  SymbolDim,
  WildcardDim,
  ShapePattern,
  DimensionSpecifier,
  PatternSpec,
} from './dimension.js';
export {
  ANY,
  literal,
  symbol,
  wildcard,
  dimensionToString,
  patternToString,
} from './dimension.js';
export { DimensionSpecifierSchema, parseDimension, parsePattern, parsePatterns } from './parser.js';
