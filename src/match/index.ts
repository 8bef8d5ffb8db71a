export type {
  MismatchRecord,
  RankMismatch,
  LiteralMismatch,
  SymbolMismatch,
} from './mismatch.js';
export type { FailurePolicy, ResolveOptions, Resolution } from './matcher.js';
export { matchShape, resolveShapes } from './matcher.js';
