import type {
  MismatchRecord,
  RankMismatch,
  LiteralMismatch,
  SymbolMismatch,
} from './match/mismatch.js';

/**
 * Base error class for shapecheck.
 */
export class ShapeCheckError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ShapeCheckError';
  }
}

/**
 * Error thrown when the number of arrays and patterns differ.
 */
export class InputLengthError extends ShapeCheckError {
  readonly arrayCount: number;
  readonly patternCount: number;

  constructor(arrayCount: number, patternCount: number) {
    super(`Got ${arrayCount} arrays and ${patternCount} patterns`);
    this.name = 'InputLengthError';
    this.arrayCount = arrayCount;
    this.patternCount = patternCount;
  }
}

/**
 * Where a pattern error was found.
 */
export interface PatternLocation {
  /** Position of the pattern in the call */
  readonly arrayIndex?: number;
  /** Position of the dimension in the pattern */
  readonly position?: number;
}

/**
 * Error thrown when a pattern cannot be parsed.
 */
export class PatternError extends ShapeCheckError {
  readonly specifier: unknown;
  readonly arrayIndex?: number;
  readonly position?: number;

  constructor(reason: string, specifier: unknown, location: PatternLocation = {}) {
    super(`${patternPrefix(location)}: ${reason}`);
    this.name = 'PatternError';
    this.specifier = specifier;
    this.arrayIndex = location.arrayIndex;
    this.position = location.position;
  }
}

function patternPrefix({ arrayIndex, position }: PatternLocation): string {
  const where = arrayIndex === undefined ? 'Pattern' : `Pattern for array ${arrayIndex}`;
  return position === undefined ? where : `${where}, dimension ${position}`;
}

/**
 * Error thrown when an array's shape cannot be read.
 */
export class ShapeReadError extends ShapeCheckError {
  readonly arrayIndex?: number;

  constructor(message: string, arrayIndex?: number) {
    super(arrayIndex === undefined ? message : `Array ${arrayIndex}: ${message}`);
    this.name = 'ShapeReadError';
    this.arrayIndex = arrayIndex;
  }
}

/**
 * Error thrown when check options are invalid.
 */
export class OptionsError extends ShapeCheckError {
  constructor(message: string) {
    super(message);
    this.name = 'OptionsError';
  }
}

/**
 * Error thrown when shapes do not match their patterns.
 *
 * `expected` and `got` describe the first mismatch; `mismatches` holds
 * every mismatch found, in array then dimension order.
 */
export class ShapeError extends ShapeCheckError {
  readonly expected: string;
  readonly got: string;
  readonly mismatches: readonly MismatchRecord[];

  constructor(message: string, expected: string, got: string, mismatches: readonly MismatchRecord[]) {
    super(message);
    this.name = 'ShapeError';
    this.expected = expected;
    this.got = got;
    this.mismatches = mismatches;
  }
}

/**
 * Error thrown when an array's rank differs from its pattern's length.
 */
export class RankMismatchError extends ShapeError {
  readonly mismatch: RankMismatch;

  constructor(
    message: string,
    expected: string,
    got: string,
    mismatch: RankMismatch,
    mismatches: readonly MismatchRecord[] = [mismatch]
  ) {
    super(message, expected, got, mismatches);
    this.name = 'RankMismatchError';
    this.mismatch = mismatch;
  }
}

/**
 * Error thrown when a dimension differs from a literal size.
 */
export class LiteralMismatchError extends ShapeError {
  readonly mismatch: LiteralMismatch;

  constructor(
    message: string,
    expected: string,
    got: string,
    mismatch: LiteralMismatch,
    mismatches: readonly MismatchRecord[] = [mismatch]
  ) {
    super(message, expected, got, mismatches);
    this.name = 'LiteralMismatchError';
    this.mismatch = mismatch;
  }
}

/**
 * Error thrown when a symbol sees a size other than the one it is bound to.
 */
export class SymbolConflictError extends ShapeError {
  readonly mismatch: SymbolMismatch;

  constructor(
    message: string,
    expected: string,
    got: string,
    mismatch: SymbolMismatch,
    mismatches: readonly MismatchRecord[] = [mismatch]
  ) {
    super(message, expected, got, mismatches);
    this.name = 'SymbolConflictError';
    this.mismatch = mismatch;
  }

  /** Name of the conflicting symbol */
  get symbol(): string {
    return this.mismatch.symbol;
  }
}
