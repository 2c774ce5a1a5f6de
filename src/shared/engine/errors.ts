/**
 * Engine Domain Errors - Structured error types for the board engine
 *
 * Placement failures (out of bounds, collision) are NOT errors: they are
 * ordinary `PlacementResult` values because a partially applied placement is
 * an expected situation the caller recovers from with `undo()`.
 *
 * The classes here cover precondition violations only:
 * - **InvalidState**: the board is asked to do something its state cannot
 *   support (undo with no snapshot ever taken)
 * - **BoardConstraintViolation**: an index or dimension outside the grid
 * - **PieceShapeError**: a malformed piece description
 *
 * Usage:
 * ```typescript
 * import { BoardConstraintViolation, EngineErrorCode } from './errors';
 *
 * throw new BoardConstraintViolation(
 *   EngineErrorCode.BOARD_INDEX_OUT_OF_RANGE,
 *   'Column index out of range',
 *   { x: 12, width: 10 }
 * );
 * ```
 *
 * @module EngineErrors
 */

// =============================================================================
// ERROR CODES
// =============================================================================

/**
 * Enumeration of all engine error codes.
 *
 * Error codes are prefixed by category:
 * - STATE_*: Board state cannot support the request
 * - BOARD_*: Grid geometry issues
 * - PIECE_*: Piece description issues
 * - INTERNAL_*: Bugs
 */
export enum EngineErrorCode {
  /** undo() called before any mutation ever took a snapshot */
  STATE_NO_BACKUP_AVAILABLE = 'STATE_NO_BACKUP_AVAILABLE',
  /** Cached tallies disagree with the grid cells */
  STATE_TALLY_MISMATCH = 'STATE_TALLY_MISMATCH',
  /** A driver was asked to continue after the board topped out */
  STATE_SESSION_OVER = 'STATE_SESSION_OVER',

  /** Column or row index outside the grid */
  BOARD_INDEX_OUT_OF_RANGE = 'BOARD_INDEX_OUT_OF_RANGE',
  /** Width or height is not a positive integer */
  BOARD_INVALID_DIMENSIONS = 'BOARD_INVALID_DIMENSIONS',

  /** Offsets are empty, non-integer or repeat a cell */
  PIECE_INVALID_SHAPE = 'PIECE_INVALID_SHAPE',

  /** Assertion failed - indicates a bug */
  INTERNAL_ASSERTION_FAILED = 'INTERNAL_ASSERTION_FAILED',
}

/**
 * Maps error code prefixes to human-readable category descriptions.
 */
export const ERROR_CATEGORY_DESCRIPTIONS: Record<string, string> = {
  STATE_: 'Board state cannot support the request',
  BOARD_: 'Grid bounds or dimension violation',
  PIECE_: 'Malformed piece description',
  INTERNAL_: 'Internal engine error (bug)',
};

// =============================================================================
// BASE ERROR CLASS
// =============================================================================

/**
 * Base class for all engine errors.
 */
export class EngineError extends Error {
  /** Error code for programmatic handling */
  readonly code: EngineErrorCode;

  /** Additional context for debugging */
  readonly context: Record<string, unknown>;

  /** Component that raised the error (e.g. 'Board', 'Piece') */
  readonly domain: string;

  readonly timestamp: Date;

  constructor(
    code: EngineErrorCode,
    message: string,
    context: Record<string, unknown> = {},
    domain: string = 'Engine'
  ) {
    super(message);
    this.name = 'EngineError';
    this.code = code;
    this.context = context;
    this.domain = domain;
    this.timestamp = new Date();

    // Maintain proper prototype chain
    Object.setPrototypeOf(this, EngineError.prototype);
  }

  /** Get error category from code prefix */
  get category(): string {
    const prefix = this.code.split('_')[0] + '_';
    return ERROR_CATEGORY_DESCRIPTIONS[prefix] ?? 'Unknown error category';
  }

  /** Serialize to a JSON-safe object for logging */
  toJSON(): EngineErrorJSON {
    return {
      error: true,
      type: this.name,
      code: this.code,
      message: this.message,
      domain: this.domain,
      context: this.context,
      category: this.category,
      timestamp: this.timestamp.toISOString(),
    };
  }
}

/**
 * JSON representation of an EngineError.
 */
export interface EngineErrorJSON {
  error: true;
  type: string;
  code: string;
  message: string;
  domain: string;
  context: Record<string, unknown>;
  category: string;
  timestamp: string;
}

// =============================================================================
// SPECIFIC ERROR CLASSES
// =============================================================================

/**
 * Error for a board state that cannot support the requested operation.
 *
 * Examples:
 * - undo() with no snapshot ever taken
 * - tally audit failure in trace mode
 * - a drop requested after the session ended
 */
export class InvalidState extends EngineError {
  constructor(
    code: EngineErrorCode,
    message: string,
    context: Record<string, unknown> = {},
    domain: string = 'State'
  ) {
    super(code, message, context, domain);
    this.name = 'InvalidState';
    Object.setPrototypeOf(this, InvalidState.prototype);
  }
}

/**
 * Error for grid geometry violations: query indices outside the grid and
 * non-positive dimensions.
 */
export class BoardConstraintViolation extends EngineError {
  constructor(
    code: EngineErrorCode,
    message: string,
    context: Record<string, unknown> = {},
    domain: string = 'Board'
  ) {
    super(code, message, context, domain);
    this.name = 'BoardConstraintViolation';
    Object.setPrototypeOf(this, BoardConstraintViolation.prototype);
  }
}

export class PieceShapeError extends EngineError {
  constructor(message: string, context: Record<string, unknown> = {}, domain: string = 'Piece') {
    super(EngineErrorCode.PIECE_INVALID_SHAPE, message, context, domain);
    this.name = 'PieceShapeError';
    Object.setPrototypeOf(this, PieceShapeError.prototype);
  }
}

// =============================================================================
// TYPE GUARDS
// =============================================================================

export function isEngineError(error: unknown): error is EngineError {
  return error instanceof EngineError;
}

export function isInvalidState(error: unknown): error is InvalidState {
  return error instanceof InvalidState;
}

export function isBoardConstraintViolation(error: unknown): error is BoardConstraintViolation {
  return error instanceof BoardConstraintViolation;
}

export function isPieceShapeError(error: unknown): error is PieceShapeError {
  return error instanceof PieceShapeError;
}

// =============================================================================
// UTILITIES
// =============================================================================

/**
 * Wrap an unknown error in an EngineError.
 *
 * Useful for catching and normalizing errors at domain boundaries.
 */
export function wrapEngineError(
  error: unknown,
  domain: string = 'Engine',
  context: Record<string, unknown> = {}
): EngineError {
  if (isEngineError(error)) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const stack = error instanceof Error ? error.stack : undefined;

  return new EngineError(
    EngineErrorCode.INTERNAL_ASSERTION_FAILED,
    message,
    { ...context, originalStack: stack },
    domain
  );
}

/**
 * Create the standard out-of-range error for a column or row lookup.
 */
export function indexOutOfRange(
  axis: 'column' | 'row',
  index: number,
  limit: number,
  domain: string = 'Board'
): BoardConstraintViolation {
  const label = axis === 'column' ? 'Column' : 'Row';
  return new BoardConstraintViolation(
    EngineErrorCode.BOARD_INDEX_OUT_OF_RANGE,
    `${label} index ${index} is outside [0, ${limit})`,
    { axis, index, limit },
    domain
  );
}
