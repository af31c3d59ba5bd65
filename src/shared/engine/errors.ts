/**
 * Engine Domain Errors - Structured error types for the rules engine layer
 *
 * Illegal moves are never errors: the rules engine reports them as a `null`
 * transition. The types here cover the cases where a caller hands the engine
 * data it cannot represent at all.
 *
 * Error Categories:
 * - **BoardConstraintViolation**: rows/stores that do not form a Kalah board
 * - **MoveRequirementError**: move codes that cannot name any move
 * - **RecordFormatError**: flat dataset records that cannot be decoded
 *
 * Relationship to GameDomainErrors:
 * - GameDomainErrors (src/shared/errors/GameDomainErrors.ts) handles session-level
 *   errors (closed input, agent timeouts, dataset files).
 * - EngineErrors handles board/record-level errors.
 *
 * Usage:
 * ```typescript
 * throw new BoardConstraintViolation(
 *   EngineErrorCode.BOARD_ROW_LENGTH_MISMATCH,
 *   'Rows must have the same number of pits',
 *   { row1: 6, row2: 5 }
 * );
 * ```
 * @module EngineErrors
 */

// =============================================================================
// ERROR CODES
// =============================================================================

/**
 * Enumeration of all engine domain error codes.
 *
 * Error codes are prefixed by category:
 * - BOARD_*: Board shape/content issues
 * - MOVE_*: Move encoding issues
 * - RECORD_*: Dataset record issues
 * - INTERNAL_*: Engine bugs
 */
export enum EngineErrorCode {
  /** The two pit rows have different lengths */
  BOARD_ROW_LENGTH_MISMATCH = 'BOARD_ROW_LENGTH_MISMATCH',
  /** A board must have at least one pit per player */
  BOARD_EMPTY_ROW = 'BOARD_EMPTY_ROW',
  /** Pit or store counts must be non-negative integers */
  BOARD_INVALID_COUNT = 'BOARD_INVALID_COUNT',
  /** A board was converted to a fixed shape with a different pit count */
  BOARD_PIT_COUNT_MISMATCH = 'BOARD_PIT_COUNT_MISMATCH',
  /** Ply and turn fields are out of range */
  BOARD_INVALID_TURN_STATE = 'BOARD_INVALID_TURN_STATE',

  /** A move code does not name any move */
  MOVE_INVALID_CODE = 'MOVE_INVALID_CODE',

  /** A record's length does not fit 3N + 6 */
  RECORD_LENGTH_MISMATCH = 'RECORD_LENGTH_MISMATCH',
  /** A record's state field is not a valid count/flag/turn */
  RECORD_INVALID_FIELD = 'RECORD_INVALID_FIELD',
  /** A CSV header does not match the expected column layout */
  RECORD_HEADER_MISMATCH = 'RECORD_HEADER_MISMATCH',

  /** Assertion failed - indicates a bug */
  INTERNAL_ASSERTION_FAILED = 'INTERNAL_ASSERTION_FAILED',
}

/**
 * Maps error codes to human-readable category descriptions.
 */
export const ERROR_CATEGORY_DESCRIPTIONS: Record<string, string> = {
  BOARD_: 'Board shape or content constraint violation',
  MOVE_: 'Move encoding error',
  RECORD_: 'Malformed dataset record',
  INTERNAL_: 'Internal engine error (bug)',
};

// =============================================================================
// BASE ERROR CLASS
// =============================================================================

export class EngineError extends Error {
  /** Error code for programmatic handling */
  readonly code: EngineErrorCode;

  /** Additional context for debugging */
  readonly context: Record<string, unknown>;

  /** Domain that generated the error (e.g., 'Board', 'Record') */
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

    Object.setPrototypeOf(this, EngineError.prototype);
  }

  /** Get error category from code prefix */
  get category(): string {
    const prefix = this.code.split('_')[0] + '_';
    return ERROR_CATEGORY_DESCRIPTIONS[prefix] ?? 'Unknown error category';
  }

  /** Serialize to a JSON-safe object for logging/debugging */
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
 * Thrown when rows, stores or turn fields cannot form a Kalah board, or when
 * a board is converted into a fixed shape of a different size.
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

export class MoveRequirementError extends EngineError {
  constructor(
    code: EngineErrorCode,
    message: string,
    context: Record<string, unknown> = {},
    domain: string = 'Move'
  ) {
    super(code, message, context, domain);
    this.name = 'MoveRequirementError';
    Object.setPrototypeOf(this, MoveRequirementError.prototype);
  }
}

/**
 * Thrown when a flat dataset record (or a CSV header describing one) cannot
 * be decoded. Utility columns are allowed to hold NaN; state columns are not.
 */
export class RecordFormatError extends EngineError {
  constructor(
    code: EngineErrorCode,
    message: string,
    context: Record<string, unknown> = {},
    domain: string = 'Record'
  ) {
    super(code, message, context, domain);
    this.name = 'RecordFormatError';
    Object.setPrototypeOf(this, RecordFormatError.prototype);
  }
}

// =============================================================================
// TYPE GUARDS
// =============================================================================

export function isEngineError(error: unknown): error is EngineError {
  return error instanceof EngineError;
}

export function isBoardConstraintViolation(error: unknown): error is BoardConstraintViolation {
  return error instanceof BoardConstraintViolation;
}

export function isRecordFormatError(error: unknown): error is RecordFormatError {
  return error instanceof RecordFormatError;
}
