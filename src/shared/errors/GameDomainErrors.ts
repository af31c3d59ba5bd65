/**
 * Game Domain Errors - Structured error types for the host layers
 *
 * These cover failures around the rules engine rather than inside it:
 * interactive sessions, the file-based external agent, and datasets.
 *
 * Error Categories:
 * - **Session Errors**: input streams closing mid-game
 * - **Agent Errors**: external agents that never answer, unreadable files
 * - **Dataset Errors**: empty datasets, persistence failures
 *
 * Usage:
 * ```typescript
 * import { AgentTimeoutError, isGameError } from './GameDomainErrors';
 *
 * throw new AgentTimeoutError(30000, { ply: 7, dir: './agent' });
 *
 * if (isGameError(error)) {
 *   process.exitCode = error.exitCode;
 * }
 * ```
 *
 * @module GameDomainErrors
 */

import { isRecordFormatError } from '../engine/errors';

// ═══════════════════════════════════════════════════════════════════════════
// ERROR CODES
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Enumeration of all game domain error codes.
 *
 * Error codes are prefixed by category:
 * - SESSION_*: Interactive play errors
 * - AGENT_*: External agent protocol errors
 * - DATASET_*: Dataset errors
 */
export enum GameErrorCode {
  // Session Errors
  SESSION_INPUT_CLOSED = 'SESSION_INPUT_CLOSED',

  // Agent Errors
  AGENT_TIMEOUT = 'AGENT_TIMEOUT',
  AGENT_IO_FAILED = 'AGENT_IO_FAILED',
  AGENT_CANCELED = 'AGENT_CANCELED',

  // Dataset Errors
  DATASET_EMPTY = 'DATASET_EMPTY',
  DATASET_IO_FAILED = 'DATASET_IO_FAILED',

  // Internal Errors
  INTERNAL_ERROR = 'INTERNAL_ERROR',
  CONFIGURATION_ERROR = 'CONFIGURATION_ERROR',
}

/**
 * Process exit codes the CLI scripts use for each error type.
 */
export const ERROR_EXIT_CODE: Record<GameErrorCode, number> = {
  [GameErrorCode.SESSION_INPUT_CLOSED]: 2,

  [GameErrorCode.AGENT_TIMEOUT]: 3,
  [GameErrorCode.AGENT_IO_FAILED]: 3,
  [GameErrorCode.AGENT_CANCELED]: 3,

  [GameErrorCode.DATASET_EMPTY]: 4,
  [GameErrorCode.DATASET_IO_FAILED]: 4,

  [GameErrorCode.INTERNAL_ERROR]: 1,
  [GameErrorCode.CONFIGURATION_ERROR]: 1,
};

// ═══════════════════════════════════════════════════════════════════════════
// BASE ERROR CLASS
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Base class for all game domain errors.
 *
 * Provides:
 * - Structured error code
 * - Context for debugging
 * - Exit code mapping for the CLI entry points
 */
export class GameError extends Error {
  /** Error code for programmatic handling */
  readonly code: GameErrorCode;

  /** Additional context for debugging */
  readonly context: Record<string, unknown>;

  /** Whether this error is fatal (the session should be aborted) */
  readonly isFatal: boolean;

  readonly timestamp: Date;

  constructor(
    code: GameErrorCode,
    message: string,
    context: Record<string, unknown> = {},
    isFatal: boolean = false
  ) {
    super(message);
    this.name = 'GameError';
    this.code = code;
    this.context = context;
    this.isFatal = isFatal;
    this.timestamp = new Date();

    // Maintain proper prototype chain
    Object.setPrototypeOf(this, GameError.prototype);
  }

  get exitCode(): number {
    return ERROR_EXIT_CODE[this.code] ?? 1;
  }

  toJSON(): GameErrorJSON {
    return {
      error: true,
      code: this.code,
      message: this.message,
      context: this.context,
      isFatal: this.isFatal,
      timestamp: this.timestamp.toISOString(),
    };
  }
}

export interface GameErrorJSON {
  error: true;
  code: string;
  message: string;
  context: Record<string, unknown>;
  isFatal: boolean;
  timestamp: string;
}

// ═══════════════════════════════════════════════════════════════════════════
// SPECIFIC ERROR CLASSES
// ═══════════════════════════════════════════════════════════════════════════

/**
 * The input stream of an interactive session ended while a move was expected.
 */
export class InputClosedError extends GameError {
  constructor(player: number, context: Record<string, unknown> = {}) {
    super(
      GameErrorCode.SESSION_INPUT_CLOSED,
      `Input closed while waiting for player ${player}'s move`,
      { player, ...context },
      true
    );
    this.name = 'InputClosedError';
    Object.setPrototypeOf(this, InputClosedError.prototype);
  }
}

/**
 * The external agent did not produce a legal move before the deadline.
 */
export class AgentTimeoutError extends GameError {
  constructor(timeoutMs: number, context: Record<string, unknown> = {}) {
    super(
      GameErrorCode.AGENT_TIMEOUT,
      `External agent did not answer within ${timeoutMs}ms`,
      { timeoutMs, ...context },
      true
    );
    this.name = 'AgentTimeoutError';
    Object.setPrototypeOf(this, AgentTimeoutError.prototype);
  }
}

export class EmptyDatasetError extends GameError {
  constructor(operation: string, context: Record<string, unknown> = {}) {
    super(
      GameErrorCode.DATASET_EMPTY,
      `Cannot ${operation} on an empty dataset`,
      { operation, ...context },
      false
    );
    this.name = 'EmptyDatasetError';
    Object.setPrototypeOf(this, EmptyDatasetError.prototype);
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// UTILITIES
// ═══════════════════════════════════════════════════════════════════════════

export function isGameError(error: unknown): error is GameError {
  return error instanceof GameError;
}

export function isFatalError(error: unknown): boolean {
  return isGameError(error) && error.isFatal;
}

/**
 * Exit code for an error raised out of a CLI entry point. Malformed dataset
 * records count as dataset failures.
 */
export function getExitCode(error: unknown): number {
  if (isGameError(error)) {
    return error.exitCode;
  }
  if (isRecordFormatError(error)) {
    return ERROR_EXIT_CODE[GameErrorCode.DATASET_IO_FAILED];
  }
  return 1;
}

/**
 * Wrap an unknown error in a GameError.
 */
export function wrapError(
  error: unknown,
  code: GameErrorCode = GameErrorCode.INTERNAL_ERROR,
  context: Record<string, unknown> = {}
): GameError {
  if (isGameError(error)) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const stack = error instanceof Error ? error.stack : undefined;

  return new GameError(code, message, { ...context, originalStack: stack }, false);
}
