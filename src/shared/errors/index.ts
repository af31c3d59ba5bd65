/**
 * Shared Errors Module
 *
 * Structured error types for the host layers around the rules engine.
 *
 * @module errors
 */

export {
  // Error codes
  GameErrorCode,
  ERROR_EXIT_CODE,
  // Base class
  GameError,
  type GameErrorJSON,
  // Specific errors
  InputClosedError,
  AgentTimeoutError,
  EmptyDatasetError,
  // Utilities
  isGameError,
  isFatalError,
  getExitCode,
  wrapError,
} from './GameDomainErrors';
