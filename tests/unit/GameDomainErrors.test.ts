/**
 * Tests for GameDomainErrors - Structured error types for the host layers
 * @module tests/unit/GameDomainErrors.test
 */

import {
  AgentTimeoutError,
  ERROR_EXIT_CODE,
  EmptyDatasetError,
  GameError,
  GameErrorCode,
  InputClosedError,
  getExitCode,
  isFatalError,
  isGameError,
  wrapError,
  type GameErrorJSON,
} from '../../src/shared/errors/GameDomainErrors';
import {
  BoardConstraintViolation,
  EngineErrorCode,
  RecordFormatError,
} from '../../src/shared/engine/errors';

describe('GameDomainErrors', () => {
  describe('ERROR_EXIT_CODE mapping', () => {
    it('gives each category its own exit code', () => {
      expect(ERROR_EXIT_CODE[GameErrorCode.SESSION_INPUT_CLOSED]).toBe(2);
      expect(ERROR_EXIT_CODE[GameErrorCode.AGENT_TIMEOUT]).toBe(3);
      expect(ERROR_EXIT_CODE[GameErrorCode.DATASET_IO_FAILED]).toBe(4);
      expect(ERROR_EXIT_CODE[GameErrorCode.CONFIGURATION_ERROR]).toBe(1);
    });
  });

  describe('GameError', () => {
    it('should carry code, context and fatality', () => {
      const error = new GameError(GameErrorCode.AGENT_IO_FAILED, 'disk full', { path: '/tmp/x' });
      expect(error).toBeInstanceOf(Error);
      expect(error.name).toBe('GameError');
      expect(error.code).toBe(GameErrorCode.AGENT_IO_FAILED);
      expect(error.context).toEqual({ path: '/tmp/x' });
      expect(error.isFatal).toBe(false);
      expect(error.exitCode).toBe(3);
    });

    it('should serialize to JSON', () => {
      const error = new GameError(GameErrorCode.INTERNAL_ERROR, 'boom', { ply: 4 }, true);
      const json: GameErrorJSON = error.toJSON();
      expect(json).toEqual({
        error: true,
        code: 'INTERNAL_ERROR',
        message: 'boom',
        context: { ply: 4 },
        isFatal: true,
        timestamp: error.timestamp.toISOString(),
      });
    });
  });

  describe('specific errors', () => {
    it('InputClosedError names the waiting player', () => {
      const error = new InputClosedError(2, { ply: 7 });
      expect(error).toBeInstanceOf(InputClosedError);
      expect(error).toBeInstanceOf(GameError);
      expect(error.message).toBe("Input closed while waiting for player 2's move");
      expect(error.context).toEqual({ player: 2, ply: 7 });
      expect(error.isFatal).toBe(true);
    });

    it('AgentTimeoutError records the deadline', () => {
      const error = new AgentTimeoutError(250);
      expect(error.message).toBe('External agent did not answer within 250ms');
      expect(error.code).toBe(GameErrorCode.AGENT_TIMEOUT);
      expect(isFatalError(error)).toBe(true);
    });

    it('EmptyDatasetError names the operation', () => {
      const error = new EmptyDatasetError('save');
      expect(error.message).toBe('Cannot save on an empty dataset');
      expect(error.exitCode).toBe(4);
      expect(isFatalError(error)).toBe(false);
    });
  });

  describe('utilities', () => {
    it('isGameError only accepts GameError instances', () => {
      expect(isGameError(new EmptyDatasetError('x'))).toBe(true);
      expect(isGameError(new Error('x'))).toBe(false);
      expect(isGameError('x')).toBe(false);
    });

    it('getExitCode falls back to 1', () => {
      expect(getExitCode(new InputClosedError(1))).toBe(2);
      expect(getExitCode(new Error('x'))).toBe(1);
      expect(getExitCode(undefined)).toBe(1);
    });

    it('getExitCode treats malformed dataset records as dataset failures', () => {
      const error = new RecordFormatError(
        EngineErrorCode.RECORD_LENGTH_MISMATCH,
        'Line 3: Record length 8 does not fit 3N + 6 for any N >= 1'
      );
      expect(getExitCode(error)).toBe(4);
      expect(getExitCode(new BoardConstraintViolation(EngineErrorCode.BOARD_EMPTY_ROW, 'x'))).toBe(1);
    });

    it('wrapError passes GameErrors through and wraps the rest', () => {
      const original = new AgentTimeoutError(10);
      expect(wrapError(original)).toBe(original);

      const wrapped = wrapError(new Error('ENOENT'), GameErrorCode.DATASET_IO_FAILED, { path: 'a' });
      expect(wrapped.code).toBe(GameErrorCode.DATASET_IO_FAILED);
      expect(wrapped.message).toBe('ENOENT');
      expect(wrapped.context.path).toBe('a');
      expect(typeof wrapped.context.originalStack).toBe('string');

      expect(wrapError('plain').code).toBe(GameErrorCode.INTERNAL_ERROR);
      expect(wrapError('plain').message).toBe('plain');
    });
  });
});
