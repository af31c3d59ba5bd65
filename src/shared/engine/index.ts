// =============================================================================
// KALAH RULES ENGINE - PUBLIC API
// =============================================================================
// Sessions, search and dataset code import the rules through this file.
// Everything here is pure: states go in, new states come out.
// =============================================================================

// =============================================================================
// CORE TYPES (from src/shared/types/game.ts)
// =============================================================================

export type {
  PlayerNumber,
  Move,
  PitMove,
  SwapMove,
  GameOutcome,
  MoveUtility,
  BoardRows,
  StorePair,
} from '../types/game';

export {
  SWAP_MOVE,
  otherPlayer,
  playerIndex,
  isPlayerNumber,
  pitMove,
  movesEqual,
  moveToCode,
  moveFromCode,
  compareMoves,
} from '../types/game';

// =============================================================================
// BOARD STATE
// =============================================================================

export type { MancalaBoardView, MancalaBoard, GameStateInit } from './gameState';
export {
  MAX_STONES,
  GameState,
  DynGameState,
  snapshotOf,
  statesEqual,
  rowSum,
  totalStones,
} from './gameState';

export type { InitialStateOptions } from './initialState';
export {
  DEFAULT_PITS,
  DEFAULT_STONES_PER_PIT,
  createInitialGameState,
  createInitialDynGameState,
} from './initialState';

// =============================================================================
// RULES
// =============================================================================

export { swapAllowed, isSwapLegal, validMoves } from './moveGeneration';
export type { MoveRng } from './moveApplication';
export { makeMove, makeMovePit, makeMoveSwap, makeRandomMove } from './moveApplication';
export { isOver, score, outcome } from './victoryLogic';

// =============================================================================
// NOTATION & ORCHESTRATION
// =============================================================================

export { formatMove, formatMoveList, parseMoveInput, formatBoard } from './notation';
export type { MoveRecord, GameEvent } from './GameEngine';
export { GameEngine } from './GameEngine';

// =============================================================================
// ERRORS
// =============================================================================

export type { EngineErrorJSON } from './errors';
export {
  EngineErrorCode,
  EngineError,
  BoardConstraintViolation,
  MoveRequirementError,
  RecordFormatError,
  isEngineError,
  isBoardConstraintViolation,
  isRecordFormatError,
} from './errors';
