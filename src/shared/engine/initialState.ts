import { PlayerNumber } from '../types/game';
import { DynGameState, GameState, GameStateInit } from './gameState';

export const DEFAULT_PITS = 6;
export const DEFAULT_STONES_PER_PIT = 4;

export interface InitialStateOptions {
  /** Pits per player (default 6). */
  pits?: number;
  /** Stones placed in every pit (default 4). */
  stonesPerPit?: number;
  stores?: [number, number];
  currentTurn?: PlayerNumber;
  ply?: number;
}

function initialInit(options: InitialStateOptions): GameStateInit {
  const pits = options.pits ?? DEFAULT_PITS;
  const stonesPerPit = options.stonesPerPit ?? DEFAULT_STONES_PER_PIT;
  return {
    rows: [new Array<number>(pits).fill(stonesPerPit), new Array<number>(pits).fill(stonesPerPit)],
    stores: options.stores ?? [0, 0],
    ply: options.ply ?? 1,
    currentTurn: options.currentTurn ?? 1,
    player2Moved: false,
  };
}

/**
 * Creates a start-of-game board in the fixed-length shape.
 *
 * With no options this is the standard Kalah opening: 6 pits of 4 stones per
 * player, empty stores, ply 1, Player 1 to move.
 */
export function createInitialGameState(options: InitialStateOptions = {}): GameState {
  return GameState.fromInit(initialInit(options));
}

/** Same as {@link createInitialGameState}, in the variable-length shape. */
export function createInitialDynGameState(options: InitialStateOptions = {}): DynGameState {
  return DynGameState.fromInit(initialInit(options));
}
