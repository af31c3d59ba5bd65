/**
 * Test Fixtures and Utilities
 * Common boards and helpers for the Kalah tests
 */

import { DynGameState, GameState, type GameStateInit } from '../../src/shared/engine/gameState';
import type { PlayerNumber } from '../../src/shared/types/game';
import type { Rng } from '../../src/shared/utils/rng';

/**
 * Fixed-length board from literal rows. Stores default to empty, ply to 1 and
 * the turn to Player 1.
 */
export function board(
  row1: number[],
  row2: number[],
  overrides: Omit<Partial<GameStateInit>, 'rows'> = {}
): GameState {
  return GameState.fromInit({ rows: [row1, row2], ...overrides });
}

export function dynBoard(
  row1: number[],
  row2: number[],
  overrides: Omit<Partial<GameStateInit>, 'rows'> = {}
): DynGameState {
  return DynGameState.fromInit({ rows: [row1, row2], ...overrides });
}

/** Board with `player` to move, everything else as in {@link board}. */
export function boardFor(player: PlayerNumber, row1: number[], row2: number[]): GameState {
  return board(row1, row2, { currentTurn: player });
}

/** Rng that replays `values` in order, then repeats the last one. */
export function sequenceRng(values: number[]): Rng {
  let index = 0;
  return () => {
    const value = values[Math.min(index, values.length - 1)];
    index += 1;
    return value;
  };
}

/** Clock that advances by `step` milliseconds on every read. */
export function steppingClock(step: number, start: number = 0): () => number {
  let now = start - step;
  return () => {
    now += step;
    return now;
  };
}
