/**
 * Core value types shared by the Kalah rules engine, the minimax search and
 * every host layer (terminal sessions, external agents, datasets).
 *
 * Player numbers are 1-based to match how the game is presented to people;
 * use {@link playerIndex} whenever a 0-based slot into a two-element array is
 * required.
 */

export type PlayerNumber = 1 | 2;

export function otherPlayer(player: PlayerNumber): PlayerNumber {
  return player === 1 ? 2 : 1;
}

export function playerIndex(player: PlayerNumber): 0 | 1 {
  return player === 1 ? 0 : 1;
}

export function isPlayerNumber(value: unknown): value is PlayerNumber {
  return value === 1 || value === 2;
}

/**
 * A single Kalah move.
 *
 * - 'pit'  – sow the stones from the mover's pit `pit` (1-based, 1..N).
 * - 'swap' – second player's early option to take over the first player's
 *            position (mirrors rows and stores).
 */
export type Move = PitMove | SwapMove;

export interface PitMove {
  readonly type: 'pit';
  readonly pit: number;
}

export interface SwapMove {
  readonly type: 'swap';
}

export const SWAP_MOVE: SwapMove = Object.freeze({ type: 'swap' });

export function pitMove(pit: number): PitMove {
  return { type: 'pit', pit };
}

export function movesEqual(a: Move, b: Move): boolean {
  if (a.type === 'swap' || b.type === 'swap') {
    return a.type === b.type;
  }
  return a.pit === b.pit;
}

/**
 * Integer move code used by flat dataset records and the file-based agent
 * protocol: 0 is Swap, k is Pit(k).
 */
export function moveToCode(move: Move): number {
  return move.type === 'swap' ? 0 : move.pit;
}

/**
 * Inverse of {@link moveToCode}. Returns null for negative or fractional codes;
 * upper-bound checks against a board's pit count are the rules engine's job.
 */
export function moveFromCode(code: number): Move | null {
  if (!Number.isInteger(code) || code < 0) {
    return null;
  }
  return code === 0 ? SWAP_MOVE : pitMove(code);
}

/** Total order used for display: pits ascending, swap after every pit. */
export function compareMoves(a: Move, b: Move): number {
  if (a.type === 'swap') return b.type === 'swap' ? 0 : 1;
  if (b.type === 'swap') return -1;
  return a.pit - b.pit;
}

export type GameOutcome =
  | { readonly kind: 'winner'; readonly player: PlayerNumber }
  | { readonly kind: 'tie' }
  | { readonly kind: 'ongoing' };

/** A (move, utility) pair produced by search. */
export interface MoveUtility {
  readonly move: Move;
  readonly utility: number;
}

/** Row pair, index 0 for Player 1 and index 1 for Player 2. */
export type BoardRows = [number[], number[]];
export type StorePair = [number, number];
