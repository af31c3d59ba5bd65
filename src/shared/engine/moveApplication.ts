import { Move, PlayerNumber, SWAP_MOVE, otherPlayer, pitMove } from '../types/game';
import { MancalaBoard, rowSum } from './gameState';
import { isSwapLegal, validMoves } from './moveGeneration';

/**
 * Kalah move application.
 *
 * Every entry point clones the incoming state and mutates only the clone, so
 * a caller's state is never touched and a rejected move (`null`) has no side
 * effects. Search relies on this to expand many successors from one parent.
 */

/**
 * Apply `move` for the side to move. Returns the successor state, or `null`
 * when the move is illegal:
 * - Pit(n) with n outside 1..N, non-integer n, or an empty pit
 * - Swap when the swap window is closed
 */
export function makeMove<S extends MancalaBoard<S>>(state: S, move: Move): S | null {
  return move.type === 'swap' ? applySwap(state) : applyPit(state, move.pit);
}

export function makeMovePit<S extends MancalaBoard<S>>(state: S, pit: number): S | null {
  return makeMove(state, pitMove(pit));
}

export function makeMoveSwap<S extends MancalaBoard<S>>(state: S): S | null {
  return makeMove(state, SWAP_MOVE);
}

export type MoveRng = () => number;

/**
 * Play a uniformly random legal move. Returns `null` once the game is over.
 */
export function makeRandomMove<S extends MancalaBoard<S>>(
  state: S,
  rng: MoveRng
): { state: S; move: Move } | null {
  const moves = validMoves(state);
  if (moves.length === 0) {
    return null;
  }
  const index = Math.min(Math.floor(rng() * moves.length), moves.length - 1);
  const move = moves[index];
  const next = makeMove(state, move);
  return next ? { state: next, move } : null;
}

function applySwap<S extends MancalaBoard<S>>(state: S): S | null {
  if (!isSwapLegal(state)) {
    return null;
  }
  const next = state.clone();
  next.swapSides();
  next.setCurrentTurn(otherPlayer(next.currentTurn));
  next.setPly(next.ply + 1);
  return next;
}

function applyPit<S extends MancalaBoard<S>>(state: S, pit: number): S | null {
  const pits = state.pits;
  if (!Number.isInteger(pit) || pit < 1 || pit > pits) {
    return null;
  }
  const mover = state.currentTurn;
  const stones = state.pit(mover, pit - 1);
  if (stones === 0) {
    return null;
  }

  const next = state.clone();
  next.setPit(mover, pit - 1, 0);

  // Sowing order: rest of the mover's row, mover's store, opponent's row,
  // back to the mover's row. The opponent's store is never sown into.
  let side: PlayerNumber = mover;
  let index = pit;
  let remaining = stones;
  let goAgain = false;
  let lastSide: PlayerNumber | null = null;
  let lastIndex = -1;

  while (remaining > 0) {
    if (index === pits) {
      if (side === mover) {
        next.setStore(mover, next.store(mover) + 1);
        remaining -= 1;
        goAgain = remaining === 0;
      }
      side = otherPlayer(side);
      index = 0;
      continue;
    }
    next.setPit(side, index, next.pit(side, index) + 1);
    remaining -= 1;
    if (remaining === 0) {
      lastSide = side;
      lastIndex = index;
    }
    index += 1;
  }

  // Capture: last stone in a previously empty pit on the mover's own side
  // takes that stone plus everything in the opposite pit.
  if (lastSide === mover && next.pit(mover, lastIndex) === 1) {
    const opponent = otherPlayer(mover);
    const opposite = pits - 1 - lastIndex;
    const captured = next.pit(mover, lastIndex) + next.pit(opponent, opposite);
    next.setStore(mover, next.store(mover) + captured);
    next.setPit(mover, lastIndex, 0);
    next.setPit(opponent, opposite, 0);
  }

  // End of board: once either row is empty, the other player sweeps their row.
  if (rowSum(next, 1) === 0) {
    sweepRow(next, 2);
  } else if (rowSum(next, 2) === 0) {
    sweepRow(next, 1);
  }

  if (mover === 2) {
    next.setPlayer2Moved(true);
  }
  if (!goAgain) {
    next.setCurrentTurn(otherPlayer(mover));
  }
  next.setPly(next.ply + 1);
  return next;
}

function sweepRow<S extends MancalaBoard<S>>(state: S, player: PlayerNumber): void {
  let swept = 0;
  for (let i = 0; i < state.pits; i++) {
    swept += state.pit(player, i);
    state.setPit(player, i, 0);
  }
  state.setStore(player, state.store(player) + swept);
}
