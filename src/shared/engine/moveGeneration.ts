import { Move, SWAP_MOVE, pitMove } from '../types/game';
import { MancalaBoardView } from './gameState';
import { isOver } from './victoryLogic';

/**
 * Swap is offered to Player 2 on ply 2 only, i.e. as their reply to Player 1's
 * first move.
 *
 * Known narrowing: the traditional pie rule also covers openings where
 * Player 1's first move earns a bonus turn. That case is intentionally not
 * handled and must not be widened without a rules change.
 */
export function swapAllowed(state: MancalaBoardView): boolean {
  return state.currentTurn === 2 && state.ply === 2;
}

/** Swap is never legal once the game has ended. */
export function isSwapLegal(state: MancalaBoardView): boolean {
  return swapAllowed(state) && !isOver(state);
}

/**
 * Legal moves for the side to move, in the canonical enumeration order:
 * pits in descending index order, then Swap (when allowed).
 *
 * Search keeps the first best move it meets, so this order is also the
 * tie-break policy for equally valued moves.
 */
export function validMoves(state: MancalaBoardView): Move[] {
  const moves: Move[] = [];
  const player = state.currentTurn;
  for (let i = state.pits - 1; i >= 0; i--) {
    if (state.pit(player, i) > 0) {
      moves.push(pitMove(i + 1));
    }
  }
  if (isSwapLegal(state)) {
    moves.push(SWAP_MOVE);
  }
  return moves;
}
