import { GameOutcome, PlayerNumber } from '../types/game';
import { MancalaBoardView } from './gameState';

/**
 * The game is over once both rows are empty. The end-of-board sweep in
 * `makeMove` guarantees this happens on the move that empties either row.
 */
export function isOver(state: MancalaBoardView): boolean {
  for (const player of [1, 2] as const) {
    for (let i = 0; i < state.pits; i++) {
      if (state.pit(player, i) !== 0) {
        return false;
      }
    }
  }
  return true;
}

export function score(state: MancalaBoardView, player: PlayerNumber): number {
  return state.store(player);
}

/**
 * Canonical, side-effect-free outcome evaluator: `ongoing` until the board is
 * empty, then the player with the larger store wins (equal stores tie).
 */
export function outcome(state: MancalaBoardView): GameOutcome {
  if (!isOver(state)) {
    return { kind: 'ongoing' };
  }
  const one = score(state, 1);
  const two = score(state, 2);
  if (one > two) {
    return { kind: 'winner', player: 1 };
  }
  if (two > one) {
    return { kind: 'winner', player: 2 };
  }
  return { kind: 'tie' };
}
