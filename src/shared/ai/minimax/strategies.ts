import { otherPlayer, type Move, type PlayerNumber } from '../../types/game';
import type { MancalaBoardView } from '../../engine/gameState';
import { validMoves } from '../../engine/moveGeneration';
import { score } from '../../engine/victoryLogic';
import type { SearchStrategy } from './types';

/**
 * Default move order: pits in descending index order, Swap last. This is the
 * rules engine's own enumeration order, reused as-is.
 */
export function descendingPitOrder(state: MancalaBoardView): Move[] {
  return validMoves(state);
}

/**
 * Store differential: `player`'s store minus the opponent's. Positive when
 * `player` is ahead.
 */
export function storeDifferential(state: MancalaBoardView, player: PlayerNumber): number {
  return score(state, player) - score(state, otherPlayer(player));
}

export const DEFAULT_SEARCH_STRATEGY: Readonly<SearchStrategy<MancalaBoardView>> = Object.freeze({
  orderMoves: descendingPitOrder,
  evaluate: storeDifferential,
  heuristic: storeDifferential,
});
