/**
 * Shared AI Module
 *
 * Depth- and time-bounded alpha-beta search over any board that implements
 * {@link MancalaBoard}, plus its builder and default strategy.
 *
 * @module ai
 */

export type {
  MoveOrderFn,
  StateEvalFn,
  SearchStrategy,
  MinimaxConfig,
  SearchContext,
  SearchStats,
} from './minimax/types';
export { Minimax } from './minimax/Minimax';
export { MinimaxBuilder, DEFAULT_MAX_DEPTH } from './minimax/MinimaxBuilder';
export { descendingPitOrder, storeDifferential, DEFAULT_SEARCH_STRATEGY } from './minimax/strategies';
