import type { Move, MoveUtility, PlayerNumber } from '../../types/game';

/**
 * Orders the legal moves of a state. Every returned move must be legal; the
 * order decides which of several equally valued moves search keeps.
 */
export type MoveOrderFn<S> = (state: S) => Move[];

/**
 * Scores a state from `player`'s point of view; larger is better for them.
 */
export type StateEvalFn<S> = (state: S, player: PlayerNumber) => number;

/**
 * The pluggable scoring policy of a search.
 *
 * - `evaluate` is only called on finished games.
 * - `heuristic` is only called where the depth/time budget cuts the search
 *   off before the game ends.
 */
export interface SearchStrategy<S> {
  orderMoves: MoveOrderFn<S>;
  evaluate: StateEvalFn<S>;
  heuristic: StateEvalFn<S>;
}

export interface MinimaxConfig<S> {
  readonly optimizeFor: PlayerNumber;
  /** Maximum search depth; null means unbounded. */
  readonly maxDepth: number | null;
  /** Maximum wall-clock time per search in milliseconds; null means unbounded. */
  readonly maxTimeMs: number | null;
  readonly strategy: Readonly<SearchStrategy<S>>;
  /** Millisecond clock used for the time budget (overridable for tests). */
  readonly clock: () => number;
}

/**
 * Per-call search bookkeeping, threaded through the recursion. A configured
 * engine holds no mutable state of its own.
 */
export interface SearchContext {
  readonly startedAt: number;
  nodes: number;
}

export interface SearchStats {
  best: MoveUtility | null;
  /** Number of nodes entered, root included. */
  nodes: number;
  elapsedMs: number;
}
