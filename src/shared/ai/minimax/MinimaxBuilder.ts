import type { MancalaBoard } from '../../engine/gameState';
import type { PlayerNumber } from '../../types/game';
import { Minimax } from './Minimax';
import { DEFAULT_SEARCH_STRATEGY } from './strategies';
import type { MinimaxConfig, MoveOrderFn, StateEvalFn } from './types';

export const DEFAULT_MAX_DEPTH = 12;

/**
 * Fluent, copy-on-write assembly of a {@link Minimax} configuration.
 *
 * Every setter returns a new builder, so one base builder can be shared and
 * specialised per call site without the variants leaking into each other:
 *
 * ```ts
 * const base = new MinimaxBuilder<GameState>().maxDepth(8);
 * const forP2 = base.optimizeFor(2).build();
 * ```
 *
 * Nothing is validated beyond the types; a move orderer that yields illegal
 * moves is a caller error and surfaces as an engine assertion during search.
 */
export class MinimaxBuilder<S extends MancalaBoard<S>> {
  private readonly config: MinimaxConfig<S>;

  constructor(config?: MinimaxConfig<S>) {
    this.config = config ?? {
      optimizeFor: 1,
      maxDepth: DEFAULT_MAX_DEPTH,
      maxTimeMs: null,
      strategy: DEFAULT_SEARCH_STRATEGY,
      clock: Date.now,
    };
  }

  optimizeFor(player: PlayerNumber): MinimaxBuilder<S> {
    return this.with({ optimizeFor: player });
  }

  /** `null` removes the depth limit. */
  maxDepth(depth: number | null): MinimaxBuilder<S> {
    return this.with({ maxDepth: depth });
  }

  /** Time budget per search in milliseconds; `null` removes it. */
  maxTime(ms: number | null): MinimaxBuilder<S> {
    return this.with({ maxTimeMs: ms });
  }

  moveOrderer(orderMoves: MoveOrderFn<S>): MinimaxBuilder<S> {
    return this.with({ strategy: { ...this.config.strategy, orderMoves } });
  }

  evaluator(evaluate: StateEvalFn<S>): MinimaxBuilder<S> {
    return this.with({ strategy: { ...this.config.strategy, evaluate } });
  }

  heuristic(heuristic: StateEvalFn<S>): MinimaxBuilder<S> {
    return this.with({ strategy: { ...this.config.strategy, heuristic } });
  }

  clock(clock: () => number): MinimaxBuilder<S> {
    return this.with({ clock });
  }

  /** Snapshot of the configuration accumulated so far. */
  getConfig(): MinimaxConfig<S> {
    return { ...this.config };
  }

  build(): Minimax<S> {
    return new Minimax({
      ...this.config,
      strategy: Object.freeze({ ...this.config.strategy }),
    });
  }

  private with(overrides: Partial<MinimaxConfig<S>>): MinimaxBuilder<S> {
    return new MinimaxBuilder<S>({ ...this.config, ...overrides });
  }
}
