import { EngineError, EngineErrorCode } from '../../engine/errors';
import type { MancalaBoard } from '../../engine/gameState';
import { makeMove } from '../../engine/moveApplication';
import { formatMove } from '../../engine/notation';
import { isOver } from '../../engine/victoryLogic';
import type { Move, MoveUtility, PlayerNumber } from '../../types/game';
import type { MinimaxConfig, SearchContext, SearchStats } from './types';

interface NodeResult {
  move: Move | null;
  value: number;
}

/**
 * Alpha-beta minimax over the Kalah rules engine.
 *
 * Nodes are expanded in the strategy's move order and never re-sorted. A
 * bonus turn (mover keeps the turn) recurses into the same max/min role; any
 * other move flips it. Comparisons are strict, so among equally valued moves
 * the first one in move order is kept.
 *
 * Budgets are checked on node entry only: a finished game is always scored
 * with `evaluate`, and a node past `maxDepth` or `maxTimeMs` with `heuristic`.
 *
 * Instances are immutable; all per-search bookkeeping lives in a
 * {@link SearchContext} created by each public entry point.
 */
export class Minimax<S extends MancalaBoard<S>> {
  readonly config: MinimaxConfig<S>;

  constructor(config: MinimaxConfig<S>) {
    this.config = Object.freeze({ ...config });
  }

  get optimizeFor(): PlayerNumber {
    return this.config.optimizeFor;
  }

  get maxDepth(): number | null {
    return this.config.maxDepth;
  }

  get maxTimeMs(): number | null {
    return this.config.maxTimeMs;
  }

  orderMoves(state: S): Move[] {
    return this.config.strategy.orderMoves(state);
  }

  evaluate(state: S): number {
    return this.config.strategy.evaluate(state, this.config.optimizeFor);
  }

  getHeuristic(state: S): number {
    return this.config.strategy.heuristic(state, this.config.optimizeFor);
  }

  /** Best move for `optimizeFor`, or null when no move could be chosen. */
  search(state: S): Move | null {
    return this.searchUtility(state)?.move ?? null;
  }

  /** Best move plus the utility backing it, or null when no move could be chosen. */
  searchUtility(state: S): MoveUtility | null {
    return this.searchWithStats(state).best;
  }

  searchWithStats(state: S): SearchStats {
    const context = this.beginSearch();
    const result = this.maxValue(state, -Infinity, Infinity, 0, context);
    return {
      best: result.move ? { move: result.move, utility: result.value } : null,
      nodes: context.nodes,
      elapsedMs: this.config.clock() - context.startedAt,
    };
  }

  /**
   * Utility of every root move, in move order. There is no pruning at the
   * root: each child is solved with a full (-Infinity, Infinity) window.
   *
   * Returns null when the root is finished or the budget is already spent at
   * the root.
   */
  searchUtilityAll(state: S): MoveUtility[] | null {
    const context = this.beginSearch();
    context.nodes += 1;
    if (isOver(state) || this.budgetExhausted(0, context)) {
      return null;
    }

    return this.orderMoves(state).map((move) => {
      const next = this.successor(state, move);
      const { value } =
        next.currentTurn === state.currentTurn
          ? this.maxValue(next, -Infinity, Infinity, 1, context)
          : this.minValue(next, -Infinity, Infinity, 1, context);
      return { move, utility: value };
    });
  }

  private beginSearch(): SearchContext {
    return { startedAt: this.config.clock(), nodes: 0 };
  }

  private budgetExhausted(depth: number, context: SearchContext): boolean {
    const { maxDepth, maxTimeMs, clock } = this.config;
    if (maxDepth !== null && depth >= maxDepth) {
      return true;
    }
    return maxTimeMs !== null && clock() - context.startedAt >= maxTimeMs;
  }

  private successor(state: S, move: Move): S {
    const next = makeMove(state, move);
    if (!next) {
      throw new EngineError(
        EngineErrorCode.INTERNAL_ASSERTION_FAILED,
        `Move orderer produced illegal move ${formatMove(move)}`,
        { move, ply: state.ply, currentTurn: state.currentTurn },
        'Minimax'
      );
    }
    return next;
  }

  private leaf(state: S, depth: number, context: SearchContext): NodeResult | null {
    context.nodes += 1;
    if (isOver(state)) {
      return { move: null, value: this.evaluate(state) };
    }
    if (this.budgetExhausted(depth, context)) {
      return { move: null, value: this.getHeuristic(state) };
    }
    return null;
  }

  private maxValue(
    state: S,
    alpha: number,
    beta: number,
    depth: number,
    context: SearchContext
  ): NodeResult {
    const leaf = this.leaf(state, depth, context);
    if (leaf) {
      return leaf;
    }

    let best: NodeResult = { move: null, value: -Infinity };
    for (const move of this.orderMoves(state)) {
      const next = this.successor(state, move);
      const { value } =
        next.currentTurn === state.currentTurn
          ? this.maxValue(next, alpha, beta, depth + 1, context)
          : this.minValue(next, alpha, beta, depth + 1, context);

      if (value > best.value) {
        best = { move, value };
        alpha = Math.max(alpha, value);
      }
      if (best.value >= beta) {
        return best;
      }
    }
    return best;
  }

  private minValue(
    state: S,
    alpha: number,
    beta: number,
    depth: number,
    context: SearchContext
  ): NodeResult {
    const leaf = this.leaf(state, depth, context);
    if (leaf) {
      return leaf;
    }

    let best: NodeResult = { move: null, value: Infinity };
    for (const move of this.orderMoves(state)) {
      const next = this.successor(state, move);
      const { value } =
        next.currentTurn === state.currentTurn
          ? this.minValue(next, alpha, beta, depth + 1, context)
          : this.maxValue(next, alpha, beta, depth + 1, context);

      if (value < best.value) {
        best = { move, value };
        beta = Math.min(beta, value);
      }
      if (best.value <= alpha) {
        return best;
      }
    }
    return best;
  }
}
