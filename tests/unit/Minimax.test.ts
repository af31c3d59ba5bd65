import type { Minimax } from '../../src/shared/ai/minimax/Minimax';
import { MinimaxBuilder, DEFAULT_MAX_DEPTH } from '../../src/shared/ai/minimax/MinimaxBuilder';
import { DEFAULT_SEARCH_STRATEGY, storeDifferential } from '../../src/shared/ai/minimax/strategies';
import { EngineErrorCode, isEngineError } from '../../src/shared/engine/errors';
import type { GameState } from '../../src/shared/engine/gameState';
import { createInitialGameState } from '../../src/shared/engine/initialState';
import { makeMove } from '../../src/shared/engine/moveApplication';
import { validMoves } from '../../src/shared/engine/moveGeneration';
import { isOver } from '../../src/shared/engine/victoryLogic';
import { type Move, type PlayerNumber, compareMoves, pitMove } from '../../src/shared/types/game';
import { createSeededRng } from '../../src/shared/utils/rng';
import { randomPlayout } from '../../src/server/services/DatasetGenerator';
import { board, steppingClock } from '../utils/fixtures';

/**
 * Plain minimax without pruning, using the same role rule (a bonus turn keeps
 * the role) and the same first-strictly-better tie-break.
 */
function reference(
  state: GameState,
  player: PlayerNumber,
  maximizing: boolean,
  depth: number,
  maxDepth: number | null,
  counter: { nodes: number }
): { move: Move | null; value: number } {
  counter.nodes += 1;
  if (isOver(state) || (maxDepth !== null && depth >= maxDepth)) {
    return { move: null, value: storeDifferential(state, player) };
  }
  let best: { move: Move | null; value: number } = {
    move: null,
    value: maximizing ? -Infinity : Infinity,
  };
  for (const move of validMoves(state)) {
    const next = makeMove(state, move);
    if (!next) throw new Error('validMoves offered an illegal move');
    const sameRole = next.currentTurn === state.currentTurn;
    const { value } = reference(
      next,
      player,
      sameRole ? maximizing : !maximizing,
      depth + 1,
      maxDepth,
      counter
    );
    if (maximizing ? value > best.value : value < best.value) {
      best = { move, value };
    }
  }
  return best;
}

describe('Minimax', () => {
  const base = new MinimaxBuilder<GameState>();

  describe('search', () => {
    it('scores a forced finish with the store differential', () => {
      const engine = base.build();
      const stats = engine.searchWithStats(board([1], [1]));
      expect(stats.best).toEqual({ move: pitMove(1), utility: 0 });
      expect(stats.nodes).toBe(2);
    });

    it('keeps the first of equally valued moves', () => {
      const state = board([1, 1], [0, 0]);
      expect(base.build().searchUtility(state)).toEqual({ move: pitMove(2), utility: 2 });

      const ascending = base.moveOrderer((s) => validMoves(s).sort(compareMoves)).build();
      expect(ascending.searchUtility(state)).toEqual({ move: pitMove(1), utility: 2 });
    });

    it('returns no move at depth 0', () => {
      const stats = base.maxDepth(0).build().searchWithStats(createInitialGameState());
      expect(stats.best).toBeNull();
      expect(stats.nodes).toBe(1);
    });

    it('returns no move on a finished board', () => {
      expect(base.build().search(board([0], [0], { stores: [2, 1] }))).toBeNull();
    });

    it('matches unpruned minimax on small boards', () => {
      const rng = createSeededRng(7);
      for (let sample = 0; sample < 6; sample++) {
        const state = randomPlayout(
          createInitialGameState({ pits: 3, stonesPerPit: 2 }),
          sample,
          rng
        );
        if (isOver(state)) continue;
        for (let depth = 1; depth <= 5; depth++) {
          const player = state.currentTurn;
          const counter = { nodes: 0 };
          const expected = reference(state, player, true, 0, depth, counter);
          const stats = base.optimizeFor(player).maxDepth(depth).build().searchWithStats(state);
          expect(stats.best).toEqual(
            expected.move ? { move: expected.move, utility: expected.value } : null
          );
          expect(stats.nodes).toBeLessThanOrEqual(counter.nodes);
        }
      }
    });

    it('solves a tiny board without a depth limit', () => {
      const state = createInitialGameState({ pits: 2, stonesPerPit: 1 });
      const expected = reference(state, 1, true, 0, null, { nodes: 0 });
      expect(base.maxDepth(null).build().searchUtility(state)).toEqual({
        move: expected.move,
        utility: expected.value,
      });
    });

    it('stops at the time budget and falls back to the heuristic', () => {
      // Each clock read advances 10ms: the root (10ms) is inside a 15ms budget,
      // every child (20ms and later) is past it.
      const timed = base.maxDepth(null).maxTime(15).clock(steppingClock(10)).build();
      expect(timed.searchUtility(createInitialGameState())).toEqual({ move: pitMove(6), utility: 1 });
      expect(base.maxDepth(1).build().searchUtility(createInitialGameState())).toEqual({
        move: pitMove(6),
        utility: 1,
      });
    });

    it('reports no move when the budget is spent at the root', () => {
      const timed = base.maxDepth(null).maxTime(5).clock(steppingClock(10)).build();
      expect(timed.searchWithStats(createInitialGameState())).toEqual({
        best: null,
        nodes: 1,
        elapsedMs: 20,
      });
    });

    it('scores a finished board with the evaluator even at the depth limit', () => {
      const engine = base.maxDepth(1).evaluator(() => 42).heuristic(() => -7).build();
      expect(engine.searchUtility(board([1], [1]))).toEqual({ move: pitMove(1), utility: 42 });
      expect(engine.searchUtilityAll(board([1], [1]))).toEqual([{ move: pitMove(1), utility: 42 }]);
    });

    it('scores an unfinished board at the depth limit with the heuristic', () => {
      const engine = base.maxDepth(1).evaluator(() => 42).heuristic(() => -7).build();
      expect(engine.searchUtility(board([2, 2], [2, 2]))).toEqual({ move: pitMove(2), utility: -7 });
    });

    it('keeps each search independent when the engine is reused mid-search', () => {
      let now = 0;
      let nested = false;
      let innerSearches = 0;
      let engine: Minimax<GameState>;
      const heuristic = (state: GameState, player: PlayerNumber): number => {
        if (!nested) {
          // Time passes before every outer leaf, then the same engine searches it.
          now += 10;
          nested = true;
          try {
            engine.searchWithStats(state);
            innerSearches += 1;
          } finally {
            nested = false;
          }
        }
        return storeDifferential(state, player);
      };
      engine = base
        .maxDepth(1)
        .maxTime(1000)
        .clock(() => now)
        .heuristic(heuristic)
        .build();

      expect(engine.searchWithStats(board([2, 2], [2, 2]))).toEqual({
        best: { move: pitMove(2), utility: 1 },
        nodes: 3,
        elapsedMs: 20,
      });
      expect(innerSearches).toBe(2);
    });

    it('treats an illegal move from the orderer as an engine bug', () => {
      const broken = base.moveOrderer(() => [pitMove(9)]).build();
      let code: string | undefined;
      try {
        broken.search(createInitialGameState());
      } catch (error) {
        code = isEngineError(error) ? error.code : undefined;
      }
      expect(code).toBe(EngineErrorCode.INTERNAL_ASSERTION_FAILED);
    });
  });

  describe('searchUtilityAll', () => {
    it('gives every root move its exact minimax value', () => {
      const state = createInitialGameState({ pits: 3, stonesPerPit: 2 });
      const utilities = base.maxDepth(4).build().searchUtilityAll(state);
      const expected = validMoves(state).map((move) => {
        const next = makeMove(state, move);
        if (!next) throw new Error('validMoves offered an illegal move');
        const maximizing = next.currentTurn === state.currentTurn;
        return { move, utility: reference(next, 1, maximizing, 1, 4, { nodes: 0 }).value };
      });
      expect(utilities).toEqual(expected);
    });

    it('agrees with search on the best utility', () => {
      const state = createInitialGameState({ pits: 3, stonesPerPit: 2 });
      const engine = base.maxDepth(4).build();
      const all = engine.searchUtilityAll(state) ?? [];
      const best = engine.searchUtility(state);
      expect(Math.max(...all.map((entry) => entry.utility))).toBe(best?.utility);
    });

    it('returns null for a finished board or a spent budget', () => {
      expect(base.build().searchUtilityAll(board([0], [0]))).toBeNull();
      expect(base.maxDepth(0).build().searchUtilityAll(createInitialGameState())).toBeNull();
    });

    it('scores leaves directly at depth 1', () => {
      expect(base.maxDepth(1).build().searchUtilityAll(createInitialGameState())).toEqual([
        { move: pitMove(6), utility: 1 },
        { move: pitMove(5), utility: 1 },
        { move: pitMove(4), utility: 1 },
        { move: pitMove(3), utility: 1 },
        { move: pitMove(2), utility: 0 },
        { move: pitMove(1), utility: 0 },
      ]);
    });
  });
});

describe('MinimaxBuilder', () => {
  it('starts from the documented defaults', () => {
    const config = new MinimaxBuilder<GameState>().getConfig();
    expect(config.optimizeFor).toBe(1);
    expect(config.maxDepth).toBe(DEFAULT_MAX_DEPTH);
    expect(config.maxTimeMs).toBeNull();
    expect(config.strategy).toBe(DEFAULT_SEARCH_STRATEGY);
  });

  it('returns a new builder from every setter', () => {
    const base = new MinimaxBuilder<GameState>();
    const deep = base.maxDepth(3).optimizeFor(2).maxTime(50);
    expect(base.getConfig().maxDepth).toBe(DEFAULT_MAX_DEPTH);
    expect(base.getConfig().optimizeFor).toBe(1);
    expect(deep.getConfig()).toMatchObject({ maxDepth: 3, optimizeFor: 2, maxTimeMs: 50 });
  });

  it('replaces strategy functions one at a time', () => {
    const zero = (): number => 0;
    const custom = new MinimaxBuilder<GameState>().heuristic(zero);
    expect(custom.getConfig().strategy.heuristic).toBe(zero);
    expect(custom.getConfig().strategy.evaluate).toBe(storeDifferential);
  });

  it('builds immutable engines', () => {
    const engine = new MinimaxBuilder<GameState>().optimizeFor(2).build();
    expect(engine.optimizeFor).toBe(2);
    expect(engine.maxDepth).toBe(DEFAULT_MAX_DEPTH);
    expect(engine.maxTimeMs).toBeNull();
    expect(Object.isFrozen(engine.config)).toBe(true);
    expect(Object.isFrozen(engine.config.strategy)).toBe(true);
  });

  it('uses the configured evaluator on finished boards', () => {
    const engine = new MinimaxBuilder<GameState>().evaluator(() => 42).build();
    expect(engine.evaluate(board([0], [0]))).toBe(42);
    expect(engine.searchUtility(board([1], [1]))).toEqual({ move: pitMove(1), utility: 42 });
  });
});
