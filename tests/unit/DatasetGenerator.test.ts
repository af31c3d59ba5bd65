import { MinimaxBuilder } from '../../src/shared/ai/minimax/MinimaxBuilder';
import { type GameState, statesEqual } from '../../src/shared/engine/gameState';
import { createInitialGameState } from '../../src/shared/engine/initialState';
import { validMoves } from '../../src/shared/engine/moveGeneration';
import { isOver } from '../../src/shared/engine/victoryLogic';
import { SWAP_MOVE } from '../../src/shared/types/game';
import { createSeededRng } from '../../src/shared/utils/rng';
import { generateDataset, randomPlayout } from '../../src/server/services/DatasetGenerator';

describe('DatasetGenerator', () => {
  const builder = new MinimaxBuilder<GameState>().maxDepth(2);

  describe('randomPlayout', () => {
    it('plays the requested number of moves', () => {
      const state = randomPlayout(createInitialGameState(), 3, createSeededRng(1));
      expect(state.ply).toBe(4);
    });

    it('stops when the game ends', () => {
      const state = randomPlayout(createInitialGameState({ pits: 1, stonesPerPit: 1 }), 5, () => 0);
      expect(isOver(state)).toBe(true);
      expect(state.ply).toBe(2);
    });
  });

  describe('generateDataset', () => {
    it('scores every legal move of every sampled position', () => {
      const { dataset, summary } = generateDataset(builder, {
        maxMoves: 4,
        runs: 2,
        rng: createSeededRng(11),
        pits: 3,
        stonesPerPit: 2,
      });

      expect(summary.generated + summary.skippedTerminal + summary.skippedNoUtilities).toBe(8);
      expect(dataset.size).toBe(summary.generated);
      for (const example of dataset.examples) {
        expect(isOver(example.state)).toBe(false);
        expect(example.utilities).toHaveLength(4);
        for (const move of validMoves(example.state)) {
          expect(Number.isFinite(example.utilityOf(move))).toBe(true);
        }
      }
    });

    it('starts each run with the opening position', () => {
      const { dataset } = generateDataset(builder, {
        maxMoves: 1,
        runs: 1,
        rng: createSeededRng(3),
        pits: 3,
        stonesPerPit: 2,
      });
      const [first] = dataset.examples;
      expect(statesEqual(first.state, createInitialGameState({ pits: 3, stonesPerPit: 2 }))).toBe(true);
      expect(first.utilityOf(SWAP_MOVE)).toBe(-Infinity);
    });

    it('is reproducible for a seed', () => {
      const options = { maxMoves: 5, runs: 2, pits: 3, stonesPerPit: 2 };
      const a = generateDataset(builder, { ...options, rng: createSeededRng(42) });
      const b = generateDataset(builder, { ...options, rng: createSeededRng(42) });
      expect(a.dataset.examples.map((e) => e.key())).toEqual(b.dataset.examples.map((e) => e.key()));
    });

    it('removes duplicates when asked', () => {
      const { dataset, summary } = generateDataset(builder, {
        maxMoves: 1,
        runs: 3,
        rng: createSeededRng(5),
        pits: 3,
        stonesPerPit: 2,
        deduplicate: true,
      });
      expect(dataset.size).toBe(1);
      expect(summary.duplicatesRemoved).toBe(2);
    });

    it('skips samples whose playouts always end the game', () => {
      const { dataset, summary } = generateDataset(builder, {
        maxMoves: 2,
        runs: 1,
        rng: createSeededRng(9),
        pits: 1,
        stonesPerPit: 1,
        maxAttemptsPerSample: 3,
      });
      expect(dataset.size).toBe(1);
      expect(summary).toEqual({
        generated: 1,
        skippedTerminal: 1,
        skippedNoUtilities: 0,
        duplicatesRemoved: 0,
      });
    });

    it('skips samples when the search budget is spent at the root', () => {
      const { dataset, summary } = generateDataset(builder.maxDepth(0), {
        maxMoves: 2,
        runs: 1,
        rng: createSeededRng(9),
        pits: 3,
        stonesPerPit: 2,
      });
      expect(dataset.size).toBe(0);
      expect(summary.skippedNoUtilities).toBe(2);
    });
  });
});
