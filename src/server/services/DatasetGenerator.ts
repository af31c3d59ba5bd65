import type { MinimaxBuilder } from '../../shared/ai/minimax/MinimaxBuilder';
import { MancalaDataset } from '../../shared/dataset/MancalaDataset';
import { MancalaExample } from '../../shared/dataset/MancalaExample';
import type { GameState } from '../../shared/engine/gameState';
import {
  DEFAULT_PITS,
  DEFAULT_STONES_PER_PIT,
  createInitialGameState,
} from '../../shared/engine/initialState';
import { makeRandomMove } from '../../shared/engine/moveApplication';
import { isOver } from '../../shared/engine/victoryLogic';
import type { Rng } from '../../shared/utils/rng';
import { createComponentLogger } from '../utils/logger';

const log = createComponentLogger('DatasetGenerator');

export const DEFAULT_MAX_ATTEMPTS_PER_SAMPLE = 10;

export interface DatasetGenerationOptions {
  /** Samples per run; sample n starts n random moves into a game. */
  maxMoves: number;
  runs: number;
  rng: Rng;
  pits?: number;
  stonesPerPit?: number;
  /** Drop repeated examples from the result. */
  deduplicate?: boolean;
  /**
   * Random playouts tried per sample before it is skipped because every
   * attempt ended the game.
   */
  maxAttemptsPerSample?: number;
}

export interface DatasetGenerationSummary {
  generated: number;
  skippedTerminal: number;
  skippedNoUtilities: number;
  duplicatesRemoved: number;
}

/**
 * Play `moves` random moves from the opening, stopping early if the game
 * ends.
 */
export function randomPlayout(start: GameState, moves: number, rng: Rng): GameState {
  let state = start;
  for (let i = 0; i < moves; i++) {
    const step = makeRandomMove(state, rng);
    if (!step) {
      break;
    }
    state = step.state;
  }
  return state;
}

/**
 * Build a training dataset from random positions scored by minimax.
 *
 * For each run and each n in 0..maxMoves-1, a position n random moves into a
 * fresh game is searched with `searchUtilityAll`, optimizing for the side to
 * move. Positions where the game is already over are re-rolled; after
 * `maxAttemptsPerSample` failures that sample is skipped. Generation is
 * sequential, so a seeded `rng` reproduces the same dataset.
 */
export function generateDataset(
  builder: MinimaxBuilder<GameState>,
  options: DatasetGenerationOptions
): { dataset: MancalaDataset<GameState>; summary: DatasetGenerationSummary } {
  const {
    maxMoves,
    runs,
    rng,
    pits = DEFAULT_PITS,
    stonesPerPit = DEFAULT_STONES_PER_PIT,
    deduplicate = false,
    maxAttemptsPerSample = DEFAULT_MAX_ATTEMPTS_PER_SAMPLE,
  } = options;

  const opening = createInitialGameState({ pits, stonesPerPit });
  const examples: MancalaExample<GameState>[] = [];
  const summary: DatasetGenerationSummary = {
    generated: 0,
    skippedTerminal: 0,
    skippedNoUtilities: 0,
    duplicatesRemoved: 0,
  };

  for (let run = 0; run < runs; run++) {
    for (let moves = 0; moves < maxMoves; moves++) {
      let state: GameState | null = null;
      for (let attempt = 0; attempt < maxAttemptsPerSample && !state; attempt++) {
        const candidate = randomPlayout(opening, moves, rng);
        if (!isOver(candidate)) {
          state = candidate;
        }
      }

      if (!state) {
        summary.skippedTerminal += 1;
        log.warn('Skipping sample: every playout ended the game', {
          run,
          moves,
          attempts: maxAttemptsPerSample,
        });
        continue;
      }

      const minimax = builder.optimizeFor(state.currentTurn).build();
      const utilities = minimax.searchUtilityAll(state);
      if (!utilities) {
        summary.skippedNoUtilities += 1;
        log.warn('Skipping sample: search budget exhausted at the root', {
          run,
          moves,
          ply: state.ply,
        });
        continue;
      }

      examples.push(MancalaExample.create(state, utilities));
      summary.generated += 1;
    }
    log.debug('Dataset run complete', { run, examples: examples.length });
  }

  let dataset = new MancalaDataset(examples);
  if (deduplicate) {
    const unique = dataset.deduplicated();
    summary.duplicatesRemoved = dataset.size - unique.size;
    dataset = unique;
  }

  log.info('Dataset generated', { runs, maxMoves, ...summary, size: dataset.size });
  return { dataset, summary };
}
