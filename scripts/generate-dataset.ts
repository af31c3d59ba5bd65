#!/usr/bin/env node
/**
 * Generate a Kalah training dataset of minimax move utilities and write it
 * as CSV.
 *
 * Usage:
 *   npm run generate-dataset -- --output data/dataset.csv \\
 *     --max-moves 30 --runs 10 --depth 6 --seed 42 --dedupe
 */

import { config } from '../src/server/config';
import { createMinimaxBuilder } from '../src/server/game/sessionSetup';
import { generateDataset } from '../src/server/services/DatasetGenerator';
import { saveDatasetCsv } from '../src/server/services/DatasetStore';
import { createComponentLogger } from '../src/server/utils/logger';
import { getExitCode } from '../src/shared/errors/GameDomainErrors';
import { createSeededRng, randomSeed } from '../src/shared/utils/rng';

const log = createComponentLogger('generate-dataset');

export interface GenerateArgs {
  output?: string;
  maxMoves: number;
  runs: number;
  seed?: number;
  /** undefined means "use the configured depth"; null means unbounded. */
  maxDepth?: number | null;
  maxTimeMs?: number;
  pits?: number;
  stonesPerPit?: number;
  dedupe: boolean;
}

function printUsage(): void {
  // eslint-disable-next-line no-console
  console.log(
    [
      'Usage: generate-dataset.ts [--output <path>] [--max-moves <n>] [--runs <n>] [--seed <n>]',
      '                           [--depth <n>|none] [--time-ms <ms>] [--pits <n>] [--stones <n>]',
      '                           [--dedupe]',
      '',
      'Each run samples positions 0..max-moves-1 random moves into a fresh game',
      'and records the minimax utility of every legal move.',
    ].join('\n')
  );
}

function parseCount(flag: string, value: string, min: number): number | null {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < min) {
    console.error(`Invalid ${flag} value: ${value}`);
    return null;
  }
  return parsed;
}

export function parseArgs(argv: string[]): GenerateArgs | null {
  const args: GenerateArgs = { maxMoves: 20, runs: 1, dedupe: false };

  for (let i = 2; i < argv.length; i += 1) {
    const raw = argv[i];
    if (!raw.startsWith('--')) continue;

    const [flag, valueMaybe] = raw.split('=', 2);
    const next = argv[i + 1];

    if (flag === '--help') {
      return null;
    }
    if (flag === '--dedupe') {
      args.dedupe = valueMaybe !== 'false' && valueMaybe !== '0';
      continue;
    }

    const value = valueMaybe ?? (next && !next.startsWith('--') ? next : undefined);
    if (!value) {
      console.error(`Missing value for ${flag}`);
      return null;
    }
    if (!valueMaybe && next === value) {
      i += 1;
    }

    switch (flag) {
      case '--output':
        args.output = value;
        break;
      case '--depth': {
        if (value.toLowerCase() === 'none') {
          args.maxDepth = null;
          break;
        }
        const depth = parseCount(flag, value, 0);
        if (depth === null) return null;
        args.maxDepth = depth;
        break;
      }
      case '--seed': {
        const seed = parseCount(flag, value, 0);
        if (seed === null) return null;
        args.seed = seed;
        break;
      }
      case '--max-moves':
      case '--runs':
      case '--time-ms':
      case '--pits':
      case '--stones': {
        const count = parseCount(flag, value, 1);
        if (count === null) return null;
        if (flag === '--max-moves') args.maxMoves = count;
        else if (flag === '--runs') args.runs = count;
        else if (flag === '--time-ms') args.maxTimeMs = count;
        else if (flag === '--pits') args.pits = count;
        else args.stonesPerPit = count;
        break;
      }
      default:
        console.warn(`Ignoring unknown flag: ${flag}`);
    }
  }

  return args;
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv);
  if (!args) {
    printUsage();
    process.exitCode = 1;
    return;
  }

  const seed = args.seed ?? randomSeed();
  const output = args.output ?? config.dataset.output;
  log.info('Generating dataset', { seed, output, runs: args.runs, maxMoves: args.maxMoves });

  const builder = createMinimaxBuilder({
    maxDepth: args.maxDepth !== undefined ? args.maxDepth : config.search.maxDepth,
    maxTimeMs: args.maxTimeMs ?? config.search.maxTimeMs,
  });
  const { dataset } = generateDataset(builder, {
    maxMoves: args.maxMoves,
    runs: args.runs,
    rng: createSeededRng(seed),
    pits: args.pits ?? config.board.pits,
    stonesPerPit: args.stonesPerPit ?? config.board.stonesPerPit,
    deduplicate: args.dedupe,
  });

  await saveDatasetCsv(dataset, output);
}

if (require.main === module) {
  main().catch((err) => {
    log.error('Dataset generation failed', { error: err });
    process.exitCode = getExitCode(err);
  });
}
