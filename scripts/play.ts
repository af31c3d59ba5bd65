#!/usr/bin/env node
/**
 * Play Kalah in the terminal.
 *
 * Usage:
 *   npm run play -- --mode pvm --minimax-player 2 --depth 8
 *
 *   # Let an agent in another process play Player 1 through ./agent
 *   npm run play -- --mode pve --agent-player 1 --agent-dir ./agent
 */

import { config } from '../src/server/config';
import { ExternalAgent } from '../src/server/game/ExternalAgent';
import { createMinimaxBuilder, loadInitialState } from '../src/server/game/sessionSetup';
import { TerminalSession } from '../src/server/game/TerminalSession';
import { createComponentLogger } from '../src/server/utils/logger';
import { getExitCode } from '../src/shared/errors/GameDomainErrors';
import type { PlayerNumber } from '../src/shared/types/game';

const log = createComponentLogger('play');

export type PlayMode = 'pvp' | 'pvm' | 'pve' | 'mve';

const PLAY_MODES: readonly PlayMode[] = ['pvp', 'pvm', 'pve', 'mve'];

export interface PlayArgs {
  mode: PlayMode;
  minimaxPlayer: PlayerNumber;
  agentPlayer: PlayerNumber;
  /** undefined means "use the configured depth"; null means unbounded. */
  maxDepth?: number | null;
  maxTimeMs?: number;
  pits?: number;
  stonesPerPit?: number;
  agentDir?: string;
  agentTimeoutMs?: number;
  statePath?: string;
}

function printUsage(): void {
  // eslint-disable-next-line no-console
  console.log(
    [
      'Usage: play.ts [--mode pvp|pvm|pve|mve] [--minimax-player 1|2] [--agent-player 1|2]',
      '               [--depth <n>|none] [--time-ms <ms>] [--pits <n>] [--stones <n>]',
      '               [--agent-dir <path>] [--agent-timeout-ms <ms>] [--state <snapshot.json>]',
      '',
      'Modes:',
      '  pvp  two people at the keyboard',
      '  pvm  a person against minimax (default; minimax is Player 2 unless --minimax-player 1)',
      '  pve  a person against an external agent polled through --agent-dir',
      '  mve  minimax against an external agent (the agent takes the other seat)',
      '',
      'Type a pit number (1 is the pit nearest the mover\'s left) or "swap" when prompted.',
    ].join('\n')
  );
}

function parsePlayer(flag: string, value: string): PlayerNumber | null {
  if (value === '1') return 1;
  if (value === '2') return 2;
  console.error(`Invalid ${flag} value: ${value}`);
  return null;
}

function parseCount(flag: string, value: string, min: number): number | null {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < min) {
    console.error(`Invalid ${flag} value: ${value}`);
    return null;
  }
  return parsed;
}

export function parseArgs(argv: string[]): PlayArgs | null {
  const args: PlayArgs = { mode: 'pvm', minimaxPlayer: 2, agentPlayer: 2 };

  for (let i = 2; i < argv.length; i += 1) {
    const raw = argv[i];
    if (!raw.startsWith('--')) continue;

    const [flag, valueMaybe] = raw.split('=', 2);
    if (flag === '--help') {
      return null;
    }

    const next = argv[i + 1];
    const value = valueMaybe ?? (next && !next.startsWith('--') ? next : undefined);
    if (!value) {
      console.error(`Missing value for ${flag}`);
      return null;
    }
    if (!valueMaybe && next === value) {
      i += 1;
    }

    switch (flag) {
      case '--mode': {
        const mode = PLAY_MODES.find((candidate) => candidate === value);
        if (!mode) {
          console.error(`Invalid --mode value: ${value}`);
          return null;
        }
        args.mode = mode;
        break;
      }
      case '--minimax-player':
      case '--agent-player': {
        const player = parsePlayer(flag, value);
        if (player === null) return null;
        if (flag === '--minimax-player') {
          args.minimaxPlayer = player;
        } else {
          args.agentPlayer = player;
        }
        break;
      }
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
      case '--time-ms':
      case '--agent-timeout-ms':
      case '--pits':
      case '--stones': {
        const count = parseCount(flag, value, 1);
        if (count === null) return null;
        if (flag === '--time-ms') args.maxTimeMs = count;
        else if (flag === '--agent-timeout-ms') args.agentTimeoutMs = count;
        else if (flag === '--pits') args.pits = count;
        else args.stonesPerPit = count;
        break;
      }
      case '--agent-dir':
        args.agentDir = value;
        break;
      case '--state':
        args.statePath = value;
        break;
      default:
        console.warn(`Ignoring unknown flag: ${flag}`);
    }
  }

  return args;
}

function createAgent(args: PlayArgs): ExternalAgent {
  return new ExternalAgent({
    dir: args.agentDir ?? config.agent.dir,
    pollIntervalMs: config.agent.pollIntervalMs,
    timeoutMs: args.agentTimeoutMs ?? config.agent.timeoutMs,
  });
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv);
  if (!args) {
    printUsage();
    process.exitCode = 1;
    return;
  }

  const initial = await loadInitialState(
    {
      pits: args.pits ?? config.board.pits,
      stonesPerPit: args.stonesPerPit ?? config.board.stonesPerPit,
    },
    args.statePath
  );
  const builder = createMinimaxBuilder({
    maxDepth: args.maxDepth !== undefined ? args.maxDepth : config.search.maxDepth,
    maxTimeMs: args.maxTimeMs ?? config.search.maxTimeMs,
  });

  const session = new TerminalSession({ input: process.stdin, output: process.stdout });
  try {
    switch (args.mode) {
      case 'pvp':
        await session.playerVsPlayer(initial);
        break;
      case 'pvm':
        await session.playerVsMinimax(initial, builder, args.minimaxPlayer);
        break;
      case 'pve':
        await session.playerVsExternal(initial, createAgent(args), args.agentPlayer);
        break;
      case 'mve':
        await session.minimaxVsExternal(initial, builder, args.minimaxPlayer, createAgent(args));
        break;
    }
  } finally {
    session.close();
  }
}

if (require.main === module) {
  main().catch((err) => {
    log.error('Game aborted', { error: err });
    process.exitCode = getExitCode(err);
  });
}
