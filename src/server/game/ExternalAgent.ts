import fs from 'fs/promises';
import path from 'path';

import type { MancalaBoardView } from '../../shared/engine/gameState';
import { validMoves } from '../../shared/engine/moveGeneration';
import { formatMove } from '../../shared/engine/notation';
import { GameError, GameErrorCode, wrapError } from '../../shared/errors/GameDomainErrors';
import { type Move, moveFromCode, movesEqual, otherPlayer } from '../../shared/types/game';
import { createCancellationSource, type CancellationToken } from '../../shared/utils/cancellation';
import { delay, runWithTimeout } from '../../shared/utils/timeout';
import { createComponentLogger } from '../utils/logger';

const log = createComponentLogger('ExternalAgent');

export interface ExternalAgentOptions {
  /** Directory shared with the agent process. */
  dir: string;
  pollIntervalMs: number;
  /** Deadline for the agent's answer, measured from writing the state file. */
  timeoutMs: number;
  now?: () => number;
}

export type AgentMoveResult =
  | { kind: 'ok'; move: Move; durationMs: number }
  | { kind: 'timeout'; durationMs: number };

/**
 * State line from the mover's point of view:
 * `ownStore oppStore ownPit1..ownPitN oppPit1..oppPitN`.
 */
export function encodeAgentState(state: MancalaBoardView): string {
  const own = state.currentTurn;
  const opp = otherPlayer(own);
  const values = [state.store(own), state.store(opp)];
  for (const player of [own, opp]) {
    for (let i = 0; i < state.pits; i++) {
      values.push(state.pit(player, i));
    }
  }
  return values.join(' ');
}

/**
 * First whitespace-separated integer in `contents` that names a legal move
 * (0 is Swap, k is Pit k). Non-integer tokens are ignored.
 */
export function selectAgentMove(state: MancalaBoardView, contents: string): Move | null {
  const legal = validMoves(state);
  for (const token of contents.split(/\s+/)) {
    if (!/^[+-]?\d+$/.test(token)) {
      continue;
    }
    const move = moveFromCode(Number(token));
    if (move && legal.some((candidate) => movesEqual(candidate, move))) {
      return move;
    }
  }
  return null;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * File-based bridge to an agent running in another process.
 *
 * For each ply the agent is handed `<dir>/state_<ply>.txt` and answers with
 * `<dir>/move_<ply>.txt`. The answer file is polled at a fixed interval until
 * it holds a legal move or the deadline passes.
 */
export class ExternalAgent {
  private readonly options: ExternalAgentOptions;

  constructor(options: ExternalAgentOptions) {
    this.options = options;
  }

  get dir(): string {
    return this.options.dir;
  }

  get timeoutMs(): number {
    return this.options.timeoutMs;
  }

  stateFilePath(ply: number): string {
    return path.join(this.options.dir, `state_${ply}.txt`);
  }

  moveFilePath(ply: number): string {
    return path.join(this.options.dir, `move_${ply}.txt`);
  }

  async writeState(state: MancalaBoardView): Promise<string> {
    const filePath = this.stateFilePath(state.ply);
    try {
      await fs.mkdir(this.options.dir, { recursive: true });
      await fs.writeFile(filePath, `${encodeAgentState(state)}\n`, 'utf8');
    } catch (error) {
      throw wrapError(error, GameErrorCode.AGENT_IO_FAILED, { path: filePath });
    }
    log.debug('State written', { path: filePath, ply: state.ply });
    return filePath;
  }

  /**
   * One poll: the legal move named in this ply's move file, or null if the
   * file is missing or names no legal move yet.
   */
  async readMove(state: MancalaBoardView): Promise<Move | null> {
    const filePath = this.moveFilePath(state.ply);
    let contents: string;
    try {
      contents = await fs.readFile(filePath, 'utf8');
    } catch (error) {
      if (isMissingFile(error)) {
        return null;
      }
      throw wrapError(error, GameErrorCode.AGENT_IO_FAILED, { path: filePath });
    }
    return selectAgentMove(state, contents);
  }

  /**
   * Publish `state` and wait for the agent's move.
   *
   * @throws GameError AGENT_CANCELED when `token` is canceled while waiting.
   */
  async requestMove(state: MancalaBoardView, token?: CancellationToken): Promise<AgentMoveResult> {
    await this.writeState(state);

    const polling = createCancellationSource();
    const result = await runWithTimeout(() => this.pollForMove(state, [polling.token, token]), {
      timeoutMs: this.options.timeoutMs,
      token,
      now: this.options.now,
    });
    // Stops a poll loop that lost the race against the deadline.
    polling.cancel('deadline reached');

    switch (result.kind) {
      case 'ok':
        log.info('Agent moved', {
          ply: state.ply,
          move: formatMove(result.value),
          durationMs: result.durationMs,
        });
        return { kind: 'ok', move: result.value, durationMs: result.durationMs };
      case 'timeout':
        log.warn('Agent timed out', {
          ply: state.ply,
          timeoutMs: this.options.timeoutMs,
          path: this.moveFilePath(state.ply),
        });
        return { kind: 'timeout', durationMs: result.durationMs };
      case 'canceled':
        throw new GameError(GameErrorCode.AGENT_CANCELED, 'Waiting for the external agent was canceled', {
          ply: state.ply,
          reason: result.cancellationReason,
        });
    }
  }

  private async pollForMove(
    state: MancalaBoardView,
    tokens: ReadonlyArray<CancellationToken | undefined>
  ): Promise<Move> {
    for (;;) {
      for (const token of tokens) {
        token?.throwIfCanceled(`polling ${this.moveFilePath(state.ply)}`);
      }
      const move = await this.readMove(state);
      if (move) {
        return move;
      }
      await delay(this.options.pollIntervalMs);
    }
  }
}
