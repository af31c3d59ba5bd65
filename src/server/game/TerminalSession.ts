import readline from 'readline';
import type { Readable, Writable } from 'stream';

import type { MinimaxBuilder } from '../../shared/ai/minimax/MinimaxBuilder';
import { GameEngine } from '../../shared/engine/GameEngine';
import type { MancalaBoard, MancalaBoardView } from '../../shared/engine/gameState';
import { validMoves } from '../../shared/engine/moveGeneration';
import { formatBoard, formatMove, parseMoveInput } from '../../shared/engine/notation';
import {
  AgentTimeoutError,
  GameError,
  GameErrorCode,
  InputClosedError,
} from '../../shared/errors/GameDomainErrors';
import { type GameOutcome, type Move, type PlayerNumber, movesEqual } from '../../shared/types/game';
import type { Rng } from '../../shared/utils/rng';
import type { ExternalAgent } from './ExternalAgent';
import { createComponentLogger } from '../utils/logger';

const log = createComponentLogger('TerminalSession');

export type ParticipantKind = 'PLAYER' | 'MINIMAX' | 'EXTERNAL';

/**
 * One side of a game: how it is announced and how it picks a move.
 */
export interface Participant<S> {
  kind: ParticipantKind;
  chooseMove(state: S): Promise<Move>;
}

export interface TerminalSessionOptions {
  input: Readable;
  output: Writable;
  /** Used when minimax returns no move. Defaults to Math.random. */
  rng?: Rng;
}

/**
 * Console play loops over injectable streams.
 *
 * The board is printed before every move. People are prompted with
 * `PLAYER <n> SELECTION: ` until they type a legal move (`swap` or a pit
 * number); the game ends with a `WINNER: ...` line naming the winning side.
 */
export class TerminalSession {
  private readonly output: Writable;
  private readonly rng: Rng;
  private readonly rl: readline.Interface;
  private readonly lines: AsyncIterator<string>;

  constructor(options: TerminalSessionOptions) {
    this.output = options.output;
    this.rng = options.rng ?? Math.random;
    this.rl = readline.createInterface({ input: options.input, terminal: false });
    this.lines = this.rl[Symbol.asyncIterator]();
  }

  close(): void {
    this.rl.close();
  }

  async playerVsPlayer<S extends MancalaBoard<S>>(initial: S): Promise<GameOutcome> {
    return this.play(initial, { 1: this.human<S>(), 2: this.human<S>() });
  }

  async playerVsMinimax<S extends MancalaBoard<S>>(
    initial: S,
    builder: MinimaxBuilder<S>,
    minimaxPlayer: PlayerNumber
  ): Promise<GameOutcome> {
    const minimax = this.minimax(builder, minimaxPlayer);
    return this.play(
      initial,
      minimaxPlayer === 1 ? { 1: minimax, 2: this.human<S>() } : { 1: this.human<S>(), 2: minimax }
    );
  }

  async playerVsExternal<S extends MancalaBoard<S>>(
    initial: S,
    agent: ExternalAgent,
    agentPlayer: PlayerNumber
  ): Promise<GameOutcome> {
    const external = this.external<S>(agent);
    return this.play(
      initial,
      agentPlayer === 1 ? { 1: external, 2: this.human<S>() } : { 1: this.human<S>(), 2: external }
    );
  }

  async minimaxVsExternal<S extends MancalaBoard<S>>(
    initial: S,
    builder: MinimaxBuilder<S>,
    minimaxPlayer: PlayerNumber,
    agent: ExternalAgent
  ): Promise<GameOutcome> {
    const minimax = this.minimax(builder, minimaxPlayer);
    const external = this.external<S>(agent);
    return this.play(
      initial,
      minimaxPlayer === 1 ? { 1: minimax, 2: external } : { 1: external, 2: minimax }
    );
  }

  /**
   * Run a game to completion with the given participants and announce the
   * result.
   */
  async play<S extends MancalaBoard<S>>(
    initial: S,
    participants: Record<PlayerNumber, Participant<S>>
  ): Promise<GameOutcome> {
    const engine = new GameEngine(initial);

    while (!engine.isGameOver()) {
      const state = engine.getGameState();
      this.write(`${formatBoard(state)}\n`);
      const participant = participants[state.currentTurn];
      const move = await participant.chooseMove(state);
      const event = engine.processMove(move);
      if (event.type === 'MOVE_REJECTED') {
        throw new GameError(GameErrorCode.INTERNAL_ERROR, event.payload.error, {
          participant: participant.kind,
          code: event.payload.code,
        });
      }
      this.write(
        participant.kind === 'PLAYER' ? '\n' : `${participant.kind} SELECTED: ${formatMove(move)}\n\n`
      );
    }

    const final = engine.getGameState();
    const outcome = engine.getOutcome();
    this.write(`${formatBoard(final)}\nWINNER: ${this.describeWinner(outcome, participants)}\n`);
    log.info('Game finished', {
      outcome: outcome.kind === 'winner' ? `player ${outcome.player}` : outcome.kind,
      plies: engine.getMoveHistory().length,
      stores: final.stores(),
    });
    return outcome;
  }

  private describeWinner<S>(
    outcome: GameOutcome,
    participants: Record<PlayerNumber, Participant<S>>
  ): string {
    if (outcome.kind !== 'winner') {
      return 'TIE';
    }
    const kind = participants[outcome.player].kind;
    return kind === 'PLAYER' ? `PLAYER ${outcome.player}` : kind;
  }

  private human<S extends MancalaBoardView>(): Participant<S> {
    return {
      kind: 'PLAYER',
      chooseMove: (state) => this.promptMove(state),
    };
  }

  private minimax<S extends MancalaBoard<S>>(
    builder: MinimaxBuilder<S>,
    player: PlayerNumber
  ): Participant<S> {
    const engine = builder.optimizeFor(player).build();
    return {
      kind: 'MINIMAX',
      chooseMove: async (state) => {
        const stats = engine.searchWithStats(state);
        log.debug('Search finished', {
          ply: state.ply,
          nodes: stats.nodes,
          elapsedMs: stats.elapsedMs,
          utility: stats.best?.utility,
        });
        return stats.best?.move ?? this.randomMove(state);
      },
    };
  }

  private external<S extends MancalaBoardView>(agent: ExternalAgent): Participant<S> {
    return {
      kind: 'EXTERNAL',
      chooseMove: async (state) => {
        const result = await agent.requestMove(state);
        if (result.kind === 'timeout') {
          throw new AgentTimeoutError(agent.timeoutMs, {
            ply: state.ply,
            path: agent.moveFilePath(state.ply),
          });
        }
        return result.move;
      },
    };
  }

  private randomMove(state: MancalaBoardView): Move {
    const moves = validMoves(state);
    const move = moves[Math.min(Math.floor(this.rng() * moves.length), moves.length - 1)];
    log.warn('Minimax returned no move; playing a random one', {
      ply: state.ply,
      move: formatMove(move),
    });
    return move;
  }

  /**
   * Prompt until a legal move is typed.
   *
   * @throws InputClosedError when the input ends first.
   */
  async promptMove(state: MancalaBoardView): Promise<Move> {
    const legal = validMoves(state);
    for (;;) {
      this.write(`PLAYER ${state.currentTurn} SELECTION: `);
      const next = await this.lines.next();
      if (next.done) {
        throw new InputClosedError(state.currentTurn, { ply: state.ply });
      }
      const move = parseMoveInput(next.value);
      if (move && legal.some((candidate) => movesEqual(candidate, move))) {
        return move;
      }
    }
  }

  private write(text: string): void {
    this.output.write(text);
  }
}
