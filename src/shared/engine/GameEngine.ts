import { GameOutcome, Move, PlayerNumber } from '../types/game';
import { MancalaBoard } from './gameState';
import { makeMove } from './moveApplication';
import { validMoves } from './moveGeneration';
import { formatMove } from './notation';
import { isOver, outcome } from './victoryLogic';

export interface MoveRecord<S> {
  move: Move;
  player: PlayerNumber;
  /** State before the move was applied. */
  before: S;
}

export type GameEvent<S> =
  | {
      type: 'MOVE_APPLIED';
      timestamp: number;
      payload: { move: Move; player: PlayerNumber; newState: S; bonusTurn: boolean };
    }
  | {
      type: 'MOVE_REJECTED';
      timestamp: number;
      payload: { move: Move; player: PlayerNumber; error: string; code: 'ILLEGAL_MOVE' | 'GAME_OVER' };
    };

/**
 * Stateful wrapper over the pure rules functions for interactive play. Holds
 * the current state plus the history of applied moves; rejected moves leave
 * both untouched.
 */
export class GameEngine<S extends MancalaBoard<S>> {
  private state: S;
  private readonly history: MoveRecord<S>[] = [];

  constructor(initialState: S) {
    this.state = initialState;
  }

  public getGameState(): S {
    return this.state;
  }

  public getValidMoves(): Move[] {
    return validMoves(this.state);
  }

  public getMoveHistory(): ReadonlyArray<MoveRecord<S>> {
    return this.history;
  }

  public isGameOver(): boolean {
    return isOver(this.state);
  }

  public getOutcome(): GameOutcome {
    return outcome(this.state);
  }

  public processMove(move: Move): GameEvent<S> {
    const player = this.state.currentTurn;
    if (isOver(this.state)) {
      return {
        type: 'MOVE_REJECTED',
        timestamp: Date.now(),
        payload: { move, player, error: 'Game is already over', code: 'GAME_OVER' },
      };
    }

    const next = makeMove(this.state, move);
    if (!next) {
      return {
        type: 'MOVE_REJECTED',
        timestamp: Date.now(),
        payload: {
          move,
          player,
          error: `Move ${formatMove(move)} is not legal for player ${player}`,
          code: 'ILLEGAL_MOVE',
        },
      };
    }

    this.history.push({ move, player, before: this.state });
    this.state = next;
    return {
      type: 'MOVE_APPLIED',
      timestamp: Date.now(),
      payload: {
        move,
        player,
        newState: next,
        bonusTurn: move.type === 'pit' && next.currentTurn === player,
      },
    };
  }
}
