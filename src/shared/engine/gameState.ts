import {
  BoardRows,
  PlayerNumber,
  StorePair,
  isPlayerNumber,
  playerIndex,
} from '../types/game';
import { BoardConstraintViolation, EngineErrorCode } from './errors';

/**
 * Read access shared by every board shape. The rules engine, the search
 * strategies and all formatting/encoding helpers only ever need this view.
 *
 * Pit indices are 0-based here; moves name pits 1-based.
 */
export interface MancalaBoardView {
  /** Pits per player (N). */
  readonly pits: number;
  readonly ply: number;
  readonly currentTurn: PlayerNumber;
  /** True once Player 2 has completed a pit move. */
  readonly player2Moved: boolean;
  pit(player: PlayerNumber, index: number): number;
  store(player: PlayerNumber): number;
  /** Fresh copies of both rows. */
  rows(): BoardRows;
  stores(): StorePair;
}

/**
 * Full board capability. `clone` plus the mutators let the rules engine build
 * a successor from a private copy; callers should treat any state they hold
 * as immutable and go through `makeMove`.
 */
export interface MancalaBoard<S extends MancalaBoard<S>> extends MancalaBoardView {
  clone(): S;
  setPit(player: PlayerNumber, index: number, value: number): void;
  setStore(player: PlayerNumber, value: number): void;
  setPly(ply: number): void;
  setCurrentTurn(player: PlayerNumber): void;
  setPlayer2Moved(value: boolean): void;
  /** Exchange rows and stores between the two players. */
  swapSides(): void;
}

/**
 * Raw description of a board, as accepted from callers and imports.
 * Omitted fields take the start-of-game values.
 */
export interface GameStateInit {
  rows: ReadonlyArray<ReadonlyArray<number>>;
  stores?: ReadonlyArray<number>;
  ply?: number;
  currentTurn?: PlayerNumber;
  player2Moved?: boolean;
}

interface NormalizedInit {
  rows: BoardRows;
  stores: StorePair;
  ply: number;
  currentTurn: PlayerNumber;
  player2Moved: boolean;
}

/** Stones a board may hold in total; `GameState` cells are 32-bit signed. */
export const MAX_STONES = 0x7fffffff;

function isCount(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0;
}

function normalizeInit(init: GameStateInit): NormalizedInit {
  if (init.rows.length !== 2) {
    throw new BoardConstraintViolation(
      EngineErrorCode.BOARD_ROW_LENGTH_MISMATCH,
      `A board needs exactly 2 rows (got ${init.rows.length})`,
      { rows: init.rows.length }
    );
  }
  const [row1, row2] = init.rows;
  if (row1.length !== row2.length) {
    throw new BoardConstraintViolation(
      EngineErrorCode.BOARD_ROW_LENGTH_MISMATCH,
      `Rows must have the same number of pits (row 1 has ${row1.length}, row 2 has ${row2.length})`,
      { row1: row1.length, row2: row2.length }
    );
  }
  if (row1.length === 0) {
    throw new BoardConstraintViolation(
      EngineErrorCode.BOARD_EMPTY_ROW,
      'A board needs at least one pit per player'
    );
  }

  const stores = init.stores ?? [0, 0];
  if (stores.length !== 2) {
    throw new BoardConstraintViolation(
      EngineErrorCode.BOARD_INVALID_COUNT,
      `A board needs exactly 2 stores (got ${stores.length})`,
      { stores: stores.length }
    );
  }

  const counts = [...row1, ...row2, ...stores];
  const badIndex = counts.findIndex((value) => !isCount(value));
  if (badIndex !== -1) {
    throw new BoardConstraintViolation(
      EngineErrorCode.BOARD_INVALID_COUNT,
      `Pit and store counts must be non-negative integers (got ${String(counts[badIndex])})`,
      { position: badIndex, value: counts[badIndex] }
    );
  }
  const total = counts.reduce((sum, value) => sum + value, 0);
  if (total > MAX_STONES) {
    throw new BoardConstraintViolation(
      EngineErrorCode.BOARD_INVALID_COUNT,
      `A board holds at most ${MAX_STONES} stones (got ${total})`,
      { total, max: MAX_STONES }
    );
  }

  const ply = init.ply ?? 1;
  const currentTurn = init.currentTurn ?? 1;
  if (!isCount(ply) || !isPlayerNumber(currentTurn)) {
    throw new BoardConstraintViolation(
      EngineErrorCode.BOARD_INVALID_TURN_STATE,
      'Ply must be a non-negative integer and the current turn must be 1 or 2',
      { ply, currentTurn }
    );
  }

  return {
    rows: [[...row1], [...row2]],
    stores: [stores[0], stores[1]],
    ply,
    currentTurn,
    player2Moved: init.player2Moved ?? false,
  };
}

/**
 * Fixed-length board: both rows and both stores share one Int32Array sized at
 * construction, so cloning is a single typed-array copy. This is the shape the
 * search should run on.
 *
 * Layout: `[p1 pit 0..N-1, p2 pit 0..N-1, store 1, store 2]`.
 */
export class GameState implements MancalaBoard<GameState> {
  readonly pits: number;
  private readonly cells: Int32Array;
  private turn: PlayerNumber;
  private plyCount: number;
  private p2Moved: boolean;

  private constructor(
    pits: number,
    cells: Int32Array,
    ply: number,
    currentTurn: PlayerNumber,
    player2Moved: boolean
  ) {
    this.pits = pits;
    this.cells = cells;
    this.plyCount = ply;
    this.turn = currentTurn;
    this.p2Moved = player2Moved;
  }

  static fromInit(init: GameStateInit): GameState {
    const normalized = normalizeInit(init);
    const pits = normalized.rows[0].length;
    const cells = new Int32Array(2 * pits + 2);
    cells.set(normalized.rows[0], 0);
    cells.set(normalized.rows[1], pits);
    cells[2 * pits] = normalized.stores[0];
    cells[2 * pits + 1] = normalized.stores[1];
    return new GameState(
      pits,
      cells,
      normalized.ply,
      normalized.currentTurn,
      normalized.player2Moved
    );
  }

  /**
   * Convert a variable-length board. When `expectedPits` is given, a board of
   * any other size is rejected rather than silently reshaped.
   */
  static fromDyn(dyn: DynGameState, expectedPits?: number): GameState {
    if (expectedPits !== undefined && dyn.pits !== expectedPits) {
      throw new BoardConstraintViolation(
        EngineErrorCode.BOARD_PIT_COUNT_MISMATCH,
        `Cannot convert a ${dyn.pits}-pit board into a ${expectedPits}-pit GameState`,
        { actual: dyn.pits, expected: expectedPits }
      );
    }
    return GameState.fromInit(snapshotOf(dyn));
  }

  get ply(): number {
    return this.plyCount;
  }

  get currentTurn(): PlayerNumber {
    return this.turn;
  }

  get player2Moved(): boolean {
    return this.p2Moved;
  }

  pit(player: PlayerNumber, index: number): number {
    return this.cells[playerIndex(player) * this.pits + index];
  }

  store(player: PlayerNumber): number {
    return this.cells[2 * this.pits + playerIndex(player)];
  }

  rows(): BoardRows {
    return [
      Array.from(this.cells.subarray(0, this.pits)),
      Array.from(this.cells.subarray(this.pits, 2 * this.pits)),
    ];
  }

  stores(): StorePair {
    return [this.store(1), this.store(2)];
  }

  clone(): GameState {
    return new GameState(
      this.pits,
      new Int32Array(this.cells),
      this.plyCount,
      this.turn,
      this.p2Moved
    );
  }

  setPit(player: PlayerNumber, index: number, value: number): void {
    this.cells[playerIndex(player) * this.pits + index] = value;
  }

  setStore(player: PlayerNumber, value: number): void {
    this.cells[2 * this.pits + playerIndex(player)] = value;
  }

  setPly(ply: number): void {
    this.plyCount = ply;
  }

  setCurrentTurn(player: PlayerNumber): void {
    this.turn = player;
  }

  setPlayer2Moved(value: boolean): void {
    this.p2Moved = value;
  }

  swapSides(): void {
    const first = this.cells.slice(0, this.pits);
    this.cells.copyWithin(0, this.pits, 2 * this.pits);
    this.cells.set(first, this.pits);
    const store1 = this.store(1);
    this.setStore(1, this.store(2));
    this.setStore(2, store1);
  }
}

/**
 * Variable-length board backed by plain arrays. Used for user-facing
 * configuration and imports; `resized` produces boards of other sizes.
 */
export class DynGameState implements MancalaBoard<DynGameState> {
  private readonly board: BoardRows;
  private readonly storeCounts: StorePair;
  private turn: PlayerNumber;
  private plyCount: number;
  private p2Moved: boolean;

  private constructor(init: NormalizedInit) {
    this.board = init.rows;
    this.storeCounts = init.stores;
    this.plyCount = init.ply;
    this.turn = init.currentTurn;
    this.p2Moved = init.player2Moved;
  }

  static fromInit(init: GameStateInit): DynGameState {
    return new DynGameState(normalizeInit(init));
  }

  static fromState(state: MancalaBoardView): DynGameState {
    return DynGameState.fromInit(snapshotOf(state));
  }

  get pits(): number {
    return this.board[0].length;
  }

  get ply(): number {
    return this.plyCount;
  }

  get currentTurn(): PlayerNumber {
    return this.turn;
  }

  get player2Moved(): boolean {
    return this.p2Moved;
  }

  pit(player: PlayerNumber, index: number): number {
    return this.board[playerIndex(player)][index];
  }

  store(player: PlayerNumber): number {
    return this.storeCounts[playerIndex(player)];
  }

  rows(): BoardRows {
    return [[...this.board[0]], [...this.board[1]]];
  }

  stores(): StorePair {
    return [this.storeCounts[0], this.storeCounts[1]];
  }

  clone(): DynGameState {
    return new DynGameState({
      rows: this.rows(),
      stores: this.stores(),
      ply: this.plyCount,
      currentTurn: this.turn,
      player2Moved: this.p2Moved,
    });
  }

  /**
   * Copy of this board with `pits` pits per player. Extra pits are filled with
   * `fill` stones; surplus pits are dropped.
   */
  resized(pits: number, fill: number = 0): DynGameState {
    const resize = (row: number[]): number[] =>
      Array.from({ length: pits }, (_, i) => (i < row.length ? row[i] : fill));
    return DynGameState.fromInit({
      rows: [resize(this.board[0]), resize(this.board[1])],
      stores: this.stores(),
      ply: this.plyCount,
      currentTurn: this.turn,
      player2Moved: this.p2Moved,
    });
  }

  setPit(player: PlayerNumber, index: number, value: number): void {
    this.board[playerIndex(player)][index] = value;
  }

  setStore(player: PlayerNumber, value: number): void {
    this.storeCounts[playerIndex(player)] = value;
  }

  setPly(ply: number): void {
    this.plyCount = ply;
  }

  setCurrentTurn(player: PlayerNumber): void {
    this.turn = player;
  }

  setPlayer2Moved(value: boolean): void {
    this.p2Moved = value;
  }

  swapSides(): void {
    const first = this.board[0];
    this.board[0] = this.board[1];
    this.board[1] = first;
    const store1 = this.storeCounts[0];
    this.storeCounts[0] = this.storeCounts[1];
    this.storeCounts[1] = store1;
  }
}

/** Plain-data snapshot of any board, suitable for JSON or re-construction. */
export function snapshotOf(state: MancalaBoardView): Required<GameStateInit> {
  return {
    rows: state.rows(),
    stores: state.stores(),
    ply: state.ply,
    currentTurn: state.currentTurn,
    player2Moved: state.player2Moved,
  };
}

/** Structural equality across board shapes. */
export function statesEqual(a: MancalaBoardView, b: MancalaBoardView): boolean {
  if (
    a.pits !== b.pits ||
    a.ply !== b.ply ||
    a.currentTurn !== b.currentTurn ||
    a.player2Moved !== b.player2Moved ||
    a.store(1) !== b.store(1) ||
    a.store(2) !== b.store(2)
  ) {
    return false;
  }
  for (const player of [1, 2] as const) {
    for (let i = 0; i < a.pits; i++) {
      if (a.pit(player, i) !== b.pit(player, i)) {
        return false;
      }
    }
  }
  return true;
}

export function rowSum(state: MancalaBoardView, player: PlayerNumber): number {
  let total = 0;
  for (let i = 0; i < state.pits; i++) {
    total += state.pit(player, i);
  }
  return total;
}

/** Stones on the board plus both stores; constant for the whole game. */
export function totalStones(state: MancalaBoardView): number {
  return rowSum(state, 1) + rowSum(state, 2) + state.store(1) + state.store(2);
}
