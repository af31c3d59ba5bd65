import { DynGameState, MancalaBoardView, statesEqual } from '../engine/gameState';
import {
  EngineErrorCode,
  MoveRequirementError,
  RecordFormatError,
  isBoardConstraintViolation,
} from '../engine/errors';
import { Move, MoveUtility, isPlayerNumber, moveFromCode, moveToCode } from '../types/game';

/**
 * Flat record layout, for a board of N pits per player:
 *
 * | offset      | field                                  |
 * |-------------|----------------------------------------|
 * | 0, 1        | store 1, store 2                       |
 * | 2 ..        | Player 1 pits 1..N, Player 2 pits 1..N |
 * | 2N + 2      | current turn (1 or 2)                  |
 * | 2N + 3      | ply                                    |
 * | 2N + 4      | Player 2 has moved (0 or 1)            |
 * | 2N + 5      | utility of Swap                        |
 * | 2N + 6 ..   | utility of Pit 1..N                    |
 *
 * Moves a search did not score are stored as -Infinity.
 */
export function recordLength(pits: number): number {
  return 3 * pits + 6;
}

/** Pit count for a record length, or null if no board has that length. */
export function pitsForRecordLength(length: number): number | null {
  const pits = (length - 6) / 3;
  return Number.isInteger(pits) && pits >= 1 ? pits : null;
}

/**
 * One training example: a board plus a utility for every move code 0..N.
 *
 * Utilities are kept in canonical order: Swap, then Pit 1..N.
 */
export class MancalaExample<S extends MancalaBoardView = MancalaBoardView> {
  readonly state: S;
  readonly utilities: ReadonlyArray<MoveUtility>;

  private constructor(state: S, utilities: ReadonlyArray<MoveUtility>) {
    this.state = state;
    this.utilities = utilities;
  }

  /**
   * Build an example from a search result. Moves missing from `utilities`
   * get -Infinity; if a move appears twice the later entry wins.
   *
   * @throws MoveRequirementError when a move names a pit beyond the board.
   */
  static create<S extends MancalaBoardView>(
    state: S,
    utilities: ReadonlyArray<MoveUtility>
  ): MancalaExample<S> {
    const values = new Array<number>(state.pits + 1).fill(-Infinity);
    for (const { move, utility } of utilities) {
      const code = moveToCode(move);
      if (code > state.pits) {
        throw new MoveRequirementError(
          EngineErrorCode.MOVE_INVALID_CODE,
          `Move code ${code} does not exist on a ${state.pits}-pit board`,
          { code, pits: state.pits }
        );
      }
      values[code] = utility;
    }
    return new MancalaExample(state, Object.freeze(values.map(toMoveUtility)));
  }

  utilityOf(move: Move): number {
    return this.utilities[moveToCode(move)]?.utility ?? -Infinity;
  }

  /**
   * Equality used for deduplication: same board, and bitwise-equal
   * utilities, so NaN matches NaN while 0 and -0 differ.
   */
  equals(other: MancalaExample): boolean {
    return (
      statesEqual(this.state, other.state) &&
      this.utilities.length === other.utilities.length &&
      this.utilities.every((entry, i) => Object.is(entry.utility, other.utilities[i].utility))
    );
  }

  /** String key consistent with {@link equals}. */
  key(): string {
    return encodeExample(this).map(formatRecordValue).join(',');
  }
}

function toMoveUtility(utility: number, code: number): MoveUtility {
  const move = moveFromCode(code);
  if (!move) {
    throw new MoveRequirementError(EngineErrorCode.MOVE_INVALID_CODE, `Invalid move code ${code}`, {
      code,
    });
  }
  return { move, utility };
}

/**
 * Text form of a record value. Distinguishes -0 from 0, which `String` does
 * not.
 */
export function formatRecordValue(value: number): string {
  return Object.is(value, -0) ? '-0' : String(value);
}

export function encodeExample(example: MancalaExample): number[] {
  const { state } = example;
  const [row1, row2] = state.rows();
  return [
    ...state.stores(),
    ...row1,
    ...row2,
    state.currentTurn,
    state.ply,
    state.player2Moved ? 1 : 0,
    ...example.utilities.map((entry) => entry.utility),
  ];
}

function requireCount(record: ReadonlyArray<number>, offset: number, field: string): number {
  const value = record[offset];
  if (!Number.isInteger(value) || value < 0) {
    throw new RecordFormatError(
      EngineErrorCode.RECORD_INVALID_FIELD,
      `Record field ${field} must be a non-negative integer (got ${formatRecordValue(value)})`,
      { offset, field, value }
    );
  }
  return value;
}

/**
 * Decode a flat record into an example over a variable-length board.
 *
 * @throws RecordFormatError for a length that fits no board, or state fields
 * that are not counts, a valid turn or a 0/1 flag. Utility fields may hold any
 * number, NaN included.
 */
export function decodeExample(record: ReadonlyArray<number>): MancalaExample<DynGameState> {
  const pits = pitsForRecordLength(record.length);
  if (pits === null) {
    throw new RecordFormatError(
      EngineErrorCode.RECORD_LENGTH_MISMATCH,
      `Record length ${record.length} does not fit 3N + 6 for any N >= 1`,
      { length: record.length }
    );
  }

  const stores = [requireCount(record, 0, 'store1'), requireCount(record, 1, 'store2')];
  const row1: number[] = [];
  const row2: number[] = [];
  for (let i = 0; i < pits; i++) {
    row1.push(requireCount(record, 2 + i, `player1p${i + 1}`));
    row2.push(requireCount(record, 2 + pits + i, `player2p${i + 1}`));
  }

  const turnOffset = 2 + 2 * pits;
  const currentTurn = record[turnOffset];
  if (!isPlayerNumber(currentTurn)) {
    throw new RecordFormatError(
      EngineErrorCode.RECORD_INVALID_FIELD,
      `Record field turn must be 1 or 2 (got ${formatRecordValue(currentTurn)})`,
      { offset: turnOffset, field: 'turn', value: currentTurn }
    );
  }
  const ply = requireCount(record, turnOffset + 1, 'ply');
  const movedFlag = record[turnOffset + 2];
  if (movedFlag !== 0 && movedFlag !== 1) {
    throw new RecordFormatError(
      EngineErrorCode.RECORD_INVALID_FIELD,
      `Record field p2_moved must be 0 or 1 (got ${formatRecordValue(movedFlag)})`,
      { offset: turnOffset + 2, field: 'p2_moved', value: movedFlag }
    );
  }

  let state: DynGameState;
  try {
    state = DynGameState.fromInit({
      rows: [row1, row2],
      stores,
      ply,
      currentTurn,
      player2Moved: movedFlag === 1,
    });
  } catch (error) {
    if (isBoardConstraintViolation(error)) {
      throw new RecordFormatError(EngineErrorCode.RECORD_INVALID_FIELD, error.message, error.context);
    }
    throw error;
  }
  const utilities = record.slice(turnOffset + 3).map(toMoveUtility);
  return MancalaExample.create(state, utilities);
}
