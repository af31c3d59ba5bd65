import { Move, compareMoves, pitMove, SWAP_MOVE } from '../types/game';
import { MancalaBoardView } from './gameState';
import { validMoves } from './moveGeneration';

/**
 * Shared move/board notation helpers.
 *
 * These give a small human-readable notation for terminal play, logs and
 * test failure messages. Pits are shown 1-based, Swap as `SWAP`.
 */

export function formatMove(move: Move): string {
  return move.type === 'swap' ? 'SWAP' : String(move.pit);
}

export function formatMoveList(moves: readonly Move[]): string {
  return moves.length === 0 ? 'None' : moves.map(formatMove).join(', ');
}

/**
 * Parse a typed move: `swap` (any case) or a positive pit number. Whether the
 * move is legal is left to the rules engine.
 */
export function parseMoveInput(input: string): Move | null {
  const trimmed = input.trim();
  if (trimmed.toLowerCase() === 'swap') {
    return SWAP_MOVE;
  }
  if (!/^\d+$/.test(trimmed)) {
    return null;
  }
  const pit = Number(trimmed);
  return pit >= 1 ? pitMove(pit) : null;
}

function pad(count: number): string {
  return String(count).padStart(2, '0');
}

/**
 * Bird's-eye board view. Player 1's row is printed right-to-left so both rows
 * read counter-clockwise around the board, with `*` marking the side to move:
 *
 * ```
 * Bird's-Eye View of Static GameState
 * ===================================
 * * P1:  (00)  [ 04 04 04 04 04 04 ]
 *   P2:        [ 04 04 04 04 04 04 ]  (00)
 * Move Number: 1
 * Valid Moves: 1, 2, 3, 4, 5, 6
 * ```
 */
export function formatBoard(state: MancalaBoardView, title: string = 'GameState'): string {
  const [row1, row2] = state.rows();
  const [store1, store2] = state.stores();
  const header = `Bird's-Eye View of ${title}`;
  const p1Marker = state.currentTurn === 1 ? '*' : ' ';
  const p2Marker = state.currentTurn === 2 ? '*' : ' ';
  const sortedMoves = [...validMoves(state)].sort(compareMoves);

  return [
    header,
    '='.repeat(header.length),
    `${p1Marker} P1:  (${pad(store1)})  [ ${[...row1].reverse().map(pad).join(' ')} ]`,
    `${p2Marker} P2:        [ ${row2.map(pad).join(' ')} ]  (${pad(store2)})`,
    `Move Number: ${state.ply}`,
    `Valid Moves: ${formatMoveList(sortedMoves)}`,
  ].join('\n');
}
