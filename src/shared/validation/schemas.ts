import { z } from 'zod';
import { isBoardConstraintViolation } from '../engine/errors';
import { DynGameState } from '../engine/gameState';

// Non-negative integer stone count (pit or store).
export const StoneCountSchema = z.number().int().min(0);

// Move validation. Pit numbers are 1-based; the upper bound depends on the
// board and is left to the rules engine.
export const MoveSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('pit'), pit: z.number().int().min(1) }),
  z.object({ type: z.literal('swap') }),
]);

export type MoveInput = z.infer<typeof MoveSchema>;

// Board snapshot, as written by snapshotOf() or by hand. Omitted fields take
// the start-of-game values.
export const GameStateSnapshotSchema = z
  .object({
    rows: z.tuple([z.array(StoneCountSchema).min(1), z.array(StoneCountSchema).min(1)]),
    stores: z.tuple([StoneCountSchema, StoneCountSchema]).default([0, 0]),
    ply: z.number().int().min(0).default(1),
    currentTurn: z.union([z.literal(1), z.literal(2)]).default(1),
    player2Moved: z.boolean().default(false),
  })
  .refine((snapshot) => snapshot.rows[0].length === snapshot.rows[1].length, {
    message: 'Both rows must have the same number of pits',
    path: ['rows'],
  });

export type GameStateSnapshotInput = z.infer<typeof GameStateSnapshotSchema>;

export type SnapshotParseResult =
  | { success: true; state: DynGameState }
  | { success: false; errors: string[] };

/**
 * Validate an untrusted snapshot (for example parsed JSON) and build a
 * variable-length board from it.
 */
export function parseGameStateSnapshot(input: unknown): SnapshotParseResult {
  const result = GameStateSnapshotSchema.safeParse(input);
  if (!result.success) {
    return {
      success: false,
      errors: result.error.issues.map(
        (issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`
      ),
    };
  }
  try {
    return { success: true, state: DynGameState.fromInit(result.data) };
  } catch (error) {
    if (isBoardConstraintViolation(error)) {
      return { success: false, errors: [`(root): ${error.message}`] };
    }
    throw error;
  }
}
