/**
 * Library entry point: the Kalah rules engine, minimax search and dataset
 * records. Terminal sessions, the external agent bridge and CSV storage live
 * under `src/server` and are driven by the scripts in `scripts/`.
 */

export * from './shared/engine';
export * from './shared/ai';
export * from './shared/dataset';
export * from './shared/errors';
export { parseGameStateSnapshot, GameStateSnapshotSchema, MoveSchema } from './shared/validation/schemas';
export type { SnapshotParseResult, GameStateSnapshotInput } from './shared/validation/schemas';
export { createSeededRng, randomSeed } from './shared/utils/rng';
export type { Rng } from './shared/utils/rng';
