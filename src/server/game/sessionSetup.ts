import fs from 'fs/promises';

import { MinimaxBuilder } from '../../shared/ai/minimax/MinimaxBuilder';
import { GameState } from '../../shared/engine/gameState';
import { createInitialGameState } from '../../shared/engine/initialState';
import { GameError, GameErrorCode, wrapError } from '../../shared/errors/GameDomainErrors';
import { parseGameStateSnapshot } from '../../shared/validation/schemas';
import { config } from '../config';
import { createComponentLogger } from '../utils/logger';

const log = createComponentLogger('SessionSetup');

export interface SearchSettings {
  /** null means unbounded */
  maxDepth: number | null;
  /** null means unbounded */
  maxTimeMs: number | null;
}

export interface BoardSettings {
  pits: number;
  stonesPerPit: number;
}

/**
 * Search builder over the fixed-length board, with depth and time budgets
 * taken from `settings` (the environment by default).
 */
export function createMinimaxBuilder(
  settings: SearchSettings = config.search
): MinimaxBuilder<GameState> {
  return new MinimaxBuilder<GameState>().maxDepth(settings.maxDepth).maxTime(settings.maxTimeMs);
}

/**
 * Board to start a game from: the snapshot in `statePath` when given,
 * otherwise a fresh opening.
 *
 * @throws GameError CONFIGURATION_ERROR for an unreadable or invalid snapshot.
 */
export async function loadInitialState(
  board: BoardSettings = config.board,
  statePath?: string
): Promise<GameState> {
  if (!statePath) {
    return createInitialGameState(board);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(await fs.readFile(statePath, 'utf8'));
  } catch (error) {
    throw wrapError(error, GameErrorCode.CONFIGURATION_ERROR, { path: statePath });
  }

  const parsed = parseGameStateSnapshot(raw);
  if (!parsed.success) {
    throw new GameError(
      GameErrorCode.CONFIGURATION_ERROR,
      `Invalid board snapshot in ${statePath}: ${parsed.errors.join('; ')}`,
      { path: statePath, errors: parsed.errors }
    );
  }
  log.info('Loaded board snapshot', { path: statePath, pits: parsed.state.pits });
  return GameState.fromDyn(parsed.state);
}
