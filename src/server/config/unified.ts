/**
 * Unified Application Configuration
 *
 * Canonical source of truth for runtime configuration. It parses environment
 * variables, validates them with Zod, and exports a frozen config object that
 * the logger, the sessions and the CLI entry points read.
 *
 * Architecture:
 * - `env.ts` defines the raw environment variable schema
 * - `unified.ts` (this file) assembles the typed application config
 * - `index.ts` re-exports everything for convenient imports
 */

import dotenv from 'dotenv';
import { z } from 'zod';
import { isTestEnvironment } from '../../shared/utils/envFlags';
import {
  LogFormatSchema,
  LogLevelSchema,
  NodeEnvSchema,
  getEffectiveNodeEnv,
  loadEnvOrExit,
} from './env';

// Load .env into process.env before we read anything from it. Skipped in test
// mode so a developer's .env cannot override test-specific variables.
if (!isTestEnvironment()) {
  dotenv.config();
}

const env = loadEnvOrExit(process.env);

const nodeEnv = getEffectiveNodeEnv(env);

const ConfigSchema = z.object({
  nodeEnv: NodeEnvSchema,
  isProduction: z.boolean(),
  isDevelopment: z.boolean(),
  isTest: z.boolean(),
  app: z.object({
    name: z.string(),
    version: z.string(),
  }),
  logging: z.object({
    level: LogLevelSchema,
    format: LogFormatSchema,
    file: z.string().optional(),
  }),
  board: z.object({
    pits: z.number().int().min(1),
    stonesPerPit: z.number().int().min(1),
  }),
  search: z.object({
    /** null means unbounded */
    maxDepth: z.number().int().min(0).nullable(),
    /** null means unbounded */
    maxTimeMs: z.number().int().positive().nullable(),
  }),
  agent: z.object({
    dir: z.string().min(1),
    pollIntervalMs: z.number().int().positive(),
    timeoutMs: z.number().int().positive(),
  }),
  dataset: z.object({
    output: z.string().min(1),
  }),
});

/**
 * Application configuration type inferred from the schema.
 */
export type AppConfig = z.infer<typeof ConfigSchema>;

const preliminaryConfig: AppConfig = {
  nodeEnv,
  isProduction: nodeEnv === 'production',
  isDevelopment: nodeEnv === 'development',
  isTest: nodeEnv === 'test',
  app: {
    name: 'kalah-minimax',
    version: env.npm_package_version ?? '0.0.0',
  },
  logging: {
    level: env.LOG_LEVEL,
    format: env.LOG_FORMAT,
    file: env.LOG_FILE?.trim() || undefined,
  },
  board: {
    pits: env.KALAH_PITS,
    stonesPerPit: env.KALAH_STONES_PER_PIT,
  },
  search: {
    maxDepth: env.KALAH_SEARCH_MAX_DEPTH,
    maxTimeMs: env.KALAH_SEARCH_MAX_TIME_MS ?? null,
  },
  agent: {
    dir: env.KALAH_AGENT_DIR,
    pollIntervalMs: env.KALAH_AGENT_POLL_INTERVAL_MS,
    timeoutMs: env.KALAH_AGENT_TIMEOUT_MS,
  },
  dataset: {
    output: env.KALAH_DATASET_OUTPUT,
  },
};

// Parse and freeze the final config so downstream code gets a fully
// validated, immutable view.
export const config: AppConfig = Object.freeze(ConfigSchema.parse(preliminaryConfig));
