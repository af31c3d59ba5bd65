/**
 * Environment Variable Schema and Validation
 *
 * This module defines the Zod schema for all environment variables the CLI
 * entry points read, validates them at startup, and exports a typed env
 * object.
 *
 * All environment variables should be defined here with appropriate
 * validation rules and defaults.
 */

import { z } from 'zod';
import { isJestRuntime } from '../../shared/utils/envFlags';

export const NodeEnvSchema = z.enum(['development', 'production', 'test']);
export type NodeEnv = z.infer<typeof NodeEnvSchema>;

export const LogLevelSchema = z.enum(['error', 'warn', 'info', 'verbose', 'debug']);
export type LogLevel = z.infer<typeof LogLevelSchema>;

export const LogFormatSchema = z.enum(['json', 'pretty']);
export type LogFormat = z.infer<typeof LogFormatSchema>;

/**
 * Search depth limit: a non-negative integer, or `none` for an unbounded
 * search.
 */
const MaxDepthSchema = z
  .string()
  .trim()
  .regex(/^(none|\d+)$/i, 'Expected a non-negative integer or "none"')
  .transform((val) => (val.toLowerCase() === 'none' ? null : Number(val)));

/**
 * Complete environment variable schema with validation rules and defaults.
 *
 * Variables are organized by category:
 * - Environment
 * - Logging
 * - Board
 * - Search
 * - External agent
 * - Dataset
 */
export const EnvSchema = z.object({
  // ===================================================================
  // ENVIRONMENT
  // ===================================================================

  /** Application environment mode */
  NODE_ENV: NodeEnvSchema.default('development'),

  /** Application version (injected by npm) */
  npm_package_version: z.string().optional(),

  // ===================================================================
  // LOGGING
  // ===================================================================

  LOG_LEVEL: LogLevelSchema.default('info'),

  /** json for machine-readable lines, pretty for colorized console output */
  LOG_FORMAT: LogFormatSchema.default('pretty'),

  /** Optional file that receives every log entry as JSON */
  LOG_FILE: z.string().optional(),

  // ===================================================================
  // BOARD
  // ===================================================================

  /** Pits per player */
  KALAH_PITS: z.coerce.number().int().min(1).max(64).default(6),

  KALAH_STONES_PER_PIT: z.coerce.number().int().min(1).default(4),

  // ===================================================================
  // SEARCH
  // ===================================================================

  KALAH_SEARCH_MAX_DEPTH: MaxDepthSchema.default('12'),

  /** Time budget per search (milliseconds); unset means unbounded */
  KALAH_SEARCH_MAX_TIME_MS: z.coerce.number().int().positive().optional(),

  // ===================================================================
  // EXTERNAL AGENT
  // ===================================================================

  /** Directory holding the state_<ply>.txt / move_<ply>.txt exchange files */
  KALAH_AGENT_DIR: z.string().default('./agent'),

  KALAH_AGENT_POLL_INTERVAL_MS: z.coerce.number().int().positive().default(100),

  /** Hard deadline for an agent's answer (milliseconds) */
  KALAH_AGENT_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),

  // ===================================================================
  // DATASET
  // ===================================================================

  KALAH_DATASET_OUTPUT: z.string().default('data/dataset.csv'),
});

/**
 * Inferred type for raw environment variables.
 */
export type RawEnv = z.infer<typeof EnvSchema>;

export interface EnvValidationResult {
  success: boolean;
  data?: RawEnv;
  errors?: Array<{ path: string; message: string }>;
}

/**
 * Parse and validate environment variables.
 *
 * @param env - Environment object to parse (defaults to process.env)
 */
export function parseEnv(env: Record<string, string | undefined> = process.env): EnvValidationResult {
  const result = EnvSchema.safeParse(env);

  if (!result.success) {
    const errors =
      result.error.issues.length > 0
        ? result.error.issues.map((issue) => ({
            path: issue.path.join('.'),
            message: issue.message,
          }))
        : [{ path: '', message: result.error.message }];

    return { success: false, errors };
  }

  return { success: true, data: result.data };
}

/**
 * Load and validate environment variables, exiting on failure.
 *
 * Called once at startup. If validation fails, it prints the issues and exits
 * the process.
 */
export function loadEnvOrExit(env: Record<string, string | undefined> = process.env): RawEnv {
  const result = parseEnv(env);

  if (!result.success || !result.data) {
    console.error('Invalid environment configuration:');
    for (const error of result.errors ?? []) {
      console.error(`  - ${error.path || 'root'}: ${error.message}`);
    }
    process.exit(1);
  }

  return result.data;
}

/**
 * Effective node environment. Under Jest this is always 'test', whatever
 * NODE_ENV says.
 */
export function getEffectiveNodeEnv(rawEnv: RawEnv): NodeEnv {
  return isJestRuntime() ? 'test' : rawEnv.NODE_ENV;
}

export function isProduction(nodeEnv: NodeEnv): boolean {
  return nodeEnv === 'production';
}

export function isDevelopment(nodeEnv: NodeEnv): boolean {
  return nodeEnv === 'development';
}

export function isTest(nodeEnv: NodeEnv): boolean {
  return nodeEnv === 'test';
}
