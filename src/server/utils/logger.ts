import winston from 'winston';
import fs from 'fs';
import path from 'path';
import { config } from '../config';

// ============================================================================
// Types
// ============================================================================

export type LogMeta = Record<string, unknown>;

// ============================================================================
// Formats
// ============================================================================

interface SerializableError {
  toJSON(): object;
}

function hasToJSON(value: Error): value is Error & SerializableError {
  return 'toJSON' in value && typeof value.toJSON === 'function';
}

/**
 * Normalize an error for structured output. Engine and game errors carry
 * their own `toJSON` with code and context.
 */
export const serializeError = (error: unknown): unknown => {
  if (!(error instanceof Error)) {
    return error;
  }
  if (hasToJSON(error)) {
    return { ...error.toJSON(), stack: error.stack };
  }
  return { message: error.message, name: error.name, stack: error.stack };
};

/**
 * Adds the environment tag and flattens Error objects passed as `error`
 * metadata.
 */
const structuredFormat = winston.format((info) => {
  if (!info.environment) {
    info.environment = config.nodeEnv;
  }
  if (info.error instanceof Error) {
    info.error = serializeError(info.error);
  }
  return info;
});

/**
 * Format for structured JSON logging (LOG_FORMAT=json and file transports).
 */
const jsonFormat = winston.format.combine(
  winston.format.timestamp({
    format: () => new Date().toISOString(),
  }),
  winston.format.errors({ stack: true }),
  structuredFormat(),
  winston.format.json()
);

/**
 * Format for human-readable console output.
 */
const consoleFormat = winston.format.combine(
  winston.format.timestamp({
    format: 'YYYY-MM-DD HH:mm:ss',
  }),
  winston.format.errors({ stack: true }),
  structuredFormat(),
  winston.format.colorize(),
  winston.format.printf(({ timestamp, level, message, service: _service, environment: _env, ...meta }) => {
    const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
    return `${String(timestamp)} ${level}: ${String(message)}${metaStr}`;
  })
);

// ============================================================================
// Logger
// ============================================================================

const logger = winston.createLogger({
  level: config.logging.level,
  defaultMeta: {
    service: config.app.name,
    environment: config.nodeEnv,
  },
  transports: [
    // All levels go to stderr; stdout belongs to terminal sessions.
    new winston.transports.Console({
      format: config.logging.format === 'json' ? jsonFormat : consoleFormat,
      stderrLevels: ['error', 'warn', 'info', 'verbose', 'debug'],
    }),
  ],
});

if (config.logging.file) {
  const logDir = path.dirname(config.logging.file);
  if (!fs.existsSync(logDir)) {
    fs.mkdirSync(logDir, { recursive: true });
  }
  logger.add(
    new winston.transports.File({
      filename: config.logging.file,
      format: jsonFormat,
      maxsize: 5242880, // 5MB
      maxFiles: 5,
    })
  );
}

/**
 * Child logger tagged with a component name, for example
 * `createComponentLogger('ExternalAgent')`.
 */
export const createComponentLogger = (component: string): winston.Logger =>
  logger.child({ component });

// ============================================================================
// Exports
// ============================================================================

export { logger };
