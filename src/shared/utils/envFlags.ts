// Environment flag helpers shared by the config layer and the tests.

type ProcessEnv = Record<string, string | undefined>;
function getProcessEnv(): ProcessEnv | undefined {
  if (typeof process !== 'undefined' && typeof process.env === 'object') {
    return process.env;
  }
  return undefined;
}

export function readEnv(name: string): string | undefined {
  const value = getProcessEnv()?.[name];
  return typeof value === 'string' ? value : undefined;
}

/**
 * Returns true if running in a test environment (NODE_ENV === 'test').
 */
export function isTestEnvironment(): boolean {
  return readEnv('NODE_ENV') === 'test';
}

/**
 * Returns true if running inside a Jest worker process, even when NODE_ENV
 * has been set to something else.
 */
export function isJestRuntime(): boolean {
  return readEnv('JEST_WORKER_ID') !== undefined;
}
