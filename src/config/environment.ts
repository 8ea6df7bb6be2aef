import path from 'node:path';

/**
 * Canonical view of the process environment consumed by the engine.
 */
export interface EnvironmentConfig {
  /** Directory holding `config.json` and `cache.json`. */
  dataDir: string;
}

/**
 * Returns the static environment configuration (ENV overrides are not supported).
 */
export function loadEnvironment(cwd: string = process.cwd()): EnvironmentConfig {
  return { dataDir: path.resolve(cwd, 'data') };
}
