/**
 * Configuration loading and validation
 *
 * Values come from WORK_* environment variables, then the YAML config file,
 * then built-in defaults.
 */

import { z } from 'zod';
import { homedir } from 'os';
import { join, resolve } from 'path';
import type { WorkConfig } from '../types/index.js';
import { ConfigError } from '../utils/errors.js';
import { logLevelSchema, timeFormatSchema, loadFileConfig, getConfigFilePath, expandHome } from './file-config.js';

// Environment variable schema
const envSchema = z.object({
  WORK_LOG_PATH: z.string().min(1).optional(),
  WORK_LOG_LEVEL: logLevelSchema.optional(),
  WORK_CONFIG_PATH: z.string().min(1).optional(),
  WORK_TIME_FORMAT: timeFormatSchema.optional(),
  SHELL: z.string().optional(),
});

/**
 * Per-user data directory holding work.log
 */
export function getDataDir(env: NodeJS.ProcessEnv = process.env): string {
  if (env.XDG_DATA_HOME) {
    return resolve(env.XDG_DATA_HOME);
  }
  if (process.platform === 'darwin') {
    return join(homedir(), 'Library', 'Application Support');
  }
  return join(homedir(), '.local', 'share');
}

export function getDefaultLogPath(env: NodeJS.ProcessEnv = process.env): string {
  return join(getDataDir(env), 'work', 'work.log');
}

/**
 * Load configuration from the environment and the config file
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): WorkConfig {
  const result = envSchema.safeParse(env);

  if (!result.success) {
    const errors = result.error.issues
      .map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`)
      .join('\n');
    throw new ConfigError(`Configuration error:\n${errors}`);
  }

  const vars = result.data;
  const file = loadFileConfig(getConfigFilePath(env));

  const logPath = vars.WORK_LOG_PATH ?? file.log_path;

  return {
    logPath: logPath ? resolve(expandHome(logPath)) : getDefaultLogPath(env),
    logLevel: vars.WORK_LOG_LEVEL ?? file.log_level ?? 'warn',
    timeFormat: vars.WORK_TIME_FORMAT ?? file.time_format ?? 'human-readable',
    // SHELL is nearly always exported, so an explicit file setting wins over it
    shell: file.shell ?? (vars.SHELL || 'sh'),
  };
}

// Singleton config instance
let configInstance: WorkConfig | null = null;

/**
 * Get the current config (cached)
 */
export function getConfig(): WorkConfig {
  if (!configInstance) {
    configInstance = loadConfig();
  }
  return configInstance;
}

/**
 * Reset config (for testing)
 */
export function resetConfig(): void {
  configInstance = null;
}

export { loadFileConfig, getConfigFilePath, expandHome } from './file-config.js';
