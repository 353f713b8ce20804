/**
 * YAML config file
 * Loaded from WORK_CONFIG_PATH or ~/.config/work/config.yaml
 */

import { z } from 'zod';
import { readFileSync, existsSync } from 'fs';
import { join, resolve } from 'path';
import { homedir } from 'os';
import { parse as parseYaml } from 'yaml';
import { logger } from '../utils/logger.js';
import { ConfigError } from '../utils/errors.js';
import { parseTimeFormat } from '../services/report/time-format.js';

export const logLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

// Accepts the long names and their short aliases (m, ma, h, hr)
export const timeFormatSchema = z.string().transform((value, ctx) => {
  const format = parseTimeFormat(value);
  if (!format) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `Unknown time format "${value}"`,
    });
    return z.NEVER;
  }
  return format;
});

const fileConfigSchema = z
  .object({
    log_path: z.string().min(1).optional(),
    log_level: logLevelSchema.optional(),
    time_format: timeFormatSchema.optional(),
    shell: z.string().min(1).optional(),
  })
  .strict();

export type FileConfig = z.infer<typeof fileConfigSchema>;

export function expandHome(path: string): string {
  if (path === '~') return homedir();
  if (path.startsWith('~/')) return join(homedir(), path.slice(2));
  return path;
}

export function getConfigFilePath(env: NodeJS.ProcessEnv = process.env): string {
  if (env.WORK_CONFIG_PATH) {
    return resolve(expandHome(env.WORK_CONFIG_PATH));
  }
  const configHome = env.XDG_CONFIG_HOME ? resolve(env.XDG_CONFIG_HOME) : join(homedir(), '.config');
  return join(configHome, 'work', 'config.yaml');
}

/**
 * Read the config file; a missing file is an empty config
 */
export function loadFileConfig(configPath: string): FileConfig {
  if (!existsSync(configPath)) {
    logger.debug(`No config file at ${configPath}`);
    return {};
  }

  let raw: unknown;
  try {
    raw = parseYaml(readFileSync(configPath, 'utf-8'));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Unable to read config file ${configPath}: ${reason}`);
  }

  const result = fileConfigSchema.safeParse(raw ?? {});
  if (!result.success) {
    const errors = result.error.issues
      .map((issue) => `  - ${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('\n');
    throw new ConfigError(`Invalid config file ${configPath}:\n${errors}`);
  }

  logger.debug(`Loaded config from ${configPath}`);
  return result.data;
}
