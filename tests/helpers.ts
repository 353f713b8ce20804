/**
 * Shared test fixtures
 */

import { join } from 'path';
import { tmpdir } from 'os';
import { randomUUID } from 'crypto';
import type { Instant, WorkConfig } from '../src/types/index.js';
import type { CliFlags } from '../src/cli/args.js';
import type { CommandArgs, CommandContext } from '../src/commands/shared.js';
import { FileLogStore } from '../src/services/log/store.js';

export const MINUTE = 60;
export const HOUR = 3600;

/**
 * Local wall-clock time as an instant (months are 1-based)
 */
export function at(year: number, month: number, day: number, hours = 0, minutes = 0, seconds = 0): Instant {
  return Math.floor(new Date(year, month - 1, day, hours, minutes, seconds).getTime() / 1000);
}

export function utc(year: number, month: number, day: number, hours = 0, minutes = 0, seconds = 0): Instant {
  return Date.UTC(year, month - 1, day, hours, minutes, seconds) / 1000;
}

export function tempPath(label: string): string {
  return join(tmpdir(), `work-${label}-test-${randomUUID()}`);
}

export function testConfig(logPath: string, overrides: Partial<WorkConfig> = {}): WorkConfig {
  return {
    logPath,
    logLevel: 'error',
    timeFormat: 'human-readable',
    shell: 'sh',
    ...overrides,
  };
}

export interface CommandHarness {
  store: FileLogStore;
  ctx: CommandContext;
  clock: { now: Instant };
}

/**
 * A command context over a real log file and a settable clock
 */
export function createHarness(logPath: string, now: Instant, overrides: Partial<CommandContext> = {}): CommandHarness {
  const clock = { now };
  const store = new FileLogStore(logPath);
  const ctx: CommandContext = {
    store,
    now: () => clock.now,
    runCommand: async () => ({ code: 0, signal: null }),
    config: testConfig(logPath),
    ...overrides,
  };
  return { store, ctx, clock };
}

export function args(positionals: string[], flags: Partial<CliFlags> = {}): CommandArgs {
  return {
    positionals,
    flags: { help: false, version: false, csv: false, json: false, ...flags },
  };
}
