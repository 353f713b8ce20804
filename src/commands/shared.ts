/**
 * Types and helpers shared by the command handlers
 */

import type { z } from 'zod';
import type { CommandResult, WorkConfig } from '../types/index.js';
import type { CliFlags } from '../cli/args.js';
import type { LogStore } from '../services/log/store.js';
import type { Clock } from '../services/time/clock.js';
import type { CommandRunner } from '../services/process/runner.js';
import { UsageError } from '../utils/errors.js';

export interface CommandContext {
  store: LogStore;
  now: Clock;
  runCommand: CommandRunner;
  config: WorkConfig;
}

export interface CommandArgs {
  positionals: string[];
  flags: CliFlags;
}

export type CommandHandler = (args: CommandArgs, ctx: CommandContext) => Promise<CommandResult>;

// Options that only some commands take; --help and --version work everywhere
export type CommandFlag = 'description' | 'csv' | 'json' | 'timeFormat';

const FLAG_NAMES: Record<CommandFlag, string> = {
  description: '--description',
  csv: '--csv',
  json: '--json',
  timeFormat: '--time-format',
};

export interface CommandDefinition {
  name: string;
  aliases: readonly string[];
  summary: string;
  usage: string;
  flags: readonly CommandFlag[];
  handler: CommandHandler;
}

/**
 * Validate command input, turning schema issues into a usage error
 */
export function parseInput<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown): T {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new UsageError(result.error.issues.map((issue) => issue.message).join('; '));
  }
  return result.data;
}

/**
 * The description: --description when given, else the words from `from` on
 */
export function descriptionArg(args: CommandArgs, from: number): string | undefined {
  if (args.flags.description !== undefined) {
    if (args.positionals.length > from) {
      throw new UsageError('Give the description either as trailing words or with --description, not both');
    }
    return args.flags.description;
  }
  const words = args.positionals.slice(from).join(' ');
  return words.length > 0 ? words : undefined;
}

/**
 * Throws if an option the command does not take was given
 */
export function expectFlags(definition: CommandDefinition, flags: CliFlags): void {
  const given: CommandFlag[] = [];
  if (flags.description !== undefined) given.push('description');
  if (flags.csv) given.push('csv');
  if (flags.json) given.push('json');
  if (flags.timeFormat !== undefined) given.push('timeFormat');

  const unsupported = given.find((flag) => !definition.flags.includes(flag));
  if (unsupported) {
    throw new UsageError(`${definition.name} does not take ${FLAG_NAMES[unsupported]}`);
  }
}

export function expectNoArgs(name: string, args: CommandArgs): void {
  if (args.positionals.length > 0) {
    throw new UsageError(`${name} takes no arguments`);
  }
}
