/**
 * Command line parsing
 *
 * `work <command> [args...] [options]`. Options may appear anywhere; `--`
 * ends option parsing so later arguments may start with a dash.
 */

import { UsageError } from '../utils/errors.js';

export interface CliFlags {
  help: boolean;
  version: boolean;
  csv: boolean;
  json: boolean;
  timeFormat?: string | undefined;
  description?: string | undefined;
}

export interface ParsedArgs {
  command?: string | undefined;
  positionals: string[];
  flags: CliFlags;
}

type BooleanFlag = 'help' | 'version' | 'csv' | 'json';
type ValueFlag = 'timeFormat' | 'description';

const BOOLEAN_FLAGS = new Map<string, BooleanFlag>([
  ['-h', 'help'],
  ['--help', 'help'],
  ['-V', 'version'],
  ['--version', 'version'],
  ['-c', 'csv'],
  ['--csv', 'csv'],
  ['-j', 'json'],
  ['--json', 'json'],
]);

const VALUE_FLAGS = new Map<string, ValueFlag>([
  ['-t', 'timeFormat'],
  ['--time-format', 'timeFormat'],
  ['-d', 'description'],
  ['--description', 'description'],
]);

export function parseArgs(argv: readonly string[]): ParsedArgs {
  const flags: CliFlags = { help: false, version: false, csv: false, json: false };
  const words: string[] = [];

  let stop = false;
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? '';
    if (stop || arg === '-' || !arg.startsWith('-')) {
      words.push(arg);
      continue;
    }
    if (arg === '--') {
      stop = true;
      continue;
    }

    const booleanFlag = BOOLEAN_FLAGS.get(arg);
    if (booleanFlag) {
      flags[booleanFlag] = true;
      continue;
    }

    const eq = arg.indexOf('=');
    const name = eq > 0 ? arg.slice(0, eq) : arg;
    const valueFlag = VALUE_FLAGS.get(name);
    if (!valueFlag) {
      throw new UsageError(`Unknown option ${name}. Run "work help" for usage.`);
    }

    let value: string | undefined;
    if (eq > 0) {
      value = arg.slice(eq + 1);
    } else {
      value = argv[i + 1];
      i++;
    }
    if (value === undefined) {
      throw new UsageError(`${name} requires a value`);
    }
    flags[valueFlag] = value;
  }

  const [command, ...positionals] = words;
  return { command, positionals, flags };
}
