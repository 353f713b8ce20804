/**
 * Help and version text
 */

import type { CommandDefinition } from '../commands/shared.js';

export const VERSION = '0.1.0';

function commandLabel(definition: CommandDefinition): string {
  return [definition.name, ...definition.aliases].join(', ');
}

export function generalHelp(commands: readonly CommandDefinition[]): string {
  const labels = commands.map(commandLabel);
  const width = Math.max('help'.length, ...labels.map((label) => label.length)) + 2;

  return [
    'work - terminal time tracker',
    '',
    'Usage:',
    '  work <command> [arguments] [options]',
    '',
    'Commands:',
    ...commands.map((definition, i) => `  ${(labels[i] ?? definition.name).padEnd(width)}${definition.summary}`),
    `  ${'help'.padEnd(width)}Show this help, or the usage of one command`,
    '',
    'Options:',
    '  -d, --description <text>   Description for start, since, between and while',
    '  -c, --csv                  Output of as CSV',
    '  -j, --json                 Output of as JSON',
    '  -t, --time-format <fmt>    Time format for of: m, ma, h or hr',
    '  -h, --help                 Show help',
    '  -V, --version              Show version',
    '',
    'Times:',
    '  now, 9, 9:30, today, yesterday 14:00, 23 9:00, 23-12 9:00,',
    '  2024-01-02T09:00, 3 hours ago, 2h, 1:30h, in 20m',
    '',
    'Environment:',
    '  WORK_LOG_PATH      Log file (default ~/.local/share/work/work.log)',
    '  WORK_CONFIG_PATH   Config file (default ~/.config/work/config.yaml)',
    '  WORK_LOG_LEVEL     debug, info, warn or error',
    '  WORK_TIME_FORMAT   Default time format for of',
  ].join('\n');
}

export function commandHelp(definition: CommandDefinition): string {
  const lines = [`Usage: ${definition.usage}`, '', definition.summary];
  if (definition.aliases.length > 0) {
    lines.push('', `Aliases: ${definition.aliases.join(', ')}`);
  }
  return lines.join('\n');
}
