/**
 * work of
 *
 * Summarizes the time spent per project within an interval.
 */

import type { CommandResult, ReportFormat, TimeFormat } from '../types/index.js';
import { UsageError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { resolveInterval } from '../services/time/resolver.js';
import { summarize, summarizeDetailed } from '../services/time/aggregator.js';
import { parseTimeFormat } from '../services/report/time-format.js';
import { renderCsv, renderJson, renderText } from '../services/report/formatter.js';
import type { CommandArgs, CommandContext, CommandDefinition } from './shared.js';

export const NO_WORK_DONE = 'No work done!';

function reportFormat(args: CommandArgs): ReportFormat {
  if (args.flags.csv && args.flags.json) {
    throw new UsageError('Choose one of --csv and --json');
  }
  if (args.flags.csv) return 'csv';
  if (args.flags.json) return 'json';
  return 'text';
}

function timeFormat(args: CommandArgs, ctx: CommandContext): TimeFormat {
  if (args.flags.timeFormat === undefined) {
    return ctx.config.timeFormat;
  }
  const format = parseTimeFormat(args.flags.timeFormat);
  if (!format) {
    throw new UsageError(
      `Unknown time format "${args.flags.timeFormat}". Valid values are m, minutes, ma, minutes-approx, h, hours, hr, human-readable`
    );
  }
  return format;
}

export async function ofHandler(args: CommandArgs, ctx: CommandContext): Promise<CommandResult> {
  // Unquoted ranges arrive as separate words: work of 9 - 11
  const intervalText = args.positionals.join(' ').trim();
  if (!intervalText) {
    throw new UsageError('Interval is required, e.g. "work of today"');
  }

  const format = reportFormat(args);
  const time = timeFormat(args, ctx);
  const now = ctx.now();
  const interval = resolveInterval(intervalText, now);
  const events = await ctx.store.readAll();

  logger.debug(`Summarizing ${events.length} events`, interval);

  if (format === 'text') {
    const summary = summarize(events, interval, now);
    if (summary.size === 0) return { exitCode: 1, output: NO_WORK_DONE };
    return { exitCode: 0, output: renderText(summary, time) };
  }

  const detailed = summarizeDetailed(events, interval, now);
  if (detailed.size === 0) return { exitCode: 1, output: NO_WORK_DONE };
  return {
    exitCode: 0,
    output: format === 'csv' ? renderCsv(detailed, time) : renderJson(detailed, time),
  };
}

export const ofCommand: CommandDefinition = {
  name: 'of',
  aliases: [],
  summary: 'Summarize work done within an interval',
  usage: 'work of <today|yesterday|week|month|year|time|"<start> - <end>"> [--csv|--json] [-t <format>]',
  flags: ['csv', 'json', 'timeFormat'],
  handler: ofHandler,
};
