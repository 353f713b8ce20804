/**
 * work between
 *
 * Records a finished piece of work in one go: a start and a stop at the two
 * ends of a range.
 */

import { z } from 'zod';
import type { CommandResult } from '../types/index.js';
import { TimeOutOfRange, UsageError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { describeStart, projectSchema, descriptionSchema } from '../services/log/event.js';
import { parseRange } from '../services/time/resolver.js';
import { formatInstant, humanReadable } from '../services/report/time-format.js';
import { descriptionArg, parseInput } from './shared.js';
import type { CommandArgs, CommandContext, CommandDefinition } from './shared.js';

const inputSchema = z.object({
  range: z.string({ required_error: 'Range is required' }).min(1, 'Range is required'),
  project: projectSchema,
  description: descriptionSchema,
});

export async function betweenHandler(args: CommandArgs, ctx: CommandContext): Promise<CommandResult> {
  const input = parseInput(inputSchema, {
    range: args.positionals[0],
    project: args.positionals[1],
    description: descriptionArg(args, 2),
  });

  const now = ctx.now();
  const range = parseRange(input.range, now);
  if (!range) {
    throw new UsageError(`Expected a range such as "9:00 - 11:30", got "${input.range}"`);
  }
  if (range.end > now) {
    throw new TimeOutOfRange(`End time ${formatInstant(range.end)} is in the future`);
  }

  const start = {
    kind: 'start' as const,
    timestamp: range.start,
    project: input.project,
    description: input.description,
  };
  await ctx.store.append(start);
  await ctx.store.append({ kind: 'stop', timestamp: range.end });

  logger.info(`Logged ${input.project}`, range);
  return {
    exitCode: 0,
    output:
      `Logged ${humanReadable(range.end - range.start)} on ${describeStart(start)} ` +
      `(${formatInstant(range.start)} - ${formatInstant(range.end)})`,
  };
}

export const betweenCommand: CommandDefinition = {
  name: 'between',
  aliases: [],
  summary: 'Log work done between two earlier times',
  usage: 'work between "<start> - <end>" <project> [description...]',
  flags: ['description'],
  handler: betweenHandler,
};
