/**
 * work until / work for
 */

import { z } from 'zod';
import type { CommandResult } from '../types/index.js';
import { TimeOutOfRange } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { describeStart } from '../services/log/event.js';
import { parseInstant } from '../services/time/resolver.js';
import { formatInstant } from '../services/report/time-format.js';
import { parseInput } from './shared.js';
import type { CommandArgs, CommandContext, CommandDefinition } from './shared.js';

const inputSchema = z.object({
  time: z.string({ required_error: 'Time is required' }).min(1, 'Time is required'),
  extra: z.array(z.string()).max(0, 'until takes a single time; quote it if it has spaces'),
});

export async function untilHandler(args: CommandArgs, ctx: CommandContext): Promise<CommandResult> {
  const input = parseInput(inputSchema, {
    time: args.positionals[0],
    extra: args.positionals.slice(1),
  });

  const now = ctx.now();
  const timestamp = parseInstant(input.time, now, 'forward');
  if (timestamp < now) {
    throw new TimeOutOfRange(`Stop time ${formatInstant(timestamp)} is in the past`);
  }

  const last = await ctx.store.last();
  await ctx.store.append({ kind: 'stop', timestamp });

  logger.info('Scheduled stop', { timestamp });
  const subject = last?.kind === 'start' ? describeStart(last) : 'current work';
  return { exitCode: 0, output: `Stopping work on ${subject} at ${formatInstant(timestamp)}` };
}

export const untilCommand: CommandDefinition = {
  name: 'until',
  aliases: ['for'],
  summary: 'Stop the work in progress at a later time',
  usage: 'work until <time>',
  flags: [],
  handler: untilHandler,
};
