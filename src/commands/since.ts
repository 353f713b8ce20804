/**
 * work since
 */

import { z } from 'zod';
import type { CommandResult } from '../types/index.js';
import { TimeOutOfRange } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { describeStart, projectSchema, descriptionSchema } from '../services/log/event.js';
import { parseInstant } from '../services/time/resolver.js';
import { formatInstant } from '../services/report/time-format.js';
import { descriptionArg, parseInput } from './shared.js';
import type { CommandArgs, CommandContext, CommandDefinition } from './shared.js';

const inputSchema = z.object({
  time: z.string({ required_error: 'Time is required' }).min(1, 'Time is required'),
  project: projectSchema,
  description: descriptionSchema,
});

export async function sinceHandler(args: CommandArgs, ctx: CommandContext): Promise<CommandResult> {
  const input = parseInput(inputSchema, {
    time: args.positionals[0],
    project: args.positionals[1],
    description: descriptionArg(args, 2),
  });

  const now = ctx.now();
  const timestamp = parseInstant(input.time, now, 'backward');
  if (timestamp > now) {
    throw new TimeOutOfRange(`Start time ${formatInstant(timestamp)} is in the future`);
  }

  const event = {
    kind: 'start' as const,
    timestamp,
    project: input.project,
    description: input.description,
  };
  await ctx.store.append(event);

  logger.info(`Started ${input.project} retroactively`, { timestamp });
  return { exitCode: 0, output: `Started working on ${describeStart(event)} at ${formatInstant(timestamp)}` };
}

export const sinceCommand: CommandDefinition = {
  name: 'since',
  aliases: [],
  summary: 'Start working on a project from an earlier time',
  usage: 'work since <time> <project> [description...]',
  flags: ['description'],
  handler: sinceHandler,
};
