/**
 * work start / work on
 */

import { z } from 'zod';
import type { CommandResult } from '../types/index.js';
import { logger } from '../utils/logger.js';
import { describeStart, projectSchema, descriptionSchema } from '../services/log/event.js';
import { descriptionArg, parseInput } from './shared.js';
import type { CommandArgs, CommandContext, CommandDefinition } from './shared.js';

const inputSchema = z.object({
  project: projectSchema,
  description: descriptionSchema,
});

export async function startHandler(args: CommandArgs, ctx: CommandContext): Promise<CommandResult> {
  const input = parseInput(inputSchema, {
    project: args.positionals[0],
    description: descriptionArg(args, 1),
  });

  const event = {
    kind: 'start' as const,
    timestamp: ctx.now(),
    project: input.project,
    description: input.description,
  };
  await ctx.store.append(event);

  logger.info(`Started ${input.project}`);
  return { exitCode: 0, output: `Started working on ${describeStart(event)}` };
}

export const startCommand: CommandDefinition = {
  name: 'start',
  aliases: ['on'],
  summary: 'Start working on a project now',
  usage: 'work start <project> [description...]',
  flags: ['description'],
  handler: startHandler,
};
