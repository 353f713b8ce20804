/**
 * work while
 *
 * Tracks a project for exactly as long as a command runs.
 */

import { z } from 'zod';
import type { CommandResult } from '../types/index.js';
import { ProcessFailed } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { describeStart, projectSchema, descriptionSchema } from '../services/log/event.js';
import type { ExitStatus } from '../services/process/runner.js';
import { humanReadable } from '../services/report/time-format.js';
import { descriptionArg, parseInput } from './shared.js';
import type { CommandArgs, CommandContext, CommandDefinition } from './shared.js';

const inputSchema = z.object({
  command: z.string({ required_error: 'Command is required' }).trim().min(1, 'Command is required'),
  project: projectSchema,
  description: descriptionSchema,
});

/**
 * Run the command and append the stop event however it ends
 */
async function runTracked(command: string, ctx: CommandContext): Promise<ExitStatus> {
  try {
    return await ctx.runCommand(command);
  } finally {
    await ctx.store.append({ kind: 'stop', timestamp: ctx.now() });
  }
}

export async function whileHandler(args: CommandArgs, ctx: CommandContext): Promise<CommandResult> {
  const input = parseInput(inputSchema, {
    command: args.positionals[0],
    project: args.positionals[1],
    description: descriptionArg(args, 2),
  });

  const start = {
    kind: 'start' as const,
    timestamp: ctx.now(),
    project: input.project,
    description: input.description,
  };
  await ctx.store.append(start);
  logger.debug(`Running tracked command: ${input.command}`);

  const status = await runTracked(input.command, ctx);
  if (status.signal) {
    throw new ProcessFailed(`Command was terminated by ${status.signal}`, null);
  }
  if (status.code !== 0) {
    throw new ProcessFailed(`Command exited with status ${status.code ?? 'unknown'}`, status.code);
  }

  const elapsed = Math.max(0, ctx.now() - start.timestamp);
  return { exitCode: 0, output: `Tracked ${humanReadable(elapsed)} on ${describeStart(start)}` };
}

export const whileCommand: CommandDefinition = {
  name: 'while',
  aliases: [],
  summary: 'Track a project while a command runs',
  usage: 'work while "<command>" <project> [description...]',
  flags: ['description'],
  handler: whileHandler,
};
