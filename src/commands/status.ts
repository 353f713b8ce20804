/**
 * work status / work free / work working
 */

import type { CommandResult } from '../types/index.js';
import { describeStart } from '../services/log/event.js';
import { humanReadable } from '../services/report/time-format.js';
import { expectNoArgs } from './shared.js';
import type { CommandArgs, CommandContext, CommandDefinition } from './shared.js';

export async function statusHandler(args: CommandArgs, ctx: CommandContext): Promise<CommandResult> {
  expectNoArgs('status', args);

  const last = await ctx.store.last();
  if (last?.kind !== 'start') {
    return { exitCode: 0, output: 'Not working' };
  }

  const elapsed = Math.max(0, ctx.now() - last.timestamp);
  return { exitCode: 0, output: `Working on ${describeStart(last)} for ${humanReadable(elapsed)}` };
}

export async function freeHandler(args: CommandArgs, ctx: CommandContext): Promise<CommandResult> {
  expectNoArgs('free', args);
  return { exitCode: (await ctx.store.isOpen()) ? 1 : 0 };
}

export async function workingHandler(args: CommandArgs, ctx: CommandContext): Promise<CommandResult> {
  expectNoArgs('working', args);
  return { exitCode: (await ctx.store.isOpen()) ? 0 : 1 };
}

export const statusCommand: CommandDefinition = {
  name: 'status',
  aliases: [],
  summary: 'Show the work in progress, if any',
  usage: 'work status',
  flags: [],
  handler: statusHandler,
};

export const freeCommand: CommandDefinition = {
  name: 'free',
  aliases: [],
  summary: 'Exit with 0 if no work is in progress, 1 otherwise',
  usage: 'work free',
  flags: [],
  handler: freeHandler,
};

export const workingCommand: CommandDefinition = {
  name: 'working',
  aliases: [],
  summary: 'Exit with 0 if work is in progress, 1 otherwise',
  usage: 'work working',
  flags: [],
  handler: workingHandler,
};
