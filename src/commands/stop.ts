/**
 * work stop
 */

import type { CommandResult } from '../types/index.js';
import { logger } from '../utils/logger.js';
import { describeStart } from '../services/log/event.js';
import { humanReadable } from '../services/report/time-format.js';
import { expectNoArgs } from './shared.js';
import type { CommandArgs, CommandContext, CommandDefinition } from './shared.js';

export async function stopHandler(args: CommandArgs, ctx: CommandContext): Promise<CommandResult> {
  expectNoArgs('stop', args);

  const last = await ctx.store.last();
  const timestamp = ctx.now();
  await ctx.store.append({ kind: 'stop', timestamp });

  // The append only succeeds when the last event was a start
  if (last?.kind !== 'start') {
    return { exitCode: 0 };
  }

  logger.info(`Stopped ${last.project}`);
  return {
    exitCode: 0,
    output: `Stopped working on ${describeStart(last)} after ${humanReadable(timestamp - last.timestamp)}`,
  };
}

export const stopCommand: CommandDefinition = {
  name: 'stop',
  aliases: [],
  summary: 'Stop the work in progress now',
  usage: 'work stop',
  flags: [],
  handler: stopHandler,
};
