/**
 * Command registration and lookup
 */

import type { CommandDefinition } from './shared.js';
import { startCommand } from './start.js';
import { stopCommand } from './stop.js';
import { statusCommand, freeCommand, workingCommand } from './status.js';
import { sinceCommand } from './since.js';
import { untilCommand } from './until.js';
import { betweenCommand } from './between.js';
import { whileCommand } from './while.js';
import { ofCommand } from './of.js';

// Command registry, in the order help lists them
const commands: Map<string, CommandDefinition> = new Map();
const aliases: Map<string, string> = new Map();

/**
 * Register all commands
 */
export function registerCommands(): void {
  const definitions = [
    startCommand,
    stopCommand,
    statusCommand,
    freeCommand,
    workingCommand,
    sinceCommand,
    untilCommand,
    betweenCommand,
    whileCommand,
    ofCommand,
  ];

  for (const definition of definitions) {
    commands.set(definition.name, definition);
    for (const alias of definition.aliases) {
      aliases.set(alias, definition.name);
    }
  }
}

/**
 * Find a command by name or alias
 */
export function getCommand(name: string): CommandDefinition | undefined {
  if (commands.size === 0) {
    registerCommands();
  }
  return commands.get(aliases.get(name) ?? name);
}

export function listCommands(): CommandDefinition[] {
  if (commands.size === 0) {
    registerCommands();
  }
  return Array.from(commands.values());
}

export type { CommandDefinition, CommandContext, CommandArgs, CommandHandler } from './shared.js';
