/**
 * CLI dispatch
 *
 * Parses argv, opens the log for the duration of one command and maps
 * failures to exit codes.
 */

import type { WorkConfig } from '../types/index.js';
import { getConfig } from '../config/index.js';
import { getCommand, listCommands } from '../commands/index.js';
import { expectFlags } from '../commands/shared.js';
import type { CommandDefinition } from '../commands/shared.js';
import { withLogStore } from '../services/log/store.js';
import { systemClock } from '../services/time/clock.js';
import type { Clock } from '../services/time/clock.js';
import { createShellRunner } from '../services/process/runner.js';
import type { CommandRunner } from '../services/process/runner.js';
import { EXIT_USER_ERROR, UsageError, WorkError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { parseArgs } from './args.js';
import { VERSION, commandHelp, generalHelp } from './help.js';

export interface CliIO {
  stdout(text: string): void;
  stderr(text: string): void;
}

export interface CliDependencies {
  config?: WorkConfig;
  now?: Clock;
  runCommand?: CommandRunner;
  io?: CliIO;
}

const processIO: CliIO = {
  stdout: (text) => {
    process.stdout.write(`${text}\n`);
  },
  stderr: (text) => {
    process.stderr.write(`${text}\n`);
  },
};

function requireCommand(name: string): CommandDefinition {
  const definition = getCommand(name);
  if (!definition) {
    throw new UsageError(`Unknown command "${name}". Run "work help" for usage.`);
  }
  return definition;
}

async function dispatch(argv: readonly string[], deps: CliDependencies, io: CliIO): Promise<number> {
  const { command, positionals, flags } = parseArgs(argv);

  if (flags.version) {
    io.stdout(`work ${VERSION}`);
    return 0;
  }

  if (command === undefined) {
    if (flags.help) {
      io.stdout(generalHelp(listCommands()));
      return 0;
    }
    io.stderr(generalHelp(listCommands()));
    return EXIT_USER_ERROR;
  }

  if (command === 'help') {
    const topic = positionals[0];
    io.stdout(topic ? commandHelp(requireCommand(topic)) : generalHelp(listCommands()));
    return 0;
  }

  const definition = requireCommand(command);
  if (flags.help) {
    io.stdout(commandHelp(definition));
    return 0;
  }

  expectFlags(definition, flags);

  const config = deps.config ?? getConfig();
  logger.setLevel(config.logLevel);
  logger.debug(`Running ${definition.name}`, { logPath: config.logPath });

  return withLogStore(config.logPath, async (store) => {
    const result = await definition.handler(
      { positionals, flags },
      {
        store,
        now: deps.now ?? systemClock,
        runCommand: deps.runCommand ?? createShellRunner(config.shell),
        config,
      }
    );
    if (result.output !== undefined) {
      io.stdout(result.output);
    }
    return result.exitCode;
  });
}

/**
 * Run one invocation and return its exit code
 *
 * WorkErrors become a message on stderr and their exit code; anything else
 * is a bug and propagates.
 */
export async function runCli(argv: readonly string[], deps: CliDependencies = {}): Promise<number> {
  const io = deps.io ?? processIO;
  try {
    return await dispatch(argv, deps, io);
  } catch (error) {
    if (error instanceof WorkError) {
      logger.debug(`${error.name} (${error.code})`);
      io.stderr(`work: ${error.message}`);
      return error.exitCode;
    }
    throw error;
  }
}
