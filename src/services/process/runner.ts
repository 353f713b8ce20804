/**
 * Runs the command tracked by `work while`
 */

import { spawn } from 'child_process';
import { ProcessFailed } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

export interface ExitStatus {
  code: number | null;
  signal: NodeJS.Signals | null;
}

export type CommandRunner = (command: string) => Promise<ExitStatus>;

/**
 * Run `command` through `<shell> -c` with the terminal attached and wait for
 * it to exit.
 *
 * While the child runs the tracker ignores SIGINT (the terminal delivers it
 * to the child as well) and passes SIGTERM on, so it outlives the child and
 * can still record the stop event.
 */
export function createShellRunner(shell: string): CommandRunner {
  return (command) =>
    new Promise<ExitStatus>((resolve, reject) => {
      const child = spawn(shell, ['-c', command], { stdio: 'inherit' });

      const onSignal = (signal: NodeJS.Signals): void => {
        logger.debug(`Received ${signal} while tracking a command`);
        if (signal === 'SIGTERM') {
          child.kill('SIGTERM');
        }
      };
      process.on('SIGINT', onSignal);
      process.on('SIGTERM', onSignal);

      const release = (): void => {
        process.off('SIGINT', onSignal);
        process.off('SIGTERM', onSignal);
      };

      child.once('error', (error) => {
        release();
        reject(new ProcessFailed(`Failed to start ${shell}: ${error.message}`, null));
      });
      child.once('close', (code, signal) => {
        release();
        resolve({ code, signal });
      });
    });
}
