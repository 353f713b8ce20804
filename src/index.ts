#!/usr/bin/env node

/**
 * work - terminal time tracker
 *
 * Records start and stop events in an append-only log and summarizes the
 * time spent per project.
 */

import { runCli } from './cli/run.js';
import { EXIT_SYSTEM_ERROR } from './utils/errors.js';
import { logger } from './utils/logger.js';

runCli(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    logger.error('Fatal error', error);
    process.exitCode = EXIT_SYSTEM_ERROR;
  });
