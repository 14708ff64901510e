#!/usr/bin/env node

/**
 * timekeep
 *
 * Log activities with durations, roll them up into daily, weekly, monthly and
 * yearly reports, export them, and capture brainstorm notes.
 */

import { runCli } from './cli.js';
import { logger } from './utils/logger.js';

runCli(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    logger.error('Fatal error', error);
    process.exit(1);
  });
