#!/usr/bin/env node
/**
 * stargazer-extract - bin entry point
 */

import 'dotenv/config';
import { loadEnvironment } from '../infrastructure/config/environment.js';
import { createLogger } from '../infrastructure/logging/logger.js';
import { createProgram, describeCliError } from './program.js';

async function main(): Promise<void> {
  const env = loadEnvironment();
  const logger = createLogger({ debug: env.debug });

  // Ctrl-C stops the run between pages/users instead of killing a request midway
  const controller = new AbortController();
  const shutdown = (signal: string) => {
    logger.warn(`[CLI] ${signal} received, cancelling...`);
    controller.abort();
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));

  const program = createProgram({ env, logger, signal: controller.signal });
  await program.parseAsync(process.argv);
}

main().catch((error: unknown) => {
  console.error(`Error: ${describeCliError(error)}`);
  process.exit(1);
});
