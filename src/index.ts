#!/usr/bin/env node
import dotenv from 'dotenv';
import { runAction, EXIT_FAILURE } from './action/run.js';
import { logger } from './observability/logger.js';

dotenv.config();

runAction(process.env)
  .then(({ exitCode }) => {
    process.exitCode = exitCode;
  })
  .catch((error: unknown) => {
    logger.error('action_fatal', 'Unhandled error', {
      error: error instanceof Error ? error.message : 'Unknown error',
      stack: error instanceof Error ? error.stack : undefined,
    });
    process.exitCode = EXIT_FAILURE;
  });
