#!/usr/bin/env node
import dotenv from 'dotenv';
dotenv.config();
import { runCli } from './cli';
import logger from './utils/logger';

runCli(process.argv.slice(2))
  .then(code => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    logger.error('Unhandled error', {
      error: error instanceof Error ? error.message : String(error),
      stack: error instanceof Error ? error.stack : undefined,
    });
    process.exitCode = 1;
  });
