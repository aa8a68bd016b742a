#!/usr/bin/env node
import { run } from './cli.js';
import { logger } from './lib/logger.js';

run().catch((error: unknown) => {
  logger.error({ err: error }, 'Gateway failed');
  process.exit(1);
});
