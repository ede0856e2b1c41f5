#!/usr/bin/env node
import { runCli } from './cli/cli';
import { logger } from './utils/logger';

async function main() {
  try {
    process.exitCode = await runCli(process.argv.slice(2));
  } catch (error) {
    logger.error({ error }, 'Fatal error');
    process.exit(1);
  }
}

void main();
