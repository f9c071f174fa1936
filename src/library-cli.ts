#!/usr/bin/env node
import { config as loadEnv } from 'dotenv';
import { runCli } from './cli/commands.js';
import { logger } from './logger.js';

loadEnv();

async function main() {
  const exitCode = await runCli(process.argv.slice(2));
  process.exitCode = exitCode;
}

main().catch((error) => {
  logger.error('library-merge failed', { error: error instanceof Error ? error.stack : String(error) });
  process.exit(1);
});
