#!/usr/bin/env node
import 'dotenv/config';
import { config } from './config.js';
import { log } from './log.js';

// Resolves to the exit code, or null while the server keeps the process alive.
async function main(): Promise<number | null> {
  if (config.PORT !== null) {
    const { startServer } = await import('./server.js');
    startServer(config.PORT);
    return null;
  }

  // One-shot mode — local CLI / dry-run
  const { collectSearchInput } = await import('./prompt.js');
  const { runPipeline } = await import('./pipeline.js');

  const input = await collectSearchInput({
    market: config.MARKET_ARG,
    query: config.QUERY_ARG,
  });
  if (!input) {
    log.error('Market or product cannot be empty. Exiting.');
    return 1;
  }

  try {
    await runPipeline({ ...input, dryRun: config.DRY_RUN });
    log.info('Price tracker complete');
    return 0;
  } catch (error) {
    log.error('Run failed:', error);
    return 1;
  }
}

main().then(
  (code) => {
    if (code !== null) process.exit(code);
  },
  (error: unknown) => {
    log.error('Unexpected error:', error);
    process.exit(1);
  }
);
