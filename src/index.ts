import dotenv from 'dotenv';
dotenv.config();

// Initialize Sentry as early as possible for proper error tracking
import { initSentry, captureException, flushSentry } from './utils/sentry';
initSentry();

import * as readline from 'readline/promises';
import { loadConfig, validateConfig } from './config';
import { getLogger } from './utils/Logger';
import { EXIT_FAILURE, MatrixRunner } from './services/matrixRunner';

const logger = getLogger(module);

async function promptForFileName(): Promise<string> {
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  try {
    const answer = await rl.question('Enter the input filename: ');
    return answer.trim();
  } finally {
    rl.close();
  }
}

async function main(): Promise<void> {
  try {
    logger.debug('Loading configuration...');
    const config = loadConfig();
    validateConfig(config);

    const fileName = process.argv[2] ?? config.inputFile ?? (await promptForFileName());

    const runner = new MatrixRunner(config);
    process.exitCode = runner.run(fileName);
  } catch (error) {
    logger.error('Fatal error running matrix operations', error);
    captureException(error);
    process.exitCode = EXIT_FAILURE;
  } finally {
    await flushSentry();
  }
}

main().catch((error: unknown) => {
  logger.error('Unhandled error', error);
  process.exit(EXIT_FAILURE);
});
