#!/usr/bin/env node

/**
 * Smoke runner entry point. Prints the smoke summary as JSON on stdout.
 */

import { runSmoke } from './smoke.js';
import { HarnessError } from '../shared/errors/index.js';
import { getLogger } from '../shared/services/logging.service.js';

const logger = getLogger();

async function main(): Promise<void> {
  try {
    const summary = await runSmoke(process.argv.slice(2));
    process.stdout.write(`${JSON.stringify(summary, null, 2)}\n`);
  } catch (error) {
    if (HarnessError.isHarnessError(error)) {
      logger.error(error.message, error, { code: error.code });
    } else {
      logger.error('Smoke run failed', error instanceof Error ? error : undefined);
    }
    process.exitCode = 1;
  }
}

void main();
