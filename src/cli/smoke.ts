/**
 * Smoke run
 *
 * Launches the configured browser, visits --url, resets the session, revisits
 * the page and reports what survived the reset.
 */

import { parseArgs } from './args.js';
import { initHarnessConfigFromArgs, getSessionController } from '../config/harness-config.js';
import { HarnessError } from '../shared/errors/index.js';

export interface SmokeSummary {
  url: string;
  localStorageKeys: string[];
  sessionStorageKeys: string[];
  cookies: string[];
  quit: string;
}

export async function runSmoke(argv: string[]): Promise<SmokeSummary> {
  const args = parseArgs(argv);
  const { url } = args;
  if (!url) {
    throw HarnessError.invalidConfig('Missing --url');
  }

  initHarnessConfigFromArgs(args);
  const session = getSessionController();

  try {
    await session.visit(url);
    await session.reset();
    await session.visit(url);

    const connection = await session.browser();
    const summary = {
      url,
      localStorageKeys: await connection.localStorageKeys(),
      sessionStorageKeys: await connection.sessionStorageKeys(),
      cookies: (await connection.cookies({ url })).map((cookie) => cookie.name),
    };
    const outcome = await session.quit();
    return { ...summary, quit: outcome.type };
  } finally {
    // No-op when already quit
    await session.quit();
  }
}
