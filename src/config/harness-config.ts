/**
 * Harness Configuration
 *
 * Global configuration combining CLI args and environment variables, plus the
 * session singleton and default driver registrations built from it.
 */

import { parseArgs, type HarnessArgs } from '../cli/args.js';
import type { BackendConnection, BackendFactory } from '../browser/backend-connection.interface.js';
import { registerDriver } from '../browser/driver-registry.js';
import { createPuppeteerBackendFactory } from '../browser/puppeteer-backend.js';
import { SessionController } from '../browser/session-controller.js';
import { PRESERVE_STORAGE, type StateResetPolicy } from '../browser/state-reset-policy.js';
import { HarnessError } from '../shared/errors/index.js';
import {
  HarnessConfigSchema,
  type HarnessConfig,
  type HarnessConfigInput,
} from '../shared/schemas/harness-config.schemas.js';
import { getLogger } from '../shared/services/logging.service.js';

/** Name of the default driver */
export const DEFAULT_DRIVER = 'firefox';

/** Driver that keeps web storage across resets */
export const KEEP_STORAGE_DRIVER = 'firefox_not_clear_storage';

// Singleton instances
let harnessConfig: HarnessConfig | null = null;
let sessionController: SessionController | null = null;

/**
 * Environment flags are "on" when set to anything but an explicit false value
 */
function envFlag(value: string | undefined): boolean | undefined {
  if (value === undefined || value === '') return undefined;
  return !['0', 'false', 'no'].includes(value.toLowerCase());
}

/**
 * Validate raw configuration input.
 *
 * @throws HarnessError(INVALID_CONFIG) listing every failing field
 */
export function parseHarnessConfig(input: HarnessConfigInput): HarnessConfig {
  const result = HarnessConfigSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw HarnessError.invalidConfig(`Invalid harness configuration: ${issues.join('; ')}`, {
      issues,
    });
  }
  return result.data;
}

/**
 * Initialize harness configuration from CLI arguments and environment variables.
 *
 * Env: HEADLESS, FIREFOX_BIN (binary path fallback), CI (log browser version).
 *
 * @param argv - Command line arguments (process.argv.slice(2))
 */
export function initHarnessConfig(
  argv: string[],
  env: NodeJS.ProcessEnv = process.env,
): HarnessConfig {
  return initHarnessConfigFromArgs(parseArgs(argv), env);
}

/**
 * Same as initHarnessConfig, for callers that already parsed argv
 */
export function initHarnessConfigFromArgs(
  args: HarnessArgs,
  env: NodeJS.ProcessEnv = process.env,
): HarnessConfig {
  harnessConfig = parseHarnessConfig({
    headless: args.headless ?? envFlag(env.HEADLESS),
    executablePath: args.executablePath ?? env.FIREFOX_BIN,
    readTimeoutMs: args.readTimeoutMs,
    downloadDir: args.downloadDir,
    resetPolicy: {
      clearLocalStorage: !args.keepStorage,
      clearSessionStorage: !args.keepStorage,
      clearCookies: !args.keepCookies,
    },
    logBrowserVersion: envFlag(env.CI),
  });
  sessionController = null;
  return harnessConfig;
}

/**
 * Get the current harness configuration.
 * Throws if not initialized.
 */
export function getHarnessConfig(): HarnessConfig {
  if (!harnessConfig) {
    throw new Error('Harness config not initialized. Call initHarnessConfig() first.');
  }
  return harnessConfig;
}

/**
 * Backend factory for a configuration: puppeteer-driven Firefox.
 */
export function createBackendFactory(config: HarnessConfig): BackendFactory {
  return async () => {
    const { executablePath } = config;
    if (!executablePath) {
      throw HarnessError.invalidConfig(
        'No Firefox binary configured: pass --executablePath or set FIREFOX_BIN',
      );
    }

    const connection: BackendConnection = await createPuppeteerBackendFactory({
      headless: config.headless,
      executablePath,
      readTimeoutMs: config.readTimeoutMs,
      downloadDir: config.downloadDir,
    })();

    if (config.logBrowserVersion) {
      getLogger().info(`Browser version: ${await connection.version()}`);
    }
    return connection;
  };
}

/**
 * Build a session from a configuration, optionally overriding its reset policy
 */
export function createSessionController(
  config: HarnessConfig,
  policy: StateResetPolicy = config.resetPolicy,
  factory: BackendFactory = createBackendFactory(config),
): SessionController {
  return new SessionController(factory, {
    policy,
    resetTimeoutMs: config.resetTimeoutMs,
    preNavigationDelayMs: config.preNavigationDelayMs > 0 ? config.preNavigationDelayMs : undefined,
  });
}

/**
 * Get or create the SessionController singleton.
 */
export function getSessionController(): SessionController {
  sessionController ??= createSessionController(getHarnessConfig());
  return sessionController;
}

/**
 * Register the default driver and the storage-keeping variant
 */
export function registerDefaultDrivers(config: HarnessConfig = getHarnessConfig()): void {
  registerDriver(DEFAULT_DRIVER, () => createSessionController(config));
  registerDriver(KEEP_STORAGE_DRIVER, () => createSessionController(config, PRESERVE_STORAGE));
}

/**
 * Reset harness state (for testing).
 */
export function resetHarnessState(): void {
  harnessConfig = null;
  sessionController = null;
}
