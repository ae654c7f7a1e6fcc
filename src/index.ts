/**
 * Browser Session Harness
 *
 * Lazily-owned browser backends, classified shutdown and policy-driven
 * session resets for integration test suites.
 */

export * from './browser/index.js';
export * from './shared/errors/index.js';
export {
  LoggingService,
  getLogger,
  setLogger,
  type LogEntry,
  type LogLevel,
  type LogSink,
  type Logger,
} from './shared/services/logging.service.js';
export {
  HarnessConfigSchema,
  type HarnessConfig,
  type HarnessConfigInput,
} from './shared/schemas/harness-config.schemas.js';
export {
  DEFAULT_DRIVER,
  KEEP_STORAGE_DRIVER,
  createBackendFactory,
  createSessionController,
  getHarnessConfig,
  getSessionController,
  initHarnessConfig,
  initHarnessConfigFromArgs,
  parseHarnessConfig,
  registerDefaultDrivers,
  resetHarnessState,
} from './config/harness-config.js';
export { parseArgs, type HarnessArgs } from './cli/args.js';
export { runSmoke, type SmokeSummary } from './cli/smoke.js';
