/**
 * Browser Module
 *
 * Exports for backend lifecycle and session reset.
 */

export type {
  BackendConnection,
  BackendFactory,
  CookieRecord,
  CookieScope,
} from './backend-connection.interface.js';
export {
  BENIGN_TERMINATION_PATTERNS,
  classifyTerminationError,
  createErrorClassifier,
  defaultErrorClassifier,
  type ClassificationVerdict,
  type ErrorClassifier,
} from './error-classifier.js';
export {
  ProcessHandle,
  type ProcessHandleOptions,
  type ProcessHandleStatus,
  type TerminationOutcome,
} from './process-handle.js';
export {
  CLEAR_EVERYTHING,
  CLEAR_NOTHING,
  PRESERVE_STORAGE,
  StateResetPolicySchema,
  applyStateResetPolicy,
  createStateResetPolicy,
  hasWebStorage,
  type StateResetPolicy,
} from './state-reset-policy.js';
export { PendingEffects } from './pending-effects.js';
export {
  disablePreNavigationDelay,
  enablePreNavigationDelay,
  getPreNavigationDelay,
} from './reset-delay.js';
export {
  BLANK_PAGE,
  SessionController,
  type ResetOptions,
  type SessionControllerOptions,
  type SessionStatus,
} from './session-controller.js';
export {
  PuppeteerBackendConnection,
  backendErrorKind,
  buildFirefoxPrefs,
  createPuppeteerBackendFactory,
  toBackendError,
  type PuppeteerBackendOptions,
} from './puppeteer-backend.js';
export {
  clearDrivers,
  createSession,
  hasDriver,
  listDrivers,
  registerDriver,
  type DriverFactory,
} from './driver-registry.js';
