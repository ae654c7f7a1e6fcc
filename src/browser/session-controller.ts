/**
 * Session Controller
 *
 * Owns the process handle for one browser session and implements reset and
 * quit on top of it.
 *
 * Reset sequence:
 *   1. (optional) drain tracked effects and wait for network idle
 *   2. apply the reset policy to the active page
 *   3. (optional) pre-navigation delay
 *   4. navigate to about:blank, aborting requests of the old document
 *   5. sweep cookies of the old page's domain again, catching writes that
 *      landed between steps 2 and 4
 *   6. wait for the blank page to settle
 *
 * Reset never starts, stops or replaces the browser.
 */

import type {
  BackendConnection,
  BackendFactory,
  CookieScope,
} from './backend-connection.interface.js';
import type { ErrorClassifier } from './error-classifier.js';
import { PendingEffects } from './pending-effects.js';
import { ProcessHandle, type TerminationOutcome } from './process-handle.js';
import { delay, getPreNavigationDelay } from './reset-delay.js';
import {
  CLEAR_EVERYTHING,
  applyStateResetPolicy,
  hasWebStorage,
  type StateResetPolicy,
} from './state-reset-policy.js';
import { HarnessError } from '../shared/errors/index.js';
import { getLogger, type Logger } from '../shared/services/logging.service.js';

/** Neutral page every reset ends on */
export const BLANK_PAGE = 'about:blank';

export const DEFAULT_RESET_TIMEOUT_MS = 10_000;
export const DEFAULT_DRAIN_NETWORK_IDLE_TIMEOUT_MS = 5_000;
const EMPTY_PAGE_POLL_INTERVAL_MS = 50;

export type SessionStatus = 'fresh' | 'active' | 'terminated';

export interface SessionControllerOptions {
  policy?: StateResetPolicy;

  /** Upper bound for waiting on the blank page after navigation */
  resetTimeoutMs?: number;

  /**
   * Pause between clearing stores and navigating away.
   * Falls back to the global pre-navigation delay when omitted.
   */
  preNavigationDelayMs?: number;

  classifier?: ErrorClassifier;
  logger?: Logger;
}

export interface ResetOptions {
  /** Wait for tracked effects and network idle before clearing */
  drain?: boolean;

  /** Network idle bound used when draining */
  networkIdleTimeoutMs?: number;
}

/**
 * A session's policy is fixed at creation; callers may still hold a mutable original
 */
function freezePolicy(policy: StateResetPolicy): StateResetPolicy {
  if (Object.isFrozen(policy)) {
    return policy;
  }
  return Object.freeze({
    clearLocalStorage: policy.clearLocalStorage,
    clearSessionStorage: policy.clearSessionStorage,
    clearCookies: policy.clearCookies,
  });
}

export class SessionController<TConnection extends BackendConnection = BackendConnection> {
  readonly policy: StateResetPolicy;
  readonly effects: PendingEffects;
  private handle: ProcessHandle<TConnection>;
  private readonly resetTimeoutMs: number;
  private readonly preNavigationDelayMs: number | undefined;
  private readonly classifier: ErrorClassifier | undefined;
  private readonly logger: Logger;

  constructor(
    private readonly factory: BackendFactory<TConnection>,
    options: SessionControllerOptions = {},
  ) {
    this.policy = freezePolicy(options.policy ?? CLEAR_EVERYTHING);
    this.resetTimeoutMs = options.resetTimeoutMs ?? DEFAULT_RESET_TIMEOUT_MS;
    this.preNavigationDelayMs = options.preNavigationDelayMs;
    this.classifier = options.classifier;
    this.logger = options.logger ?? getLogger();
    this.effects = new PendingEffects(this.logger);
    this.handle = this.createHandle();
  }

  get status(): SessionStatus {
    switch (this.handle.status) {
      case 'unstarted':
        return 'fresh';
      case 'terminated':
        return 'terminated';
      default:
        return 'active';
    }
  }

  /**
   * The process handle currently owned by this session
   */
  get processHandle(): ProcessHandle<TConnection> {
    return this.handle;
  }

  isLive(): boolean {
    return this.handle.isLive();
  }

  /**
   * Live connection, starting the browser on first use.
   *
   * After quit(), a fresh handle (and browser) replaces the terminated one.
   */
  async browser(): Promise<TConnection> {
    if (this.handle.status === 'terminated') {
      this.logger.debug('Replacing terminated process handle');
      this.handle = this.createHandle();
    }
    return this.handle.get();
  }

  /**
   * Navigate the live page, starting the browser if needed
   */
  async visit(location: string): Promise<void> {
    const connection = await this.browser();
    await connection.navigate(location);
  }

  /**
   * Restore in-page state without touching the browser process.
   *
   * No-op when no browser is running. Backend failures propagate unchanged.
   *
   * @throws HarnessError(RESET_TIMEOUT) when the blank page does not settle in time
   */
  async reset(options: ResetOptions = {}): Promise<void> {
    if (!this.handle.isLive()) {
      this.logger.debug('Reset skipped: no live browser', { status: this.handle.status });
      return;
    }
    const connection = await this.handle.get();
    const startedAt = Date.now();

    if (options.drain) {
      await this.drain(connection, options.networkIdleTimeoutMs);
    }

    const scope: CookieScope = { url: await connection.currentUrl() };
    await applyStateResetPolicy(this.policy, connection, scope);

    const pause = this.preNavigationDelayMs ?? getPreNavigationDelay();
    if (pause > 0) {
      await delay(pause);
    }

    await connection.navigate(BLANK_PAGE);

    if (this.policy.clearCookies && hasWebStorage(scope.url)) {
      await connection.clearCookies(scope);
    }

    await this.waitForEmptyPage(connection);
    this.logger.debug('Session reset', {
      durationMs: Date.now() - startedAt,
      drained: options.drain ?? false,
    });
  }

  /**
   * Terminate the browser. Never rejects; see ProcessHandle.quit().
   */
  async quit(): Promise<TerminationOutcome> {
    return this.handle.quit();
  }

  private createHandle(): ProcessHandle<TConnection> {
    return new ProcessHandle(this.factory, {
      classifier: this.classifier,
      logger: this.logger,
    });
  }

  private async drain(
    connection: TConnection,
    networkIdleTimeoutMs = DEFAULT_DRAIN_NETWORK_IDLE_TIMEOUT_MS,
  ): Promise<void> {
    await this.effects.drain();
    const idle = await connection.waitForNetworkIdle(networkIdleTimeoutMs);
    if (!idle) {
      this.logger.debug('Network did not reach idle state before reset', {
        timeoutMs: networkIdleTimeoutMs,
      });
    }
  }

  private async waitForEmptyPage(connection: TConnection): Promise<void> {
    const startedAt = Date.now();
    while (!(await connection.isPageEmpty())) {
      if (Date.now() - startedAt >= this.resetTimeoutMs) {
        throw HarnessError.resetTimeout(this.resetTimeoutMs);
      }
      await delay(EMPTY_PAGE_POLL_INTERVAL_MS);
    }
  }
}
