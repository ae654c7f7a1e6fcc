/**
 * Puppeteer Backend
 *
 * BackendConnection over puppeteer-core driving Firefox through WebDriver BiDi.
 * Puppeteer failures are translated into BackendError so callers can
 * classify them by kind without importing puppeteer.
 */

import puppeteer, { ProtocolError, TimeoutError, type Browser, type Page } from 'puppeteer-core';
import type {
  BackendConnection,
  BackendFactory,
  CookieRecord,
  CookieScope,
} from './backend-connection.interface.js';
import {
  BackendError,
  ErrorCode,
  extractErrorMessage,
  type BackendErrorKind,
} from '../shared/errors/index.js';
import { getLogger } from '../shared/services/logging.service.js';

const logger = getLogger();

/** Name puppeteer gives the ProtocolError raised when the browser or page goes away */
const TARGET_CLOSE_ERROR = 'TargetCloseError';

/** Quiet period that counts as "network idle" */
const NETWORK_IDLE_TIME_MS = 500;

export interface PuppeteerBackendOptions {
  /** Run Firefox without a window (default: true) */
  headless?: boolean;

  /** Path to the Firefox binary; puppeteer-core never downloads one */
  executablePath: string;

  /** Read timeout for every protocol call, in ms */
  readTimeoutMs?: number;

  /** Directory downloads are saved to without prompting */
  downloadDir?: string;

  /** Additional Firefox command-line arguments */
  args?: string[];
}

/**
 * Firefox preferences: save CSV downloads into downloadDir without a dialog
 */
export function buildFirefoxPrefs(downloadDir?: string): Record<string, unknown> {
  if (!downloadDir) {
    return {};
  }
  return {
    'browser.download.dir': downloadDir,
    'browser.download.folderList': 2,
    'browser.helperApps.neverAsk.saveToDisk': 'text/csv',
  };
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error && typeof error.code === 'string';
}

/**
 * Map a thrown value onto a backend error kind
 */
export function backendErrorKind(error: unknown): BackendErrorKind {
  // The browser going away is a communication failure, not a protocol one
  if (error instanceof ProtocolError && error.name === TARGET_CLOSE_ERROR) return 'unknown';
  if (error instanceof TimeoutError) return 'timeout';
  if (error instanceof ProtocolError) return 'protocol';
  if (isErrnoException(error) && (error.code === 'EACCES' || error.code === 'EPERM')) {
    return 'permission';
  }
  return 'unknown';
}

/**
 * Wrap any thrown value in a BackendError, keeping its message verbatim
 */
export function toBackendError(
  error: unknown,
  code: ErrorCode = ErrorCode.BACKEND_OPERATION_FAILED,
): BackendError {
  if (BackendError.isBackendError(error)) {
    return error;
  }
  return new BackendError(
    extractErrorMessage(error),
    backendErrorKind(error),
    code,
    error instanceof Error ? error : undefined,
  );
}

export class PuppeteerBackendConnection implements BackendConnection {
  constructor(
    readonly browser: Browser,
    readonly page: Page,
  ) {}

  async terminate(): Promise<void> {
    try {
      await this.browser.close();
    } catch (error) {
      throw toBackendError(error, ErrorCode.TERMINATION_FAILED);
    }
  }

  async navigate(location: string): Promise<void> {
    await this.call(() => this.page.goto(location, { waitUntil: 'domcontentloaded' }));
  }

  async currentUrl(): Promise<string> {
    return this.call(() => Promise.resolve(this.page.url()));
  }

  async clearLocalStorage(): Promise<void> {
    await this.call(() =>
      this.page.evaluate(() => {
        window.localStorage.clear();
      }),
    );
  }

  async clearSessionStorage(): Promise<void> {
    await this.call(() =>
      this.page.evaluate(() => {
        window.sessionStorage.clear();
      }),
    );
  }

  async clearCookies(scope: CookieScope): Promise<void> {
    await this.call(async () => {
      const cookies = await this.page.cookies(scope.url);
      if (cookies.length === 0) {
        return;
      }
      await this.page.deleteCookie(
        ...cookies.map((cookie) => ({
          name: cookie.name,
          url: scope.url,
          domain: cookie.domain,
          path: cookie.path,
        })),
      );
    });
  }

  async cookies(scope: CookieScope): Promise<CookieRecord[]> {
    return this.call(async () => {
      const cookies = await this.page.cookies(scope.url);
      return cookies.map(({ name, value, domain, path }) => ({ name, value, domain, path }));
    });
  }

  async localStorageKeys(): Promise<string[]> {
    return this.call(() => this.page.evaluate(() => Object.keys(window.localStorage)));
  }

  async sessionStorageKeys(): Promise<string[]> {
    return this.call(() => this.page.evaluate(() => Object.keys(window.sessionStorage)));
  }

  async isPageEmpty(): Promise<boolean> {
    return this.call(() =>
      this.page.evaluate(() => document.body === null || document.body.children.length === 0),
    );
  }

  async waitForNetworkIdle(timeoutMs: number): Promise<boolean> {
    try {
      await this.page.waitForNetworkIdle({ idleTime: NETWORK_IDLE_TIME_MS, timeout: timeoutMs });
      return true;
    } catch (error) {
      // Pages with long-polling or websockets may never idle
      if (error instanceof TimeoutError) {
        return false;
      }
      throw toBackendError(error);
    }
  }

  async version(): Promise<string> {
    return this.call(() => this.browser.version());
  }

  private async call<T>(operation: () => Promise<T>): Promise<T> {
    try {
      return await operation();
    } catch (error) {
      throw toBackendError(error);
    }
  }
}

/**
 * Factory that launches Firefox and adopts its first tab
 */
export function createPuppeteerBackendFactory(
  options: PuppeteerBackendOptions,
): BackendFactory<PuppeteerBackendConnection> {
  return async () => {
    const { headless = true, executablePath, readTimeoutMs, downloadDir, args = [] } = options;

    logger.info('Launching browser', { browser: 'firefox', headless, readTimeoutMs });

    let browser: Browser;
    try {
      browser = await puppeteer.launch({
        browser: 'firefox',
        protocol: 'webDriverBiDi',
        headless,
        executablePath,
        protocolTimeout: readTimeoutMs,
        extraPrefsFirefox: buildFirefoxPrefs(downloadDir),
        args,
      });
    } catch (error) {
      throw toBackendError(error, ErrorCode.BACKEND_START_FAILED);
    }

    try {
      const [existing] = await browser.pages();
      const page = existing ?? (await browser.newPage());
      logger.info('Browser launched successfully');
      return new PuppeteerBackendConnection(browser, page);
    } catch (error) {
      // Cleanup is best-effort: the launch already failed
      await browser.close().catch((closeError: unknown) => {
        logger.debug('Browser close failed after launch error', {
          error: extractErrorMessage(closeError),
        });
      });
      throw toBackendError(error, ErrorCode.BACKEND_START_FAILED);
    }
  };
}
