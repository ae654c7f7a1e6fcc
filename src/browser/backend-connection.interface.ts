/**
 * Backend Connection Interface
 *
 * The live channel to an external browser-automation process. Abstracts the
 * transport (puppeteer over WebDriver BiDi, or an in-process fake in tests) so
 * lifecycle and reset logic can be exercised without a browser.
 *
 * Every method may fail with a BackendError carrying the backend's own message.
 */

/**
 * Cookies are addressed by the URL of the document they belong to.
 * Clearing is limited to that URL's domain.
 */
export interface CookieScope {
  url: string;
}

export interface CookieRecord {
  name: string;
  value: string;
  domain: string;
  path: string;
}

export interface BackendConnection {
  /** Stop the external process (or end the remote session) */
  terminate(): Promise<void>;

  navigate(location: string): Promise<void>;

  /** URL of the active document */
  currentUrl(): Promise<string>;

  clearLocalStorage(): Promise<void>;

  clearSessionStorage(): Promise<void>;

  /** Delete every cookie visible to the scope's URL */
  clearCookies(scope: CookieScope): Promise<void>;

  cookies(scope: CookieScope): Promise<CookieRecord[]>;

  localStorageKeys(): Promise<string[]>;

  sessionStorageKeys(): Promise<string[]>;

  /** True when the active document has no rendered content */
  isPageEmpty(): Promise<boolean>;

  /**
   * Wait until no requests are in flight.
   * Resolves false on timeout instead of rejecting.
   */
  waitForNetworkIdle(timeoutMs: number): Promise<boolean>;

  /** Browser product and version string */
  version(): Promise<string>;
}

/**
 * Creates a connection; called at most once per process handle
 */
export type BackendFactory<TConnection extends BackendConnection = BackendConnection> =
  () => Promise<TConnection>;
