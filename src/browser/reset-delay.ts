/**
 * Pre-navigation Delay
 *
 * Test-only switch that makes every reset pause between clearing stores and
 * navigating away, so an in-flight request can land inside that window.
 * Off unless a test turns it on.
 */

let globalDelayMs = 0;

export function enablePreNavigationDelay(ms: number): void {
  if (!Number.isFinite(ms) || ms < 0) {
    throw new RangeError(`Pre-navigation delay must be a non-negative number, got ${ms}`);
  }
  globalDelayMs = ms;
}

export function disablePreNavigationDelay(): void {
  globalDelayMs = 0;
}

export function getPreNavigationDelay(): number {
  return globalDelayMs;
}

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
