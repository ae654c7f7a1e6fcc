/**
 * State Reset Policy
 *
 * Which session-local stores a reset clears. Chosen when a session is
 * created and fixed for its lifetime.
 *
 * Cookie clearing only reaches the domain of the active page. Cookies a
 * session picked up on other domains survive a reset: the backends expose no
 * "delete every cookie regardless of domain" primitive.
 */

import { z } from 'zod';
import type { BackendConnection, CookieScope } from './backend-connection.interface.js';

export const StateResetPolicySchema = z.object({
  clearLocalStorage: z.boolean().default(true).describe('Clear localStorage on reset'),
  clearSessionStorage: z.boolean().default(true).describe('Clear sessionStorage on reset'),
  clearCookies: z.boolean().default(true).describe('Clear cookies of the active domain on reset'),
});

export type StateResetPolicy = Readonly<z.infer<typeof StateResetPolicySchema>>;

export const CLEAR_EVERYTHING: StateResetPolicy = Object.freeze({
  clearLocalStorage: true,
  clearSessionStorage: true,
  clearCookies: true,
});

/** Opt-out used when storage must persist across resets */
export const CLEAR_NOTHING: StateResetPolicy = Object.freeze({
  clearLocalStorage: false,
  clearSessionStorage: false,
  clearCookies: false,
});

/** Cookies go, web storage stays */
export const PRESERVE_STORAGE: StateResetPolicy = Object.freeze({
  clearLocalStorage: false,
  clearSessionStorage: false,
  clearCookies: true,
});

/**
 * Build a frozen policy; omitted flags default to true
 */
export function createStateResetPolicy(
  overrides: Partial<StateResetPolicy> = {},
): StateResetPolicy {
  return Object.freeze(StateResetPolicySchema.parse(overrides));
}

/**
 * Web storage only exists on http(s) documents
 */
export function hasWebStorage(url: string): boolean {
  try {
    const { protocol } = new URL(url);
    return protocol === 'http:' || protocol === 'https:';
  } catch {
    return false;
  }
}

/**
 * Clear every store the policy enables on the live connection.
 *
 * Backend failures propagate unchanged.
 *
 * @param scope - Cookie scope; defaults to the active page's URL
 */
export async function applyStateResetPolicy(
  policy: StateResetPolicy,
  connection: BackendConnection,
  scope?: CookieScope,
): Promise<void> {
  const url = await connection.currentUrl();

  if (hasWebStorage(url)) {
    if (policy.clearSessionStorage) {
      await connection.clearSessionStorage();
    }
    if (policy.clearLocalStorage) {
      await connection.clearLocalStorage();
    }
  }

  if (policy.clearCookies) {
    const cookieScope = scope ?? { url };
    if (hasWebStorage(cookieScope.url)) {
      await connection.clearCookies(cookieScope);
    }
  }
}
