/**
 * Termination Error Classifier
 *
 * Decides whether an error raised while terminating the backend is an
 * expected race (the process was already gone) or a genuine failure.
 */

import type { BackendErrorKind } from '../shared/errors/index.js';

export type ClassificationVerdict = 'suppress' | 'report';

export interface ErrorClassifier {
  classify(kind: BackendErrorKind, message: string): ClassificationVerdict;
}

/**
 * Messages backends produce when the remote browser already exited.
 * Vendor wording; extend when a backend version changes it.
 */
export const BENIGN_TERMINATION_PATTERNS: readonly RegExp[] = [
  /error communicating with the remote browser/i,
  /connection closed/i,
  /target closed/i,
];

/** The only kind eligible for suppression */
const SUPPRESSIBLE_KIND: BackendErrorKind = 'unknown';

export function classifyTerminationError(
  kind: BackendErrorKind,
  message: string,
  benignPatterns: readonly RegExp[] = BENIGN_TERMINATION_PATTERNS,
): ClassificationVerdict {
  if (kind !== SUPPRESSIBLE_KIND) {
    return 'report';
  }
  return benignPatterns.some((pattern) => pattern.test(message)) ? 'suppress' : 'report';
}

/**
 * Build a classifier over a custom pattern list.
 *
 * Global (`g`) and sticky (`y`) flags are stripped so `test()` stays stateless.
 */
export function createErrorClassifier(
  benignPatterns: readonly RegExp[] = BENIGN_TERMINATION_PATTERNS,
): ErrorClassifier {
  const patterns = benignPatterns.map(
    (pattern) => new RegExp(pattern.source, pattern.flags.replace(/[gy]/g, '')),
  );
  return {
    classify: (kind, message) => classifyTerminationError(kind, message, patterns),
  };
}

export const defaultErrorClassifier: ErrorClassifier = createErrorClassifier();
