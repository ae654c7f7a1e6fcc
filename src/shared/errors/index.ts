/**
 * Error Handling
 *
 * Exports error types, codes, and helpers for classifying backend failures.
 */

export * from './error-codes.js';
export * from './harness-error.js';
export * from './extract-error-message.js';
