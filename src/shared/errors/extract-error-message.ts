/**
 * Extract a meaningful error message from any thrown value.
 */
export function extractErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message || error.name || 'Unknown Error';
  }
  if (typeof error === 'string') {
    return error;
  }
  if (error && typeof error === 'object') {
    if ('message' in error && typeof error.message === 'string') return error.message;
    if ('error' in error && typeof error.error === 'string') return error.error;
    if ('reason' in error && typeof error.reason === 'string') return error.reason;
    // Try to stringify, but handle circular refs
    try {
      const str = JSON.stringify(error);
      return str !== '{}'
        ? str
        : `Unknown error object: ${Object.keys(error).join(', ') || 'empty'}`;
    } catch {
      return `Non-serializable error: ${Object.prototype.toString.call(error)}`;
    }
  }
  return String(error);
}
