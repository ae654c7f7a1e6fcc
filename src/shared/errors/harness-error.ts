/**
 * Harness Error Types
 *
 * Structured errors raised by the process handle, the session controller,
 * and backend adapters.
 */

import { ErrorCode, ErrorSeverity } from './error-codes.js';

/**
 * Base harness error
 *
 * Extends Error with a stable code, a severity and optional details.
 */
export class HarnessError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode = ErrorCode.UNKNOWN_ERROR,
    public readonly severity: ErrorSeverity = ErrorSeverity.ERROR,
    public readonly details?: Record<string, unknown>,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'HarnessError';

    // Maintain proper stack trace for where error was thrown (V8 only)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, HarnessError);
    }
  }

  /**
   * Convert to a plain object for logs and CLI output
   */
  toStructured(): {
    error: string;
    code: ErrorCode;
    severity: ErrorSeverity;
    details?: Record<string, unknown>;
    stack?: string;
  } {
    return {
      error: this.message,
      code: this.code,
      severity: this.severity,
      details: this.details,
      stack: this.stack,
    };
  }

  static fromError(
    error: Error,
    code: ErrorCode = ErrorCode.UNKNOWN_ERROR,
    severity: ErrorSeverity = ErrorSeverity.ERROR,
  ): HarnessError {
    return new HarnessError(error.message, code, severity, undefined, error);
  }

  static isHarnessError(error: unknown): error is HarnessError {
    return error instanceof HarnessError;
  }

  // ==================== Factory Methods ====================

  static handleTerminated(): HarnessError {
    return new HarnessError(
      'Process handle has been terminated; create a new handle to start another browser',
      ErrorCode.HANDLE_TERMINATED,
    );
  }

  static resetTimeout(timeoutMs: number): HarnessError {
    return new HarnessError(
      'Timed out waiting for session reset',
      ErrorCode.RESET_TIMEOUT,
      ErrorSeverity.ERROR,
      { timeoutMs },
    );
  }

  static driverNotRegistered(name: string, registered: string[]): HarnessError {
    return new HarnessError(
      `No driver registered under "${name}"`,
      ErrorCode.DRIVER_NOT_REGISTERED,
      ErrorSeverity.ERROR,
      { name, registered },
    );
  }

  static invalidConfig(message: string, details?: Record<string, unknown>): HarnessError {
    return new HarnessError(message, ErrorCode.INVALID_CONFIG, ErrorSeverity.ERROR, details);
  }
}

/**
 * Error kinds a backend can report.
 *
 * `unknown` is the generic communication failure; it is the only kind whose
 * termination errors may be treated as benign.
 */
export type BackendErrorKind = 'unknown' | 'protocol' | 'timeout' | 'permission' | 'javascript';

/**
 * Failure raised by a backend connection operation.
 *
 * The message is the backend's own, unmodified.
 */
export class BackendError extends HarnessError {
  constructor(
    message: string,
    public readonly kind: BackendErrorKind = 'unknown',
    code: ErrorCode = ErrorCode.BACKEND_OPERATION_FAILED,
    cause?: Error,
  ) {
    super(message, code, ErrorSeverity.ERROR, { kind }, cause);
    this.name = 'BackendError';
  }

  static isBackendError(error: unknown): error is BackendError {
    return error instanceof BackendError;
  }
}
