/**
 * Error Codes
 *
 * Stable identifiers for harness failures, grouped by the layer that raises them.
 */

export enum ErrorCode {
  // Process handle lifecycle
  HANDLE_TERMINATED = 'HANDLE_TERMINATED',
  BACKEND_START_FAILED = 'BACKEND_START_FAILED',

  // Backend operations (navigate, clear, query)
  BACKEND_OPERATION_FAILED = 'BACKEND_OPERATION_FAILED',

  // Termination path
  TERMINATION_FAILED = 'TERMINATION_FAILED',

  // Session reset
  RESET_TIMEOUT = 'RESET_TIMEOUT',

  // Driver registry and configuration
  DRIVER_NOT_REGISTERED = 'DRIVER_NOT_REGISTERED',
  INVALID_CONFIG = 'INVALID_CONFIG',

  UNKNOWN_ERROR = 'UNKNOWN_ERROR',
}

export enum ErrorSeverity {
  DEBUG = 'debug',
  INFO = 'info',
  WARNING = 'warning',
  ERROR = 'error',
  CRITICAL = 'critical',
}
