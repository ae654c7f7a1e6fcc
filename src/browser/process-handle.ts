/**
 * Process Handle
 *
 * Exclusive, lazily-acquired ownership of one backend connection.
 *
 * unstarted ──get()──▶ starting ──▶ live ──quit()──▶ terminated
 *     └──────────────────────quit()──────────────────────┘
 *
 * A terminated handle never creates another connection; callers that need a
 * new browser build a new handle.
 */

import type { BackendConnection, BackendFactory } from './backend-connection.interface.js';
import {
  defaultErrorClassifier,
  type ClassificationVerdict,
  type ErrorClassifier,
} from './error-classifier.js';
import {
  BackendError,
  ErrorCode,
  HarnessError,
  extractErrorMessage,
} from '../shared/errors/index.js';
import { getLogger, type Logger } from '../shared/services/logging.service.js';

export type ProcessHandleStatus = 'unstarted' | 'starting' | 'live' | 'terminated';

type HandleState<TConnection> =
  | { status: 'unstarted' }
  | { status: 'starting'; pending: Promise<TConnection> }
  | { status: 'live'; connection: TConnection }
  | { status: 'terminated' };

/**
 * Result of a single quit() call
 */
export type TerminationOutcome =
  | { type: 'clean' }
  | { type: 'benign'; message: string }
  | { type: 'fatal'; message: string };

export interface ProcessHandleOptions {
  classifier?: ErrorClassifier;
  logger?: Logger;
}

const CLEAN: TerminationOutcome = { type: 'clean' };

export class ProcessHandle<TConnection extends BackendConnection = BackendConnection> {
  private state: HandleState<TConnection> = { status: 'unstarted' };
  private readonly classifier: ErrorClassifier;
  private readonly logger: Logger;

  constructor(
    private readonly factory: BackendFactory<TConnection>,
    options: ProcessHandleOptions = {},
  ) {
    this.classifier = options.classifier ?? defaultErrorClassifier;
    this.logger = options.logger ?? getLogger();
  }

  get status(): ProcessHandleStatus {
    return this.state.status;
  }

  isLive(): boolean {
    return this.state.status === 'live';
  }

  /**
   * Resolve the live connection, creating it on first use.
   *
   * Concurrent first calls share a single creation. Creation failures are
   * rethrown unchanged and leave the handle unstarted.
   *
   * @throws HarnessError(HANDLE_TERMINATED) once quit() has been called
   */
  async get(): Promise<TConnection> {
    switch (this.state.status) {
      case 'live':
        return this.state.connection;
      case 'starting':
        return this.state.pending;
      case 'terminated':
        throw HarnessError.handleTerminated();
      case 'unstarted':
        return this.start();
    }
  }

  /**
   * Terminate the backend and invalidate the handle.
   *
   * Never rejects. Termination errors are classified: benign ones are logged
   * at debug level, everything else becomes a warning carrying the original
   * message. The handle ends up terminated in every case.
   */
  async quit(): Promise<TerminationOutcome> {
    const previous = this.state;
    if (previous.status === 'terminated') {
      return CLEAN;
    }

    // Invalidate before awaiting anything so no caller can observe a live handle
    this.state = { status: 'terminated' };
    this.logger.debug('Process handle terminated', { previousStatus: previous.status });

    const connection = await this.connectionToTerminate(previous);
    if (!connection) {
      return CLEAN;
    }

    try {
      await connection.terminate();
      return CLEAN;
    } catch (error) {
      return this.handleTerminationError(error);
    }
  }

  private start(): Promise<TConnection> {
    const pending: Promise<TConnection> = this.factory().then(
      (connection) => {
        // quit() may have run meanwhile; it awaits this promise and terminates the connection
        if (this.state.status === 'starting' && this.state.pending === pending) {
          this.state = { status: 'live', connection };
          this.logger.debug('Process handle live');
        }
        return connection;
      },
      (error: unknown) => {
        if (this.state.status === 'starting' && this.state.pending === pending) {
          this.state = { status: 'unstarted' };
        }
        this.logger.error('Backend failed to start', error instanceof Error ? error : undefined);
        throw error;
      },
    );
    this.state = { status: 'starting', pending };
    return pending;
  }

  private async connectionToTerminate(
    previous: HandleState<TConnection>,
  ): Promise<TConnection | null> {
    if (previous.status === 'live') {
      return previous.connection;
    }
    if (previous.status !== 'starting') {
      return null;
    }
    try {
      return await previous.pending;
    } catch (error) {
      this.logger.debug('Backend never started; nothing to terminate', {
        error: extractErrorMessage(error),
      });
      return null;
    }
  }

  private handleTerminationError(error: unknown): TerminationOutcome {
    const backendError = BackendError.isBackendError(error)
      ? error
      : new BackendError(
          extractErrorMessage(error),
          'unknown',
          ErrorCode.TERMINATION_FAILED,
          error instanceof Error ? error : undefined,
        );

    let verdict: ClassificationVerdict;
    try {
      verdict = this.classifier.classify(backendError.kind, backendError.message);
    } catch (classifierError) {
      this.logger.warning(
        `Ignoring ${backendError.kind} error during browser quit: ${backendError.message} ` +
          `(classifier failed: ${extractErrorMessage(classifierError)})`,
        { kind: backendError.kind },
      );
      return { type: 'fatal', message: backendError.message };
    }

    if (verdict === 'suppress') {
      this.logger.debug('Browser already gone during quit', {
        kind: backendError.kind,
        error: backendError.message,
      });
      return { type: 'benign', message: backendError.message };
    }

    this.logger.warning(
      `Ignoring ${backendError.kind} error during browser quit: ${backendError.message}`,
      { kind: backendError.kind },
    );
    return { type: 'fatal', message: backendError.message };
  }
}
