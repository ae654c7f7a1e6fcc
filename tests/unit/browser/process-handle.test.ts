/**
 * ProcessHandle Tests
 *
 * Lazy acquisition, classified quit and unconditional invalidation.
 * Uses the in-process fake backend - no real browser required.
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { ProcessHandle } from '../../../src/browser/process-handle.js';
import { BackendError, ErrorCode, HarnessError } from '../../../src/shared/errors/index.js';
import type { LoggingService } from '../../../src/shared/services/logging.service.js';
import { FakeBackendConnection, createFakeBackendFactory } from '../../mocks/fake-backend.js';
import { createRecordingLogger, deferred, warningsOf } from '../../helpers/test-utils.js';

describe('ProcessHandle', () => {
  let logger: LoggingService;

  beforeEach(() => {
    logger = createRecordingLogger();
  });

  describe('get', () => {
    it('should not create a connection at construction time', () => {
      const { factory } = createFakeBackendFactory();

      const handle = new ProcessHandle(factory, { logger });

      expect(factory).not.toHaveBeenCalled();
      expect(handle.status).toBe('unstarted');
    });

    it('should create the connection on first call and reuse it afterwards', async () => {
      const { factory, connections } = createFakeBackendFactory();
      const handle = new ProcessHandle(factory, { logger });

      const first = await handle.get();
      const second = await handle.get();

      expect(factory).toHaveBeenCalledTimes(1);
      expect(first).toBe(connections[0]);
      expect(second).toBe(first);
      expect(handle.status).toBe('live');
      expect(handle.isLive()).toBe(true);
    });

    it('should share a single creation between concurrent first calls', async () => {
      const { factory } = createFakeBackendFactory();
      const handle = new ProcessHandle(factory, { logger });

      const [a, b] = await Promise.all([handle.get(), handle.get()]);

      expect(factory).toHaveBeenCalledTimes(1);
      expect(a).toBe(b);
    });

    it('should rethrow creation failures unchanged and stay unstarted', async () => {
      const failure = new Error('Failed to launch the browser process');
      const connection = new FakeBackendConnection();
      const factory = vi
        .fn<() => Promise<FakeBackendConnection>>()
        .mockRejectedValueOnce(failure)
        .mockResolvedValueOnce(connection);
      const handle = new ProcessHandle(factory, { logger });

      await expect(handle.get()).rejects.toBe(failure);
      expect(handle.status).toBe('unstarted');

      await expect(handle.get()).resolves.toBe(connection);
      expect(factory).toHaveBeenCalledTimes(2);
    });

    it('should refuse to create a connection after quit', async () => {
      const { factory } = createFakeBackendFactory();
      const handle = new ProcessHandle(factory, { logger });
      await handle.get();
      await handle.quit();

      const error: unknown = await handle.get().catch((e: unknown) => e);

      expect(HarnessError.isHarnessError(error)).toBe(true);
      expect(error).toMatchObject({ code: ErrorCode.HANDLE_TERMINATED });
      expect(factory).toHaveBeenCalledTimes(1);
    });
  });

  describe('quit', () => {
    it('should terminate the live connection and end terminated', async () => {
      const { factory, connections } = createFakeBackendFactory();
      const handle = new ProcessHandle(factory, { logger });
      await handle.get();

      const outcome = await handle.quit();

      expect(outcome).toEqual({ type: 'clean' });
      expect(connections[0].terminate).toHaveBeenCalledTimes(1);
      expect(handle.status).toBe('terminated');
      expect(handle.isLive()).toBe(false);
    });

    it('should not start a browser just to quit it', async () => {
      const { factory } = createFakeBackendFactory();
      const handle = new ProcessHandle(factory, { logger });

      const outcome = await handle.quit();

      expect(outcome).toEqual({ type: 'clean' });
      expect(factory).not.toHaveBeenCalled();
      expect(handle.status).toBe('terminated');
    });

    it('should warn with the original message for unknown errors during quit', async () => {
      const { factory, connections } = createFakeBackendFactory();
      const handle = new ProcessHandle(factory, { logger });
      await handle.get();
      connections[0].terminate.mockRejectedValueOnce(new BackendError('random message', 'unknown'));

      const outcome = await handle.quit();

      expect(outcome).toEqual({ type: 'fatal', message: 'random message' });
      expect(handle.status).toBe('terminated');
      const warnings = warningsOf(logger);
      expect(warnings).toHaveLength(1);
      expect(warnings[0].message).toBe('Ignoring unknown error during browser quit: random message');
    });

    it('should stay silent for errors saying the browser is already gone', async () => {
      const { factory, connections } = createFakeBackendFactory();
      const handle = new ProcessHandle(factory, { logger });
      await handle.get();
      connections[0].terminate.mockRejectedValueOnce(
        new BackendError('Error communicating with the remote browser', 'unknown'),
      );

      const outcome = await handle.quit();

      expect(outcome).toEqual({
        type: 'benign',
        message: 'Error communicating with the remote browser',
      });
      expect(handle.status).toBe('terminated');
      expect(warningsOf(logger)).toEqual([]);
    });

    it('should treat plain errors as the unknown kind', async () => {
      const { factory, connections } = createFakeBackendFactory();
      const handle = new ProcessHandle(factory, { logger });
      await handle.get();
      connections[0].terminate.mockRejectedValueOnce(new Error('random message'));

      const outcome = await handle.quit();

      expect(outcome).toEqual({ type: 'fatal', message: 'random message' });
      expect(warningsOf(logger)).toHaveLength(1);
    });

    it('should report non-communication kinds even with a benign message', async () => {
      const { factory, connections } = createFakeBackendFactory();
      const handle = new ProcessHandle(factory, { logger });
      await handle.get();
      connections[0].terminate.mockRejectedValueOnce(
        new BackendError('Error communicating with the remote browser', 'permission'),
      );

      const outcome = await handle.quit();

      expect(outcome.type).toBe('fatal');
      expect(warningsOf(logger)[0].message).toBe(
        'Ignoring permission error during browser quit: Error communicating with the remote browser',
      );
    });

    it('should still resolve when the classifier itself throws', async () => {
      const { factory, connections } = createFakeBackendFactory();
      const handle = new ProcessHandle(factory, {
        logger,
        classifier: {
          classify: () => {
            throw new Error('classifier broke');
          },
        },
      });
      await handle.get();
      connections[0].terminate.mockRejectedValueOnce(new BackendError('random message', 'unknown'));

      const outcome = await handle.quit();

      expect(outcome).toEqual({ type: 'fatal', message: 'random message' });
      expect(handle.status).toBe('terminated');
      const warnings = warningsOf(logger);
      expect(warnings).toHaveLength(1);
      expect(warnings[0].message).toBe(
        'Ignoring unknown error during browser quit: random message (classifier failed: classifier broke)',
      );
    });

    it('should be a no-op the second time', async () => {
      const { factory, connections } = createFakeBackendFactory();
      const handle = new ProcessHandle(factory, { logger });
      await handle.get();
      connections[0].terminate.mockRejectedValueOnce(new BackendError('random message', 'unknown'));

      await handle.quit();
      const second = await handle.quit();

      expect(second).toEqual({ type: 'clean' });
      expect(connections[0].terminate).toHaveBeenCalledTimes(1);
      expect(warningsOf(logger)).toHaveLength(1);
      expect(handle.status).toBe('terminated');
    });

    it('should terminate a connection that was still starting', async () => {
      const pending = deferred<FakeBackendConnection>();
      const factory = vi.fn(() => pending.promise);
      const handle = new ProcessHandle(factory, { logger });
      const getting = handle.get();
      expect(handle.status).toBe('starting');

      const quitting = handle.quit();
      expect(handle.status).toBe('terminated');

      const connection = new FakeBackendConnection();
      pending.resolve(connection);
      await expect(quitting).resolves.toEqual({ type: 'clean' });
      await expect(getting).resolves.toBe(connection);

      expect(connection.terminate).toHaveBeenCalledTimes(1);
      expect(handle.status).toBe('terminated');
    });

    it('should end clean when the connection being started fails', async () => {
      const pending = deferred<FakeBackendConnection>();
      const handle = new ProcessHandle(() => pending.promise, { logger });
      const getting = handle.get().catch((e: unknown) => e);

      const quitting = handle.quit();
      pending.reject(new Error('launch failed'));

      await expect(quitting).resolves.toEqual({ type: 'clean' });
      await expect(getting).resolves.toEqual(new Error('launch failed'));
      expect(handle.status).toBe('terminated');
    });
  });
});
