/**
 * Smoke run tests
 */

import { describe, it, expect, beforeEach, vi, type Mock } from 'vitest';
import { createLinkedMocks, type MockBrowser, type MockPage } from '../../mocks/puppeteer.mock.js';

vi.mock('puppeteer-core', async (importOriginal) => {
  const actual = await importOriginal<typeof import('puppeteer-core')>();
  return {
    ...actual,
    default: {
      launch: vi.fn(),
    },
  };
});

// Import AFTER mocking
import puppeteer from 'puppeteer-core';
import { runSmoke } from '../../../src/cli/smoke.js';
import { resetHarnessState } from '../../../src/config/harness-config.js';
import { ErrorCode } from '../../../src/shared/errors/index.js';

const ARGV = ['--url', 'http://app.test/', '--executablePath', '/opt/firefox/firefox'];

describe('runSmoke', () => {
  let mockBrowser: MockBrowser;
  let mockPage: MockPage;

  beforeEach(() => {
    vi.clearAllMocks();
    resetHarnessState();

    const mocks = createLinkedMocks({ url: 'http://app.test/' });
    mockBrowser = mocks.browser;
    mockPage = mocks.page;

    (puppeteer.launch as Mock).mockResolvedValue(mockBrowser);
  });

  it('should require --url', async () => {
    await expect(runSmoke([])).rejects.toMatchObject({
      code: ErrorCode.INVALID_CONFIG,
      message: 'Missing --url',
    });
    expect(puppeteer.launch).not.toHaveBeenCalled();
  });

  it('should report what survives a reset and quit the browser', async () => {
    mockPage.evaluate
      .mockResolvedValueOnce(undefined) // clear sessionStorage
      .mockResolvedValueOnce(undefined) // clear localStorage
      .mockResolvedValueOnce(true) // blank page is empty
      .mockResolvedValueOnce(['theme'])
      .mockResolvedValueOnce([]);

    const summary = await runSmoke(ARGV);

    expect(summary).toEqual({
      url: 'http://app.test/',
      localStorageKeys: ['theme'],
      sessionStorageKeys: [],
      cookies: [],
      quit: 'clean',
    });
    expect(mockPage.goto.mock.calls.map(([location]) => location)).toEqual([
      'http://app.test/',
      'about:blank',
      'http://app.test/',
    ]);
    expect(mockBrowser.close).toHaveBeenCalledTimes(1);
  });

  it('should warn about an unknown argument once', async () => {
    mockPage.evaluate.mockResolvedValue(true);

    await runSmoke([...ARGV, '--hedless']);

    expect(
      vi.mocked(console.warn).mock.calls.filter(
        ([message]) => message === 'Warning: Unknown argument "--hedless" - ignored',
      ),
    ).toHaveLength(1);
  });

  it('should surface launch failures', async () => {
    (puppeteer.launch as Mock).mockRejectedValue(new Error('Failed to launch the browser process'));

    await expect(runSmoke(ARGV)).rejects.toMatchObject({
      code: ErrorCode.BACKEND_START_FAILED,
      message: 'Failed to launch the browser process',
    });
    expect(mockBrowser.close).not.toHaveBeenCalled();
  });
});
