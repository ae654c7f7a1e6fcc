/**
 * CLI Argument Parsing Tests
 */

import { describe, it, expect } from 'vitest';
import { parseArgs, type HarnessArgs } from '../../../src/cli/args.js';

describe('parseArgs', () => {
  it('should return default options when no args provided', () => {
    const args: HarnessArgs = parseArgs([]);

    expect(args).toEqual({
      keepStorage: false,
      keepCookies: false,
    });
    expect(args.headless).toBeUndefined();
  });

  it.each([
    ['--headless=false', false],
    ['--headless=0', false],
    ['--headless=true', true],
    ['--headless=1', true],
    ['--headless', true],
  ])('should parse %s', (flag, expected) => {
    expect(parseArgs([flag]).headless).toBe(expected);
  });

  it('should parse --executablePath', () => {
    const args = parseArgs(['--executablePath', '/opt/firefox/firefox']);
    expect(args.executablePath).toBe('/opt/firefox/firefox');
  });

  it('should parse --readTimeout as milliseconds', () => {
    const args = parseArgs(['--readTimeout', '15000']);
    expect(args.readTimeoutMs).toBe(15000);
  });

  it('should parse --downloadDir', () => {
    const args = parseArgs(['--downloadDir', '/tmp/downloads']);
    expect(args.downloadDir).toBe('/tmp/downloads');
  });

  it('should parse the storage switches', () => {
    const args = parseArgs(['--keepStorage', '--keepCookies']);

    expect(args.keepStorage).toBe(true);
    expect(args.keepCookies).toBe(true);
  });

  it('should parse --url', () => {
    const args = parseArgs(['--url', 'http://app.test/']);
    expect(args.url).toBe('http://app.test/');
  });

  it('should ignore a value flag given without a value', () => {
    const args = parseArgs(['--executablePath']);
    expect(args.executablePath).toBeUndefined();
  });

  it('should parse multiple arguments together', () => {
    const args = parseArgs([
      '--headless=false',
      '--url',
      'http://app.test/',
      '--keepCookies',
      '--readTimeout',
      '5000',
    ]);

    expect(args).toEqual({
      headless: false,
      url: 'http://app.test/',
      keepStorage: false,
      keepCookies: true,
      readTimeoutMs: 5000,
    });
  });

  it('should warn about and ignore unknown arguments', () => {
    const args = parseArgs(['--hedless', '--unknownArg=value']);

    expect(args).toEqual({ keepStorage: false, keepCookies: false });
    expect(console.warn).toHaveBeenCalledWith('Warning: Unknown argument "--hedless" - ignored');
    expect(console.warn).toHaveBeenCalledWith(
      'Warning: Unknown argument "--unknownArg=value" - ignored',
    );
  });
});
