import { afterEach, describe, expect, it, vi } from 'vitest';
import { CatalogParseError, ConfigError, ReconcileError } from '@parlance/core';
import { CliError, toCliError, withErrorHandling } from './errors.js';
import { EXIT_CODES, getExitCodeDescription } from './exit-codes.js';

describe('toCliError', () => {
  it('maps core errors onto their exit codes', () => {
    expect(toCliError(new ConfigError('bad config'))?.exitCode).toBe(EXIT_CODES.CONFIG);
    expect(toCliError(new ReconcileError('conflict'))?.exitCode).toBe(EXIT_CODES.CONFLICT);
    expect(toCliError(new CliError('stale', EXIT_CODES.UPDATE))?.exitCode).toBe(4);
    expect(toCliError(new CatalogParseError('/ws/en.json', new Error('bad')))?.message).toBe(
      'Unable to parse catalog /ws/en.json: bad'
    );
    expect(toCliError(new Error('boom'))).toBeUndefined();
  });
});

describe('withErrorHandling', () => {
  afterEach(() => {
    process.exitCode = undefined;
    vi.restoreAllMocks();
  });

  it('returns the result of a successful action', async () => {
    const wrapped = withErrorHandling(async (value: number) => value * 2);

    expect(await wrapped(21)).toBe(42);
  });

  it('prints the message and sets the exit code of a known error', async () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const wrapped = withErrorHandling(async () => {
      throw new ConfigError('Config file at x.json contains invalid JSON: oops');
    });

    expect(await wrapped()).toBeUndefined();
    expect(process.exitCode).toBe(2);
    expect(spy).toHaveBeenCalledTimes(1);
    expect(String(spy.mock.calls[0][0])).toContain('Config file at x.json contains invalid JSON: oops');
  });

  it('treats unknown errors as general failures', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    const wrapped = withErrorHandling(() => {
      throw new Error('boom');
    });

    await wrapped();
    expect(process.exitCode).toBe(1);
  });
});

describe('getExitCodeDescription', () => {
  it('describes known and unknown codes', () => {
    expect(getExitCodeDescription(4)).toBe('Catalogs would be updated');
    expect(getExitCodeDescription(9)).toBe('Unknown exit code: 9');
  });
});
