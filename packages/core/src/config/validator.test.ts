import { describe, it, expect } from 'vitest';
import { normalizeConfig } from './normalizer.js';
import { assertConfigValid, validateConfig } from './validator.js';
import type { RawParlanceConfig } from './types.js';
import { ConfigError } from '../errors.js';

function captureError(run: () => void): unknown {
  try {
    run();
  } catch (error) {
    return error;
  }
  return undefined;
}

function buildConfig(overrides: RawParlanceConfig = {}) {
  return normalizeConfig(overrides);
}

describe('config validator', () => {
  it('accepts a normalized default config', () => {
    const config = buildConfig();
    expect(() => assertConfigValid(config)).not.toThrow();
  });

  it('rejects output paths with shell metacharacters', () => {
    const config = buildConfig({ output: 'locales/$LOCALE;rm -rf.json' });
    expect(() => assertConfigValid(config)).toThrow(/output/);
  });

  it('requires $LOCALE in the output with several locales', () => {
    const issues = validateConfig(buildConfig({ locales: ['en', 'de'], output: 'locales/$NAMESPACE.json' }));
    expect(issues).toEqual([{ field: 'output', message: 'must contain $LOCALE when more than one locale is configured' }]);
  });

  it('rejects invalid language tags', () => {
    const issues = validateConfig(buildConfig({ locales: ['en us'] }));
    expect(issues.some((issue) => issue.field === 'locales[0]')).toBe(true);
  });

  it('requires the reset locale to be configured', () => {
    const issues = validateConfig(buildConfig({ locales: ['en'], resetDefaultValueLocale: 'fr' }));
    expect(issues).toEqual([{ field: 'resetDefaultValueLocale', message: 'must be one of the configured locales' }]);
  });

  it('rejects identical key and namespace separators', () => {
    const issues = validateConfig(buildConfig({ keySeparator: ':' }));
    expect(issues.map((issue) => issue.field)).toEqual(['namespaceSeparator']);
  });

  it('rejects function names that are not member paths', () => {
    const issues = validateConfig(buildConfig({ functions: ['t', 'foo-bar'] }));
    expect(issues.map((issue) => issue.field)).toEqual(['functions[1]']);
  });

  it('lists every issue in the thrown error', () => {
    const config = buildConfig({ locales: ['en', 'de'], output: 'out.json', indentation: 12 });
    const error = captureError(() => assertConfigValid(config));

    expect(error).toBeInstanceOf(ConfigError);
    expect(error instanceof ConfigError && error.issues).toHaveLength(2);
    expect(error instanceof Error && error.message).toBe(
      'Invalid parlance configuration:\n' +
        '• output: must contain $LOCALE when more than one locale is configured\n' +
        '• indentation: must be at most 8'
    );
  });
});
