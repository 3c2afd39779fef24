import { afterEach, describe, expect, it, vi } from 'vitest';
import type { CatalogDiffEntry } from '@parlance/core';
import { printCatalogDiffs } from './diff-utils.js';

describe('printCatalogDiffs', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('prints a notice when there is nothing to show', () => {
    const spy = vi.spyOn(console, 'log').mockImplementation(() => {});

    printCatalogDiffs([]);

    expect(spy).toHaveBeenCalledTimes(1);
    expect(String(spy.mock.calls[0][0])).toContain('No catalog diffs to display.');
  });

  it('prints every line of each patch', () => {
    const spy = vi.spyOn(console, 'log').mockImplementation(() => {});
    const diffs: CatalogDiffEntry[] = [
      {
        locale: 'en',
        namespace: 'translation',
        path: '/ws/locales/en/translation.json',
        diff: '--- a\n+++ b\n+  "hello": "Hello"\n',
        added: ['hello'],
        updated: [],
        removed: [],
      },
    ];

    printCatalogDiffs(diffs);

    const output = spy.mock.calls.map((call) => String(call[0]));
    expect(output).toHaveLength(5);
    expect(output[1]).toContain('en/translation (/ws/locales/en/translation.json)');
    expect(output[4]).toContain('+  "hello": "Hello"');
  });
});
