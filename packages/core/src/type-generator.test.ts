import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { emptyCatalog } from './catalog.js';
import { createDefaultConfig } from './config/defaults.js';
import { reconcileNamespace, type NamespaceReconciliation } from './reconciler.js';
import {
  camelize,
  renderResourceTypes,
  supportsResourceTypes,
  writeResourceTypes,
  RESOURCE_TYPES_FILENAME,
} from './type-generator.js';

let tempDir: string;

function buildResult(root: string, locale: string, namespace: string): NamespaceReconciliation {
  return {
    ...reconcileNamespace({ locale, namespace, catalog: emptyCatalog() }, createDefaultConfig()),
    path: path.join(root, 'locales', locale, `${namespace}.json`),
    backupPath: path.join(root, 'locales', locale, `${namespace}_old.json`),
    counts: { uniqueCount: 0, uniquePluralsCount: 0 },
  };
}

describe('camelize', () => {
  it('joins separated words in camel case', () => {
    expect(camelize('hello_world')).toBe('helloWorld');
    expect(camelize('Hello-World')).toBe('helloWorld');
    expect(camelize('T-ESTSTRING')).toBe('tEststring');
    expect(camelize('')).toBe('');
  });
});

describe('supportsResourceTypes', () => {
  it('only supports JSON catalogs', () => {
    expect(supportsResourceTypes({ output: 'locales/$LOCALE/$NAMESPACE.json' })).toBe(true);
    expect(supportsResourceTypes({ output: 'locales/$LOCALE/$NAMESPACE.yml' })).toBe(false);
    expect(supportsResourceTypes({ output: 'locales/$LOCALE/$NAMESPACE.YAML' })).toBe(false);
  });
});

describe('renderResourceTypes', () => {
  const config = { ...createDefaultConfig(), locales: ['en', 'de'] };

  it('imports the catalogs of the first locale', () => {
    const output = renderResourceTypes(
      [buildResult('/ws', 'en', 'translation'), buildResult('/ws', 'en', 'my-ns'), buildResult('/ws', 'de', 'translation')],
      config,
      '/ws'
    );
    const lines = output.split('\n');

    expect(lines).toContain("import type translationResources from './locales/en/translation.json';");
    expect(lines).toContain("import type myNsResources from './locales/en/my-ns.json';");
    expect(lines).toContain('      translation: typeof translationResources;');
    expect(lines).toContain("      'my-ns': typeof myNsResources;");
    expect(lines).toContain("    defaultNS: 'translation';");
    expect(lines).toContain("  type Ns = 'my-ns' | 'translation';");
    expect(output).not.toContain('/de/');
  });
});

describe('writeResourceTypes', () => {
  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'type-generator-'));
  });

  afterEach(async () => {
    if (tempDir) {
      await fs.rm(tempDir, { recursive: true, force: true });
    }
  });

  it('writes the declaration file at the project root', async () => {
    const config = createDefaultConfig();
    const results = [buildResult(tempDir, 'en', 'translation')];

    const filePath = await writeResourceTypes(results, config, tempDir);

    expect(filePath).toBe(path.join(tempDir, RESOURCE_TYPES_FILENAME));
    expect(await fs.readFile(filePath, 'utf8')).toBe(renderResourceTypes(results, config, tempDir));
  });
});
