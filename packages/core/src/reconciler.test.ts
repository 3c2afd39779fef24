import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { catalogFromJson, toJson } from './catalog.js';
import { createDefaultConfig } from './config/defaults.js';
import type { ParlanceConfig } from './config/types.js';
import { createEntry } from './entry.js';
import { ConfigError } from './errors.js';
import {
  hasCatalogChanged,
  listNamespaceResults,
  reconcile,
  reconcileNamespace,
  writeReconciliation,
  type NamespaceReconciliation,
} from './reconciler.js';

let tempDir: string;

const suffixProvider = () => ['one', 'other'];

function buildConfig(overrides: Partial<ParlanceConfig> = {}): ParlanceConfig {
  return { ...createDefaultConfig(), locales: ['en', 'de'], ...overrides };
}

async function writeJson(relativePath: string, data: unknown): Promise<void> {
  const filePath = path.join(tempDir, relativePath);
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, JSON.stringify(data), 'utf8');
}

async function readJson(relativePath: string): Promise<unknown> {
  return JSON.parse(await fs.readFile(path.join(tempDir, relativePath), 'utf8'));
}

function find(results: NamespaceReconciliation[], locale: string, namespace = 'translation'): NamespaceReconciliation {
  const match = results.find((result) => result.locale === locale && result.namespace === namespace);
  if (!match) {
    throw new Error(`No result for ${locale}/${namespace}`);
  }
  return match;
}

describe('reconcileNamespace', () => {
  it('returns the extracted catalog when nothing exists on disk', () => {
    const result = reconcileNamespace(
      { locale: 'en', namespace: 'translation', catalog: catalogFromJson({ a: 'A' }) },
      buildConfig()
    );

    expect(toJson(result.merged.new)).toEqual({ a: 'A' });
    expect(toJson(result.oldCatalog)).toEqual({});
    expect(result.previous).toBeUndefined();
  });

  it('counts keys the backup would restore and keeps them in the old catalog', () => {
    const result = reconcileNamespace(
      {
        locale: 'de',
        namespace: 'translation',
        catalog: catalogFromJson({ farewell: '' }),
        backup: catalogFromJson({ farewell: 'Tschüss', unused: 'X' }),
      },
      buildConfig()
    );

    expect(toJson(result.merged.new)).toEqual({ farewell: '' });
    expect(result.restored.mergeCount).toBe(1);
    expect(toJson(result.oldCatalog)).toEqual({ unused: 'X' });
  });

  it('moves values found in the backup out of the primary catalog', () => {
    const result = reconcileNamespace(
      {
        locale: 'de',
        namespace: 'translation',
        catalog: catalogFromJson({ farewell: '' }),
        existing: catalogFromJson({ farewell: 'Ciao' }),
        backup: catalogFromJson({ farewell: 'Tschüss' }),
      },
      buildConfig()
    );

    expect(toJson(result.merged.new)).toEqual({ farewell: '' });
    expect(result.merged.resetKeys).toEqual(['translation.farewell']);
    expect(toJson(result.oldCatalog)).toEqual({ farewell: 'Ciao' });
  });
});

describe('reconcile', () => {
  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'reconciler-'));
  });

  afterEach(async () => {
    if (tempDir) {
      await fs.rm(tempDir, { recursive: true, force: true });
    }
  });

  it('rejects a configuration without locales', async () => {
    await expect(
      reconcile([createEntry('a')], buildConfig({ locales: [] }), { projectRoot: tempDir, suffixProvider })
    ).rejects.toBeInstanceOf(ConfigError);
  });

  it('creates missing catalogs for every locale', async () => {
    const config = buildConfig();
    const result = await reconcile([createEntry('greeting', { value: 'Hello' })], config, {
      projectRoot: tempDir,
      suffixProvider,
    });

    const en = result.locales[0];
    expect(en.warnings).toEqual([
      `Catalog not found, it will be created: ${path.resolve(tempDir, 'locales/en/translation.json')}`,
    ]);

    const written = await writeReconciliation(result, config);
    expect(written.map((entry) => path.relative(tempDir, entry.path))).toEqual([
      path.join('locales', 'en', 'translation.json'),
      path.join('locales', 'de', 'translation.json'),
    ]);
    expect(await readJson('locales/de/translation.json')).toEqual({ greeting: 'Hello' });
  });

  it('keeps translations on disk over extracted default values', async () => {
    await writeJson('locales/en/translation.json', { greeting: 'Hi there' });
    await writeJson('locales/de/translation.json', { greeting: 'Hallo', stale: 'Alt' });
    const config = buildConfig({ createOldCatalogs: true });

    const result = await reconcile([createEntry('greeting', { value: 'Hello' })], config, {
      projectRoot: tempDir,
      suffixProvider,
    });
    const results = listNamespaceResults(result);

    expect(toJson(find(results, 'en').merged.new)).toEqual({ greeting: 'Hi there' });
    expect(hasCatalogChanged(find(results, 'en'))).toBe(false);
    expect(toJson(find(results, 'de').merged.new)).toEqual({ greeting: 'Hallo' });
    expect(hasCatalogChanged(find(results, 'de'))).toBe(true);

    const written = await writeReconciliation(result, config);
    expect(written.map((entry) => entry.kind)).toEqual(['primary', 'primary', 'backup']);
    expect(await readJson('locales/de/translation.json')).toEqual({ greeting: 'Hallo' });
    expect(await readJson('locales/de/translation_old.json')).toEqual({ stale: 'Alt' });
  });

  it('resets changed values of the reset locale only', async () => {
    await writeJson('locales/en/translation.json', { greeting: 'Hi there' });
    await writeJson('locales/de/translation.json', { greeting: 'Hallo' });

    const result = await reconcile(
      [createEntry('greeting', { value: 'Hello' })],
      buildConfig({ resetDefaultValueLocale: 'en' }),
      { projectRoot: tempDir, suffixProvider }
    );
    const results = listNamespaceResults(result);

    expect(toJson(find(results, 'en').merged.new)).toEqual({ greeting: 'Hello' });
    expect(toJson(find(results, 'en').oldCatalog)).toEqual({ greeting: 'Hi there' });
    expect(toJson(find(results, 'de').merged.new)).toEqual({ greeting: 'Hallo' });
  });

  it('expands plural keys and reports namespace counts', async () => {
    const result = await reconcile(
      [createEntry('apple', { hasCount: true }), createEntry('title', { namespace: 'common', value: 'Title' })],
      buildConfig({ locales: ['en'] }),
      { projectRoot: tempDir, suffixProvider }
    );
    const results = listNamespaceResults(result);

    expect(toJson(find(results, 'en').merged.new)).toEqual({ apple_one: '', apple_other: '' });
    expect(find(results, 'en').counts).toEqual({ uniqueCount: 2, uniquePluralsCount: 2 });
    expect(find(results, 'en', 'common').path).toBe(path.resolve(tempDir, 'locales/en/common.json'));
  });

  it('writes identical files when run twice', async () => {
    await writeJson('locales/en/translation.json', {
      nav: { home: 'Start', old: 'X' },
      apple_one: 'an apple',
      apple_many: 'many',
      friend: 'Friend',
      gone: 'Bye',
    });
    await writeJson('locales/en/translation_old.json', { gone: 'Tschau', lost: 'L' });
    const config = buildConfig({ locales: ['en'], createOldCatalogs: true });
    const entries = [
      createEntry('nav.home', { value: 'Home' }),
      createEntry('apple', { hasCount: true }),
      createEntry('friend_male'),
    ];

    const run = async () => {
      const result = await reconcile(entries, config, { projectRoot: tempDir, suffixProvider });
      await writeReconciliation(result, config);
      return {
        result,
        primary: await fs.readFile(path.join(tempDir, 'locales/en/translation.json'), 'utf8'),
        backup: await fs.readFile(path.join(tempDir, 'locales/en/translation_old.json'), 'utf8'),
      };
    };

    const first = await run();
    const second = await run();

    expect(JSON.parse(first.primary)).toEqual({
      apple_many: 'many',
      apple_one: 'an apple',
      apple_other: '',
      friend_male: '',
      nav: { home: 'Start' },
    });
    expect(JSON.parse(first.backup)).toEqual({ friend: 'Friend', gone: 'Tschau', lost: 'L', nav: { old: 'X' } });
    expect(second.primary).toBe(first.primary);
    expect(second.backup).toBe(first.backup);
    expect(hasCatalogChanged(find(listNamespaceResults(second.result), 'en'))).toBe(false);
  });
});
