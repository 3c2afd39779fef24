import { catalogsEqual, isCatalogEmpty, type Catalog } from './catalog.js';
import { buildSourceCatalogs, type ConflictRecord, type NamespaceCounts } from './catalog-builder.js';
import {
  readCatalog,
  resolveCatalogPaths,
  writeCatalog,
  type WriteCatalogOptions,
} from './catalog-store.js';
import type { ParlanceConfig } from './config/types.js';
import type { Entry } from './entry.js';
import { ConfigError } from './errors.js';
import { merge, transferValues, type MergeResult } from './merge-engine.js';
import { suffixesFor, type SuffixProvider } from './plurals.js';

export interface NamespaceInput {
  locale: string;
  namespace: string;
  /** Catalog built from the extracted entries. */
  catalog: Catalog;
  /** Primary catalog read from disk. */
  existing?: Catalog;
  /** Backup catalog read from disk. */
  backup?: Catalog;
}

export interface NamespaceReconciliation {
  locale: string;
  namespace: string;
  path: string;
  backupPath: string;
  previous?: Catalog;
  previousBackup?: Catalog;
  counts: NamespaceCounts;
  /** Merge of the on-disk catalog into the extracted one; `merged.new` is written. */
  merged: MergeResult;
  /** Re-merge of the backup; `restored.mergeCount` is how many keys it restores. */
  restored: MergeResult;
  /** Catalog to persist as backup. */
  oldCatalog: Catalog;
}

export interface LocaleReconciliation {
  locale: string;
  namespaces: NamespaceReconciliation[];
  conflicts: ConflictRecord[];
  warnings: string[];
}

export interface ReconcileResult {
  locales: LocaleReconciliation[];
}

export interface ReconcileOptions {
  projectRoot: string;
  suffixProvider?: SuffixProvider;
}

export interface WrittenCatalog {
  locale: string;
  namespace: string;
  path: string;
  kind: 'primary' | 'backup';
}

export type ReconcileConfig = Pick<
  ParlanceConfig,
  | 'locales'
  | 'output'
  | 'defaultNamespace'
  | 'defaultValue'
  | 'keySeparator'
  | 'pluralSeparator'
  | 'contextSeparator'
  | 'namespaceSeparator'
  | 'keepRemoved'
  | 'createOldCatalogs'
  | 'resetDefaultValueLocale'
  | 'failOnWarnings'
>;

/**
 * Runs both merge passes for one namespace of one locale. The on-disk catalog
 * is merged into the extracted one, then the backup is merged into that
 * result to find the keys it would restore.
 */
export function reconcileNamespace(
  input: NamespaceInput,
  config: ReconcileConfig
): Omit<NamespaceReconciliation, 'path' | 'backupPath' | 'counts'> {
  const keyPrefix = `${input.namespace}${config.keySeparator}`;
  const merged = merge(
    {
      source: input.existing,
      existing: input.catalog,
      resetValues: input.backup,
      keyPrefix,
      resetAndFlag: input.locale === config.resetDefaultValueLocale,
    },
    config
  );
  const restored = merge(
    { source: input.backup, existing: merged.new, keyPrefix, resetAndFlag: false },
    { ...config, keepRemoved: false }
  );

  return {
    locale: input.locale,
    namespace: input.namespace,
    previous: input.existing,
    previousBackup: input.backup,
    merged,
    restored,
    oldCatalog: transferValues(merged.old, restored.old),
  };
}

/**
 * Reconciles extracted entries against the catalogs on disk for every
 * configured locale. Nothing is written.
 */
export async function reconcile(
  entries: readonly Entry[],
  config: ReconcileConfig,
  options: ReconcileOptions
): Promise<ReconcileResult> {
  if (!config.locales.length) {
    throw new ConfigError('No locales configured: set "locales" in the parlance configuration.');
  }

  const locales: LocaleReconciliation[] = [];
  for (const locale of config.locales) {
    const built = buildSourceCatalogs(entries, locale, config, options.suffixProvider ?? suffixesFor);
    const warnings = [...built.warnings];
    const namespaces: NamespaceReconciliation[] = [];

    for (const [namespace, catalog] of built.catalogs) {
      const paths = resolveCatalogPaths(config, options.projectRoot, locale, namespace);
      const existing = await readCatalog(paths.path);
      if (!existing) {
        warnings.push(`Catalog not found, it will be created: ${paths.path}`);
      }
      const backup = await readCatalog(paths.backupPath);
      const reconciled = reconcileNamespace({ locale, namespace, catalog, existing, backup }, config);
      namespaces.push({
        ...reconciled,
        path: paths.path,
        backupPath: paths.backupPath,
        counts: built.counts.get(namespace) ?? { uniqueCount: 0, uniquePluralsCount: 0 },
      });
    }

    locales.push({ locale, namespaces, conflicts: built.conflicts, warnings });
  }

  return { locales };
}

export function listNamespaceResults(result: ReconcileResult): NamespaceReconciliation[] {
  return result.locales.flatMap((locale) => locale.namespaces);
}

/** Whether writing would change the primary catalog on disk. */
export function hasCatalogChanged(result: NamespaceReconciliation): boolean {
  return !result.previous || !catalogsEqual(result.previous, result.merged.new);
}

export function shouldWriteBackup(
  result: NamespaceReconciliation,
  config: Pick<ParlanceConfig, 'createOldCatalogs'>
): boolean {
  return config.createOldCatalogs && !isCatalogEmpty(result.oldCatalog);
}

/**
 * Writes every primary catalog, and the backups when enabled and non-empty.
 * Files are written one after another; a failure stops the run without
 * rolling back what was already written.
 */
export async function writeReconciliation(
  result: ReconcileResult,
  config: Pick<ParlanceConfig, 'createOldCatalogs'>,
  writeOptions: WriteCatalogOptions = {}
): Promise<WrittenCatalog[]> {
  const written: WrittenCatalog[] = [];
  for (const entry of listNamespaceResults(result)) {
    await writeCatalog(entry.path, entry.merged.new, writeOptions);
    written.push({ locale: entry.locale, namespace: entry.namespace, path: entry.path, kind: 'primary' });

    if (shouldWriteBackup(entry, config)) {
      await writeCatalog(entry.backupPath, entry.oldCatalog, writeOptions);
      written.push({ locale: entry.locale, namespace: entry.namespace, path: entry.backupPath, kind: 'backup' });
    }
  }
  return written;
}
