import { emptyCatalog, isBranch, type Catalog } from './catalog.js';
import type { ParlanceConfig } from './config/types.js';
import type { Entry } from './entry.js';
import { ReconcileError } from './errors.js';
import { materialize, type Conflict } from './key-materializer.js';
import { suffixesFor, type SuffixProvider } from './plurals.js';

export interface Materialization {
  entry: Entry;
  /** Plural suffix with its separator, e.g. `_one`. */
  suffix?: string;
}

export interface ExpandResult {
  materializations: Materialization[];
  /** Set when the plural categories of the locale could not be resolved. */
  error?: Error;
}

export interface ConflictRecord {
  namespace: string;
  key: string;
  path: string;
  conflict: Conflict;
  entry: Entry;
}

export interface NamespaceCounts {
  /** Materializations written without conflict. */
  uniqueCount: number;
  /** The part of `uniqueCount` that carried a plural suffix. */
  uniquePluralsCount: number;
}

export interface SourceCatalogs {
  locale: string;
  /** One catalog per namespace, in first-seen order. */
  catalogs: Map<string, Catalog>;
  counts: Map<string, NamespaceCounts>;
  conflicts: ConflictRecord[];
  warnings: string[];
}

export type BuildOptions = Pick<
  ParlanceConfig,
  'keySeparator' | 'pluralSeparator' | 'defaultNamespace' | 'defaultValue' | 'namespaceSeparator' | 'failOnWarnings'
>;

/**
 * Expands an entry into one materialization per plural category of `locale`,
 * or a single one when the entry has no count.
 */
export function expand(
  entry: Entry,
  locale: string,
  pluralSeparator: string,
  suffixProvider: SuffixProvider = suffixesFor
): ExpandResult {
  if (!entry.hasCount) {
    return { materializations: [{ entry }] };
  }

  try {
    const suffixes = suffixProvider(locale);
    return {
      materializations: suffixes.map((category) => ({ entry, suffix: `${pluralSeparator}${category}` })),
    };
  } catch (error) {
    return {
      materializations: [],
      error: error instanceof Error ? error : new Error(String(error)),
    };
  }
}

function namespaceBranch(root: Catalog, namespace: string, keySeparator: string): Catalog | undefined {
  let node: Catalog | undefined = root;
  for (const segment of namespace.split(keySeparator)) {
    if (!segment) {
      continue;
    }
    const child = node?.children.get(segment);
    node = isBranch(child) ? child : undefined;
  }
  return node;
}

export function describeConflict(record: ConflictRecord, namespaceSeparator: string): string {
  const { conflict } = record;
  switch (conflict.kind) {
    case 'key':
      return `Found translation key already mapped to a map or parent of new key already mapped to a string: ${conflict.segment}`;
    case 'value':
      return `Found same keys with different values: ${record.namespace}${namespaceSeparator}${record.key}`;
  }
}

/**
 * Folds all entries of one locale into per-namespace source catalogs.
 *
 * With `failOnWarnings`, the first key conflict throws a `ReconcileError`.
 */
export function buildSourceCatalogs(
  entries: readonly Entry[],
  locale: string,
  options: BuildOptions,
  suffixProvider: SuffixProvider = suffixesFor
): SourceCatalogs {
  // One tree per namespace so `a` and `a.b` never share keys
  const roots = new Map<string, Catalog>();
  const counts = new Map<string, NamespaceCounts>();
  const conflicts: ConflictRecord[] = [];
  const warnings: string[] = [];

  for (const entry of entries) {
    const namespace = entry.namespace ?? options.defaultNamespace;
    let namespaceCounts = counts.get(namespace);
    if (!namespaceCounts) {
      namespaceCounts = { uniqueCount: 0, uniquePluralsCount: 0 };
      counts.set(namespace, namespaceCounts);
    }

    const expanded = expand(entry, locale, options.pluralSeparator, suffixProvider);
    if (expanded.error) {
      warnings.push(`Skipping plural forms of "${entry.key}" for ${locale}: ${expanded.error.message}`);
    }

    for (const { suffix } of expanded.materializations) {
      const result = materialize(entry, roots.get(namespace) ?? emptyCatalog(), suffix, options);
      roots.set(namespace, result.target);

      if (!result.conflict) {
        namespaceCounts.uniqueCount += 1;
        if (suffix) {
          namespaceCounts.uniquePluralsCount += 1;
        }
        continue;
      }

      const record: ConflictRecord = {
        namespace,
        key: entry.key,
        path: result.path ?? entry.key,
        conflict: result.conflict,
        entry,
      };
      if (result.conflict.kind === 'key' && options.failOnWarnings) {
        throw new ReconcileError(describeConflict(record, options.namespaceSeparator), {
          ...result.conflict,
          namespace,
          key: entry.key,
        });
      }
      conflicts.push(record);
    }
  }

  const catalogs = new Map<string, Catalog>();
  for (const namespace of counts.keys()) {
    const root = roots.get(namespace);
    catalogs.set(namespace, (root && namespaceBranch(root, namespace, options.keySeparator)) ?? emptyCatalog());
  }

  return { locale, catalogs, counts, conflicts, warnings };
}
