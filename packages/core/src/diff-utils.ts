import { createPatch, diffChars } from 'diff';
import path from 'path';
import { isBranch, type Catalog, type CatalogNode } from './catalog.js';
import { serializeCatalog, type WriteCatalogOptions } from './catalog-store.js';
import type { NamespaceReconciliation } from './reconciler.js';

export interface CatalogDiffEntry {
  locale: string;
  namespace: string;
  path: string;
  diff: string;
  added: string[];
  updated: string[];
  removed: string[];
}

export interface CatalogDiffOptions extends WriteCatalogOptions {
  workspaceRoot: string;
  keySeparator: string;
}

export type ValueSegmentKind = 'same' | 'added' | 'removed';

export interface ValueSegment {
  kind: ValueSegmentKind;
  text: string;
}

/** Flattens a catalog into `path -> value`; lists are kept as their JSON text. */
export function flattenCatalog(catalog: Catalog, keySeparator: string): Map<string, string> {
  const flat = new Map<string, string>();
  const visit = (node: CatalogNode, prefix: string) => {
    if (isBranch(node)) {
      for (const [key, child] of node.children) {
        visit(child, prefix ? `${prefix}${keySeparator}${key}` : key);
      }
      return;
    }
    flat.set(prefix, node.kind === 'leaf' ? node.value : JSON.stringify(node.items));
  };
  visit(catalog, '');
  return flat;
}

function computeDiffStats(
  before: Map<string, string>,
  after: Map<string, string>
): { added: string[]; updated: string[]; removed: string[] } {
  const added: string[] = [];
  const updated: string[] = [];
  const removed: string[] = [];
  const allKeys = new Set([...before.keys(), ...after.keys()]);

  for (const key of allKeys) {
    const prev = before.get(key);
    const next = after.get(key);
    if (prev === undefined && next !== undefined) {
      added.push(key);
      continue;
    }
    if (next === undefined) {
      removed.push(key);
      continue;
    }
    if (prev !== next) {
      updated.push(key);
    }
  }

  return {
    added: added.sort(),
    updated: updated.sort(),
    removed: removed.sort(),
  };
}

/**
 * Unified diffs between each catalog on disk and the catalog that would be
 * written. Unchanged catalogs are skipped.
 */
export function buildCatalogDiffs(
  results: readonly NamespaceReconciliation[],
  options: CatalogDiffOptions
): CatalogDiffEntry[] {
  const diffs: CatalogDiffEntry[] = [];

  for (const result of results) {
    const beforeText = result.previous ? serializeCatalog(result.path, result.previous, options) : '';
    const afterText = serializeCatalog(result.path, result.merged.new, options);
    if (beforeText === afterText) {
      continue;
    }

    const relativePath = path.relative(options.workspaceRoot, result.path) || result.path;
    const before = result.previous ? flattenCatalog(result.previous, options.keySeparator) : new Map<string, string>();
    const after = flattenCatalog(result.merged.new, options.keySeparator);

    diffs.push({
      locale: result.locale,
      namespace: result.namespace,
      path: result.path,
      diff: createPatch(relativePath, beforeText, afterText),
      ...computeDiffStats(before, after),
    });
  }

  return diffs;
}

/** Character-level diff of two conflicting values. */
export function diffValueSegments(oldValue: string, newValue: string): ValueSegment[] {
  return diffChars(oldValue, newValue).map((change) => ({
    kind: change.added ? 'added' : change.removed ? 'removed' : 'same',
    text: change.value,
  }));
}
