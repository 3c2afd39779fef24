import {
  branch,
  isBranch,
  isCatalogEmpty,
  nodesEqual,
  type Catalog,
  type CatalogNode,
  type JsonValue,
} from './catalog.js';
import type { ParlanceConfig } from './config/types.js';
import { contextBase, hasPluralSibling, isPluralKey, singularForm } from './key-family.js';

/** Tree of `true` leaves marking the keys that were force-reset. */
export type ResetFlags = ReadonlyMap<string, ResetFlags | true>;

export interface MergeCounters {
  mergeCount: number;
  pullCount: number;
  oldCount: number;
  resetCount: number;
}

export interface MergeResult extends MergeCounters {
  new: Catalog;
  old: Catalog;
  reset: ResetFlags;
  /** Full key paths (prefix included) pulled back into `new` as plural or context siblings. */
  pulledKeys: string[];
  /** Full key paths moved to `old`, or kept in `new` as unreferenced when `keepRemoved` is set. */
  removedKeys: string[];
  resetKeys: string[];
}

export interface MergeInput {
  /** Tree whose keys are visited. */
  source?: Catalog;
  /** Base tree; keys only found here pass through untouched. */
  existing: Catalog;
  /** Keys present here are force-reset. */
  resetValues?: Catalog;
  keyPrefix?: string;
  resetAndFlag?: boolean;
}

export type MergeOptions = Pick<ParlanceConfig, 'keySeparator' | 'pluralSeparator' | 'contextSeparator' | 'keepRemoved'>;

function isEmptyLeaf(node: CatalogNode): boolean {
  return node.kind === 'leaf' && node.value === '';
}

/**
 * Merges `source` into `existing`.
 *
 * Every key of `source` ends up in exactly one place: overwritten or pulled
 * into `new`, or recorded in `old` (and flagged in `reset` when it was
 * force-reset). Keys absent from `source` are left as they are.
 */
export function merge(input: MergeInput, options: MergeOptions): MergeResult {
  const { source, existing, resetValues } = input;
  const keyPrefix = input.keyPrefix ?? '';
  const resetAndFlag = input.resetAndFlag ?? false;

  const working = new Map(existing.children);
  const old = new Map<string, CatalogNode>();
  const reset = new Map<string, ResetFlags | true>();
  const result: MergeCounters & Pick<MergeResult, 'pulledKeys' | 'removedKeys' | 'resetKeys'> = {
    mergeCount: 0,
    pullCount: 0,
    oldCount: 0,
    resetCount: 0,
    pulledKeys: [],
    removedKeys: [],
    resetKeys: [],
  };

  for (const [key, value] of source?.children ?? []) {
    const target = working.get(key);
    const fullKey = `${keyPrefix}${key}`;

    if (isBranch(target) && isBranch(value)) {
      const resetChild = resetValues?.children.get(key);
      const nested = merge(
        {
          source: value,
          existing: target,
          resetValues: isBranch(resetChild) ? resetChild : undefined,
          keyPrefix: `${fullKey}${options.keySeparator}`,
          resetAndFlag,
        },
        options
      );
      working.set(key, nested.new);
      result.mergeCount += nested.mergeCount;
      result.pullCount += nested.pullCount;
      result.oldCount += nested.oldCount;
      result.resetCount += nested.resetCount;
      result.pulledKeys.push(...nested.pulledKeys);
      result.removedKeys.push(...nested.removedKeys);
      result.resetKeys.push(...nested.resetKeys);
      if (!isCatalogEmpty(nested.old)) {
        old.set(key, nested.old);
      }
      if (nested.reset.size) {
        reset.set(key, nested.reset);
      }
      continue;
    }

    if (target && isBranch(target) !== isBranch(value)) {
      old.set(key, value);
      result.oldCount += 1;
      result.removedKeys.push(fullKey);
      continue;
    }

    if (target) {
      const forceReset =
        (resetAndFlag && !isPluralKey(key, options.pluralSeparator) && !nodesEqual(value, target)) ||
        (resetValues?.children.has(key) ?? false);
      if (forceReset) {
        old.set(key, value);
        reset.set(key, true);
        result.oldCount += 1;
        result.resetCount += 1;
        result.resetKeys.push(fullKey);
        continue;
      }

      if (!isEmptyLeaf(value) || isEmptyLeaf(target)) {
        working.set(key, value);
      }
      result.mergeCount += 1;
      continue;
    }

    const singular = singularForm(key, options.pluralSeparator);
    const pluralMatch = singular !== key;
    const rawKey = contextBase(singular, options.contextSeparator);
    const contextMatch = rawKey !== undefined && working.has(rawKey);

    if (contextMatch || (pluralMatch && hasPluralSibling(singular, working, options.pluralSeparator))) {
      working.set(key, value);
      result.pullCount += 1;
      result.pulledKeys.push(fullKey);
      continue;
    }

    if (options.keepRemoved) {
      working.set(key, value);
    } else {
      old.set(key, value);
    }
    result.oldCount += 1;
    result.removedKeys.push(fullKey);
  }

  return {
    ...result,
    new: branch(working),
    old: branch(old),
    reset,
  };
}

/**
 * Copies every key of `from` that `into` lacks, recursing where both hold a
 * branch. Values already in `into` win.
 */
export function transferValues(from: Catalog, into: Catalog): Catalog {
  const children = new Map(into.children);
  for (const [key, value] of from.children) {
    const current = children.get(key);
    if (!current) {
      children.set(key, value);
    } else if (isBranch(current) && isBranch(value)) {
      children.set(key, transferValues(value, current));
    }
  }
  return branch(children);
}

export function resetFlagsToJson(flags: ResetFlags): JsonValue {
  const result: { [key: string]: JsonValue } = {};
  for (const [key, value] of flags) {
    Object.defineProperty(result, key, {
      value: value === true ? true : resetFlagsToJson(value),
      enumerable: true,
      writable: true,
      configurable: true,
    });
  }
  return result;
}
