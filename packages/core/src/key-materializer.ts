import { branch, leaf, withChild, type Catalog, type CatalogBranch } from './catalog.js';
import type { ParlanceConfig } from './config/types.js';
import type { Entry } from './entry.js';

/** A path segment that has to be a branch already holds a value. */
export interface KeyConflict {
  readonly kind: 'key';
  readonly segment: string;
}

/** Two different non-empty values were claimed for the same leaf. */
export interface ValueConflict {
  readonly kind: 'value';
  readonly oldValue: string;
  readonly newValue: string;
}

export type Conflict = KeyConflict | ValueConflict;

export type KeyPathOptions = Pick<ParlanceConfig, 'keySeparator' | 'defaultNamespace' | 'defaultValue'>;

export interface MaterializeResult {
  target: Catalog;
  /** Full dotted path written, namespace included. */
  path?: string;
  priorValue?: string;
  conflict?: Conflict;
}

const ESCAPES: Record<string, string> = { n: '\n', r: '\r', t: '\t', '\\': '\\' };

export function unescapeKeyPath(value: string): string {
  return value.replace(/\\([nrt\\])/g, (match, char: string) => ESCAPES[char] ?? match);
}

/**
 * Builds the full path of an entry: namespace, key and plural suffix joined,
 * with one trailing separator removed.
 */
export function buildKeyPath(entry: Entry, suffix: string | undefined, options: KeyPathOptions): string {
  const separator = options.keySeparator;
  let keyPath = unescapeKeyPath(`${entry.namespace ?? options.defaultNamespace}${separator}${entry.key}`);
  if (suffix) {
    keyPath += suffix;
  }
  if (keyPath.endsWith(separator)) {
    keyPath = keyPath.slice(0, keyPath.length - separator.length);
  }
  return keyPath;
}

interface ResolvedValue {
  value: string;
  conflict?: ValueConflict;
}

function resolveValue(prior: string | undefined, claimed: string): ResolvedValue {
  if (prior === undefined || prior === claimed || prior === '') {
    return { value: claimed };
  }
  if (claimed === '') {
    return { value: prior };
  }
  return { value: claimed, conflict: { kind: 'value', oldValue: prior, newValue: claimed } };
}

/**
 * Writes one entry into `target` and returns the updated tree. The input tree
 * is never mutated.
 *
 * A value already stored where a branch is needed (or a branch where the leaf
 * goes) is replaced and reported as a key conflict. A non-empty prior value is
 * never replaced by an empty one.
 */
export function materialize(
  entry: Entry,
  target: Catalog,
  suffix: string | undefined,
  options: KeyPathOptions
): MaterializeResult {
  if (!entry.key) {
    return { target };
  }

  const keyPath = buildKeyPath(entry, suffix, options);
  const segments = keyPath.split(options.keySeparator);
  const last = segments[segments.length - 1] ?? '';
  const parents = segments.slice(0, -1).filter((segment) => segment.length > 0);
  const claimed = (entry.value ?? options.defaultValue).trim();

  const found: { conflict?: Conflict; priorValue?: string } = {};

  const assign = (node: CatalogBranch, depth: number): CatalogBranch => {
    if (depth === parents.length) {
      const current = node.children.get(last);
      if (current?.kind === 'leaf') {
        found.priorValue = current.value;
      } else if (current) {
        found.conflict = { kind: 'key', segment: last };
      }
      const resolved = resolveValue(found.priorValue, claimed);
      if (resolved.conflict) {
        found.conflict = resolved.conflict;
      }
      return withChild(node, last, leaf(resolved.value));
    }

    const segment = parents[depth];
    const current = node.children.get(segment);
    let child: CatalogBranch;
    if (current?.kind === 'branch') {
      child = current;
    } else {
      if (current) {
        found.conflict = { kind: 'key', segment };
      }
      child = branch();
    }
    return withChild(node, segment, assign(child, depth + 1));
  };

  return { target: assign(target, 0), path: keyPath, ...found };
}
