/**
 * Translation catalog tree.
 *
 * Catalogs are immutable trees keyed by `Map` so that keys such as `__proto__`
 * or `constructor` coming from user files are plain data. Arrays found on disk
 * (i18next `returnObjects` values) are carried as opaque lists.
 */

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

export interface CatalogLeaf {
  readonly kind: 'leaf';
  readonly value: string;
}

export interface CatalogList {
  readonly kind: 'list';
  readonly items: readonly JsonValue[];
}

export interface CatalogBranch {
  readonly kind: 'branch';
  readonly children: ReadonlyMap<string, CatalogNode>;
}

export type CatalogNode = CatalogLeaf | CatalogList | CatalogBranch;

/** A catalog root is always a branch. */
export type Catalog = CatalogBranch;

export function leaf(value: string): CatalogLeaf {
  return { kind: 'leaf', value };
}

export function branch(entries: Iterable<readonly [string, CatalogNode]> = []): CatalogBranch {
  return { kind: 'branch', children: new Map(entries) };
}

export function emptyCatalog(): Catalog {
  return branch();
}

export function isBranch(node: CatalogNode | undefined): node is CatalogBranch {
  return node?.kind === 'branch';
}

export function isCatalogEmpty(catalog: Catalog): boolean {
  return catalog.children.size === 0;
}

/**
 * Returns a copy of `catalog` with `key` set to `node`. Insertion order of an
 * existing key is kept.
 */
export function withChild(catalog: CatalogBranch, key: string, node: CatalogNode): CatalogBranch {
  const children = new Map(catalog.children);
  children.set(key, node);
  return { kind: 'branch', children };
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toJsonValue(value: unknown): JsonValue {
  if (value === null || typeof value === 'string' || typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'number') {
    return value;
  }
  if (Array.isArray(value)) {
    return value.map(toJsonValue);
  }
  if (isPlainObject(value)) {
    const result: { [key: string]: JsonValue } = {};
    for (const [key, nested] of Object.entries(value)) {
      Object.defineProperty(result, key, {
        value: toJsonValue(nested),
        enumerable: true,
        writable: true,
        configurable: true,
      });
    }
    return result;
  }
  return String(value);
}

/**
 * Decodes parsed JSON or YAML into a catalog node. Numbers and booleans become
 * string leaves, `null` becomes the empty string.
 */
export function fromJson(value: unknown): CatalogNode {
  if (isPlainObject(value)) {
    return branch(Object.entries(value).map(([key, nested]) => [key, fromJson(nested)] as const));
  }
  if (Array.isArray(value)) {
    return { kind: 'list', items: value.map(toJsonValue) };
  }
  if (value === null || value === undefined) {
    return leaf('');
  }
  if (value instanceof Date) {
    return leaf(value.toISOString());
  }
  return leaf(String(value));
}

/** Decodes a parsed file; anything but an object decodes as an empty catalog. */
export function catalogFromJson(value: unknown): Catalog {
  const node = fromJson(value);
  return isBranch(node) ? node : emptyCatalog();
}

export function toJson(node: CatalogNode): JsonValue {
  switch (node.kind) {
    case 'leaf':
      return node.value;
    case 'list':
      return [...node.items];
    case 'branch': {
      const result: { [key: string]: JsonValue } = {};
      for (const [key, child] of node.children) {
        Object.defineProperty(result, key, {
          value: toJson(child),
          enumerable: true,
          writable: true,
          configurable: true,
        });
      }
      return result;
    }
  }
}

function jsonEqual(left: JsonValue, right: JsonValue): boolean {
  return JSON.stringify(left) === JSON.stringify(right);
}

/** Structural equality; key order is irrelevant. */
export function nodesEqual(left: CatalogNode, right: CatalogNode): boolean {
  switch (left.kind) {
    case 'leaf':
      return right.kind === 'leaf' && left.value === right.value;
    case 'list':
      return (
        right.kind === 'list' &&
        left.items.length === right.items.length &&
        left.items.every((item, index) => jsonEqual(item, right.items[index]))
      );
    case 'branch': {
      if (right.kind !== 'branch' || left.children.size !== right.children.size) {
        return false;
      }
      for (const [key, child] of left.children) {
        const other = right.children.get(key);
        if (!other || !nodesEqual(child, other)) {
          return false;
        }
      }
      return true;
    }
  }
}

export function catalogsEqual(left: Catalog, right: Catalog): boolean {
  return nodesEqual(left, right);
}

/** Recursively orders branch keys alphabetically. */
export function sortCatalog(catalog: Catalog): Catalog {
  const entries = Array.from(catalog.children.entries()).sort(([a], [b]) => a.localeCompare(b));
  return branch(entries.map(([key, child]) => [key, isBranch(child) ? sortCatalog(child) : child] as const));
}

/** Counts leaves and lists. */
export function countLeaves(node: CatalogNode): number {
  if (!isBranch(node)) {
    return 1;
  }
  let total = 0;
  for (const child of node.children.values()) {
    total += countLeaves(child);
  }
  return total;
}
