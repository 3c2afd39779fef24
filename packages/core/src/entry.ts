/**
 * One translation call site found in source code.
 *
 * Many entries may share the same namespace and key; the catalog builder folds
 * them together.
 */
export interface Entry {
  readonly key: string;
  /** Falls back to the configured default namespace when absent. */
  readonly namespace?: string;
  /** Default text found at the call site. */
  readonly value?: string;
  /** A `count` option was passed, so the key expands per plural category. */
  readonly hasCount: boolean;
  readonly options?: ReadonlyMap<string, string | undefined>;
  readonly filePath?: string;
  readonly line?: number;
  readonly column?: number;
}

export function createEntry(key: string, init: Omit<Entry, 'key' | 'hasCount'> & { hasCount?: boolean } = {}): Entry {
  return { ...init, key, hasCount: init.hasCount ?? false };
}
