import { isPluralCategory, PLURAL_CATEGORIES } from './plurals.js';

/**
 * Strips a trailing `separator + category` from a plural key. Keys that are
 * only a category name (`one`, `_other`) are left alone.
 */
export function singularForm(key: string, pluralSeparator: string): string {
  const index = key.lastIndexOf(pluralSeparator);
  if (index <= 0) {
    return key;
  }
  const category = key.slice(index + pluralSeparator.length);
  return isPluralCategory(category) ? key.slice(0, index) : key;
}

export function isPluralKey(key: string, pluralSeparator: string): boolean {
  return singularForm(key, pluralSeparator) !== key;
}

/** Text before the last context separator, or undefined when there is none. */
export function contextBase(key: string, contextSeparator: string): string | undefined {
  if (!contextSeparator) {
    return undefined;
  }
  const index = key.lastIndexOf(contextSeparator);
  return index > 0 ? key.slice(0, index) : undefined;
}

/** Whether `keys` holds any plural variant of `singular`. */
export function hasPluralSibling(
  singular: string,
  keys: { has(key: string): boolean },
  pluralSeparator: string
): boolean {
  return PLURAL_CATEGORIES.some((category) => keys.has(`${singular}${pluralSeparator}${category}`));
}
