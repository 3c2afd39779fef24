import { UnknownLocaleError } from './errors.js';

/** CLDR plural categories in their canonical order. */
export const PLURAL_CATEGORIES = ['zero', 'one', 'two', 'few', 'many', 'other'] as const;

export type PluralCategory = (typeof PLURAL_CATEGORIES)[number];

export type SuffixProvider = (locale: string) => readonly string[];

export function isPluralCategory(value: string): value is PluralCategory {
  return PLURAL_CATEGORIES.some((category) => category === value);
}

export function normalizeLocaleCode(locale: string): string {
  return locale.trim().replace(/_/g, '-');
}

const cache = new Map<string, readonly PluralCategory[]>();

/**
 * Cardinal plural categories used by `locale`, e.g. `['one', 'other']` for
 * English. Throws `UnknownLocaleError` when no plural rules exist for it.
 */
export function suffixesFor(locale: string): readonly PluralCategory[] {
  const code = normalizeLocaleCode(locale);
  const cached = cache.get(code);
  if (cached) {
    return cached;
  }

  let supported: string[];
  try {
    supported = Intl.PluralRules.supportedLocalesOf(code);
  } catch {
    throw new UnknownLocaleError(locale);
  }
  if (!supported.length) {
    throw new UnknownLocaleError(locale);
  }

  const available = new Set<string>(new Intl.PluralRules(code, { type: 'cardinal' }).resolvedOptions().pluralCategories);
  const categories = PLURAL_CATEGORIES.filter((category) => available.has(category));
  cache.set(code, categories);
  return categories;
}
