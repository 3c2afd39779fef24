/**
 * Configuration normalization utilities
 *
 * These functions take raw/unknown input and return properly typed values,
 * applying defaults where necessary.
 */

import type { ExtractionConfig, LineEnding, ParlanceConfig, RawParlanceConfig } from './types.js';
import {
  DEFAULT_CONTEXT_SEPARATOR,
  DEFAULT_EXCLUDE,
  DEFAULT_EXTRACTION_CONCURRENCY,
  DEFAULT_FUNCTIONS,
  DEFAULT_INDENTATION,
  DEFAULT_INPUT,
  DEFAULT_KEY_SEPARATOR,
  DEFAULT_LOCALES,
  DEFAULT_NAMESPACE,
  DEFAULT_NAMESPACE_SEPARATOR,
  DEFAULT_OUTPUT,
  DEFAULT_PLURAL_SEPARATOR,
  DEFAULT_TRANS_KEEP_BASIC_HTML_NODES,
} from './defaults.js';

// ─────────────────────────────────────────────────────────────────────────────
// Type Guards
// ─────────────────────────────────────────────────────────────────────────────

export const isLineEnding = (value: unknown): value is LineEnding =>
  value === 'auto' || value === 'crlf' || value === 'cr' || value === 'lf';

export const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

// ─────────────────────────────────────────────────────────────────────────────
// Array Utilities
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Parse a comma-separated list of glob patterns, respecting brace expansions.
 * Brace-expanded globs like `src/**\/*.{ts,tsx}` are kept as a single token.
 */
export function parseGlobList(value: string): string[] {
  const result: string[] = [];
  let current = '';
  let braceDepth = 0;

  for (const char of value) {
    if (char === '{') {
      braceDepth++;
      current += char;
    } else if (char === '}') {
      braceDepth = Math.max(0, braceDepth - 1);
      current += char;
    } else if (char === ',' && braceDepth === 0) {
      const trimmed = current.trim();
      if (trimmed) result.push(trimmed);
      current = '';
    } else {
      current += char;
    }
  }

  const trimmed = current.trim();
  if (trimmed) result.push(trimmed);
  return result;
}

export function ensureStringArray(value: unknown): string[] {
  if (Array.isArray(value)) {
    return value
      .filter((item): item is string => typeof item === 'string' && item.trim().length > 0)
      .map((item) => item.trim());
  }

  if (typeof value === 'string') {
    return parseGlobList(value);
  }

  return [];
}

export function ensureArray(value: unknown, fallback: readonly string[]): string[] {
  const normalized = ensureStringArray(value);
  return normalized.length ? normalized : [...fallback];
}

export function ensureUniqueStrings(value: unknown, fallback: readonly string[]): string[] {
  return Array.from(new Set(ensureArray(value, fallback)));
}

// ─────────────────────────────────────────────────────────────────────────────
// Primitive Normalizers
// ─────────────────────────────────────────────────────────────────────────────

export function normalizePositiveInteger(value: unknown): number | undefined {
  if (typeof value !== 'number' || !Number.isFinite(value) || value <= 0) {
    return undefined;
  }
  return Math.floor(value);
}

export function normalizeBoolean(value: unknown, fallback: boolean): boolean {
  if (typeof value === 'boolean') {
    return value;
  }
  if (value === 'true') return true;
  if (value === 'false') return false;
  return fallback;
}

export function normalizeString(value: unknown, fallback: string): string {
  if (typeof value === 'string' && value.trim().length > 0) {
    return value.trim();
  }
  return fallback;
}

/** Separators keep surrounding whitespace; only the empty string falls back. */
export function normalizeSeparator(value: unknown, fallback: string): string {
  return typeof value === 'string' && value.length > 0 ? value : fallback;
}

export function normalizeLineEnding(value: unknown): LineEnding {
  if (typeof value !== 'string') {
    return 'auto';
  }
  const normalized = value.trim().toLowerCase();
  return isLineEnding(normalized) ? normalized : 'auto';
}

export function normalizeExtractionConfig(input: unknown): ExtractionConfig {
  const raw = isRecord(input) ? input : {};
  return {
    concurrency: normalizePositiveInteger(raw.concurrency) ?? DEFAULT_EXTRACTION_CONCURRENCY,
  };
}

// ─────────────────────────────────────────────────────────────────────────────
// Main Config Normalizer
// ─────────────────────────────────────────────────────────────────────────────

export function normalizeConfig(parsed: RawParlanceConfig): ParlanceConfig {
  const normalized: ParlanceConfig = {
    locales: ensureUniqueStrings(parsed.locales, DEFAULT_LOCALES),
    input: ensureArray(parsed.input, DEFAULT_INPUT),
    exclude: ensureArray(parsed.exclude, DEFAULT_EXCLUDE),
    output: normalizeString(parsed.output, DEFAULT_OUTPUT),
    defaultNamespace: normalizeString(parsed.defaultNamespace, DEFAULT_NAMESPACE),
    defaultValue: typeof parsed.defaultValue === 'string' ? parsed.defaultValue : '',
    keySeparator: normalizeSeparator(parsed.keySeparator, DEFAULT_KEY_SEPARATOR),
    pluralSeparator: normalizeSeparator(parsed.pluralSeparator, DEFAULT_PLURAL_SEPARATOR),
    contextSeparator: normalizeSeparator(parsed.contextSeparator, DEFAULT_CONTEXT_SEPARATOR),
    namespaceSeparator: normalizeSeparator(parsed.namespaceSeparator, DEFAULT_NAMESPACE_SEPARATOR),
    keepRemoved: normalizeBoolean(parsed.keepRemoved, false),
    createOldCatalogs: normalizeBoolean(parsed.createOldCatalogs, false),
    lineEnding: normalizeLineEnding(parsed.lineEnding),
    sort: normalizeBoolean(parsed.sort, true),
    indentation: normalizePositiveInteger(parsed.indentation) ?? DEFAULT_INDENTATION,
    failOnWarnings: normalizeBoolean(parsed.failOnWarnings, false),
    failOnUpdate: normalizeBoolean(parsed.failOnUpdate, false),
    generateTypes: normalizeBoolean(parsed.generateTypes, false),
    functions: ensureUniqueStrings(parsed.functions, DEFAULT_FUNCTIONS),
    transKeepBasicHtmlNodesFor: ensureUniqueStrings(
      parsed.transKeepBasicHtmlNodesFor,
      DEFAULT_TRANS_KEEP_BASIC_HTML_NODES
    ),
    extraction: normalizeExtractionConfig(parsed.extraction),
    verbose: normalizeBoolean(parsed.verbose, false),
  };

  if (typeof parsed.resetDefaultValueLocale === 'string' && parsed.resetDefaultValueLocale.trim().length > 0) {
    normalized.resetDefaultValueLocale = parsed.resetDefaultValueLocale.trim();
  }

  return normalized;
}
