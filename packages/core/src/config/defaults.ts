/**
 * Default configuration values for parlance
 */

import type { ParlanceConfig } from './types.js';

// ─────────────────────────────────────────────────────────────────────────────
// File Pattern Defaults
// ─────────────────────────────────────────────────────────────────────────────

export const DEFAULT_INPUT = ['src/**/*.{ts,tsx,js,jsx}'];

export const DEFAULT_EXCLUDE = ['node_modules/**', 'dist/**'];

export const DEFAULT_OUTPUT = 'locales/$LOCALE/$NAMESPACE.json';

// ─────────────────────────────────────────────────────────────────────────────
// Key Defaults
// ─────────────────────────────────────────────────────────────────────────────

export const DEFAULT_LOCALES = ['en'];
export const DEFAULT_NAMESPACE = 'translation';
export const DEFAULT_KEY_SEPARATOR = '.';
export const DEFAULT_PLURAL_SEPARATOR = '_';
export const DEFAULT_CONTEXT_SEPARATOR = '_';
export const DEFAULT_NAMESPACE_SEPARATOR = ':';

// ─────────────────────────────────────────────────────────────────────────────
// Extraction Defaults
// ─────────────────────────────────────────────────────────────────────────────

export const DEFAULT_FUNCTIONS = ['t', 'i18next.t', 'i18n.t'];
export const DEFAULT_TRANS_KEEP_BASIC_HTML_NODES = ['br', 'strong', 'i', 'p'];
export const DEFAULT_EXTRACTION_CONCURRENCY = 8;

// ─────────────────────────────────────────────────────────────────────────────
// Other Defaults
// ─────────────────────────────────────────────────────────────────────────────

export const DEFAULT_INDENTATION = 2;
export const DEFAULT_CONFIG_FILENAME = 'parlance.config.json';
export const CONFIG_FILENAMES = [DEFAULT_CONFIG_FILENAME, 'parlance.config.yaml', 'parlance.config.yml'];

export function createDefaultConfig(): ParlanceConfig {
  return {
    locales: [...DEFAULT_LOCALES],
    input: [...DEFAULT_INPUT],
    exclude: [...DEFAULT_EXCLUDE],
    output: DEFAULT_OUTPUT,
    defaultNamespace: DEFAULT_NAMESPACE,
    defaultValue: '',
    keySeparator: DEFAULT_KEY_SEPARATOR,
    pluralSeparator: DEFAULT_PLURAL_SEPARATOR,
    contextSeparator: DEFAULT_CONTEXT_SEPARATOR,
    namespaceSeparator: DEFAULT_NAMESPACE_SEPARATOR,
    keepRemoved: false,
    createOldCatalogs: false,
    lineEnding: 'auto',
    sort: true,
    indentation: DEFAULT_INDENTATION,
    failOnWarnings: false,
    failOnUpdate: false,
    generateTypes: false,
    functions: [...DEFAULT_FUNCTIONS],
    transKeepBasicHtmlNodesFor: [...DEFAULT_TRANS_KEEP_BASIC_HTML_NODES],
    extraction: { concurrency: DEFAULT_EXTRACTION_CONCURRENCY },
    verbose: false,
  };
}
