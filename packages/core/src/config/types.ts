/**
 * Configuration type definitions for parlance
 */

// ─────────────────────────────────────────────────────────────────────────────
// Core Types
// ─────────────────────────────────────────────────────────────────────────────

/** `auto` writes `\n`; the others convert every line break on write. */
export type LineEnding = 'auto' | 'crlf' | 'cr' | 'lf';

export interface ExtractionConfig {
  /** Maximum number of source files read at once. */
  concurrency: number;
}

// ─────────────────────────────────────────────────────────────────────────────
// Main Configuration
// ─────────────────────────────────────────────────────────────────────────────

export interface ParlanceConfig {
  locales: string[];
  /** Glob patterns of source files, relative to the project root. */
  input: string[];
  exclude: string[];
  /**
   * Catalog path template. `$LOCALE` and `$NAMESPACE` are substituted.
   * The `.yml`/`.yaml` extension switches the catalog format to YAML.
   */
  output: string;
  defaultNamespace: string;
  /** Value written for keys extracted without a default text. */
  defaultValue: string;
  keySeparator: string;
  pluralSeparator: string;
  contextSeparator: string;
  namespaceSeparator: string;
  /** Keep keys that are no longer referenced in the primary catalog. */
  keepRemoved: boolean;
  /** Write `<name>_old.<ext>` backups holding removed and reset values. */
  createOldCatalogs: boolean;
  /**
   * Locale whose on-disk values are moved to the backup when they differ
   * from the extracted default text.
   */
  resetDefaultValueLocale?: string;
  lineEnding: LineEnding;
  sort: boolean;
  indentation: number;
  failOnWarnings: boolean;
  failOnUpdate: boolean;
  generateTypes: boolean;
  /** Callee texts treated as translation functions, e.g. `t` or `i18n.t`. */
  functions: string[];
  transKeepBasicHtmlNodesFor: string[];
  extraction: ExtractionConfig;
  verbose: boolean;
}

/** Shape accepted from a config file before normalisation. */
export type RawParlanceConfig = { [K in keyof ParlanceConfig]?: unknown };

// ─────────────────────────────────────────────────────────────────────────────
// Load Result Types
// ─────────────────────────────────────────────────────────────────────────────

export interface LoadConfigResult {
  config: ParlanceConfig;
  configPath: string;
  projectRoot: string;
  /** False when no config file exists and defaults were used. */
  found: boolean;
}
