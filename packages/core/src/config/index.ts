/**
 * Configuration module for parlance
 *
 * This module handles loading, parsing, and normalizing configuration files.
 */

export type {
  LineEnding,
  ExtractionConfig,
  ParlanceConfig,
  RawParlanceConfig,
  LoadConfigResult,
} from './types.js';

export {
  DEFAULT_INPUT,
  DEFAULT_EXCLUDE,
  DEFAULT_OUTPUT,
  DEFAULT_LOCALES,
  DEFAULT_NAMESPACE,
  DEFAULT_KEY_SEPARATOR,
  DEFAULT_PLURAL_SEPARATOR,
  DEFAULT_CONTEXT_SEPARATOR,
  DEFAULT_NAMESPACE_SEPARATOR,
  DEFAULT_FUNCTIONS,
  DEFAULT_TRANS_KEEP_BASIC_HTML_NODES,
  DEFAULT_EXTRACTION_CONCURRENCY,
  DEFAULT_INDENTATION,
  DEFAULT_CONFIG_FILENAME,
  CONFIG_FILENAMES,
  createDefaultConfig,
} from './defaults.js';

// Re-export normalizer utilities (for testing and advanced use)
export {
  isLineEnding,
  parseGlobList,
  ensureStringArray,
  ensureArray,
  ensureUniqueStrings,
  normalizePositiveInteger,
  normalizeLineEnding,
  normalizeExtractionConfig,
  normalizeConfig,
} from './normalizer.js';

export { validateConfig, assertConfigValid, type ConfigValidationIssue } from './validator.js';

export { loadConfig, loadConfigWithMeta, parseConfigText } from './loader.js';
