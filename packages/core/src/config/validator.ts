import type { ParlanceConfig } from './types.js';
import { ConfigError } from '../errors.js';

export interface ConfigValidationIssue {
  field: string;
  message: string;
}
function containsControlCharacters(value: string): boolean {
  for (let index = 0; index < value.length; index += 1) {
    const code = value.charCodeAt(index);
    if (code < 0x20 || code === 0x7f) {
      return true;
    }
  }
  return false;
}
const SHELL_META_PATTERN = /[;"'`|&<>$]/;
const LANGUAGE_TAG_PATTERN = /^[A-Za-z0-9]+(?:[-_][A-Za-z0-9]+)*$/;
const CALLEE_PATTERN = /^[A-Za-z_$][A-Za-z0-9_$]*(?:\.[A-Za-z_$][A-Za-z0-9_$]*)*$/;
const NAMESPACE_PATTERN = /^[A-Za-z0-9._-]+$/;
const TAG_NAME_PATTERN = /^[A-Za-z][A-Za-z0-9]*$/;
const OUTPUT_PLACEHOLDERS = /\$(LOCALE|NAMESPACE)/g;
const MAX_PATH_LIKE_LENGTH = 320;
const MAX_GLOB_LENGTH = 512;
const MAX_INDENTATION = 8;
export function hasUnsafeConfigValue(value: string): boolean {
  return containsControlCharacters(value) || SHELL_META_PATTERN.test(value);
}

export function isSafeLanguageTag(value: string): boolean {
  return LANGUAGE_TAG_PATTERN.test(value);
}

export function isSafeNamespace(value: string): boolean {
  return NAMESPACE_PATTERN.test(value);
}

function validatePathLike(field: string, value: string, issues: ConfigValidationIssue[]) {
  if (!value.trim()) {
    issues.push({ field, message: 'must not be empty' });
    return;
  }
  if (value.length > MAX_PATH_LIKE_LENGTH) {
    issues.push({ field, message: `must be shorter than ${MAX_PATH_LIKE_LENGTH} characters` });
    return;
  }
  if (hasUnsafeConfigValue(value.replace(OUTPUT_PLACEHOLDERS, ''))) {
    issues.push({ field, message: 'contains control characters or shell metacharacters' });
  }
}

function validateLanguage(field: string, value: string, issues: ConfigValidationIssue[]) {
  if (!value.trim()) {
    issues.push({ field, message: 'must not be empty' });
    return;
  }
  if (!isSafeLanguageTag(value)) {
    issues.push({ field, message: 'must be an alphanumeric language tag (letters, numbers, "-", "_")' });
  }
}

function validateNamespace(field: string, value: string, issues: ConfigValidationIssue[]) {
  if (!value.trim()) {
    issues.push({ field, message: 'must not be empty' });
    return;
  }
  if (!isSafeNamespace(value)) {
    issues.push({ field, message: 'may only contain letters, numbers, dot, dash, or underscore' });
  }
}

function validateStringList(field: string, values: string[], issues: ConfigValidationIssue[]) {
  values.forEach((entry, index) => {
    const targetField = `${field}[${index}]`;
    if (!entry.trim()) {
      issues.push({ field: targetField, message: 'must not be empty' });
      return;
    }
    if (entry.length > MAX_GLOB_LENGTH) {
      issues.push({ field: targetField, message: `must be shorter than ${MAX_GLOB_LENGTH} characters` });
      return;
    }
    if (hasUnsafeConfigValue(entry)) {
      issues.push({ field: targetField, message: 'contains control characters or shell metacharacters' });
    }
  });
}

function validatePatternList(
  field: string,
  values: string[],
  pattern: RegExp,
  message: string,
  issues: ConfigValidationIssue[]
) {
  values.forEach((entry, index) => {
    if (!pattern.test(entry)) {
      issues.push({ field: `${field}[${index}]`, message });
    }
  });
}

export function validateConfig(config: ParlanceConfig): ConfigValidationIssue[] {
  const issues: ConfigValidationIssue[] = [];

  if (!config.locales.length) {
    issues.push({ field: 'locales', message: 'must list at least one locale' });
  }
  config.locales.forEach((locale, index) => {
    validateLanguage(`locales[${index}]`, locale, issues);
  });

  validatePathLike('output', config.output, issues);
  if (config.locales.length > 1 && !config.output.includes('$LOCALE')) {
    issues.push({ field: 'output', message: 'must contain $LOCALE when more than one locale is configured' });
  }

  validateNamespace('defaultNamespace', config.defaultNamespace, issues);

  for (const field of ['keySeparator', 'pluralSeparator', 'contextSeparator', 'namespaceSeparator'] as const) {
    if (!config[field].length) {
      issues.push({ field, message: 'must not be empty' });
    }
  }
  if (config.keySeparator === config.namespaceSeparator) {
    issues.push({ field: 'namespaceSeparator', message: 'must differ from keySeparator' });
  }

  if (config.resetDefaultValueLocale !== undefined && !config.locales.includes(config.resetDefaultValueLocale)) {
    issues.push({ field: 'resetDefaultValueLocale', message: 'must be one of the configured locales' });
  }

  if (config.indentation > MAX_INDENTATION) {
    issues.push({ field: 'indentation', message: `must be at most ${MAX_INDENTATION}` });
  }

  validateStringList('input', config.input, issues);
  validateStringList('exclude', config.exclude, issues);
  validatePatternList('functions', config.functions, CALLEE_PATTERN, 'must be an identifier or a dotted member path', issues);
  validatePatternList(
    'transKeepBasicHtmlNodesFor',
    config.transKeepBasicHtmlNodesFor,
    TAG_NAME_PATTERN,
    'must be a plain HTML tag name',
    issues
  );

  return issues;
}

export function assertConfigValid(config: ParlanceConfig): void {
  const issues = validateConfig(config);
  if (!issues.length) {
    return;
  }

  const details = issues.map((issue) => `• ${issue.field}: ${issue.message}`).join('\n');
  throw new ConfigError(`Invalid parlance configuration:\n${details}`, issues);
}
