import type { ConfigValidationIssue } from './config/validator.js';
import type { KeyConflict } from './key-materializer.js';

export class ConfigError extends Error {
  constructor(message: string, public readonly issues: readonly ConfigValidationIssue[] = []) {
    super(message);
    this.name = 'ConfigError';
  }
}

/** Raised when a key conflict is escalated by `failOnWarnings`. */
export class ReconcileError extends Error {
  constructor(
    message: string,
    public readonly conflict?: KeyConflict & { namespace: string; key: string }
  ) {
    super(message);
    this.name = 'ReconcileError';
  }
}

export class UnknownLocaleError extends Error {
  constructor(public readonly locale: string) {
    super(`No plural rules available for locale "${locale}"`);
    this.name = 'UnknownLocaleError';
  }
}

export class CatalogParseError extends Error {
  constructor(public readonly filePath: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Unable to parse catalog ${filePath}: ${detail}`);
    this.name = 'CatalogParseError';
  }
}
