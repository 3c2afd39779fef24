/**
 * Exit Code Reference for the parlance CLI
 *
 * This module centralizes all exit codes used by the CLI for consistent
 * behavior across commands and improved CI/CD integration.
 *
 * ## Usage in CI/CD
 *
 * ```bash
 * npx parlance extract --fail-on-update
 * case $? in
 *   0) echo "Catalogs up to date" ;;
 *   3) echo "Conflicting keys" ;;
 *   4) echo "Catalogs need an update" ;;
 * esac
 * ```
 */

export const EXIT_CODES = {
  /** Command completed successfully */
  SUCCESS: 0,
  /** General error (catch-all for exceptions) */
  ERROR: 1,
  /** Configuration file missing, unreadable or invalid */
  CONFIG: 2,
  /** Key conflict escalated by failOnWarnings */
  CONFLICT: 3,
  /** Catalogs would change while failOnUpdate is set */
  UPDATE: 4,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

/**
 * Human-readable descriptions for exit codes.
 */
export const EXIT_CODE_DESCRIPTIONS: Record<ExitCode, string> = {
  [EXIT_CODES.SUCCESS]: 'Success',
  [EXIT_CODES.ERROR]: 'General error',
  [EXIT_CODES.CONFIG]: 'Configuration error',
  [EXIT_CODES.CONFLICT]: 'Translation key conflict',
  [EXIT_CODES.UPDATE]: 'Catalogs would be updated',
};

function isExitCode(code: number): code is ExitCode {
  return Object.values(EXIT_CODES).some((value) => value === code);
}

/**
 * Get a human-readable description for an exit code.
 */
export function getExitCodeDescription(code: number): string {
  return isExitCode(code) ? EXIT_CODE_DESCRIPTIONS[code] : `Unknown exit code: ${code}`;
}
