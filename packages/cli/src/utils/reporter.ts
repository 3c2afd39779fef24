/**
 * Console presentation for the extract command. The `format*` helpers return
 * plain lines; the `print*` helpers add colour and write them out.
 */

import path from 'path';
import chalk from 'chalk';
import {
  describeConflict,
  diffValueSegments,
  type ConflictRecord,
  type DynamicKeyWarning,
  type NamespaceReconciliation,
  type ParlanceConfig,
} from '@parlance/core';

export interface NamespaceCountSummary {
  unique: number;
  plurals: number;
  merged: number;
  added: number;
  restored: number;
  removed: number;
  reset: number;
}

export function summarizeCounts(result: NamespaceReconciliation): NamespaceCountSummary {
  const unique = result.counts.uniqueCount;
  return {
    unique,
    plurals: result.counts.uniquePluralsCount,
    merged: result.merged.mergeCount,
    added: Math.max(0, unique - result.merged.mergeCount),
    restored: result.restored.mergeCount,
    removed: result.merged.oldCount,
    reset: result.merged.resetCount,
  };
}

export function formatCounts(
  result: NamespaceReconciliation,
  config: Pick<ParlanceConfig, 'keepRemoved' | 'resetDefaultValueLocale'>
): string[] {
  const counts = summarizeCounts(result);
  const lines = [
    `[${result.locale}] ${result.namespace}`,
    `Unique keys: ${counts.unique} (${counts.plurals} are plurals)`,
    `Added keys: ${counts.added}`,
    `Restored keys: ${counts.restored}`,
    config.keepRemoved ? `Unreferenced keys: ${counts.removed}` : `Removed keys: ${counts.removed}`,
  ];
  if (config.resetDefaultValueLocale !== undefined) {
    lines.push(`Reset keys: ${counts.reset}`);
  }
  return lines;
}

export interface NamespaceKeyLists {
  pulled: string[];
  removed: string[];
  reset: string[];
}

/** Full key paths behind the pulled, removed and reset counters. */
export function listChangedKeys(result: NamespaceReconciliation): NamespaceKeyLists {
  return {
    pulled: result.merged.pulledKeys,
    removed: result.merged.removedKeys,
    reset: result.merged.resetKeys,
  };
}

export function formatKeyLists(
  result: NamespaceReconciliation,
  config: Pick<ParlanceConfig, 'keepRemoved'>
): string[] {
  const keys = listChangedKeys(result);
  const lines: string[] = [];
  if (keys.pulled.length) {
    lines.push(`Pulled: ${keys.pulled.join(', ')}`);
  }
  if (keys.removed.length) {
    lines.push(`${config.keepRemoved ? 'Unreferenced' : 'Removed'}: ${keys.removed.join(', ')}`);
  }
  if (keys.reset.length) {
    lines.push(`Reset: ${keys.reset.join(', ')}`);
  }
  return lines;
}

export function formatConfigBanner(
  config: ParlanceConfig,
  projectRoot: string,
  options: { verbose?: boolean } = {}
): string[] {
  const lines = [
    `Dir:     ${projectRoot}`,
    `Input:   ${config.input.join(', ')}`,
    `Output:  ${config.output}`,
  ];
  if (options.verbose) {
    lines.push(
      `Default value:       ${config.defaultValue}`,
      `Default namespace:   ${config.defaultNamespace}`,
      `Context separator:   ${config.contextSeparator}`,
      `Namespace separator: ${config.namespaceSeparator}`,
      `Key separator:       ${config.keySeparator}`,
      `Plural separator:    ${config.pluralSeparator}`,
      `Locales:             ${config.locales.join(', ')}`
    );
  }
  return lines;
}

function formatLocation(filePath: string | undefined, line: number | undefined, column: number | undefined): string {
  if (!filePath) {
    return '';
  }
  return line === undefined ? filePath : `${filePath}:${line}:${column ?? 1}`;
}

export function formatConflict(record: ConflictRecord, namespaceSeparator: string): string {
  const location = formatLocation(record.entry.filePath, record.entry.line, record.entry.column);
  const message = describeConflict(record, namespaceSeparator);
  return location ? `${message} (${location})` : message;
}

export function formatDynamicKeyWarning(warning: DynamicKeyWarning): string {
  const location = formatLocation(warning.filePath, warning.position.line, warning.position.column);
  return `Skipping dynamic key ${warning.expression} (${warning.reason}) at ${location}`;
}

/** Old value with removals in red, then the new value with additions in green. */
export function renderValueDiff(oldValue: string, newValue: string): string {
  const segments = diffValueSegments(oldValue, newValue);
  const before = segments
    .filter((segment) => segment.kind !== 'added')
    .map((segment) => (segment.kind === 'removed' ? chalk.red.bold(segment.text) : segment.text))
    .join('');
  const after = segments
    .filter((segment) => segment.kind !== 'removed')
    .map((segment) => (segment.kind === 'added' ? chalk.green.bold(segment.text) : segment.text))
    .join('');
  return `${before} -> ${after}`;
}

// ─────────────────────────────────────────────────────────────────────────────
// Printing
// ─────────────────────────────────────────────────────────────────────────────

export function printConfigBanner(config: ParlanceConfig, projectRoot: string, verbose: boolean) {
  console.log(chalk.cyan('parlance'));
  console.log(chalk.cyan('-------------------'));
  formatConfigBanner(config, projectRoot, { verbose }).forEach((line) => console.log(`  ${line}`));
  console.log('');
}

export function printCounts(
  results: NamespaceReconciliation[],
  config: Pick<ParlanceConfig, 'keepRemoved' | 'resetDefaultValueLocale'>
) {
  for (const result of results) {
    const [title, ...lines] = formatCounts(result, config);
    console.log(chalk.blue(title));
    lines.forEach((line) => console.log(`  ${line}`));
    formatKeyLists(result, config).forEach((line) => console.log(chalk.gray(`    ${line}`)));
  }
}

export function printConflicts(conflicts: ConflictRecord[], namespaceSeparator: string) {
  for (const record of conflicts) {
    console.warn(chalk.yellow(formatConflict(record, namespaceSeparator)));
    if (record.conflict.kind === 'value') {
      console.warn(`  ${renderValueDiff(record.conflict.oldValue, record.conflict.newValue)}`);
    }
  }
}

export function printWarnings(warnings: string[], dynamicKeyWarnings: DynamicKeyWarning[]) {
  warnings.forEach((warning) => console.warn(chalk.yellow(warning)));
  dynamicKeyWarnings.forEach((warning) => console.warn(chalk.yellow(formatDynamicKeyWarning(warning))));
}

export function printWritten(paths: string[], projectRoot: string, dryRun: boolean) {
  if (!paths.length) {
    console.log(chalk.gray('No catalogs to write.'));
    return;
  }
  const verb = dryRun ? 'Would write' : 'Wrote';
  console.log(chalk.green(`${verb} ${paths.length} catalog${paths.length === 1 ? '' : 's'}:`));
  paths.forEach((filePath) => console.log(`  • ${path.relative(projectRoot, filePath) || filePath}`));
}
