/**
 * CLI presentation layer for diff utilities.
 * Core diff building logic is in packages/core/src/diff-utils.ts.
 */

import chalk from 'chalk';
import type { CatalogDiffEntry } from '@parlance/core';

function colorizeDiffLine(line: string): string {
  if (line.startsWith('+++') || line.startsWith('---')) {
    return chalk.bold(line);
  }
  if (line.startsWith('+')) {
    return chalk.green(line);
  }
  if (line.startsWith('-')) {
    return chalk.red(line);
  }
  if (line.startsWith('@@')) {
    return chalk.cyan(line);
  }
  return line;
}

export function printCatalogDiffs(diffs: CatalogDiffEntry[]) {
  if (!diffs.length) {
    console.log(chalk.gray('No catalog diffs to display.'));
    return;
  }

  console.log(chalk.blue('\nUnified catalog diffs:'));
  diffs.forEach((entry) => {
    console.log(chalk.yellow(`\n--- ${entry.locale}/${entry.namespace} (${entry.path})`));
    entry.diff
      .trimEnd()
      .split('\n')
      .forEach((line) => console.log(colorizeDiffLine(line)));
  });
}
