import path from 'path';
import chalk from 'chalk';
import type { Command } from 'commander';
import {
  buildCatalogDiffs,
  describeConflict,
  extractEntries,
  hasCatalogChanged,
  listNamespaceResults,
  loadConfigWithMeta,
  reconcile,
  resetFlagsToJson,
  shouldWriteBackup,
  supportsResourceTypes,
  writeReconciliation,
  writeResourceTypes,
  type CatalogDiffEntry,
  type ConflictRecord,
  type DynamicKeyWarning,
  type JsonValue,
  type NamespaceReconciliation,
  type ParlanceConfig,
} from '@parlance/core';
import { CliError, withErrorHandling } from '../utils/errors.js';
import { EXIT_CODES } from '../utils/exit-codes.js';
import { printCatalogDiffs } from '../utils/diff-utils.js';
import {
  printConfigBanner,
  printConflicts,
  printCounts,
  printWarnings,
  printWritten,
  listChangedKeys,
  summarizeCounts,
  type NamespaceCountSummary,
  type NamespaceKeyLists,
} from '../utils/reporter.js';

export interface ExtractCommandOptions {
  config?: string;
  dryRun?: boolean;
  diff?: boolean;
  json?: boolean;
  verbose?: boolean;
  failOnWarnings?: boolean;
  failOnUpdate?: boolean;
  generateTypes?: boolean;
  keepRemoved?: boolean;
  createOldCatalogs?: boolean;
}

export interface CatalogSummary {
  locale: string;
  namespace: string;
  path: string;
  changed: boolean;
  counts: NamespaceCountSummary;
  keys: NamespaceKeyLists;
  /** Tree of `true` leaves marking the keys whose values were moved to the backup. */
  resetFlags: JsonValue;
}

export interface ConflictSummary {
  kind: 'key' | 'value';
  namespace: string;
  key: string;
  message: string;
}

export interface ExtractSummary {
  projectRoot: string;
  configPath: string;
  configFound: boolean;
  dryRun: boolean;
  filesScanned: number;
  entries: number;
  catalogs: CatalogSummary[];
  conflicts: ConflictSummary[];
  warnings: string[];
  dynamicKeyWarnings: DynamicKeyWarning[];
  /** Files written, or that would be written on a dry run. */
  written: string[];
  diffs: CatalogDiffEntry[];
  typesPath?: string;
}

export interface ExtractOutcome {
  summary: ExtractSummary;
  /** Configuration after command-line overrides. */
  config: ParlanceConfig;
  namespaces: NamespaceReconciliation[];
  conflicts: ConflictRecord[];
}

function applyOverrides(config: ParlanceConfig, options: ExtractCommandOptions): ParlanceConfig {
  return {
    ...config,
    failOnWarnings: options.failOnWarnings || config.failOnWarnings,
    failOnUpdate: options.failOnUpdate || config.failOnUpdate,
    generateTypes: options.generateTypes || config.generateTypes,
    keepRemoved: options.keepRemoved || config.keepRemoved,
    createOldCatalogs: options.createOldCatalogs || config.createOldCatalogs,
    verbose: options.verbose || config.verbose,
  };
}

/**
 * Extracts keys, reconciles them with the catalogs on disk and writes the
 * result. Nothing is printed; the caller reports the returned summary.
 */
export async function runExtract(
  targetPath: string | undefined,
  options: ExtractCommandOptions,
  cwd = process.cwd()
): Promise<ExtractOutcome> {
  const searchRoot = targetPath ? path.resolve(cwd, targetPath) : cwd;
  const loaded = await loadConfigWithMeta(options.config, { cwd: searchRoot });
  const config = applyOverrides(loaded.config, options);
  const { projectRoot } = loaded;

  const extraction = await extractEntries(config, projectRoot);
  const result = await reconcile(extraction.entries, config, { projectRoot });
  const namespaces = listNamespaceResults(result);
  const changed = namespaces.filter(hasCatalogChanged);
  const conflicts = result.locales.flatMap((locale) => locale.conflicts);

  if (config.failOnUpdate && changed.length) {
    const files = changed.map((entry) => path.relative(projectRoot, entry.path) || entry.path).join(', ');
    throw new CliError(`Catalogs would be updated and failOnUpdate is enabled: ${files}`, EXIT_CODES.UPDATE);
  }

  const writeOptions = { lineEnding: config.lineEnding, sort: config.sort, indentation: config.indentation };
  let written: string[];
  if (options.dryRun) {
    written = namespaces.flatMap((entry) =>
      shouldWriteBackup(entry, config) ? [entry.path, entry.backupPath] : [entry.path]
    );
  } else {
    written = (await writeReconciliation(result, config, writeOptions)).map((entry) => entry.path);
  }

  const warnings = result.locales.flatMap((locale) => locale.warnings);
  let typesPath: string | undefined;
  if (config.generateTypes && !options.dryRun) {
    if (supportsResourceTypes(config)) {
      typesPath = await writeResourceTypes(namespaces, config, projectRoot);
    } else {
      warnings.push(`Skipping type generation: YAML catalogs (${config.output}) cannot be imported as types`);
    }
  }

  const summary: ExtractSummary = {
    projectRoot,
    configPath: loaded.configPath,
    configFound: loaded.found,
    dryRun: Boolean(options.dryRun),
    filesScanned: extraction.filesScanned,
    entries: extraction.entries.length,
    catalogs: namespaces.map((entry) => ({
      locale: entry.locale,
      namespace: entry.namespace,
      path: entry.path,
      changed: hasCatalogChanged(entry),
      counts: summarizeCounts(entry),
      keys: listChangedKeys(entry),
      resetFlags: resetFlagsToJson(entry.merged.reset),
    })),
    conflicts: conflicts.map((record) => ({
      kind: record.conflict.kind,
      namespace: record.namespace,
      key: record.key,
      message: describeConflict(record, config.namespaceSeparator),
    })),
    warnings,
    dynamicKeyWarnings: extraction.dynamicKeyWarnings,
    written,
    diffs: options.diff
      ? buildCatalogDiffs(namespaces, { ...writeOptions, workspaceRoot: projectRoot, keySeparator: config.keySeparator })
      : [],
    typesPath,
  };

  return { summary, config, namespaces, conflicts };
}

export function registerExtract(program: Command) {
  program
    .command('extract [path]')
    .description('Extract translation keys from source files and update the catalogs')
    .option('-c, --config <path>', 'Path to parlance config file')
    .option('--dry-run', 'Reconcile without writing any file', false)
    .option('--diff', 'Print unified diffs of the catalog changes', false)
    .option('--json', 'Print a machine-readable summary', false)
    .option('-v, --verbose', 'Print the configuration and per-catalog counts', false)
    .option('--fail-on-warnings', 'Exit with an error on conflicting keys', false)
    .option('--fail-on-update', 'Exit with an error when catalogs would change', false)
    .option('--generate-types', 'Write react-i18next.resources.d.ts', false)
    .option('--keep-removed', 'Keep keys no longer found in the sources', false)
    .option('--create-old-catalogs', 'Write removed and reset values to <name>_old catalogs', false)
    .action(
      withErrorHandling(async (targetPath: string | undefined, options: ExtractCommandOptions) => {
        const { summary, config, namespaces, conflicts } = await runExtract(targetPath, options);

        if (options.json) {
          console.log(JSON.stringify(summary, null, 2));
          return;
        }

        if (!summary.configFound) {
          console.log(chalk.gray('No parlance config file found, using defaults.'));
        }
        if (config.verbose) {
          printConfigBanner(config, summary.projectRoot, true);
        }

        printWarnings(summary.warnings, summary.dynamicKeyWarnings);
        printConflicts(conflicts, config.namespaceSeparator);

        if (config.verbose) {
          printCounts(namespaces, config);
        }
        if (options.diff) {
          printCatalogDiffs(summary.diffs);
        }

        printWritten(summary.written, summary.projectRoot, summary.dryRun);
        if (summary.typesPath) {
          console.log(chalk.green(`Generated ${path.relative(summary.projectRoot, summary.typesPath)}`));
        }
      })
    );
}
