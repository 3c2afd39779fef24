import path from 'path';
import chalk from 'chalk';
import type { Command } from 'commander';
import { loadConfigWithMeta, type LoadConfigResult } from '@parlance/core';
import { withErrorHandling } from '../utils/errors.js';
import { formatConfigBanner } from '../utils/reporter.js';

interface ConfigShowOptions {
  config?: string;
  json?: boolean;
}

/** Lines describing the options that the banner leaves out. */
export function formatConfigDetails(result: LoadConfigResult): string[] {
  const { config } = result;
  return [
    `Exclude:             ${config.exclude.join(', ')}`,
    `Functions:           ${config.functions.join(', ')}`,
    `Keep removed:        ${config.keepRemoved}`,
    `Old catalogs:        ${config.createOldCatalogs}`,
    `Reset locale:        ${config.resetDefaultValueLocale ?? '(none)'}`,
    `Line ending:         ${config.lineEnding}`,
    `Sort keys:           ${config.sort}`,
    `Indentation:         ${config.indentation}`,
    `Generate types:      ${config.generateTypes}`,
  ];
}

export function registerConfig(program: Command) {
  const configCmd = program.command('config').description('Inspect the parlance configuration');

  configCmd
    .command('show')
    .description('Print the resolved configuration')
    .option('-c, --config <path>', 'Path to parlance config file')
    .option('--json', 'Output as JSON', false)
    .action(
      withErrorHandling(async (options: ConfigShowOptions) => {
        const result = await loadConfigWithMeta(options.config);

        if (options.json) {
          console.log(JSON.stringify({ configPath: result.found ? result.configPath : null, config: result.config }, null, 2));
          return;
        }

        if (result.found) {
          console.log(chalk.gray(`Config: ${path.relative(process.cwd(), result.configPath) || result.configPath}`));
        } else {
          console.log(chalk.gray('No parlance config file found, showing defaults.'));
        }
        const lines = [...formatConfigBanner(result.config, result.projectRoot, { verbose: true }), ...formatConfigDetails(result)];
        lines.forEach((line) => console.log(`  ${line}`));
      })
    );
}
