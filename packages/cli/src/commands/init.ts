import { Command } from 'commander';
import inquirer from 'inquirer';
import fs from 'fs/promises';
import path from 'path';
import chalk from 'chalk';
import {
  createDefaultConfig,
  DEFAULT_CONFIG_FILENAME,
  parseGlobList,
  type ParlanceConfig,
} from '@parlance/core';
import { CliError, withErrorHandling } from '../utils/errors.js';

interface InitCommandOptions {
  yes?: boolean;
  force?: boolean;
}

export interface InitAnswers {
  locales: string;
  input: string;
  output: string;
  defaultNamespace: string;
  keepRemoved: boolean;
  createOldCatalogs: boolean;
}

/** Config file contents: only the options a new project usually sets. */
export type InitConfig = Pick<
  ParlanceConfig,
  'locales' | 'input' | 'exclude' | 'output' | 'defaultNamespace' | 'keepRemoved' | 'createOldCatalogs'
>;

export function defaultInitAnswers(): InitAnswers {
  const defaults = createDefaultConfig();
  return {
    locales: defaults.locales.join(', '),
    input: defaults.input.join(', '),
    output: defaults.output,
    defaultNamespace: defaults.defaultNamespace,
    keepRemoved: defaults.keepRemoved,
    createOldCatalogs: defaults.createOldCatalogs,
  };
}

export function buildInitConfig(answers: InitAnswers): InitConfig {
  const defaults = createDefaultConfig();
  const locales = parseGlobList(answers.locales);
  const input = parseGlobList(answers.input);
  return {
    locales: locales.length ? locales : defaults.locales,
    input: input.length ? input : defaults.input,
    exclude: defaults.exclude,
    output: answers.output.trim() || defaults.output,
    defaultNamespace: answers.defaultNamespace.trim() || defaults.defaultNamespace,
    keepRemoved: answers.keepRemoved,
    createOldCatalogs: answers.createOldCatalogs,
  };
}

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Writes `parlance.config.json` into `workspaceRoot` and returns its path.
 * An existing file is only replaced with `force`.
 */
export async function writeInitConfig(
  workspaceRoot: string,
  config: InitConfig,
  options: { force?: boolean } = {}
): Promise<string> {
  const configPath = path.join(workspaceRoot, DEFAULT_CONFIG_FILENAME);
  if (!options.force && (await fileExists(configPath))) {
    throw new CliError(`Config file already exists at ${configPath}. Use --force to overwrite it.`);
  }

  try {
    await fs.writeFile(configPath, `${JSON.stringify(config, null, 2)}\n`);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new CliError(`Failed to write configuration file: ${message}`);
  }
  return configPath;
}

async function promptAnswers(): Promise<InitAnswers> {
  const defaults = defaultInitAnswers();
  return inquirer.prompt<InitAnswers>([
    {
      type: 'input',
      name: 'locales',
      message: 'Which locales do you need? (comma separated)',
      default: defaults.locales,
    },
    {
      type: 'input',
      name: 'input',
      message: 'Which files should be scanned? (comma separated glob patterns)',
      default: defaults.input,
    },
    {
      type: 'input',
      name: 'output',
      message: 'Where should catalogs be written? ($LOCALE and $NAMESPACE are substituted)',
      default: defaults.output,
      validate: (value: string) =>
        value.includes('$LOCALE') || value.includes('$NAMESPACE')
          ? true
          : 'The path should contain $LOCALE or $NAMESPACE',
    },
    {
      type: 'input',
      name: 'defaultNamespace',
      message: 'Default namespace?',
      default: defaults.defaultNamespace,
    },
    {
      type: 'confirm',
      name: 'keepRemoved',
      message: 'Keep keys that are no longer referenced?',
      default: defaults.keepRemoved,
    },
    {
      type: 'confirm',
      name: 'createOldCatalogs',
      message: 'Write removed values to <name>_old catalogs?',
      default: defaults.createOldCatalogs,
    },
  ]);
}

export function registerInit(program: Command) {
  program
    .command('init')
    .description('Create a parlance configuration file')
    .option('-y, --yes', 'Skip prompts and use defaults (non-interactive mode)', false)
    .option('-f, --force', 'Overwrite an existing configuration file', false)
    .action(
      withErrorHandling(async (commandOptions: InitCommandOptions) => {
        console.log(chalk.blue('Initializing parlance configuration...'));

        const answers = commandOptions.yes ? defaultInitAnswers() : await promptAnswers();
        const config = buildInitConfig(answers);
        const configPath = await writeInitConfig(process.cwd(), config, { force: commandOptions.force });

        console.log(chalk.green(`\nConfiguration created at ${configPath}`));
        console.log(chalk.dim(`  Locales: ${config.locales.join(', ')}`));
        console.log(chalk.dim(`  Output:  ${config.output}`));
        console.log(chalk.blue('\nRun "parlance extract" to build your catalogs.'));
      })
    );
}
