import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { Command } from 'commander';
import { loadConfig } from '@parlance/core';
import { CliError } from '../utils/errors.js';
import { buildInitConfig, defaultInitAnswers, registerInit, writeInitConfig } from './init.js';

let tempDir: string;

describe('init command', () => {
  it('registers the init command with its options', () => {
    const program = new Command();
    registerInit(program);

    const command = program.commands.find((cmd) => cmd.name() === 'init');
    expect(command).toBeDefined();
    expect(command?.options.map((option) => option.long)).toEqual(['--yes', '--force']);
  });
});

describe('buildInitConfig', () => {
  it('turns the default answers into the default options', () => {
    expect(buildInitConfig(defaultInitAnswers())).toEqual({
      locales: ['en'],
      input: ['src/**/*.{ts,tsx,js,jsx}'],
      exclude: ['node_modules/**', 'dist/**'],
      output: 'locales/$LOCALE/$NAMESPACE.json',
      defaultNamespace: 'translation',
      keepRemoved: false,
      createOldCatalogs: false,
    });
  });

  it('splits comma separated answers without breaking brace globs', () => {
    const config = buildInitConfig({
      ...defaultInitAnswers(),
      locales: 'en, de,fr',
      input: 'src/**/*.{ts,tsx}, app/**/*.ts',
      defaultNamespace: '  common ',
      keepRemoved: true,
    });

    expect(config.locales).toEqual(['en', 'de', 'fr']);
    expect(config.input).toEqual(['src/**/*.{ts,tsx}', 'app/**/*.ts']);
    expect(config.defaultNamespace).toBe('common');
    expect(config.keepRemoved).toBe(true);
  });

  it('falls back to defaults for blank answers', () => {
    const config = buildInitConfig({ ...defaultInitAnswers(), locales: ' , ', output: '  ' });

    expect(config.locales).toEqual(['en']);
    expect(config.output).toBe('locales/$LOCALE/$NAMESPACE.json');
  });
});

describe('writeInitConfig', () => {
  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'parlance-init-'));
  });

  afterEach(async () => {
    if (tempDir) {
      await fs.rm(tempDir, { recursive: true, force: true });
    }
  });

  it('writes a config file the loader accepts', async () => {
    const config = buildInitConfig({ ...defaultInitAnswers(), locales: 'en,de' });

    const configPath = await writeInitConfig(tempDir, config);

    expect(configPath).toBe(path.join(tempDir, 'parlance.config.json'));
    expect(JSON.parse(await fs.readFile(configPath, 'utf8'))).toEqual(config);
    expect((await loadConfig(configPath)).locales).toEqual(['en', 'de']);
  });

  it('refuses to replace an existing file unless forced', async () => {
    const config = buildInitConfig(defaultInitAnswers());
    await writeInitConfig(tempDir, config);

    await expect(writeInitConfig(tempDir, config)).rejects.toBeInstanceOf(CliError);
    await expect(writeInitConfig(tempDir, { ...config, locales: ['fr'] }, { force: true })).resolves.toBe(
      path.join(tempDir, 'parlance.config.json')
    );
    expect(JSON.parse(await fs.readFile(path.join(tempDir, 'parlance.config.json'), 'utf8')).locales).toEqual(['fr']);
  });
});
