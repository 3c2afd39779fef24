/**
 * Configuration file loading utilities
 */

import fs from 'fs/promises';
import path from 'path';
import yaml from 'js-yaml';
import type { LoadConfigResult, ParlanceConfig, RawParlanceConfig } from './types.js';
import { isRecord, normalizeConfig } from './normalizer.js';
import { assertConfigValid } from './validator.js';
import { CONFIG_FILENAMES, DEFAULT_CONFIG_FILENAME } from './defaults.js';
import { ConfigError } from '../errors.js';

// ─────────────────────────────────────────────────────────────────────────────
// File System Utilities
// ─────────────────────────────────────────────────────────────────────────────

async function exists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Search upward through directories for the first of `filenames`.
 */
async function findUp(filenames: readonly string[], cwd: string): Promise<string | null> {
  let currentDir = cwd;
  const maxDepth = 10; // Prevent infinite loops

  for (let depth = 0; depth < maxDepth; depth++) {
    for (const filename of filenames) {
      const filePath = path.join(currentDir, filename);
      if (await exists(filePath)) {
        return filePath;
      }
    }

    const parentDir = path.dirname(currentDir);
    if (parentDir === currentDir) {
      return null;
    }
    currentDir = parentDir;
  }

  return null;
}

// ─────────────────────────────────────────────────────────────────────────────
// Config Loading
// ─────────────────────────────────────────────────────────────────────────────

function isYamlConfig(filePath: string): boolean {
  const extension = path.extname(filePath).toLowerCase();
  return extension === '.yaml' || extension === '.yml';
}

/**
 * Parse config file contents; YAML by extension, JSON otherwise.
 */
export function parseConfigText(resolvedPath: string, contents: string): RawParlanceConfig {
  let parsed: unknown;
  try {
    parsed = isYamlConfig(resolvedPath) ? yaml.load(contents) : JSON.parse(contents);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    const format = isYamlConfig(resolvedPath) ? 'YAML' : 'JSON';
    throw new ConfigError(`Config file at ${resolvedPath} contains invalid ${format}: ${message}`);
  }

  if (parsed === undefined || parsed === null) {
    return {};
  }
  if (!isRecord(parsed)) {
    throw new ConfigError(`Config file at ${resolvedPath} must contain an object.`);
  }
  return parsed;
}

/**
 * Load and parse a config file from a specific path.
 */
async function readConfigFile(resolvedPath: string): Promise<RawParlanceConfig> {
  let fileContents: string;

  try {
    fileContents = await fs.readFile(resolvedPath, 'utf-8');
  } catch (error) {
    const err = error as NodeJS.ErrnoException;
    if (err.code === 'ENOENT') {
      throw new ConfigError(`Config file not found at ${resolvedPath}. Run "parlance init" to create one.`);
    }
    throw new ConfigError(`Unable to read config file at ${resolvedPath}: ${err.message}`);
  }

  return parseConfigText(resolvedPath, fileContents);
}

/**
 * Load config file with upward directory traversal.
 *
 * Without an explicit path, the first of `parlance.config.json`,
 * `parlance.config.yaml` and `parlance.config.yml` found from `cwd` upwards is
 * used. When none exists the defaults apply and `found` is false. An explicit
 * path that does not exist is an error.
 */
export async function loadConfigWithMeta(
  configPath?: string,
  options?: { cwd?: string }
): Promise<LoadConfigResult> {
  const cwd = options?.cwd ?? process.cwd();
  let resolvedPath: string;

  if (configPath) {
    resolvedPath = path.resolve(cwd, configPath);
  } else {
    const found = await findUp(CONFIG_FILENAMES, cwd);
    if (!found) {
      const config = normalizeConfig({});
      assertConfigValid(config);
      return {
        config,
        configPath: path.join(cwd, DEFAULT_CONFIG_FILENAME),
        projectRoot: cwd,
        found: false,
      };
    }
    resolvedPath = found;
  }

  const rawConfig = await readConfigFile(resolvedPath);
  const config = normalizeConfig(rawConfig);
  assertConfigValid(config);

  return {
    config,
    configPath: resolvedPath,
    projectRoot: path.dirname(resolvedPath),
    found: true,
  };
}

/**
 * Load config file (simplified API).
 * @returns Normalized config object
 */
export async function loadConfig(configPath?: string, options?: { cwd?: string }): Promise<ParlanceConfig> {
  const result = await loadConfigWithMeta(configPath, options);
  return result.config;
}
