import fs from 'fs/promises';
import path from 'path';
import fg from 'fast-glob';
import pLimit from 'p-limit';
import type { Project } from 'ts-morph';
import type { ParlanceConfig } from './config/types.js';
import type { Entry } from './entry.js';
import { createDefaultParserRegistry, type ParserRegistry } from './parsers/index.js';
import type { DynamicKeyWarning } from './parsers/types.js';

export type ExtractConfig = Pick<
  ParlanceConfig,
  | 'input'
  | 'exclude'
  | 'functions'
  | 'namespaceSeparator'
  | 'contextSeparator'
  | 'transKeepBasicHtmlNodesFor'
  | 'extraction'
>;

export interface ExtractOptions {
  registry?: ParserRegistry;
  project?: Project;
}

export interface ExtractionResult {
  /** Entries in file path order, then document order within a file. */
  entries: Entry[];
  dynamicKeyWarnings: DynamicKeyWarning[];
  filesScanned: number;
}

/** Include patterns followed by the excludes as negated patterns, absolute to `workspaceRoot`. */
export function getGlobPatterns(config: Pick<ParlanceConfig, 'input' | 'exclude'>, workspaceRoot: string): string[] {
  const toAbsolute = (pattern: string) => (path.isAbsolute(pattern) ? pattern : path.join(workspaceRoot, pattern));
  const includes = config.input.filter(Boolean).map(toAbsolute);
  const excludes = config.exclude.filter(Boolean).map((pattern) => `!${toAbsolute(pattern)}`);
  return [...includes, ...excludes];
}

export async function resolveSourceFiles(
  config: Pick<ParlanceConfig, 'input' | 'exclude'>,
  workspaceRoot: string
): Promise<string[]> {
  const matches = await fg(getGlobPatterns(config, workspaceRoot), {
    onlyFiles: true,
    unique: true,
    followSymbolicLinks: true,
  });
  return matches.sort((a, b) => a.localeCompare(b));
}

/**
 * Scans the configured source files and returns every translation entry found.
 * Files are read concurrently but parsed one after another, so the entry order
 * only depends on the file list.
 */
export async function extractEntries(
  config: ExtractConfig,
  workspaceRoot: string,
  options: ExtractOptions = {}
): Promise<ExtractionResult> {
  const registry = options.registry ?? createDefaultParserRegistry(config, options.project);
  const files = (await resolveSourceFiles(config, workspaceRoot)).filter((file) => registry.getForFile(file));

  const limit = pLimit(config.extraction.concurrency);
  const contents = await Promise.all(files.map((file) => limit(() => fs.readFile(file, 'utf8'))));

  const entries: Entry[] = [];
  const dynamicKeyWarnings: DynamicKeyWarning[] = [];
  files.forEach((file, index) => {
    const parser = registry.getForFile(file);
    if (!parser) {
      return;
    }
    const result = parser.parseFile(file, contents[index] ?? '', workspaceRoot);
    entries.push(...result.entries);
    dynamicKeyWarnings.push(...result.dynamicKeyWarnings);
  });

  return { entries, dynamicKeyWarnings, filesScanned: files.length };
}
