import fs from 'fs/promises';
import path from 'path';
import crypto from 'crypto';
import yaml from 'js-yaml';
import { catalogFromJson, sortCatalog, toJson, type Catalog } from './catalog.js';
import type { LineEnding, ParlanceConfig } from './config/types.js';
import { CatalogParseError } from './errors.js';

export interface WriteCatalogOptions {
  lineEnding?: LineEnding;
  sort?: boolean;
  indentation?: number;
}

export interface CatalogPaths {
  path: string;
  /** Same file name with `_old` before the extension. */
  backupPath: string;
}

export function isYamlPath(filePath: string): boolean {
  const extension = path.extname(filePath).toLowerCase();
  return extension === '.yml' || extension === '.yaml';
}

export function backupPathFor(filePath: string): string {
  const extension = path.extname(filePath);
  const base = path.basename(filePath, extension);
  return path.join(path.dirname(filePath), `${base}_old${extension}`);
}

export function resolveCatalogPaths(
  config: Pick<ParlanceConfig, 'output'>,
  projectRoot: string,
  locale: string,
  namespace: string
): CatalogPaths {
  const relative = config.output.replace(/\$LOCALE/g, locale).replace(/\$NAMESPACE/g, namespace);
  const filePath = path.resolve(projectRoot, relative);
  return { path: filePath, backupPath: backupPathFor(filePath) };
}

export function parseCatalog(filePath: string, contents: string): Catalog {
  const text = contents.charCodeAt(0) === 0xfeff ? contents.slice(1) : contents;
  try {
    if (isYamlPath(filePath)) {
      return catalogFromJson(yaml.load(text));
    }
    return text.trim() ? catalogFromJson(JSON.parse(text)) : catalogFromJson({});
  } catch (error) {
    throw new CatalogParseError(filePath, error);
  }
}

/** Reads a catalog; a missing file yields `undefined`. */
export async function readCatalog(filePath: string): Promise<Catalog | undefined> {
  let contents: string;
  try {
    contents = await fs.readFile(filePath, 'utf8');
  } catch (error) {
    const err = error as NodeJS.ErrnoException;
    if (err.code === 'ENOENT') {
      return undefined;
    }
    throw error;
  }
  return parseCatalog(filePath, contents);
}

export function applyLineEnding(text: string, lineEnding: LineEnding = 'auto'): string {
  const normalized = text.replace(/\r\n|\r/g, '\n');
  switch (lineEnding) {
    case 'crlf':
      return normalized.replace(/\n/g, '\r\n');
    case 'cr':
      return normalized.replace(/\n/g, '\r');
    case 'lf':
    case 'auto':
      return normalized;
  }
}

export function serializeCatalog(filePath: string, catalog: Catalog, options: WriteCatalogOptions = {}): string {
  const indentation = options.indentation ?? 2;
  const data = toJson(options.sort === false ? catalog : sortCatalog(catalog));
  const text = isYamlPath(filePath)
    ? yaml.dump(data, { indent: indentation, lineWidth: -1, noRefs: true })
    : `${JSON.stringify(data, null, indentation)}\n`;
  return applyLineEnding(text, options.lineEnding);
}

function createTempPath(filePath: string): string {
  const unique = crypto.randomBytes(6).toString('hex');
  return `${filePath}.${unique}.tmp`;
}

/** Writes through a temp file and a rename; parent directories are created. */
export async function writeCatalogText(filePath: string, contents: string): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  const tempPath = createTempPath(filePath);
  await fs.writeFile(tempPath, contents, 'utf8');

  try {
    await fs.rename(tempPath, filePath);
  } catch (error) {
    const err = error as NodeJS.ErrnoException;
    if (err.code === 'EEXIST' || err.code === 'EPERM') {
      await fs.rm(filePath, { force: true });
      await fs.rename(tempPath, filePath);
    } else {
      throw error;
    }
  } finally {
    await fs.rm(tempPath, { force: true });
  }
}

export async function writeCatalog(
  filePath: string,
  catalog: Catalog,
  options: WriteCatalogOptions = {}
): Promise<void> {
  await writeCatalogText(filePath, serializeCatalog(filePath, catalog, options));
}
