import fs from 'fs/promises';
import path from 'path';
import { isYamlPath } from './catalog-store.js';
import type { ParlanceConfig } from './config/types.js';
import type { NamespaceReconciliation } from './reconciler.js';

export const RESOURCE_TYPES_FILENAME = 'react-i18next.resources.d.ts';

export type TypeGenerationConfig = Pick<
  ParlanceConfig,
  'locales' | 'defaultNamespace' | 'namespaceSeparator' | 'keySeparator' | 'contextSeparator'
>;

const ALPHANUMERIC = /[\p{L}\p{N}]/u;
const IDENTIFIER = /^[A-Za-z_$][\w$]*$/;

/** `hello_world` and `Hello-World` both become `helloWorld`. */
export function camelize(value: string): string {
  let result = '';
  let atSeparator = false;
  for (const char of value) {
    if (!ALPHANUMERIC.test(char)) {
      atSeparator = true;
      continue;
    }
    result += result && atSeparator ? char.toUpperCase() : char.toLowerCase();
    atSeparator = false;
  }
  return result;
}

function quote(value: string): string {
  return `'${value.replace(/\\/g, '\\\\').replace(/'/g, "\\'")}'`;
}

function propertyName(name: string): string {
  return IDENTIFIER.test(name) ? name : quote(name);
}

function importPath(projectRoot: string, filePath: string): string {
  const relative = path.relative(projectRoot, filePath).split(path.sep).join('/');
  return relative.startsWith('.') ? relative : `./${relative}`;
}

/** Resource types import the catalogs as JSON modules, which YAML catalogs are not. */
export function supportsResourceTypes(config: Pick<ParlanceConfig, 'output'>): boolean {
  return !isYamlPath(config.output);
}

/**
 * Renders a declaration file typing i18next resources from the catalogs of the
 * first configured locale.
 */
export function renderResourceTypes(
  results: readonly NamespaceReconciliation[],
  config: TypeGenerationConfig,
  projectRoot: string
): string {
  const [locale] = config.locales;
  const seen = new Map<string, number>();
  const resources = results
    .filter((result) => result.locale === locale)
    .map((result) => {
      const base = `${camelize(result.namespace) || 'namespace'}Resources`;
      const occurrences = seen.get(base) ?? 0;
      seen.set(base, occurrences + 1);
      return {
        namespace: result.namespace,
        importName: occurrences ? `${base}${occurrences + 1}` : base,
        path: importPath(projectRoot, result.path),
      };
    });

  const imports = resources.map((entry) => `import type ${entry.importName} from ${quote(entry.path)};`).join('\n');
  const members = resources
    .map((entry) => `      ${propertyName(entry.namespace)}: typeof ${entry.importName};`)
    .join('\n');
  const namespaces = Array.from(new Set(resources.map((entry) => entry.namespace))).sort();
  const union = namespaces.length ? namespaces.map(quote).join(' | ') : 'never';

  return `// This file is generated by parlance. Changes will be overwritten.
/* eslint-disable */

import 'i18next';

${imports}

declare module 'i18next' {
  interface CustomTypeOptions {
    defaultNS: ${quote(config.defaultNamespace)};
    nsSeparator: ${quote(config.namespaceSeparator)};
    keySeparator: ${quote(config.keySeparator)};
    contextSeparator: ${quote(config.contextSeparator)};
    resources: {
${members}
    };
  }
}

declare global {
  type Ns = ${union};
}

export default {};
`;
}

export async function writeResourceTypes(
  results: readonly NamespaceReconciliation[],
  config: TypeGenerationConfig,
  projectRoot: string
): Promise<string> {
  const filePath = path.join(projectRoot, RESOURCE_TYPES_FILENAME);
  await fs.writeFile(filePath, renderResourceTypes(results, config, projectRoot), 'utf8');
  return filePath;
}
