/**
 * Parser Module Exports
 *
 * Provides the parser abstraction layer and default implementations.
 */

export * from './types.js';
export * from './typescript-parser.js';
export { cleanMultiLineText, serializeTransChildren } from './trans-children.js';
export { resolveStaticString, resolveStaticScalar } from './static-values.js';

import type { Project } from 'ts-morph';
import { ParserRegistry } from './types.js';
import { TypeScriptParser, type TypeScriptParserOptions } from './typescript-parser.js';

/**
 * Create a default parser registry with all available parsers.
 * @param project Optional ts-morph project to share across parsers
 */
export function createDefaultParserRegistry(options: TypeScriptParserOptions, project?: Project): ParserRegistry {
  const registry = new ParserRegistry();
  registry.register(new TypeScriptParser(options, project));
  return registry;
}
