/**
 * Parser Abstraction Layer
 *
 * Provides a uniform interface for parsing different file types into
 * translation entries, so the extractor works with any registered parser.
 */

import path from 'path';
import type { Entry } from '../entry.js';

export interface SourcePosition {
  line: number;
  column: number;
}

export type DynamicKeyReason = 'template' | 'binary' | 'expression';

/** A translation call whose key cannot be read statically. */
export interface DynamicKeyWarning {
  filePath: string;
  position: SourcePosition;
  expression: string;
  reason: DynamicKeyReason;
}

/**
 * Result of parsing a file for translation entries.
 */
export interface ParseResult {
  entries: Entry[];
  /** Calls whose key could not be statically analyzed */
  dynamicKeyWarnings: DynamicKeyWarning[];
}

/**
 * Core parser interface that all file parsers must implement.
 */
export interface Parser {
  /** Unique parser identifier (e.g., 'typescript') */
  readonly id: string;

  /** Human-readable name */
  readonly name: string;

  /** File extensions this parser can handle */
  readonly extensions: string[];

  /**
   * Parse a file and extract translation entries.
   * @param filePath Absolute path to the file to parse
   * @param content File content as string
   * @param workspaceRoot Optional root that reported paths are made relative to
   */
  parseFile(filePath: string, content: string, workspaceRoot?: string): ParseResult;
}

/**
 * Registry for managing available parsers.
 */
export class ParserRegistry {
  private parsers = new Map<string, Parser>();

  register(parser: Parser): void {
    this.parsers.set(parser.id, parser);
  }

  /**
   * Get the parser that handles a specific file path.
   * Matches by file extension, first-match wins.
   */
  getForFile(filePath: string): Parser | undefined {
    const ext = path.extname(filePath).toLowerCase();
    for (const parser of this.parsers.values()) {
      if (parser.extensions.includes(ext)) {
        return parser;
      }
    }
    return undefined;
  }
}
