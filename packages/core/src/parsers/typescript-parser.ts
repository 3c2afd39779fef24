/**
 * TypeScript/JavaScript Parser Implementation
 *
 * Uses ts-morph to parse TypeScript/JavaScript files and extract translation
 * entries from `t()` calls and `<Trans>` elements. This is the default parser
 * for .ts, .tsx, .js, .jsx files.
 */

import path from 'path';
import {
  Node,
  Project,
  type CallExpression,
  type JsxAttributeLike,
  type JsxChild,
  type ObjectLiteralExpression,
  type SourceFile,
} from 'ts-morph';
import type { ParlanceConfig } from '../config/types.js';
import type { Entry } from '../entry.js';
import { createScannerProject } from '../project-factory.js';
import {
  classifyDynamicKey,
  resolveStaticNamespace,
  resolveStaticScalar,
  resolveStaticString,
} from './static-values.js';
import { serializeTransChildren } from './trans-children.js';
import type { DynamicKeyWarning, Parser, ParseResult } from './types.js';

export type TypeScriptParserOptions = Pick<
  ParlanceConfig,
  'functions' | 'namespaceSeparator' | 'contextSeparator' | 'transKeepBasicHtmlNodesFor'
>;

/** Calls that set the namespace of the calls after them, with the index of the namespace argument. */
const NAMESPACE_SETTERS: ReadonlyMap<string, number> = new Map([
  ['useTranslation', 0],
  ['withTranslation', 0],
  ['getFixedT', 1],
]);

const TRANS_COMPONENT = 'Trans';

type OptionMap = Map<string, string | undefined>;

interface FileScope {
  file: SourceFile;
  workspaceRoot?: string;
  namespace?: string;
  entries: Entry[];
  dynamicKeyWarnings: DynamicKeyWarning[];
}

interface EntryParts {
  key: string;
  value?: string;
  namespace?: string;
  context?: string;
  hasCount: boolean;
  options?: OptionMap;
}

function propertyName(node: Node): string {
  return Node.isStringLiteral(node) || Node.isNoSubstitutionTemplateLiteral(node)
    ? node.getLiteralValue()
    : node.getText();
}

function calleeName(node: CallExpression): string | undefined {
  const callee = node.getExpression();
  if (Node.isIdentifier(callee)) {
    return callee.getText();
  }
  if (Node.isPropertyAccessExpression(callee)) {
    return callee.getName();
  }
  return undefined;
}

function calleeText(node: CallExpression): string {
  return node.getExpression().getText().replace(/\s+/g, '').replace(/\?\./g, '.');
}

/**
 * Parser for TypeScript and JavaScript files using ts-morph.
 */
export class TypeScriptParser implements Parser {
  readonly id = 'typescript';
  readonly name = 'TypeScript/JavaScript Parser';
  readonly extensions = ['.ts', '.tsx', '.mts', '.cts', '.js', '.jsx', '.mjs', '.cjs'];

  private readonly project: Project;
  private readonly functions: ReadonlySet<string>;

  constructor(private readonly options: TypeScriptParserOptions, project?: Project) {
    this.project = project ?? createScannerProject();
    this.functions = new Set(options.functions);
  }

  parseFile(filePath: string, content: string, workspaceRoot?: string): ParseResult {
    const file = this.project.createSourceFile(filePath, content, { overwrite: true });
    const scope: FileScope = { file, workspaceRoot, entries: [], dynamicKeyWarnings: [] };

    try {
      file.forEachDescendant((node) => {
        if (Node.isCallExpression(node)) {
          this.visitCall(node, scope);
        } else if (Node.isJsxElement(node)) {
          const opening = node.getOpeningElement();
          if (opening.getTagNameNode().getText() === TRANS_COMPONENT) {
            this.visitTrans(opening, opening.getAttributes(), node.getJsxChildren(), scope);
          }
        } else if (Node.isJsxSelfClosingElement(node)) {
          if (node.getTagNameNode().getText() === TRANS_COMPONENT) {
            this.visitTrans(node, node.getAttributes(), [], scope);
          }
        }
      });
    } finally {
      this.project.removeSourceFile(file);
    }

    return { entries: scope.entries, dynamicKeyWarnings: scope.dynamicKeyWarnings };
  }

  private visitCall(node: CallExpression, scope: FileScope): void {
    const name = calleeName(node);
    const namespaceIndex = name === undefined ? undefined : NAMESPACE_SETTERS.get(name);
    if (namespaceIndex !== undefined) {
      const argument = node.getArguments()[namespaceIndex];
      const namespace = argument ? resolveStaticNamespace(argument) : undefined;
      if (namespace !== undefined) {
        scope.namespace = namespace;
      }
      return;
    }

    if (!this.functions.has(calleeText(node))) {
      return;
    }

    const [keyArg, second, third] = node.getArguments();
    if (!keyArg) {
      return;
    }

    const key = resolveStaticString(keyArg);
    if (key === undefined) {
      this.recordDynamicKey(keyArg, scope);
      return;
    }

    let value: string | undefined;
    let options: OptionMap | undefined;
    if (second && Node.isObjectLiteralExpression(second)) {
      options = this.readOptions(second);
    } else if (second) {
      value = resolveStaticString(second);
    }
    if (!options && third && Node.isObjectLiteralExpression(third)) {
      options = this.readOptions(third);
    }

    this.addEntry(
      node,
      {
        key,
        value: value ?? options?.get('defaultValue'),
        namespace: options?.get('ns') ?? options?.get('namespace'),
        context: options?.get('context'),
        hasCount: options?.has('count') ?? false,
        options,
      },
      scope
    );
  }

  private visitTrans(node: Node, attributes: JsxAttributeLike[], children: JsxChild[], scope: FileScope): void {
    const props: OptionMap = new Map();
    let keyNode: Node | undefined;

    for (const attribute of attributes) {
      if (!Node.isJsxAttribute(attribute)) {
        continue;
      }
      const name = attribute.getNameNode().getText();
      const initializer = attribute.getInitializer();
      let valueNode: Node | undefined = initializer;
      if (initializer && Node.isJsxExpression(initializer)) {
        valueNode = initializer.getExpression();
      }
      if (name === 'i18nKey') {
        keyNode = valueNode;
      }
      if (!valueNode) {
        props.set(name, undefined);
      } else {
        props.set(name, name === 'ns' ? resolveStaticNamespace(valueNode) : resolveStaticScalar(valueNode));
      }
    }

    if (!keyNode) {
      return;
    }
    const key = resolveStaticString(keyNode);
    if (key === undefined) {
      this.recordDynamicKey(keyNode, scope);
      return;
    }

    const serialized = serializeTransChildren(children, this.options.transKeepBasicHtmlNodesFor);
    const value = props.get('defaults') ?? serialized;

    this.addEntry(
      node,
      {
        key,
        value: value === '' ? undefined : value,
        namespace: props.get('ns'),
        context: props.get('context'),
        hasCount: props.has('count'),
        options: props,
      },
      scope
    );
  }

  private readOptions(node: ObjectLiteralExpression): OptionMap {
    const options: OptionMap = new Map();
    for (const property of node.getProperties()) {
      if (Node.isPropertyAssignment(property)) {
        const name = propertyName(property.getNameNode());
        const initializer = property.getInitializer();
        if (!initializer) {
          options.set(name, undefined);
        } else {
          options.set(name, name === 'ns' ? resolveStaticNamespace(initializer) : resolveStaticScalar(initializer));
        }
      } else if (Node.isShorthandPropertyAssignment(property)) {
        options.set(property.getName(), resolveStaticScalar(property.getNameNode()));
      }
    }
    return options;
  }

  private addEntry(node: Node, parts: EntryParts, scope: FileScope): void {
    let key = parts.key;
    let prefixNamespace: string | undefined;
    const separator = this.options.namespaceSeparator;
    const separatorIndex = separator ? key.indexOf(separator) : -1;
    if (separatorIndex > 0) {
      prefixNamespace = key.slice(0, separatorIndex);
      key = key.slice(separatorIndex + separator.length);
    }
    if (parts.context) {
      key = `${key}${this.options.contextSeparator}${parts.context}`;
    }

    const position = scope.file.getLineAndColumnAtPos(node.getStart());
    const entry: Entry = {
      key,
      namespace: parts.namespace ?? prefixNamespace ?? scope.namespace,
      value: parts.value,
      hasCount: parts.hasCount,
      options: parts.options,
      filePath: this.relativePath(scope),
      line: position.line,
      column: position.column,
    };
    scope.entries.push(entry);
  }

  private recordDynamicKey(node: Node, scope: FileScope): void {
    scope.dynamicKeyWarnings.push({
      filePath: this.relativePath(scope),
      position: scope.file.getLineAndColumnAtPos(node.getStart()),
      expression: node.getText(),
      reason: classifyDynamicKey(node),
    });
  }

  private relativePath(scope: FileScope): string {
    const filePath = scope.file.getFilePath();
    if (!scope.workspaceRoot) {
      return filePath;
    }
    return path.relative(scope.workspaceRoot, filePath) || filePath;
  }
}
