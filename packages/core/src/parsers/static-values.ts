import { Node, VariableDeclarationKind, type Expression } from 'ts-morph';
import type { DynamicKeyReason } from './types.js';

function unwrap(node: Node): Node {
  let current = node;
  while (
    Node.isAsExpression(current) ||
    Node.isSatisfiesExpression(current) ||
    Node.isParenthesizedExpression(current) ||
    Node.isTypeAssertion(current) ||
    Node.isNonNullExpression(current)
  ) {
    current = current.getExpression();
  }
  return current;
}

function resolveConstInitializer(node: Node, seen: Set<string>): Expression | undefined {
  if (!Node.isIdentifier(node)) {
    return undefined;
  }
  const name = node.getText();
  if (seen.has(name)) {
    return undefined;
  }
  seen.add(name);

  const declaration = node.getSourceFile().getVariableDeclaration(name);
  if (!declaration || declaration.getVariableStatement()?.getDeclarationKind() !== VariableDeclarationKind.Const) {
    return undefined;
  }
  return declaration.getInitializer();
}

function readString(node: Node, seen: Set<string>): string | undefined {
  const target = unwrap(node);
  if (Node.isStringLiteral(target) || Node.isNoSubstitutionTemplateLiteral(target)) {
    return target.getLiteralValue();
  }
  const initializer = resolveConstInitializer(target, seen);
  return initializer ? readString(initializer, seen) : undefined;
}

function readScalar(node: Node, seen: Set<string>): string | undefined {
  const target = unwrap(node);
  if (Node.isNumericLiteral(target)) {
    return String(target.getLiteralValue());
  }
  if (Node.isTrueLiteral(target) || Node.isFalseLiteral(target)) {
    return String(target.getLiteralValue());
  }
  if (Node.isStringLiteral(target) || Node.isNoSubstitutionTemplateLiteral(target)) {
    return target.getLiteralValue();
  }
  const initializer = resolveConstInitializer(target, seen);
  return initializer ? readScalar(initializer, seen) : undefined;
}

/**
 * Reads a string known at parse time: a literal, or an identifier bound to a
 * top-level `const` holding one (also through `as` and `satisfies`).
 */
export function resolveStaticString(node: Node): string | undefined {
  return readString(node, new Set());
}

/** Like `resolveStaticString`, also accepting numbers and booleans. */
export function resolveStaticScalar(node: Node): string | undefined {
  return readScalar(node, new Set());
}

/** First static string of an array literal, or the string itself. */
export function resolveStaticNamespace(node: Node): string | undefined {
  const target = unwrap(node);
  if (Node.isArrayLiteralExpression(target)) {
    const [first] = target.getElements();
    return first ? resolveStaticString(first) : undefined;
  }
  return resolveStaticString(target);
}

export function classifyDynamicKey(node: Node): DynamicKeyReason {
  const target = unwrap(node);
  if (Node.isTemplateExpression(target)) {
    return 'template';
  }
  if (Node.isBinaryExpression(target)) {
    return 'binary';
  }
  return 'expression';
}
