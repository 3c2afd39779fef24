import { Node, type JsxChild } from 'ts-morph';

type TransNode =
  | { kind: 'text'; text: string }
  | { kind: 'tag'; name: string; basic: boolean; selfClosing: boolean; children?: TransNode[] };

/** Trims line breaks at both ends and folds inner ones into a single space. */
export function cleanMultiLineText(text: string): string {
  return text.replace(/^[\n\r]\s*|[\n\r]\s*$/g, '').replace(/[\n\r]\s*/g, ' ');
}

function isEmptyNode(node: TransNode): boolean {
  return node.kind === 'text' ? node.text.length === 0 : node.children === undefined;
}

function isDynamicList(children: JsxChild[]): boolean {
  return children.some((child) => {
    if (Node.isJsxElement(child)) {
      return child.getOpeningElement().getTagNameNode().getText() === 'i18nIsDynamicList';
    }
    if (Node.isJsxSelfClosingElement(child)) {
      return child.getTagNameNode().getText() === 'i18nIsDynamicList';
    }
    return false;
  });
}

function interpolationFromObject(node: Node): string {
  if (!Node.isObjectLiteralExpression(node)) {
    return '';
  }
  let valueName: string | undefined;
  let format: string | undefined;
  let valueCount = 0;
  for (const property of node.getProperties()) {
    if (!Node.isPropertyAssignment(property) && !Node.isShorthandPropertyAssignment(property)) {
      continue;
    }
    const name = property.getName();
    if (name === 'format' && Node.isPropertyAssignment(property)) {
      const initializer = property.getInitializer();
      if (initializer && Node.isStringLiteral(initializer)) {
        format = initializer.getLiteralValue();
      }
      continue;
    }
    valueName = name;
    valueCount += 1;
  }
  if (valueCount !== 1 || valueName === undefined) {
    return '';
  }
  return format ? `{{${valueName}, ${format}}}` : `{{${valueName}}}`;
}

function expressionChild(node: Node | undefined): TransNode {
  if (!node) {
    return { kind: 'text', text: '' };
  }
  if (Node.isStringLiteral(node) || Node.isNoSubstitutionTemplateLiteral(node)) {
    return { kind: 'text', text: node.getLiteralValue() };
  }
  if (Node.isAsExpression(node) || Node.isParenthesizedExpression(node)) {
    return expressionChild(node.getExpression());
  }
  if (Node.isIdentifier(node)) {
    return { kind: 'text', text: `{{${node.getText()}}}` };
  }
  return { kind: 'text', text: interpolationFromObject(node) };
}

function parseChildren(children: JsxChild[]): TransNode[] {
  const nodes: TransNode[] = [];
  for (const child of children) {
    let node: TransNode;
    if (Node.isJsxText(child)) {
      // getText() drops leading whitespace as trivia
      node = { kind: 'text', text: cleanMultiLineText(child.compilerNode.text) };
    } else if (Node.isJsxElement(child)) {
      const opening = child.getOpeningElement();
      const nested = child.getJsxChildren();
      node = {
        kind: 'tag',
        name: opening.getTagNameNode().getText(),
        basic: opening.getAttributes().length === 0,
        selfClosing: false,
        children: isDynamicList(nested) ? undefined : parseChildren(nested),
      };
    } else if (Node.isJsxSelfClosingElement(child)) {
      node = {
        kind: 'tag',
        name: child.getTagNameNode().getText(),
        basic: child.getAttributes().length === 0,
        selfClosing: true,
        children: [],
      };
    } else if (Node.isJsxExpression(child)) {
      node = expressionChild(child.getExpression());
    } else {
      node = { kind: 'text', text: '' };
    }
    if (!isEmptyNode(node)) {
      nodes.push(node);
    }
  }
  return nodes;
}

function render(nodes: TransNode[], keepBasicHtmlNodesFor: readonly string[]): string {
  return nodes
    .map((node, index) => {
      if (node.kind === 'text') {
        return node.text;
      }
      const keepName = node.basic && keepBasicHtmlNodesFor.includes(node.name);
      const elementName = keepName ? node.name : String(index);
      const inner = render(node.children ?? [], keepBasicHtmlNodesFor);
      if (keepName && node.selfClosing && inner === '') {
        return `<${elementName} />`;
      }
      return `<${elementName}>${inner}</${elementName}>`;
    })
    .join('');
}

/**
 * Serialises the children of a `<Trans>` element the way react-i18next builds
 * its default value: elements become `<index>…</index>`, basic HTML elements
 * listed in `keepBasicHtmlNodesFor` keep their tag name.
 */
export function serializeTransChildren(children: JsxChild[], keepBasicHtmlNodesFor: readonly string[]): string {
  return render(parseChildren(children), keepBasicHtmlNodesFor);
}
