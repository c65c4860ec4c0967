/**
 * Thin element tree over fast-xml-parser's ordered output.
 *
 * Namespace prefixes are removed, so `tei:p` and a default-namespace `p`
 * resolve to the same element name. Text nodes keep their whitespace;
 * callers trim.
 */

import { XMLParser, XMLValidator } from 'fast-xml-parser';
import type { XmlElement, XmlNode } from './types';
import { MalformedXmlError, MissingRootError } from './errors/parse-errors';

const parser = new XMLParser({
  preserveOrder: true,
  ignoreAttributes: true,
  removeNSPrefix: true,
  trimValues: false,
  parseTagValue: false,
  ignoreDeclaration: true,
  ignorePiTags: true,
  htmlEntities: true,
});

const TEXT_KEY = '#text';
const ATTRIBUTES_KEY = ':@';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toNodes(raw: unknown): XmlNode[] {
  if (!Array.isArray(raw)) {
    return [];
  }

  const nodes: XmlNode[] = [];
  for (const entry of raw) {
    if (!isRecord(entry)) {
      continue;
    }
    for (const [key, value] of Object.entries(entry)) {
      if (key === ATTRIBUTES_KEY) {
        continue;
      }
      if (key === TEXT_KEY) {
        nodes.push({ type: 'text', text: String(value) });
        continue;
      }
      // processing instructions, comments, cdata markers
      if (key.startsWith('?') || key.startsWith('#')) {
        continue;
      }
      nodes.push({ type: 'element', name: key, children: toNodes(value) });
    }
  }
  return nodes;
}

/**
 * Parse an XML string into its root element.
 * @throws MalformedXmlError when the markup is not well-formed
 * @throws MissingRootError when the document holds no element
 */
export function readXmlRoot(xml: string, filePath: string): XmlElement {
  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    throw new MalformedXmlError(
      filePath,
      validation.err.msg,
      validation.err.line,
    );
  }

  const root = toNodes(parser.parse(xml)).find(
    (node): node is XmlElement => node.type === 'element',
  );
  if (!root) {
    throw new MissingRootError(filePath);
  }
  return root;
}

export function childElements(element: XmlElement, name: string): XmlElement[] {
  return element.children.filter(
    (node): node is XmlElement => node.type === 'element' && node.name === name,
  );
}

/**
 * All descendants named `name`, in document (pre-)order. The element
 * itself is not included.
 */
export function descendants(element: XmlElement, name: string): XmlElement[] {
  const found: XmlElement[] = [];
  const visit = (node: XmlElement): void => {
    for (const child of node.children) {
      if (child.type !== 'element') {
        continue;
      }
      if (child.name === name) {
        found.push(child);
      }
      visit(child);
    }
  };
  visit(element);
  return found;
}

/**
 * First match of a child path (`a/b/c`) anchored at any descendant depth.
 */
export function findFirst(
  element: XmlElement,
  path: readonly string[],
): XmlElement | undefined {
  const [head, ...rest] = path;
  if (head === undefined) {
    return undefined;
  }

  for (const anchor of descendants(element, head)) {
    let frontier: XmlElement[] = [anchor];
    for (const segment of rest) {
      frontier = frontier.flatMap((node) => childElements(node, segment));
    }
    if (frontier.length > 0) {
      return frontier[0];
    }
  }
  return undefined;
}

/**
 * Concatenated text of the element and every nested element, in order.
 */
export function innerText(element: XmlElement): string {
  let text = '';
  for (const child of element.children) {
    text += child.type === 'text' ? child.text : innerText(child);
  }
  return text;
}
