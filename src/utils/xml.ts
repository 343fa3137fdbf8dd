import { Parser } from 'xml2js';

export type XmlValue = string | XmlNode | XmlValue[];

export interface XmlNode {
  [key: string]: XmlValue | undefined;
}

export function isXmlNode(value: unknown): value is XmlNode {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse with attributes merged into their element, single children unwrapped
 * and the root element dropped. An empty element (`<w:b/>`) becomes ''.
 */
export async function parseXml(xml: string): Promise<XmlNode> {
  const parser = new Parser({
    explicitArray: false,
    ignoreAttrs: false,
    mergeAttrs: true,
    xmlns: false,
    explicitRoot: false
  });
  const result: unknown = await parser.parseStringPromise(xml);
  return isXmlNode(result) ? result : {};
}

export function asArray(value: XmlValue | undefined): XmlValue[] {
  if (value === undefined) return [];
  return Array.isArray(value) ? value : [value];
}

export function children(node: XmlNode | undefined, name: string): XmlNode[] {
  const nodes: XmlNode[] = [];
  for (const value of asArray(node?.[name])) {
    if (isXmlNode(value)) {
      nodes.push(value);
    } else if (typeof value === 'string') {
      // Element without attributes or children
      nodes.push({});
    }
  }
  return nodes;
}

export function child(node: XmlNode | undefined, name: string): XmlNode | undefined {
  return children(node, name)[0];
}

export function attr(node: XmlNode | undefined, name: string): string | undefined {
  const value = node?.[name];
  return typeof value === 'string' ? value : undefined;
}

/**
 * Value of a `w:val`-style attribute on a child element.
 */
export function childValue(node: XmlNode | undefined, name: string, attribute = 'w:val'): string | undefined {
  return attr(child(node, name), attribute);
}
