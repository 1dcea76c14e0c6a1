/**
 * Helpers for the ordered node form fast-xml-parser produces with
 * `preserveOrder`: `{ tag: children[], ':@': { '@_attr': value } }`, text
 * as `{ '#text': value }`.
 */
import type { XmlPayload } from '@dat-curator/shared-types';

export const ATTRIBUTES_KEY = ':@';
export const TEXT_KEY = '#text';
export const ATTRIBUTE_PREFIX = '@_';

export function isXmlNode(value: unknown): value is XmlPayload {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function tagOf(node: XmlPayload): string | undefined {
  return Object.keys(node).find((key) => key !== ATTRIBUTES_KEY && key !== TEXT_KEY);
}

export function childNodes(node: XmlPayload): XmlPayload[] {
  const tag = tagOf(node);
  if (tag === undefined) return [];
  const children = node[tag];
  return Array.isArray(children) ? children.filter(isXmlNode) : [];
}

export function attribute(node: XmlPayload, name: string): string | undefined {
  const attributes = node[ATTRIBUTES_KEY];
  if (!isXmlNode(attributes)) return undefined;
  const value = attributes[`${ATTRIBUTE_PREFIX}${name}`];
  return typeof value === 'string' ? value : undefined;
}

/** Concatenated text children, or null when the element has none */
export function textContent(node: XmlPayload): string | null {
  const parts: string[] = [];
  for (const child of childNodes(node)) {
    const text = child[TEXT_KEY];
    if (typeof text === 'string' || typeof text === 'number') {
      parts.push(String(text));
    }
  }
  return parts.length > 0 ? parts.join('') : null;
}

export function element(tag: string, children: XmlPayload[] = []): XmlPayload {
  return { [tag]: children };
}

export function textElement(tag: string, text: string): XmlPayload {
  return element(tag, [{ [TEXT_KEY]: text }]);
}
