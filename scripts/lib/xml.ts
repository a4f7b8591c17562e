import { XMLParser, XMLValidator } from 'fast-xml-parser';
import path from 'node:path';

import { toPosixRelative } from './io.js';

export type XmlNode = Record<string, unknown>;

const ATTRIBUTE_PREFIX = '@_';

export function isRecord(value: unknown): value is XmlNode {
  return Boolean(value) && typeof value === 'object' && !Array.isArray(value);
}

export function asArray(value: unknown): unknown[] {
  if (value === undefined || value === null) {
    return [];
  }
  return Array.isArray(value) ? value : [value];
}

export function childNodes(node: XmlNode, tag: string): XmlNode[] {
  return asArray(node[tag]).filter(isRecord);
}

export function textOf(value: unknown): string | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    const text = String(value).trim();
    return text.length > 0 ? text : undefined;
  }
  if (isRecord(value) && '#text' in value) {
    return textOf(value['#text']);
  }
  return undefined;
}

export function childText(node: XmlNode, tag: string): string | undefined {
  return textOf(node[tag]);
}

export function attributeOf(node: XmlNode, name: string): string | undefined {
  return textOf(node[`${ATTRIBUTE_PREFIX}${name}`]);
}

export function describeSource(filePath: string): string {
  return path.isAbsolute(filePath) ? toPosixRelative(filePath) : filePath;
}

/**
 * Parse an XML document, failing on markup that does not validate. Tags named
 * in `arrayTags` always come back as arrays, whatever their count.
 */
export function parseXml(text: string, source: string, arrayTags: readonly string[]): XmlNode {
  const validation = XMLValidator.validate(text);
  if (validation !== true) {
    throw new Error(
      `${describeSource(source)} is not well-formed XML (line ${validation.err.line}): ${validation.err.msg}`
    );
  }

  const arrays = new Set(arrayTags);
  const parser = new XMLParser({
    ignoreAttributes: false,
    attributeNamePrefix: ATTRIBUTE_PREFIX,
    parseTagValue: false,
    parseAttributeValue: false,
    isArray: (tagName: string) => arrays.has(tagName)
  });

  const doc: unknown = parser.parse(text);
  if (!isRecord(doc)) {
    throw new Error(`${describeSource(source)} has no root element`);
  }
  return doc;
}
