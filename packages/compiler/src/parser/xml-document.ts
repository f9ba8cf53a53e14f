import { XMLParser, XMLValidator } from 'fast-xml-parser';
import { ParseError } from '../core/errors.js';
import { asArray, isRecord, type UnknownRecord } from '../core/guards.js';

// ── Element access ───────────────────────────────────────────────────
//
// fast-xml-parser yields plain objects: attributes under `@_name`, text
// under `#text`, repeated children as arrays and single ones as values.
// Namespace prefixes are stripped on both elements and attributes.

export type XmlElement = UnknownRecord;

const TEXT = '#text';

function toElement(value: unknown): XmlElement {
  if (isRecord(value)) return value;
  return { [TEXT]: typeof value === 'string' || typeof value === 'number' ? String(value) : '' };
}

export function children(element: XmlElement, name: string): XmlElement[] {
  return asArray(element[name]).map(toElement);
}

/** First element along a child path, e.g. `child(view, 'viewAttributes', 'viewAttribute')`. */
export function child(element: XmlElement, ...path: string[]): XmlElement | undefined {
  let current: XmlElement | undefined = element;
  for (const name of path) {
    if (!current) return undefined;
    current = children(current, name)[0];
  }
  return current;
}

/** All elements at the end of a child path. */
export function descendants(element: XmlElement, ...path: string[]): XmlElement[] {
  let level: XmlElement[] = [element];
  for (const name of path) {
    level = level.flatMap((el) => children(el, name));
  }
  return level;
}

export function attr(element: XmlElement, name: string): string | undefined {
  const value = element[`@_${name}`];
  return typeof value === 'string' ? value : undefined;
}

export function flag(element: XmlElement, name: string): boolean {
  return attr(element, name)?.toLowerCase() === 'true';
}

export function intAttr(element: XmlElement, name: string): number | undefined {
  const value = attr(element, name);
  if (value === undefined || !/^\d+$/.test(value)) return undefined;
  return Number(value);
}

export function text(element: XmlElement): string {
  const value = element[TEXT];
  return typeof value === 'string' ? value.trim() : '';
}

// ── Document loading ─────────────────────────────────────────────────

export interface XmlDocument {
  readonly rootName: string;
  readonly root: XmlElement;
}

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  removeNSPrefix: true,
  parseTagValue: false,
  parseAttributeValue: false,
  ignoreDeclaration: true,
  ignorePiTags: true,
  textNodeName: TEXT,
  trimValues: true,
});

export function readXmlDocument(input: string | Uint8Array): XmlDocument {
  const source = typeof input === 'string' ? input : new TextDecoder().decode(input);
  if (source.trim() === '') {
    throw new ParseError('Empty XML document');
  }

  const verdict = XMLValidator.validate(source);
  if (verdict !== true) {
    throw new ParseError(`Malformed XML: ${verdict.err.msg}`, { line: verdict.err.line });
  }

  const parsed: unknown = parser.parse(source);
  if (!isRecord(parsed)) {
    throw new ParseError('XML document has no root element');
  }

  const rootName = Object.keys(parsed).find((k) => !k.startsWith('?') && k !== TEXT);
  const root = rootName === undefined ? undefined : parsed[rootName];
  if (rootName === undefined || root === undefined) {
    throw new ParseError('XML document has no root element');
  }
  return { rootName, root: toElement(root) };
}
