/**
 * XML adapter
 *
 * Wraps @xmldom/xmldom so the rest of the package works on a small
 * tagged-union tree (`XmlNode`) instead of live DOM nodes. The DOM itself is
 * only kept around for splicing, where document order and untouched content
 * must survive re-serialization.
 */

import { DOMParser, XMLSerializer } from '@xmldom/xmldom';
import { SvgMetadataError, describeError, isSvgMetadataError } from './errors.js';
import { XmlElement, XmlNode } from './types.js';

const ELEMENT_NODE = 1;
const TEXT_NODE = 3;
const CDATA_SECTION_NODE = 4;

const INDENT = '  ';

// ── Parse / serialize ─────────────────────────────────────────────

/**
 * Parse XML text into a DOM document.
 *
 * Every parser diagnostic is fatal: xmldom reports several well-formedness
 * violations (mismatched end tags, unclosed attributes) only as warnings and
 * then repairs the tree. The internal DTD subset is applied first (see
 * `resolveInternalSubset`).
 */
export function parseXml(text: string): Document {
  let failure: SvgMetadataError | undefined;
  // xmldom re-reports a thrown handler error as "element parse error"; keep the first one
  const fail = (message: unknown): never => {
    failure ??= new SvgMetadataError('ParseFailure', `Malformed XML: ${String(message)}`);
    throw failure;
  };
  const parser = new DOMParser({
    errorHandler: { warning: fail, error: fail, fatalError: fail },
  });

  let document: Document;
  try {
    document = parser.parseFromString(resolveInternalSubset(text), 'text/xml');
  } catch (error) {
    if (isSvgMetadataError(error)) throw error;
    throw new SvgMetadataError('ParseFailure', `Malformed XML: ${describeError(error)}`, { cause: error });
  }

  if (failure) throw failure;
  if (!document || !document.documentElement) {
    throw new SvgMetadataError('ParseFailure', 'Document has no root element');
  }
  return document;
}

export function serializeXml(node: Node): string {
  return new XMLSerializer().serializeToString(node);
}

// ── DOM → XmlNode ─────────────────────────────────────────────────

/**
 * Convert a DOM element into an `XmlElement`. Comments and processing
 * instructions are dropped, as are whitespace-only text runs.
 */
export function toXmlElement(domElement: Element): XmlElement {
  const attributes: Record<string, string> = {};
  for (let i = 0; i < domElement.attributes.length; i++) {
    const attr = domElement.attributes.item(i);
    if (attr) attributes[attr.name] = attr.value;
  }

  const children: XmlNode[] = [];
  for (let i = 0; i < domElement.childNodes.length; i++) {
    const child = domElement.childNodes.item(i);
    if (!child) continue;
    if (isElement(child)) {
      children.push(toXmlElement(child));
    } else if (child.nodeType === TEXT_NODE || child.nodeType === CDATA_SECTION_NODE) {
      const value = child.nodeValue ?? '';
      if (value.trim() !== '') children.push({ kind: 'text', value });
    }
  }

  return { kind: 'element', name: domElement.nodeName, attributes, children };
}

function isElement(node: Node): node is Element {
  return node.nodeType === ELEMENT_NODE;
}

// ── Navigation ────────────────────────────────────────────────────

export function childElements(parent: XmlElement): XmlElement[] {
  return parent.children.filter((child): child is XmlElement => child.kind === 'element');
}

export function isNamed(node: XmlElement, aliases: readonly string[]): boolean {
  return aliases.includes(node.name);
}

/** First child element whose name matches one of the aliases */
export function findChild(
  parent: XmlElement | undefined,
  aliases: readonly string[]
): XmlElement | undefined {
  if (!parent) return undefined;
  return childElements(parent).find(child => isNamed(child, aliases));
}

export function findChildren(parent: XmlElement, aliases: readonly string[]): XmlElement[] {
  return childElements(parent).filter(child => isNamed(child, aliases));
}

/** Attribute value, or '' when absent */
export function attributeOf(node: XmlElement | undefined, name: string): string {
  return node?.attributes[name] ?? '';
}

/**
 * Scalar value of a node. A text node yields its value; an element yields
 * its own character data (not its descendants'). Text is returned as
 * written; whitespace-only runs were already dropped by `toXmlElement`.
 */
export function contentOf(node: XmlNode | undefined): string {
  if (!node) return '';
  switch (node.kind) {
    case 'text':
      return node.value;
    case 'element':
      return node.children
        .map(child => (child.kind === 'text' ? child.value : ''))
        .join('');
  }
}

// ── Building & rendering ──────────────────────────────────────────

/** Shorthand for building `XmlElement` trees */
export function element(
  name: string,
  attributes: Record<string, string> = {},
  children: Array<XmlNode | string> = []
): XmlElement {
  return {
    kind: 'element',
    name,
    attributes,
    children: children
      .filter(child => child !== '')
      .map((child): XmlNode => (typeof child === 'string' ? { kind: 'text', value: child } : child)),
  };
}

/** Replace the five XML special characters with entity references */
export function escapeEntities(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/'/g, '&apos;')
    .replace(/"/g, '&quot;');
}

/**
 * Pretty-print an element tree, one element per line with two-space
 * indentation. Elements holding only text stay on one line; empty
 * elements self-close. Output ends with a newline.
 */
export function renderXml(root: XmlElement, depth = 0): string {
  const pad = INDENT.repeat(depth);
  const attrs = Object.entries(root.attributes)
    .map(([name, value]) => ` ${name}="${escapeEntities(value)}"`)
    .join('');

  if (root.children.length === 0) {
    return `${pad}<${root.name}${attrs} />\n`;
  }

  if (root.children.every(child => child.kind === 'text')) {
    const text = root.children.map(child => (child.kind === 'text' ? child.value : '')).join('');
    return `${pad}<${root.name}${attrs}>${escapeEntities(text)}</${root.name}>\n`;
  }

  let out = `${pad}<${root.name}${attrs}>\n`;
  for (const child of root.children) {
    out += child.kind === 'element'
      ? renderXml(child, depth + 1)
      : `${pad}${INDENT}${escapeEntities(child.value)}\n`;
  }
  out += `${pad}</${root.name}>\n`;
  return out;
}

// ── Preamble ──────────────────────────────────────────────────────

/**
 * Text preceding the root element: XML declaration, comments, processing
 * instructions, a DOCTYPE (with internal subset) and the whitespace between
 * them, returned verbatim.
 */
export function extractPreamble(text: string): string {
  let pos = 0;
  while (pos < text.length) {
    const ch = text[pos];
    if (ch === '\uFEFF' || /\s/.test(ch)) {
      pos++;
    } else if (text.startsWith('<?', pos)) {
      pos = skipPast(text, pos, '?>');
    } else if (text.startsWith('<!--', pos)) {
      pos = skipPast(text, pos, '-->');
    } else if (text.startsWith('<!', pos)) {
      pos = skipDeclaration(text, pos);
    } else {
      break;
    }
  }
  return text.slice(0, pos);
}

function skipPast(text: string, from: number, terminator: string): number {
  const end = text.indexOf(terminator, from);
  return end < 0 ? text.length : end + terminator.length;
}

function skipDeclaration(text: string, from: number): number {
  let inSubset = false;
  for (let i = from; i < text.length; i++) {
    const ch = text[i];
    if (ch === '[') inSubset = true;
    else if (ch === ']') inSubset = false;
    else if (ch === '>' && !inSubset) return i + 1;
  }
  return text.length;
}

// ── Internal DTD subset ───────────────────────────────────────────

/** Upper bound on the length of one expanded entity value */
export const MAX_ENTITY_LENGTH = 1024 * 1024;

const ENTITY_DECLARATION = /<!ENTITY\s+([A-Za-z_:][\w.:-]*)\s+(["'])([\s\S]*?)\2\s*>/g;
const ENTITY_REFERENCE = /&([A-Za-z_:][\w.:-]*);/g;
// CDATA sections and comments are matched first so references inside them stay literal
const BODY_REFERENCE = /<!\[CDATA\[[\s\S]*?\]\]>|<!--[\s\S]*?-->|&([A-Za-z_:][\w.:-]*);/g;

interface Doctype {
  start: number;
  /** Offset just past the closing `>` of the DOCTYPE */
  end: number;
  /** Offset of `[`, or -1 without an internal subset */
  open: number;
  /** Text between `[` and `]` */
  subset: string;
}

function findDoctype(text: string): Doctype | undefined {
  const start = extractPreamble(text).indexOf('<!DOCTYPE');
  if (start < 0) return undefined;
  const end = skipDeclaration(text, start);
  const open = text.indexOf('[', start);
  const close = text.lastIndexOf(']', end);
  if (open < 0 || open >= end || close <= open) return { start, end, open: -1, subset: '' };
  return { start, end, open, subset: text.slice(open + 1, close) };
}

/**
 * Internal general entities of a DTD subset, with references to entities
 * declared earlier already replaced. Parameter and external entities are
 * skipped; the first declaration of a name wins.
 */
export function internalEntities(subset: string): Map<string, string> {
  const entities = new Map<string, string>();
  for (const [, name, , raw] of subset.matchAll(ENTITY_DECLARATION)) {
    if (entities.has(name)) continue;
    const value = raw.replace(ENTITY_REFERENCE, (ref: string, inner: string) => entities.get(inner) ?? ref);
    if (value.length > MAX_ENTITY_LENGTH) {
      throw new SvgMetadataError('ParseFailure', `Entity '${name}' expands beyond ${MAX_ENTITY_LENGTH} characters`);
    }
    entities.set(name, value);
  }
  return entities;
}

/**
 * Apply the internal DTD subset to the text after the DOCTYPE: references
 * to its general entities are replaced by their values and the subset
 * itself is dropped from the declaration, since xmldom reads neither.
 * Text without an internal subset is returned unchanged.
 */
export function resolveInternalSubset(text: string): string {
  const doctype = findDoctype(text);
  if (!doctype || doctype.open < 0) return text;
  const entities = internalEntities(doctype.subset);

  const declaration = `${text.slice(doctype.start, doctype.open).trimEnd()}>`;
  const body = text
    .slice(doctype.end)
    .replace(BODY_REFERENCE, (match: string, name: string | undefined) =>
      name === undefined ? match : entities.get(name) ?? match
    );
  return text.slice(0, doctype.start) + declaration + body;
}
