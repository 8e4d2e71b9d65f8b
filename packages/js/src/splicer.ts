/**
 * Document Splicer
 *
 * Swaps freshly rendered RDF into a retained source document. Everything
 * outside the RDF block is re-emitted from the retained DOM, so content is
 * preserved structurally but not byte for byte.
 */

import { SvgMetadataError } from './errors.js';
import { parseXml, serializeXml } from './xml.js';

/** Source document kept by an extraction with `retainXml` */
export interface RetainedDocument {
  document: Document;
  /** Declaration, comments and DOCTYPE that preceded the root element, verbatim */
  preamble: string;
  /** Element-child indices from the document element to the RDF root */
  path: number[];
}

export interface SpliceResult {
  text: string;
  /** Retained state pointing at the newly inserted RDF root */
  retained: RetainedDocument;
}

function elementChildren(node: Element): Element[] {
  const out: Element[] = [];
  for (let i = 0; i < node.childNodes.length; i++) {
    const child = node.childNodes.item(i);
    if (child && isElementNode(child)) out.push(child);
  }
  return out;
}

function isElementNode(node: Node): node is Element {
  return node.nodeType === 1;
}

function nodeAtPath(root: Element, path: readonly number[]): Element {
  let current = root;
  for (const index of path) {
    const next = elementChildren(current)[index];
    if (!next) {
      throw new SvgMetadataError('NotRetained', 'Retained document no longer contains the RDF block');
    }
    current = next;
  }
  return current;
}

/**
 * Replace the RDF block of `retained` with `rdf` and return the complete
 * document text, preamble first.
 */
export function spliceRdf(retained: RetainedDocument, rdf: string): SpliceResult {
  const fragment = parseXml(rdf);

  // The RDF block is the whole document: the fragment replaces it outright.
  if (retained.path.length === 0) {
    const next: RetainedDocument = { ...retained, document: fragment };
    return { text: retained.preamble + serializeXml(fragment.documentElement), retained: next };
  }

  const { document } = retained;
  const target = nodeAtPath(document.documentElement, retained.path);
  const parent = target.parentNode;
  if (!parent) {
    throw new SvgMetadataError('NotRetained', 'Retained RDF block is detached from its document');
  }
  parent.replaceChild(document.importNode(fragment.documentElement, true), target);

  return { text: retained.preamble + serializeXml(document.documentElement), retained };
}
