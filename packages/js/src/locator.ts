/**
 * RDF Locator
 *
 * Finds the rdf:RDF block of a document. Accepted shapes:
 *
 *   <svg><metadata><rdf:RDF>…</rdf:RDF></metadata></svg>   (any metadata alias)
 *   <metadata><rdf:RDF>…</rdf:RDF></metadata>
 *   <svg><rdf:RDF>…</rdf:RDF></svg>                         (bare, lenient only)
 *   <rdf:RDF>…</rdf:RDF>                                     (bare, lenient only)
 *
 * Every metadata container at those two levels is searched, so an empty
 * metadata element hides neither a later container nor a bare RDF root.
 */

import { SvgMetadataError } from './errors.js';
import { METADATA_ALIASES, RDF_ROOT_ALIASES } from './vocabulary.js';
import { XmlElement } from './types.js';
import { childElements, isNamed } from './xml.js';

export interface RdfLocation {
  rdf: XmlElement;
  /** Whether the RDF root sat inside a metadata element */
  wrapped: boolean;
  /**
   * Element-child indices leading from the document element to the RDF
   * root; empty when the document element is the RDF root itself.
   */
  path: number[];
}

interface Match {
  node: XmlElement;
  path: number[];
}

/** The document element and its direct children with a matching name, in document order */
function findAllAtTop(root: XmlElement, aliases: readonly string[]): Match[] {
  const matches: Match[] = isNamed(root, aliases) ? [{ node: root, path: [] }] : [];
  childElements(root).forEach((child, index) => {
    if (isNamed(child, aliases)) matches.push({ node: child, path: [index] });
  });
  return matches;
}

/**
 * Locate the RDF root under `documentElement`.
 *
 * @throws SvgMetadataError `MissingRdfRoot` when no RDF root exists, or
 *   `MissingMetadataWrapper` when `strict` and the root is not wrapped
 */
export function locateRdf(documentElement: XmlElement, strict = false): RdfLocation {
  for (const metadata of findAllAtTop(documentElement, METADATA_ALIASES)) {
    const index = childElements(metadata.node).findIndex(child => isNamed(child, RDF_ROOT_ALIASES));
    if (index >= 0) {
      return {
        rdf: childElements(metadata.node)[index],
        wrapped: true,
        path: [...metadata.path, index],
      };
    }
  }

  const [bare] = findAllAtTop(documentElement, RDF_ROOT_ALIASES);
  if (!bare) {
    throw new SvgMetadataError('MissingRdfRoot', 'No rdf:RDF element found in document');
  }
  if (strict) {
    throw new SvgMetadataError(
      'MissingMetadataWrapper',
      'rdf:RDF element is not wrapped in a <metadata> element'
    );
  }
  return { rdf: bare.node, wrapped: false, path: bare.path };
}
