/**
 * RDF vocabulary used by SVG metadata blocks
 *
 * SVG editors disagree on prefixes: Inkscape writes `cc:Work` under an
 * `svg:metadata` wrapper, older clip-art tools write a bare `Work` with the
 * Creative Commons namespace as default, and some hand-written files use
 * `ns:`. Element lookups therefore go through alias lists rather than
 * namespace resolution.
 */

// ── Namespaces ────────────────────────────────────────────────────
/** Creative Commons REL namespace, the default namespace of generated RDF */
export const CC_NAMESPACE = 'http://web.resource.org/cc/';
/** Dublin Core elements 1.1 */
export const DC_NAMESPACE = 'http://purl.org/dc/elements/1.1/';
/** RDF syntax namespace */
export const RDF_NAMESPACE = 'http://www.w3.org/1999/02/22-rdf-syntax-ns#';

// ── Element aliases ───────────────────────────────────────────────
export const METADATA_ALIASES = ['metadata', 'svg:metadata'] as const;
export const RDF_ROOT_ALIASES = ['rdf:RDF', 'RDF:RDF', 'RDF'] as const;
export const WORK_ALIASES = ['cc:Work', 'Work', 'ns:Work'] as const;
export const AGENT_ALIASES = ['cc:Agent', 'Agent'] as const;
export const LICENSE_ALIASES = ['cc:license', 'license', 'ns:license'] as const;
export const BAG_ALIASES = ['rdf:Bag'] as const;
export const LIST_ITEM_ALIASES = ['rdf:li'] as const;

// Dublin Core properties
export const DC_TITLE = 'dc:title';
export const DC_DESCRIPTION = 'dc:description';
export const DC_SUBJECT = 'dc:subject';
export const DC_CREATOR = 'dc:creator';
/** Rights holder, surfaced as `owner` */
export const DC_RIGHTS = 'dc:rights';
export const DC_PUBLISHER = 'dc:publisher';
export const DC_DATE = 'dc:date';
export const DC_LANGUAGE = 'dc:language';
export const DC_FORMAT = 'dc:format';
export const DC_TYPE = 'dc:type';

// ── Attributes ────────────────────────────────────────────────────
export const ATTR_ABOUT = 'rdf:about';
export const ATTR_RESOURCE = 'rdf:resource';

// ── Fixed values ──────────────────────────────────────────────────
export const DEFAULT_LANGUAGE = 'en';
/** Keyword assigned when a document carries no keyword Bag */
export const UNSORTED_KEYWORD = 'unsorted';
export const SVG_MEDIA_TYPE = 'image/svg+xml';
export const STILL_IMAGE_TYPE = 'http://purl.org/dc/dcmitype/StillImage';
