/**
 * @svgmeta/core — RDF metadata for SVG documents
 *
 * Reads the Creative Commons / Dublin Core "Work" block that SVG editors
 * embed in `<metadata>`, exposes it as a flat record, and writes it back as
 * RDF/XML, either standalone or spliced into the original document.
 */

// Main record
export { SvgMetadata, DEFAULT_LOAD_OPTIONS } from './metadata.js';

// Types
export * from './types.js';
export * from './errors.js';

// Vocabulary and license table
export * from './vocabulary.js';
export * from './licenses.js';

// Pipeline stages (for direct access)
export { locateRdf, type RdfLocation } from './locator.js';
export { extractWork, applyAgentDefaults, emptyFields, METADATA_FIELD_NAMES } from './extractor.js';
export { buildRdf, toRdf } from './serializer.js';
export { spliceRdf, type RetainedDocument, type SpliceResult } from './splicer.js';
export {
  assertSourceAllowed, classifySource, isSourceAllowed, resolveSource, resolveSourceSync, type SourceKind,
} from './source.js';
export {
  parseXml, toXmlElement, contentOf, escapeEntities, renderXml, extractPreamble, resolveInternalSubset,
} from './xml.js';
export * from './jsonld.js';
export * from './schemas.js';
export * from './client.js';
