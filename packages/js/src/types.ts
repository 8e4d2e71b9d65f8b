/**
 * Core type definitions for svgmeta
 */

import type { Readable } from 'stream';

// ── XML Tree ──────────────────────────────────────────────────────

/** Character data (text or CDATA) */
export interface XmlText {
  kind: 'text';
  value: string;
}

/** An element with its qualified name as written in the source */
export interface XmlElement {
  kind: 'element';
  name: string;
  attributes: Record<string, string>;
  children: XmlNode[];
}

export type XmlNode = XmlText | XmlElement;

// ── Metadata Fields ───────────────────────────────────────────────

/** The flat field model of a Work. Unset values are empty strings. */
export interface MetadataFields {
  title: string;
  description: string;
  /** Raw dc:subject text; blank whenever the subject held a keyword Bag */
  subject: string;
  creator: string;
  creatorUrl: string;
  /** Rights holder (dc:rights) */
  owner: string;
  ownerUrl: string;
  publisher: string;
  publisherUrl: string;
  /** License URI, or the label "Public Domain" */
  license: string;
  licenseDate: string;
  language: string;
  date: string;
  /** rdf:about of the Work node */
  aboutUrl: string;
}

export type MetadataField = keyof MetadataFields;

/** Field values plus keyword set, as produced by extraction */
export interface ExtractedMetadata {
  fields: MetadataFields;
  keywords: string[];
}

// ── Errors ────────────────────────────────────────────────────────

export type SvgMetadataErrorCode =
  | 'MissingInput'
  | 'FileNotFound'
  | 'ReadFailure'
  | 'SourceNotAllowed'
  | 'FetchFailure'
  | 'DocumentTooLarge'
  | 'ParseFailure'
  | 'MissingRdfRoot'
  | 'MissingMetadataWrapper'
  | 'MissingWorkElement'
  | 'NotRetained';

// ── Inputs & Options ──────────────────────────────────────────────

/**
 * Anything extraction can read from: a path, literal XML text, an http(s)
 * or ftp URL, a buffer, or an open stream.
 */
export type MetadataSource = string | Buffer | Readable;

/** Options for a single extraction call */
export interface LoadOptions {
  /** Keep the parsed document and its preamble so `toSvg()` can splice into it */
  retainXml?: boolean;
  /** Maximum input size in bytes */
  maxDocumentSize?: number;
  /** Timeout for URL retrieval in milliseconds */
  fetchTimeout?: number;
}

/** Sources a caller may name besides literal XML text */
export interface SourceAllowlist {
  /** Directories whose files may be read; with none, no path is readable */
  allowedRoots?: string[];
  /** Whether URLs may be fetched */
  allowUrls?: boolean;
}

/** Seed values accepted by the SvgMetadata constructor */
export interface MetadataSeed extends Partial<MetadataFields> {
  /** Alias for creator */
  author?: string;
  keywords?: string[];
  strictValidation?: boolean;
}
