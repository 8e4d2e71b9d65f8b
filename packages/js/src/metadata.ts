/**
 * SvgMetadata — the metadata record of one SVG document
 *
 * Holds the Work fields and keyword set, populates them from a source
 * document and renders them back as RDF/XML, plain text, JSON-LD or a
 * complete SVG document.
 *
 * @example
 * ```ts
 * const meta = new SvgMetadata();
 * if (!meta.parseSync('apple.svg', { retainXml: true })) {
 *   throw new Error(`Could not parse apple.svg: ${meta.errorMessage}`);
 * }
 * if (meta.title === '') meta.title = 'Unknown';
 * if (meta.hasKeyword('unsorted') && meta.keywords.length > 1) {
 *   meta.removeKeyword('unsorted');
 * }
 * fs.writeFileSync('apple.svg', meta.toSvg());
 * ```
 */

import { SvgMetadataError, isSvgMetadataError } from './errors.js';
import { METADATA_FIELD_NAMES, emptyFields, extractWork } from './extractor.js';
import { WorkDocument, toJsonLd, toNQuads } from './jsonld.js';
import { locateRdf } from './locator.js';
import { LoadOptionsSchema, MetadataSeedSchema, validate } from './schemas.js';
import { toRdf } from './serializer.js';
import { ResolveLimits, resolveSource, resolveSourceSync } from './source.js';
import { RetainedDocument, spliceRdf } from './splicer.js';
import {
  LoadOptions, MetadataFields, MetadataSeed, MetadataSource, SvgMetadataErrorCode,
} from './types.js';
import { DEFAULT_LANGUAGE } from './vocabulary.js';
import { extractPreamble, parseXml, toXmlElement } from './xml.js';

// ── Default Load Options ──────────────────────────────────────────

export const DEFAULT_LOAD_OPTIONS: Required<LoadOptions> = {
  retainXml: false,
  maxDocumentSize: 10 * 1024 * 1024, // 10 MB
  fetchTimeout: 30_000, // 30 seconds
};

interface ResolvedLoadOptions extends ResolveLimits {
  retainXml: boolean;
}

export class SvgMetadata {
  /** Reject documents whose RDF block is not wrapped in `<metadata>` */
  strictValidation: boolean;

  private fields: MetadataFields;
  private keywordSet: Set<string>;
  private retained: RetainedDocument | undefined;
  private lastError: SvgMetadataError | undefined;

  constructor(seed: MetadataSeed = {}) {
    const { author, keywords, strictValidation, ...values } = validate(MetadataSeedSchema, seed);

    this.fields = emptyFields();
    for (const name of METADATA_FIELD_NAMES) {
      const value = values[name];
      if (value !== undefined) this.fields[name] = value;
    }
    if (values.creator === undefined && author !== undefined) this.fields.creator = author;
    if (this.fields.language === '') this.fields.language = DEFAULT_LANGUAGE;

    this.keywordSet = new Set(keywords ?? []);
    this.strictValidation = strictValidation ?? false;
  }

  // ── Extraction ────────────────────────────────────────────────

  /**
   * Populate the record from a path, literal XML text, URL, buffer or stream.
   *
   * Resolves to false when anything fails; `errorMessage` and `errorCode`
   * then describe the failure and every field keeps its previous value.
   */
  async parse(source: MetadataSource | undefined | null, options: LoadOptions = {}): Promise<boolean> {
    const resolved = this.resolveOptions(options);
    return this.attempt(async () => {
      const text = await resolveSource(source, resolved);
      this.extractFrom(text, resolved);
    });
  }

  /**
   * Synchronous `parse()` for paths, literal XML text and buffers.
   */
  parseSync(source: string | Buffer | undefined | null, options: LoadOptions = {}): boolean {
    const resolved = this.resolveOptions(options);
    try {
      this.extractFrom(resolveSourceSync(source, resolved), resolved);
    } catch (error) {
      return this.recordFailure(error);
    }
    this.lastError = undefined;
    return true;
  }

  private async attempt(run: () => Promise<void>): Promise<boolean> {
    try {
      await run();
    } catch (error) {
      return this.recordFailure(error);
    }
    this.lastError = undefined;
    return true;
  }

  private recordFailure(error: unknown): false {
    if (!isSvgMetadataError(error)) throw error;
    this.lastError = error;
    return false;
  }

  private resolveOptions(options: LoadOptions): ResolvedLoadOptions {
    const valid = validate(LoadOptionsSchema, options);
    return {
      retainXml: valid.retainXml ?? DEFAULT_LOAD_OPTIONS.retainXml,
      maxDocumentSize: valid.maxDocumentSize ?? DEFAULT_LOAD_OPTIONS.maxDocumentSize,
      fetchTimeout: valid.fetchTimeout ?? DEFAULT_LOAD_OPTIONS.fetchTimeout,
    };
  }

  /** All steps run before any state changes, so a failure leaves the record untouched. */
  private extractFrom(text: string, options: ResolvedLoadOptions): void {
    const document = parseXml(text);
    const location = locateRdf(toXmlElement(document.documentElement), this.strictValidation);
    const { fields, keywords } = extractWork(location.rdf);

    this.fields = fields;
    this.keywordSet = new Set(keywords);
    this.retained = options.retainXml
      ? { document, preamble: extractPreamble(text), path: location.path }
      : undefined;
  }

  /** Description of the latest failed extraction, or '' */
  get errorMessage(): string {
    return this.lastError?.message ?? '';
  }

  get errorCode(): SvgMetadataErrorCode | undefined {
    return this.lastError?.code;
  }

  /** Whether the source document was kept for `toSvg()` */
  get isRetained(): boolean {
    return this.retained !== undefined;
  }

  get retainedPreamble(): string {
    return this.retained?.preamble ?? '';
  }

  // ── Fields ────────────────────────────────────────────────────

  get title(): string { return this.fields.title; }
  set title(value: string) { this.fields.title = value; }

  get description(): string { return this.fields.description; }
  set description(value: string) { this.fields.description = value; }

  get subject(): string { return this.fields.subject; }
  set subject(value: string) { this.fields.subject = value; }

  get creator(): string { return this.fields.creator; }
  set creator(value: string) { this.fields.creator = value; }

  /** Alias for `creator` */
  get author(): string { return this.fields.creator; }
  set author(value: string) { this.fields.creator = value; }

  get creatorUrl(): string { return this.fields.creatorUrl; }
  set creatorUrl(value: string) { this.fields.creatorUrl = value; }

  get owner(): string { return this.fields.owner; }
  set owner(value: string) { this.fields.owner = value; }

  get ownerUrl(): string { return this.fields.ownerUrl; }
  set ownerUrl(value: string) { this.fields.ownerUrl = value; }

  get publisher(): string { return this.fields.publisher; }
  set publisher(value: string) { this.fields.publisher = value; }

  get publisherUrl(): string { return this.fields.publisherUrl; }
  set publisherUrl(value: string) { this.fields.publisherUrl = value; }

  get license(): string { return this.fields.license; }
  set license(value: string) { this.fields.license = value; }

  get licenseDate(): string { return this.fields.licenseDate; }
  set licenseDate(value: string) { this.fields.licenseDate = value; }

  /** Never empty: assigning '' restores the default language */
  get language(): string { return this.fields.language; }
  set language(value: string) { this.fields.language = value === '' ? DEFAULT_LANGUAGE : value; }

  get date(): string { return this.fields.date; }
  set date(value: string) { this.fields.date = value; }

  get aboutUrl(): string { return this.fields.aboutUrl; }
  set aboutUrl(value: string) { this.fields.aboutUrl = value; }

  /** Snapshot of every field */
  toFields(): MetadataFields {
    return { ...this.fields };
  }

  // ── Keywords ──────────────────────────────────────────────────

  get keywords(): string[] {
    return [...this.keywordSet];
  }

  addKeyword(...keywords: string[]): void {
    for (const keyword of keywords) this.keywordSet.add(keyword);
  }

  /** Returns whether the keyword was present */
  removeKeyword(keyword: string): boolean {
    return this.keywordSet.delete(keyword);
  }

  hasKeyword(keyword: string): boolean {
    return this.keywordSet.has(keyword);
  }

  clearKeywords(): void {
    this.keywordSet.clear();
  }

  // ── Comparison ────────────────────────────────────────────────

  /**
   * Two records are equivalent when author, title and license match.
   * Keywords and every other field may differ.
   */
  compare(other: SvgMetadata): boolean {
    return other.creator === this.creator
      && other.title === this.title
      && other.license === this.license;
  }

  // ── Output ────────────────────────────────────────────────────

  /** RDF/XML fragment for the current fields */
  toRdf(): string {
    return toRdf(this.fields, this.keywordSet);
  }

  /**
   * The retained source document with its RDF block replaced by `toRdf()`.
   *
   * @throws SvgMetadataError `NotRetained` unless the last successful
   *   extraction used `retainXml`
   */
  toSvg(): string {
    if (!this.retained) {
      throw new SvgMetadataError('NotRetained', 'No source document was retained; parse with retainXml first');
    }
    const { text, retained } = spliceRdf(this.retained, this.toRdf());
    this.retained = retained;
    return text;
  }

  /** Plain-text summary for logs and e-mail */
  toText(): string {
    return [
      `Title:    ${this.title}`,
      `Author:   ${this.author}`,
      `License:  ${this.license}`,
      `Keywords: ${this.keywords.join('\n          ')}`,
    ].join('\n') + '\n';
  }

  toJsonLd(): WorkDocument {
    return toJsonLd(this.fields, this.keywordSet);
  }

  /** N-Quads serialization of `toJsonLd()` */
  toNQuads(): Promise<string> {
    return toNQuads(this.toJsonLd());
  }
}
