/**
 * High-level Client API for svgmeta.
 *
 * Provides a validated, exception-based interface over SvgMetadata for
 * callers that work with plain objects rather than records.
 */

import { SvgMetadataError } from './errors.js';
import { METADATA_FIELD_NAMES } from './extractor.js';
import { SvgMetadata } from './metadata.js';
import {
    CompareArgsSchema,
    ExtractArgsSchema,
    MetadataSeedSchema,
    SummaryArgsSchema,
    UpdateArgsSchema,
    validate,
} from './schemas.js';
import { MetadataFields, MetadataSeed, MetadataSource } from './types.js';

export interface ExtractResult {
    fields: MetadataFields;
    keywords: string[];
}

export class SvgMetadataClient {
    /**
     * Extract metadata from a path, URL or literal SVG text.
     * Throws SvgMetadataError when extraction fails.
     */
    public async extract(source: string, options: { strict?: boolean } = {}): Promise<ExtractResult> {
        const args = validate(ExtractArgsSchema, { source, strict: options.strict });
        const meta = await this.load(args.source, { strictValidation: args.strict ?? false });
        return { fields: meta.toFields(), keywords: meta.keywords };
    }

    /**
     * Render RDF/XML for a set of field values.
     */
    public render(fields: MetadataSeed): string {
        return new SvgMetadata(validate(MetadataSeedSchema, fields)).toRdf();
    }

    /**
     * Whether two documents carry the same author, title and license.
     */
    public async compare(sourceA: string, sourceB: string): Promise<boolean> {
        const args = validate(CompareArgsSchema, { sourceA, sourceB });
        const [a, b] = await Promise.all([this.load(args.sourceA), this.load(args.sourceB)]);
        return a.compare(b);
    }

    /**
     * Apply field changes to a document and return the rewritten SVG.
     * Keywords in `changes` replace the existing set.
     */
    public async update(source: string, changes: MetadataSeed): Promise<string> {
        const args = validate(UpdateArgsSchema, { source, changes });
        const meta = await this.load(args.source, { retainXml: true });

        for (const name of METADATA_FIELD_NAMES) {
            const value = args.changes[name];
            if (value !== undefined) meta[name] = value;
        }
        if (args.changes.creator === undefined && args.changes.author !== undefined) {
            meta.author = args.changes.author;
        }
        if (args.changes.keywords !== undefined) {
            meta.clearKeywords();
            meta.addKeyword(...args.changes.keywords);
        }

        return meta.toSvg();
    }

    /**
     * Plain-text summary (title, author, license, keywords) of a document.
     */
    public async summarize(source: string): Promise<string> {
        const args = validate(SummaryArgsSchema, { source });
        const meta = await this.load(args.source);
        return meta.toText();
    }

    private async load(
        source: MetadataSource,
        options: { strictValidation?: boolean; retainXml?: boolean } = {}
    ): Promise<SvgMetadata> {
        const meta = new SvgMetadata({ strictValidation: options.strictValidation });
        const ok = await meta.parse(source, { retainXml: options.retainXml });
        if (!ok) {
            throw new SvgMetadataError(meta.errorCode ?? 'ParseFailure', meta.errorMessage);
        }
        return meta;
    }
}

// Default export for easy usage
export default new SvgMetadataClient();
