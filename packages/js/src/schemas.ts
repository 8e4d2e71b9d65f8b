/**
 * Runtime validation schemas using Zod.
 */

import { z } from 'zod';

// ── Primitives & Helpers ──────────────────────────────────────────

const TextSchema = z.string();
const UrlSchema = z.string(); // rdf:about values are frequently relative or empty

// ── Metadata Fields ───────────────────────────────────────────────

export const MetadataFieldsSchema = z.object({
    title: TextSchema,
    description: TextSchema,
    subject: TextSchema,
    creator: TextSchema,
    creatorUrl: UrlSchema,
    owner: TextSchema,
    ownerUrl: UrlSchema,
    publisher: TextSchema,
    publisherUrl: UrlSchema,
    license: TextSchema,
    licenseDate: TextSchema,
    language: TextSchema,
    date: TextSchema,
    aboutUrl: UrlSchema,
});

export const MetadataSeedSchema = MetadataFieldsSchema.partial().extend({
    author: TextSchema.optional(),
    keywords: z.array(z.string()).optional(),
    strictValidation: z.boolean().optional(),
});

// ── Options ───────────────────────────────────────────────────────

export const LoadOptionsSchema = z.object({
    retainXml: z.boolean().optional(),
    maxDocumentSize: z.number().int().positive().optional(),
    fetchTimeout: z.number().int().positive().optional(),
});

// ── Tool Arguments ────────────────────────────────────────────────

export const ExtractArgsSchema = z.object({
    source: z.string().min(1),
    strict: z.boolean().optional(),
});

export const RenderArgsSchema = z.object({
    fields: MetadataSeedSchema,
});

export const CompareArgsSchema = z.object({
    sourceA: z.string().min(1),
    sourceB: z.string().min(1),
});

export const UpdateArgsSchema = z.object({
    source: z.string().min(1),
    changes: MetadataSeedSchema,
});

export const SummaryArgsSchema = z.object({
    source: z.string().min(1),
});

// ── Validation Helper ─────────────────────────────────────────────

/**
 * Validates data against a Zod schema.
 * Throws a ZodError if validation fails.
 */
export function validate<T>(schema: z.ZodType<T>, data: unknown): T {
    return schema.parse(data);
}
