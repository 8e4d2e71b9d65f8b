
import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import {
    CallToolRequestSchema,
    CallToolResult,
    ListToolsRequestSchema,
    Tool,
} from "@modelcontextprotocol/sdk/types.js";
import client from '../client.js';
import { describeError } from '../errors.js';
import { assertSourceAllowed } from '../source.js';
import { SourceAllowlist } from '../types.js';
import {
    CompareArgsSchema,
    ExtractArgsSchema,
    RenderArgsSchema,
    SummaryArgsSchema,
    UpdateArgsSchema,
    validate,
} from '../schemas.js';

const FIELDS_SCHEMA = {
    type: "object",
    properties: {
        title: { type: "string" },
        description: { type: "string" },
        author: { type: "string", description: "Alias for creator" },
        creator: { type: "string" },
        creatorUrl: { type: "string" },
        owner: { type: "string", description: "Rights holder" },
        ownerUrl: { type: "string" },
        publisher: { type: "string" },
        publisherUrl: { type: "string" },
        license: { type: "string", description: "License URI or \"Public Domain\"" },
        licenseDate: { type: "string" },
        language: { type: "string" },
        date: { type: "string" },
        aboutUrl: { type: "string" },
        keywords: { type: "array", items: { type: "string" } },
    },
};

export const TOOLS: Tool[] = [
    {
        name: "svgmeta_extract",
        description: "Extract title, creator, license, keywords and other RDF metadata from an SVG document.",
        inputSchema: {
            type: "object",
            properties: {
                source: { type: "string", description: "SVG text, or a file path / http(s) URL the server allows" },
                strict: { type: "boolean", description: "Require the RDF block to be inside <metadata>" }
            },
            required: ["source"]
        },
    },
    {
        name: "svgmeta_render_rdf",
        description: "Render RDF/XML metadata for the given fields.",
        inputSchema: {
            type: "object",
            properties: {
                fields: FIELDS_SCHEMA
            },
            required: ["fields"]
        },
    },
    {
        name: "svgmeta_compare",
        description: "Check whether two SVG documents carry the same author, title and license.",
        inputSchema: {
            type: "object",
            properties: {
                sourceA: { type: "string", description: "First document (SVG text, or an allowed path or URL)" },
                sourceB: { type: "string", description: "Second document (SVG text, or an allowed path or URL)" }
            },
            required: ["sourceA", "sourceB"]
        },
    },
    {
        name: "svgmeta_update",
        description: "Rewrite the metadata block of an SVG document and return the full document.",
        inputSchema: {
            type: "object",
            properties: {
                source: { type: "string", description: "SVG text, or a file path / http(s) URL the server allows" },
                changes: FIELDS_SCHEMA
            },
            required: ["source", "changes"]
        },
    },
    {
        name: "svgmeta_summary",
        description: "Plain-text summary of an SVG document's title, author, license and keywords.",
        inputSchema: {
            type: "object",
            properties: {
                source: { type: "string", description: "SVG text, or a file path / http(s) URL the server allows" }
            },
            required: ["source"]
        },
    },
];

function text(value: string): CallToolResult {
    return { content: [{ type: "text", text: value }] };
}

/**
 * Run one tool call. Failures come back as `isError` results rather than
 * exceptions so the client sees the message.
 *
 * Literal SVG text is always accepted; file paths and URLs only as far as
 * `allowlist` permits.
 */
export async function callTool(
    name: string,
    args: Record<string, unknown> = {},
    allowlist: SourceAllowlist = {}
): Promise<CallToolResult> {
    const allowed = (source: string): string => {
        assertSourceAllowed(source, allowlist);
        return source;
    };

    try {
        switch (name) {
            case "svgmeta_extract": {
                const { source, strict } = validate(ExtractArgsSchema, args);
                const result = await client.extract(allowed(source), { strict });
                return text(JSON.stringify(result, null, 2));
            }

            case "svgmeta_render_rdf": {
                const { fields } = validate(RenderArgsSchema, args);
                return text(client.render(fields));
            }

            case "svgmeta_compare": {
                const { sourceA, sourceB } = validate(CompareArgsSchema, args);
                const same = await client.compare(allowed(sourceA), allowed(sourceB));
                return text(JSON.stringify({ same }, null, 2));
            }

            case "svgmeta_update": {
                const { source, changes } = validate(UpdateArgsSchema, args);
                return text(await client.update(allowed(source), changes));
            }

            case "svgmeta_summary": {
                const { source } = validate(SummaryArgsSchema, args);
                return text(await client.summarize(allowed(source)));
            }

            default:
                throw new Error(`Unknown tool: ${name}`);
        }
    } catch (error: unknown) {
        return {
            content: [{ type: "text", text: `Error: ${describeError(error)}` }],
            isError: true,
        };
    }
}

export class SvgMetadataMcpServer {
    private server: Server;
    private allowlist: SourceAllowlist;

    constructor(allowlist: SourceAllowlist = {}) {
        this.allowlist = allowlist;
        this.server = new Server(
            {
                name: "@svgmeta/core",
                version: "0.1.0",
            },
            {
                capabilities: {
                    tools: {},
                },
            }
        );

        this.setupHandlers();

        // Error handling
        this.server.onerror = (error) => console.error("[MCP Error]", error);
    }

    private setupHandlers() {
        this.server.setRequestHandler(ListToolsRequestSchema, async () => ({
            tools: TOOLS,
        }));

        this.server.setRequestHandler(CallToolRequestSchema, async (request) => {
            const { name, arguments: args } = request.params;
            return callTool(name, args, this.allowlist);
        });
    }

    async run() {
        const transport = new StdioServerTransport();
        await this.server.connect(transport);
        console.error("svgmeta MCP Server running on stdio");
    }
}
