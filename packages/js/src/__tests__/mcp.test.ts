import * as path from 'path';
import { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { TOOLS, callTool } from '../mcp/server.js';

const FIXTURES = path.join(__dirname, '..', '..', 'test', 'fixtures');
const APPLE = path.join(FIXTURES, 'apple.svg');
const ALLOW_FIXTURES = { allowedRoots: [FIXTURES] };

const INLINE = `<svg xmlns="http://www.w3.org/2000/svg">
<metadata><rdf:RDF xmlns:rdf="http://www.w3.org/1999/02/22-rdf-syntax-ns#" xmlns:cc="http://web.resource.org/cc/" xmlns:dc="http://purl.org/dc/elements/1.1/">
<cc:Work rdf:about=""><dc:title>Inline</dc:title></cc:Work>
</rdf:RDF></metadata>
</svg>`;

function textOf(result: CallToolResult): string {
    return result.content
        .map(item => (item.type === 'text' ? item.text : ''))
        .join('');
}

describe('MCP tools', () => {

    it('lists every tool', () => {
        expect(TOOLS.map(tool => tool.name)).toEqual([
            'svgmeta_extract',
            'svgmeta_render_rdf',
            'svgmeta_compare',
            'svgmeta_update',
            'svgmeta_summary',
        ]);
    });

    it('extracts metadata as JSON', async () => {
        const result = await callTool('svgmeta_extract', { source: APPLE }, ALLOW_FIXTURES);
        expect(result.isError).toBeUndefined();
        const parsed = JSON.parse(textOf(result));
        expect(parsed.fields.title).toBe('Red Apple');
        expect(parsed.keywords).toEqual(['Fruit', 'Food']);
    });

    it('renders RDF', async () => {
        const result = await callTool('svgmeta_render_rdf', { fields: { title: 'Apple' } });
        expect(textOf(result)).toContain('    <dc:title>Apple</dc:title>\n');
    });

    it('compares documents', async () => {
        const result = await callTool('svgmeta_compare', { sourceA: APPLE, sourceB: APPLE }, ALLOW_FIXTURES);
        expect(JSON.parse(textOf(result))).toEqual({ same: true });
    });

    it('updates documents', async () => {
        const result = await callTool('svgmeta_update', { source: APPLE, changes: { title: 'Green Apple' } }, ALLOW_FIXTURES);
        expect(textOf(result)).toContain('<dc:title>Green Apple</dc:title>');
    });

    it('summarizes documents', async () => {
        const result = await callTool('svgmeta_summary', { source: APPLE }, ALLOW_FIXTURES);
        expect(textOf(result).split('\n')[0]).toBe('Title:    Red Apple');
    });

    it('reports extraction failures as tool errors', async () => {
        const missing = path.join(FIXTURES, 'missing.svg');
        const result = await callTool('svgmeta_extract', { source: missing }, ALLOW_FIXTURES);
        expect(result.isError).toBe(true);
        expect(textOf(result)).toBe(`Error: File '${missing}' does not exist`);
    });

    it('accepts literal SVG text without an allowlist', async () => {
        const result = await callTool('svgmeta_summary', { source: INLINE });
        expect(result.isError).toBeUndefined();
        expect(textOf(result).split('\n')[0]).toBe('Title:    Inline');
    });

    it('blocks file paths by default', async () => {
        const result = await callTool('svgmeta_extract', { source: APPLE });
        expect(result.isError).toBe(true);
        expect(textOf(result)).toBe(`Error: Source blocked by allowlist: ${APPLE}. Allowed roots: (none)`);
    });

    it('blocks paths outside the allowed roots', async () => {
        const outside = path.join(FIXTURES, '..', 'source.test.ts');
        const result = await callTool('svgmeta_summary', { source: outside }, ALLOW_FIXTURES);
        expect(result.isError).toBe(true);
        expect(textOf(result)).toBe(`Error: Source blocked by allowlist: ${outside}. Allowed roots: ${FIXTURES}`);
    });

    it('blocks traversal out of an allowed root', async () => {
        const result = await callTool('svgmeta_extract', { source: `${FIXTURES}/../../package.json` }, ALLOW_FIXTURES);
        expect(result.isError).toBe(true);
        expect(textOf(result).startsWith('Error: Source blocked by allowlist:')).toBe(true);
    });

    it('checks both documents of a comparison', async () => {
        const result = await callTool('svgmeta_compare', { sourceA: APPLE, sourceB: '/etc/hostname' }, ALLOW_FIXTURES);
        expect(result.isError).toBe(true);
        expect(textOf(result)).toBe(`Error: Source blocked by allowlist: /etc/hostname. Allowed roots: ${FIXTURES}`);
    });

    it('blocks URLs unless they are allowed', async () => {
        const result = await callTool('svgmeta_extract', { source: 'http://127.0.0.1:1/a.svg' }, ALLOW_FIXTURES);
        expect(result.isError).toBe(true);
        expect(textOf(result)).toBe(`Error: Source blocked by allowlist: http://127.0.0.1:1/a.svg. Allowed roots: ${FIXTURES}`);
    });

    it('reports invalid arguments as tool errors', async () => {
        const result = await callTool('svgmeta_summary', {});
        expect(result.isError).toBe(true);
    });

    it('rejects unknown tools', async () => {
        const result = await callTool('svgmeta_nope');
        expect(result).toEqual({
            content: [{ type: 'text', text: 'Error: Unknown tool: svgmeta_nope' }],
            isError: true,
        });
    });
});
