#!/usr/bin/env node
import { SvgMetadataMcpServer } from './server.js';

// Usage: svgmeta-mcp [--allow-urls] [allowed-directory ...]
async function main() {
    const args = process.argv.slice(2);
    const server = new SvgMetadataMcpServer({
        allowUrls: args.includes('--allow-urls'),
        allowedRoots: args.filter(arg => !arg.startsWith('--')),
    });
    await server.run();
}

main().catch((error) => {
    console.error(error);
    process.exitCode = 1;
});
