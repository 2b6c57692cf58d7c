/**
 * MCP stdio transport entry point.
 *
 * Serves the document tools over stdio (no HTTP server needed).
 * Usage: npx tsx src/mcp-stdio.ts [configPath]
 */

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { initializeApp } from './server.js';
import { createMcpServer } from './mcp/index.js';

async function main() {
  const configPath = process.argv[2] || process.env.CONFIG_PATH;

  // Redirect all console to stderr so stdout stays clean for MCP JSON-RPC
  console.log = (...args: unknown[]) => process.stderr.write(args.map(String).join(' ') + '\n');
  console.warn = (...args: unknown[]) => process.stderr.write(args.map(String).join(' ') + '\n');
  console.error = (...args: unknown[]) => process.stderr.write(args.map(String).join(' ') + '\n');
  console.debug = (...args: unknown[]) => process.stderr.write(args.map(String).join(' ') + '\n');

  console.log('Initializing rfc-mirror MCP server');

  const ctx = await initializeApp(configPath !== undefined ? { configPath } : {});
  const mcpServer = createMcpServer(ctx);

  const transport = new StdioServerTransport();
  await mcpServer.connect(transport);

  console.log('MCP server connected via stdio');
}

main().catch((err) => {
  process.stderr.write(`Fatal: ${err}\n`);
  process.exit(1);
});
