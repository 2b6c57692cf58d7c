/**
 * Aggregator that registers all MCP tools on the server.
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { AppContext } from '../../server.js';
import { registerDocumentTools } from './documentTools.js';
import { registerCacheTools } from './cacheTools.js';

export function registerAllTools(server: McpServer, ctx: AppContext): void {
  registerDocumentTools(server, ctx);
  registerCacheTools(server, ctx);
}
