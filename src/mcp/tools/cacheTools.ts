/**
 * MCP tools for cache status and updates.
 */

import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { AppContext } from '../../server.js';
import type { UpdateOptions } from '../../cache/types.js';
import { jsonResult, thrownResult } from '../helpers.js';

export function registerCacheTools(server: McpServer, ctx: AppContext): void {
  // cache_status: Entry, download and index counts
  server.tool(
    'cache_status',
    'Report how many registry entries are loaded, downloaded and indexed.',
    async () => {
      try {
        return jsonResult(await ctx.store.status());
      } catch (err) {
        return thrownResult(err);
      }
    }
  );

  // cache_update: Refresh the registry, download and index missing documents
  server.tool(
    'cache_update',
    'Refresh the registry index, download missing documents and add them to the search index.',
    {
      refreshIndex: z.boolean().optional().describe('Download a fresh registry index first (default true)'),
      fetchDocuments: z.boolean().optional().describe('Download documents missing locally (default true)'),
      indexDocuments: z.boolean().optional().describe('Index downloaded documents (default true)'),
      limit: z.number().int().min(0).optional().describe('Maximum documents to download'),
    },
    async (args) => {
      try {
        const options: UpdateOptions = {};
        if (args.refreshIndex !== undefined) options.refreshIndex = args.refreshIndex;
        if (args.fetchDocuments !== undefined) options.fetchDocuments = args.fetchDocuments;
        if (args.indexDocuments !== undefined) options.indexDocuments = args.indexDocuments;
        if (args.limit !== undefined) options.limit = args.limit;
        return jsonResult(await ctx.updater.run(options));
      } catch (err) {
        return thrownResult(err);
      }
    }
  );
}
