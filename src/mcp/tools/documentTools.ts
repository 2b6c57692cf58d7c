/**
 * MCP tools for document lookup, text retrieval and search.
 */

import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { AppContext } from '../../server.js';
import { jsonResult, textResult, errorResult, thrownResult } from '../helpers.js';

export function registerDocumentTools(server: McpServer, ctx: AppContext): void {
  // document_get: Registry entry metadata by number
  server.tool(
    'document_get',
    'Get the registry entry for a document number: title, date, flags and source URL.',
    { number: z.number().int().describe('Document number (e.g., 2616)') },
    async (args) => {
      try {
        return jsonResult(ctx.store.getByNumber(args.number).toJSON());
      } catch (err) {
        return thrownResult(err);
      }
    }
  );

  // document_text: Full cached text
  server.tool(
    'document_text',
    'Get the full text of a downloaded document.',
    { number: z.number().int().describe('Document number (e.g., 2616)') },
    async (args) => {
      try {
        const entry = ctx.store.getByNumber(args.number);
        if (!(await entry.exists())) {
          return errorResult(`Document ${entry.number} has not been downloaded`);
        }
        return textResult(await entry.read());
      } catch (err) {
        return thrownResult(err);
      }
    }
  );

  // document_search: Title search, optionally extended to bodies
  server.tool(
    'document_search',
    'Search indexed documents. All terms must match. Titles are always searched; set body to also search document text.',
    {
      terms: z.array(z.string()).min(1).describe('Search terms, all of which must match'),
      body: z.boolean().optional().describe('Also search document bodies (default false)'),
    },
    async (args) => {
      try {
        const results = ctx.store.search(args.terms, args.body ?? false).map(entry => entry.toJSON());
        return jsonResult({ results, total: results.length });
      } catch (err) {
        return thrownResult(err);
      }
    }
  );
}
