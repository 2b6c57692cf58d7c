/**
 * Integration tests for MCP server layer.
 */

import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { rm } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { randomUUID } from 'node:crypto';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { CallToolResultSchema, type CallToolResult } from '@modelcontextprotocol/sdk/types.js';

import { initializeApp, type AppContext } from '../server.js';
import { createMcpServer } from './McpServerFactory.js';
import { jsonResult, errorResult, textResult, thrownResult } from './helpers.js';
import { DEFAULT_CONFIG } from '../config/types.js';
import { CacheError } from '../cache/CacheError.js';
import { silentLogger } from '../logging/Logger.js';
import type { DocumentFetcher } from '../cache/types.js';

const INDEX_URL = 'https://docs.example.test/rfc-index.txt';
const BASE_URL = 'https://docs.example.test/rfc/';

const INDEX_TEXT = [
  '0001 Host Software. S. Crocker. April 1969. (Status: UNKNOWN)',
  '0002 Host software. B. Duvall. April 1969. (Status: UNKNOWN)',
  '0010 Documentation conventions. S.D. Crocker. July 1969. (Status: UNKNOWN)',
].join('\n');

class MapFetcher implements DocumentFetcher {
  constructor(private readonly files: Map<string, string>) {}

  async fetchBytes(url: string): Promise<Uint8Array> {
    const body = this.files.get(url);
    if (body === undefined) {
      throw new CacheError(`Error downloading ${url}: status code 404`, 'FETCH');
    }
    return new TextEncoder().encode(body);
  }
}

function firstText(result: CallToolResult): string {
  const item = result.content[0];
  if (item === undefined || item.type !== 'text') {
    throw new Error('expected text content');
  }
  return item.text;
}

describe('MCP Server', () => {
  let ctx: AppContext;
  let server: McpServer;
  let client: Client;
  const cacheDir = join(tmpdir(), `mcp-test-${randomUUID()}`);

  const callTool = async (name: string, args: Record<string, unknown> = {}): Promise<CallToolResult> =>
    CallToolResultSchema.parse(await client.callTool({ name, arguments: args }));

  beforeAll(async () => {
    ctx = await initializeApp({
      config: {
        ...DEFAULT_CONFIG,
        cache: { ...DEFAULT_CONFIG.cache, directory: cacheDir },
        source: { indexUrl: INDEX_URL, documentBaseUrl: BASE_URL },
      },
      logger: silentLogger,
      fetcher: new MapFetcher(new Map([
        [INDEX_URL, INDEX_TEXT],
        [`${BASE_URL}rfc0001.txt`, 'Host protocol notes about IMP connections.\n'],
        [`${BASE_URL}rfc0010.txt`, 'Conventions for writing these notes.\n'],
      ])),
    });
    await ctx.updater.run();

    server = createMcpServer(ctx);
    client = new Client({ name: 'test-client', version: '0.0.0' });
    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    await server.connect(serverTransport);
    await client.connect(clientTransport);
  });

  afterAll(async () => {
    await client.close();
    await server.close();
    await rm(cacheDir, { recursive: true, force: true });
  });

  describe('createMcpServer', () => {
    it('creates an McpServer instance', () => {
      expect(server).toBeInstanceOf(McpServer);
    });

    it('registers the document and cache tools', async () => {
      const { tools } = await client.listTools();

      expect(tools.map(tool => tool.name).sort()).toEqual([
        'cache_status',
        'cache_update',
        'document_get',
        'document_search',
        'document_text',
      ]);
    });
  });

  describe('helpers', () => {
    it('textResult creates text content', () => {
      const result = textResult('hello');
      expect(result.content).toEqual([{ type: 'text', text: 'hello' }]);
    });

    it('jsonResult creates JSON text content', () => {
      const result = jsonResult({ foo: 1 });
      expect(result.content).toEqual([{ type: 'text', text: '{\n  "foo": 1\n}' }]);
    });

    it('errorResult creates error content', () => {
      const result = errorResult('bad');
      expect(result.content).toEqual([{ type: 'text', text: 'bad' }]);
      expect(result.isError).toBe(true);
    });

    it('thrownResult prefixes cache errors with their code', () => {
      const result = thrownResult(new CacheError('No documents loaded to index', 'NOT_LOADED'));
      expect(firstText(result)).toBe('NOT_LOADED: No documents loaded to index');
      expect(result.isError).toBe(true);
    });

    it('thrownResult reports other errors as tool errors', () => {
      expect(firstText(thrownResult(new Error('boom')))).toBe('Tool error: boom');
    });
  });

  describe('document tools', () => {
    it('document_get returns the entry summary', async () => {
      const result = await callTool('document_get', { number: 10 });

      expect(result.isError).toBeFalsy();
      expect(JSON.parse(firstText(result))).toMatchObject({
        number: 10,
        title: 'Documentation conventions. S.D. Crocker',
        date: { year: 1969, month: 7 },
        flags: { Status: 'UNKNOWN' },
        url: `${BASE_URL}rfc0010.txt`,
      });
    });

    it('document_get reports lookup failures', async () => {
      const result = await callTool('document_get', { number: 9999 });

      expect(result.isError).toBe(true);
      expect(firstText(result)).toBe('NOT_CACHED: Requested 9999, latest cached document 0010');
    });

    it('document_text returns the cached text', async () => {
      const result = await callTool('document_text', { number: 1 });

      expect(firstText(result)).toBe('Host protocol notes about IMP connections.\n');
    });

    it('document_text reports documents that are not downloaded', async () => {
      const result = await callTool('document_text', { number: 2 });

      expect(result.isError).toBe(true);
      expect(firstText(result)).toBe('Document 2 has not been downloaded');
    });

    it('document_search searches titles, then bodies on request', async () => {
      const titles = JSON.parse(firstText(await callTool('document_search', { terms: ['crocker'] })));
      expect(titles.total).toBe(2);
      expect(titles.results.map((r: { number: number }) => r.number)).toEqual([1, 10]);

      const bodies = JSON.parse(firstText(await callTool('document_search', { terms: ['imp'], body: true })));
      expect(bodies.results.map((r: { number: number }) => r.number)).toEqual([1]);
    });
  });

  describe('cache tools', () => {
    it('cache_status reports store progress', async () => {
      const result = await callTool('cache_status');

      expect(JSON.parse(firstText(result))).toEqual({
        loaded: true,
        entries: 3,
        latestNumber: 10,
        cached: 2,
        indexed: 2,
        cacheDir,
      });
    });

    it('cache_update runs only the requested steps', async () => {
      const result = await callTool('cache_update', { refreshIndex: false, fetchDocuments: false });

      expect(JSON.parse(firstText(result))).toMatchObject({
        refreshed: false,
        entries: 3,
        fetched: [],
        failed: [],
        indexed: [],
      });
    });
  });
});
