#!/usr/bin/env node
// src/mcp.ts
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { z } from 'zod';
import { BannerCache } from './cache/manager.js';
import { loadConfig } from './config.js';
import { errorMessage } from './errors.js';
import { createRequire } from 'node:module';
import type { Config } from './types.js';

const require = createRequire(import.meta.url);
const { version: PACKAGE_VERSION } = require('../package.json') as { version: string };

export interface McpServerOptions {
  /** Cache configuration; resolved from the environment when omitted */
  config?: Config;
  /** Per-request timeout in ms for remote sources */
  timeout?: number;
}

function textResult(data: unknown) {
  return {
    content: [{ type: 'text' as const, text: JSON.stringify(data) }],
  };
}

function errorResult(prefix: string, err: unknown) {
  return {
    content: [{ type: 'text' as const, text: `${prefix}: ${errorMessage(err)}` }],
    isError: true,
  };
}

export function createMcpServer(options: McpServerOptions = {}): McpServer {
  let cache: BannerCache | null = null;
  const getCache = async (): Promise<BannerCache> => {
    if (!cache) {
      const config = options.config ?? (await loadConfig());
      cache = new BannerCache(config, { timeout: options.timeout });
    }
    return cache;
  };

  const server = new McpServer({
    name: 'basar',
    version: PACKAGE_VERSION,
  });

  // --- basar_uri ---
  server.registerTool(
    'basar_uri',
    {
      description:
        'Return the file:// URI of the merged ISF banner index for volatility3 (-u / remote_isf_url). ' +
        'Refreshes the cache first when it is missing or older than its TTL.',
      annotations: {
        readOnlyHint: false,
        openWorldHint: true,
      },
    },
    async () => {
      try {
        const c = await getCache();
        await c.ensure();
        return textResult({ uri: await c.uri() });
      } catch (err) {
        return errorResult('Cache unavailable', err);
      }
    },
  );

  // --- basar_stats ---
  server.registerTool(
    'basar_stats',
    {
      description:
        'Report cache state: whether the banner index is valid, its path, number of kernel banners, ' +
        'size in bytes and age in seconds.',
      annotations: {
        readOnlyHint: true,
        openWorldHint: false,
      },
    },
    async () => {
      const c = await getCache();
      return textResult(await c.stats());
    },
  );

  // --- basar_update ---
  server.registerTool(
    'basar_update',
    {
      description:
        'Fetch every configured banner source, merge them and rewrite the cache. ' +
        'Sources that fail are skipped; fails only when all of them do.',
      inputSchema: {
        force: z.boolean().optional().describe('Refetch even if the cache is still fresh (default: true)'),
      },
      annotations: {
        readOnlyHint: false,
        openWorldHint: true,
      },
    },
    async ({ force }) => {
      try {
        const c = await getCache();
        await c.update({ force: force ?? true });
        return textResult(await c.stats());
      } catch (err) {
        return errorResult('Update failed', err);
      }
    },
  );

  // --- basar_smart_update ---
  server.registerTool(
    'basar_smart_update',
    {
      description:
        'Conditional update: asks each source whether it changed (ETag / Last-Modified) and rewrites ' +
        'the cache only if one did. Returns { updated, stats }.',
      annotations: {
        readOnlyHint: false,
        openWorldHint: true,
      },
    },
    async () => {
      try {
        const c = await getCache();
        const updated = await c.smartUpdate();
        return textResult({ updated, stats: await c.stats() });
      } catch (err) {
        return errorResult('Smart update failed', err);
      }
    },
  );

  // --- basar_clear ---
  server.registerTool(
    'basar_clear',
    {
      description: 'Delete the cached banner index. The next basar_uri call rebuilds it.',
      annotations: {
        readOnlyHint: false,
        destructiveHint: true,
        openWorldHint: false,
      },
    },
    async () => {
      try {
        const c = await getCache();
        await c.clear();
        return textResult({ cleared: true });
      } catch (err) {
        return errorResult('Clear failed', err);
      }
    },
  );

  return server;
}

// --- stdio entry point ---
// Only start when run directly (not imported for testing)
const _argv1 = (process.argv[1] || '').replace(/\\/g, '/');
const isMainModule = _argv1.endsWith('/mcp.ts') ||
  _argv1.endsWith('/mcp.js') ||
  _argv1.endsWith('/basar-mcp');

if (isMainModule) {
  const server = createMcpServer();
  const transport = new StdioServerTransport();
  server.connect(transport).catch((err) => {
    console.error('MCP server failed to start:', err);
    process.exit(1);
  });
}
