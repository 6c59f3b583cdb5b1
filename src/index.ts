#!/usr/bin/env node

/**
 * Read-only Google Drive MCP server over stdio
 */

import 'dotenv/config';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { getConfig, RATE_LIMIT_RETRY_CONFIG } from './config.js';
import { createCredentialManager } from './auth/setup.js';
import { ToolDispatcher } from './dispatcher.js';
import { buildServer, createShutdownHandler } from './server.js';
import { info, warn, error as logError, resetLogger } from './utils/logger.js';

async function main(): Promise<void> {
  const config = getConfig();
  const { manager } = await createCredentialManager(config);

  const status = await manager.getStatus();
  if (status === 'missing' || status === 'dead') {
    warn('No usable Drive credential; tool calls will fail until the authorize command is run', {
      module: 'index',
      status,
    });
  } else {
    info('Drive credential loaded', { module: 'index', status });
  }

  const dispatcher = new ToolDispatcher({
    credentials: manager,
    policy: { timeoutMs: config.requestTimeoutMs, retry: RATE_LIMIT_RETRY_CONFIG },
    limits: {
      maxPagesPerCall: config.maxPagesPerCall,
      maxContentBytes: config.maxContentBytes,
      maxTextBytes: config.maxTextBytes,
    },
    maxConcurrentCalls: config.maxConcurrentCalls,
  });

  const server = buildServer(dispatcher);
  const transport = new StdioServerTransport();
  await server.connect(transport);
  info('MCP server running on stdio', { module: 'index', tools: dispatcher.listTools().length });

  const shutdown = createShutdownHandler(
    async () => {
      await server.close();
      manager.close();
      resetLogger();
    },
    (code) => process.exit(code)
  );

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      void shutdown(signal);
    });
  }
}

main().catch((err: unknown) => {
  logError('Failed to start MCP server', {
    module: 'index',
    error: err instanceof Error ? err.message : String(err),
  });
  resetLogger();
  process.exit(1);
});
