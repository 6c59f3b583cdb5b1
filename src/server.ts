/**
 * MCP server exposing the Drive tools over the Model Context Protocol
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';
import type { ToolResult } from './types/index.js';
import type { ToolDispatcher } from './dispatcher.js';
import { info, warn, error as logError } from './utils/logger.js';

export const SERVER_NAME = 'drive-reader-mcp';
export const SERVER_VERSION = '1.0.0';

export interface McpTextContent {
  type: 'text';
  text: string;
}

export interface McpToolResult {
  content: McpTextContent[];
  isError: boolean;
}

/**
 * Converts a ToolResult to MCP text content
 * Data blocks become pretty-printed JSON; an empty result carries its note
 */
export function toMcpResult(result: ToolResult): McpToolResult {
  if (result.isError) {
    const [block] = result.content;
    return {
      content: [{ type: 'text', text: `${block.kind}: ${block.message}` }],
      isError: true,
    };
  }

  const content: McpTextContent[] = result.content.map((block) =>
    block.type === 'text'
      ? { type: 'text', text: block.text }
      : { type: 'text', text: JSON.stringify(block.data, null, 2) }
  );

  if (content.length === 0 && result.note) {
    content.push({ type: 'text', text: result.note });
  }

  return { content, isError: false };
}

/**
 * Builds an MCP server whose tool handlers go through the dispatcher
 */
export function buildServer(dispatcher: ToolDispatcher): Server {
  const server = new Server(
    {
      name: SERVER_NAME,
      version: SERVER_VERSION,
    },
    {
      capabilities: {
        tools: {},
      },
    }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return {
      tools: dispatcher.listTools().map(({ name, description, inputSchema }) => ({
        name,
        description,
        inputSchema: {
          ...inputSchema,
          required: [...inputSchema.required],
        },
      })),
    };
  });

  server.setRequestHandler(CallToolRequestSchema, async (request, extra) => {
    const result = await dispatcher.dispatch(
      { name: request.params.name, arguments: request.params.arguments },
      extra.signal
    );
    return { ...toMcpResult(result) };
  });

  return server;
}

/**
 * Maximum time to wait for graceful shutdown before forcing exit
 */
export const SHUTDOWN_TIMEOUT_MS = 10000;

/**
 * Creates a shutdown handler that awaits cleanup, bounded by a timeout
 *
 * @param cleanup - Closes the transport and releases credentials
 * @param processExit - Exits the process (injected for testing)
 * @param timeoutMs - Maximum time to wait for cleanup
 */
export function createShutdownHandler(
  cleanup: () => Promise<void>,
  processExit: (code: number) => void,
  timeoutMs: number = SHUTDOWN_TIMEOUT_MS
): (signal: string) => Promise<void> {
  return async (signal: string) => {
    info('Received shutdown signal', { module: 'server', phase: 'shutdown', signal });

    let timer: NodeJS.Timeout | undefined;
    const timeoutPromise = new Promise<'timeout'>((resolve) => {
      timer = setTimeout(() => resolve('timeout'), timeoutMs);
    });

    const shutdownPromise = (async () => {
      try {
        await cleanup();
        info('Server closed', { module: 'server', phase: 'shutdown' });
        return 'success' as const;
      } catch (err) {
        logError('Shutdown error', {
          module: 'server',
          phase: 'shutdown',
          error: err instanceof Error ? err.message : String(err),
        });
        return 'error' as const;
      }
    })();

    const result = await Promise.race([shutdownPromise, timeoutPromise]);
    clearTimeout(timer);

    if (result === 'timeout') {
      warn('Shutdown timed out, forcing exit', { module: 'server', phase: 'shutdown', timeoutMs });
      processExit(1);
    } else if (result === 'error') {
      processExit(1);
    } else {
      processExit(0);
    }
  };
}
