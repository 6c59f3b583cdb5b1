/**
 * Tool dispatcher: validates a tool call, obtains an authorized Drive client,
 * runs the tool and turns every outcome into a ToolResult
 */

import type { ToolRequest, ToolResult } from './types/index.js';
import type { AuthorizedClient } from './auth/credential-manager.js';
import type { RemotePolicy } from './drive/remote.js';
import type { InputSchema, RegisteredTool, ToolLimits } from './tools/types.js';
import { tools as defaultTools } from './tools/index.js';
import { AuthError, classifyRemoteError } from './errors.js';
import { formatError } from './format/result-formatter.js';
import { ToolCallQueue } from './utils/queue.js';
import { withCorrelationAsync, getElapsedMs } from './utils/correlation.js';
import { info, warn, error as logError } from './utils/logger.js';

/**
 * The part of CredentialManager the dispatcher depends on
 */
export interface CredentialSource {
  ensureAuthorizedClient(): Promise<AuthorizedClient>;
  invalidateAccessToken(accessToken: string): void;
}

export interface ToolDescriptor {
  name: string;
  description: string;
  inputSchema: InputSchema;
}

export interface ToolDispatcherOptions {
  credentials: CredentialSource;
  policy: RemotePolicy;
  limits: ToolLimits;
  maxConcurrentCalls: number;
  tools?: readonly RegisteredTool[];
  /** Clock, for testing */
  now?: () => Date;
}

export class ToolDispatcher {
  private readonly credentials: CredentialSource;
  private readonly policy: RemotePolicy;
  private readonly limits: ToolLimits;
  private readonly tools: readonly RegisteredTool[];
  private readonly now: () => Date;
  private readonly queue: ToolCallQueue;

  constructor(options: ToolDispatcherOptions) {
    this.credentials = options.credentials;
    this.policy = options.policy;
    this.limits = options.limits;
    this.tools = options.tools ?? defaultTools;
    this.now = options.now ?? (() => new Date());
    this.queue = new ToolCallQueue(options.maxConcurrentCalls);
  }

  listTools(): ToolDescriptor[] {
    return this.tools.map(({ name, description, inputSchema }) => ({ name, description, inputSchema }));
  }

  /**
   * Runs one tool call. Never throws: every path returns a ToolResult.
   *
   * @param signal - Caller cancellation; in-flight remote calls are abandoned
   */
  async dispatch(request: ToolRequest, signal?: AbortSignal): Promise<ToolResult> {
    return withCorrelationAsync(
      async () => {
        const { running, waiting } = this.queue.getStats();
        info('Tool call started', { module: 'dispatcher', running, waiting });

        let result: ToolResult;
        try {
          result = await this.queue.add(() => this.execute(request, signal), signal);
        } catch (err) {
          result = signal?.aborted
            ? formatError('Cancelled', 'Tool call was cancelled')
            : this.unexpected(err);
        }

        const context = { module: 'dispatcher', durationMs: getElapsedMs() };
        if (result.isError) {
          warn('Tool call failed', { ...context, kind: result.content[0].kind, message: result.content[0].message });
        } else {
          info('Tool call completed', { ...context, blocks: result.content.length });
        }
        return result;
      },
      { toolName: request.name }
    );
  }

  private async execute(request: ToolRequest, signal?: AbortSignal): Promise<ToolResult> {
    const tool = this.tools.find((t) => t.name === request.name);
    if (!tool) {
      const available = this.tools.map((t) => t.name).join(', ');
      return formatError('UnknownTool', `Unknown tool: ${request.name}. Available tools: ${available}`);
    }

    const invocation = tool.prepare(request.arguments);
    if (!invocation.ok) {
      return formatError('InvalidArgument', invocation.error);
    }

    if (signal?.aborted) {
      return formatError('Cancelled', 'Tool call was cancelled');
    }

    let client: AuthorizedClient;
    try {
      client = await this.credentials.ensureAuthorizedClient();
    } catch (err) {
      const message =
        err instanceof AuthError
          ? err.message
          : `Could not load the Drive credential: ${err instanceof Error ? err.message : String(err)}`;
      return formatError('AuthRequired', message);
    }

    const outcome = await invocation.value({
      drive: client.drive,
      policy: this.policy,
      signal,
      limits: this.limits,
      now: this.now,
    });

    if (!outcome.ok) {
      if (outcome.error.kind === 'AuthRequired') {
        this.credentials.invalidateAccessToken(client.accessToken);
      }
      return formatError(outcome.error.kind, outcome.error.message);
    }
    return outcome.value;
  }

  private unexpected(err: unknown): ToolResult {
    const classified = classifyRemoteError(err, 'run the tool');
    logError('Unexpected tool failure', {
      module: 'dispatcher',
      kind: classified.kind,
      error: err instanceof Error ? err.stack : String(err),
    });
    return formatError(classified.kind, classified.message);
  }
}
