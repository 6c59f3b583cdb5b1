/**
 * Tool system types
 */

import type { Result, ToolResult } from '../types/index.js';
import type { DriveToolError } from '../errors.js';
import type { RemoteContext } from '../drive/remote.js';

export type ToolName =
  | 'search_drive'
  | 'list_recent_files'
  | 'get_file_content'
  | 'get_file_metadata'
  | 'list_folder_contents';

export interface ToolLimits {
  maxPagesPerCall: number;
  maxContentBytes: number;
  maxTextBytes: number;
}

/**
 * Everything a tool handler may use during one call
 */
export interface ToolContext extends RemoteContext {
  limits: ToolLimits;
  now: () => Date;
}

export type ToolOutcome = Result<ToolResult, DriveToolError>;

export interface InputSchema {
  type: 'object';
  properties: Record<string, unknown>;
  required: readonly string[];
  additionalProperties: false;
}

export interface Tool<T> {
  name: ToolName;
  description: string;
  inputSchema: InputSchema;
  /** Validates raw arguments; the error is a message for InvalidArgument */
  parse: (args: unknown) => Result<T, string>;
  handler: (args: T, context: ToolContext) => Promise<ToolOutcome>;
}

/**
 * A tool with its argument type erased, so tools can share one registry
 */
export interface RegisteredTool {
  name: ToolName;
  description: string;
  inputSchema: InputSchema;
  /** Validates arguments and returns the bound invocation */
  prepare: (args: unknown) => Result<(context: ToolContext) => Promise<ToolOutcome>, string>;
}

export function registerTool<T>(tool: Tool<T>): RegisteredTool {
  return {
    name: tool.name,
    description: tool.description,
    inputSchema: tool.inputSchema,
    prepare: (args) => {
      const parsed = tool.parse(args);
      if (!parsed.ok) {
        return parsed;
      }
      return { ok: true, value: (context) => tool.handler(parsed.value, context) };
    },
  };
}
