/**
 * Type definitions for the Drive reader
 * Shared interfaces and types used across auth, drive, formatting and tools
 */

/**
 * Result type for operations that can succeed or fail
 * Replaces exceptions with explicit error handling
 */
export type Result<T, E = Error> =
  | { ok: true; value: T }
  | { ok: false; error: E };

/**
 * Log levels for the logging system
 */
export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

/**
 * Error kinds surfaced to the assistant
 *
 * - NoCredential / RefreshFailed: credential lifecycle (reported to callers as AuthRequired)
 * - UnknownTool / InvalidArgument: request validation, never reach the remote layer
 * - NotFound ... RemoteServerError: remote failures, mapped from HTTP status
 * - UnsupportedContentType / ContentTooLarge / DecodeFailure: content retrieval
 * - Cancelled: the caller abandoned the tool call
 */
export type ErrorKind =
  | 'NoCredential'
  | 'RefreshFailed'
  | 'UnknownTool'
  | 'InvalidArgument'
  | 'AuthRequired'
  | 'NotFound'
  | 'PermissionDenied'
  | 'RateLimited'
  | 'RemoteTimeout'
  | 'RemoteServerError'
  | 'UnsupportedContentType'
  | 'ContentTooLarge'
  | 'DecodeFailure'
  | 'Cancelled';

/**
 * Delegated-access credential (OAuth token pair)
 */
export interface Credential {
  /** Short-lived bearer token */
  accessToken: string;
  /** Long-lived refresh token, null when the provider did not grant one */
  refreshToken: string | null;
  /** Access token expiry (epoch milliseconds) */
  expiresAt: number;
  /** Granted OAuth scopes */
  scopes: string[];
}

/**
 * Lifecycle state of the stored credential
 */
export type CredentialStatus = 'missing' | 'valid' | 'refreshable' | 'dead';

/**
 * Snapshot of a Drive file at fetch time
 */
export interface FileRecord {
  /** Google Drive file ID */
  id: string;
  name: string;
  mimeType: string;
  modifiedTime: Date | null;
  /** Last time the authorized user viewed the file */
  viewedByMeTime: Date | null;
  createdTime: Date | null;
  /** Size in bytes, null for Google-native documents */
  size: number | null;
  /** Parent folder IDs */
  parents: string[];
  webViewLink: string | null;
  /** Owner display names (or e-mail when no name is set) */
  owners: string[];
  shared: boolean;
  trashed: boolean;
}

/**
 * Which timestamp a recency listing filters and orders on
 */
export type RecentMode = 'edited' | 'viewed';

/**
 * Incoming tool invocation
 */
export interface ToolRequest {
  name: string;
  arguments: unknown;
}

export interface TextBlock {
  type: 'text';
  text: string;
}

export interface DataBlock {
  type: 'data';
  data: Record<string, unknown>;
}

export interface ErrorBlock {
  type: 'error';
  kind: ErrorKind;
  message: string;
}

/**
 * Outcome of a tool invocation
 * Errors always carry exactly one error block
 */
export type ToolResult =
  | { isError: false; content: Array<TextBlock | DataBlock>; note?: string }
  | { isError: true; content: [ErrorBlock] };
