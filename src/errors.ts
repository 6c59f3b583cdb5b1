/**
 * Error types and Drive API error classification
 *
 * Remote failures are classified into ErrorKind values so the dispatcher can
 * report them without inspecting googleapis internals:
 * - RateLimited: 429, or 403 with a rate-limit reason (retried by the caller)
 * - AuthRequired / PermissionDenied / NotFound / InvalidArgument: permanent 4xx
 * - RemoteServerError: 5xx and network failures without a status
 * - RemoteTimeout: socket timeouts and our own call deadline
 */

import type { ErrorKind } from './types/index.js';
import { CancelledError, TimeoutError } from './utils/timeout.js';

export type AuthErrorKind = 'NoCredential' | 'RefreshFailed';

/**
 * Raised by the credential manager when no usable credential is available
 */
export class AuthError extends Error {
  constructor(
    public readonly kind: AuthErrorKind,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'AuthError';
  }
}

/**
 * Failure of a tool call, tagged with the kind reported to the assistant
 */
export class DriveToolError extends Error {
  constructor(
    public readonly kind: ErrorKind,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'DriveToolError';
  }
}

const RATE_LIMIT_REASONS = new Set(['rateLimitExceeded', 'userRateLimitExceeded']);
const TIMEOUT_CODES = new Set(['ETIMEDOUT', 'ESOCKETTIMEDOUT']);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * A response body cut off at the request's maxContentLength
 * (node-fetch `max-size`, possibly wrapped by gaxios)
 */
function isContentLimitError(error: unknown): boolean {
  if (!isRecord(error)) return false;
  if (error.type === 'max-size') return true;
  return isRecord(error.cause) && error.cause.type === 'max-size';
}

/**
 * Extracts the HTTP status from a gaxios error (response.status, status or numeric code)
 */
export function getHttpStatus(error: unknown): number | undefined {
  if (!isRecord(error)) return undefined;

  const response = error.response;
  if (isRecord(response) && typeof response.status === 'number') {
    return response.status;
  }
  if (typeof error.status === 'number') return error.status;
  if (typeof error.code === 'number') return error.code;
  if (typeof error.code === 'string' && /^\d{3}$/.test(error.code)) {
    return Number(error.code);
  }
  return undefined;
}

/**
 * Extracts Google API error reasons from a gaxios error body
 * (response.data.error.errors[].reason)
 */
export function getErrorReasons(error: unknown): string[] {
  if (!isRecord(error) || !isRecord(error.response)) return [];
  const data = error.response.data;
  if (!isRecord(data) || !isRecord(data.error)) return [];
  const errors = data.error.errors;
  if (!Array.isArray(errors)) return [];

  const reasons: string[] = [];
  for (const entry of errors) {
    if (isRecord(entry) && typeof entry.reason === 'string') {
      reasons.push(entry.reason);
    }
  }
  return reasons;
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Maps any failure of a remote Drive call to a DriveToolError
 *
 * @param error - Value thrown by googleapis, withTimeout or our own code
 * @param operation - Short description used in the message (e.g. "list files")
 */
export function classifyRemoteError(error: unknown, operation: string): DriveToolError {
  if (error instanceof DriveToolError) return error;

  if (error instanceof TimeoutError) {
    return new DriveToolError('RemoteTimeout', `Timed out while trying to ${operation}`, { cause: error });
  }
  if (error instanceof CancelledError) {
    return new DriveToolError('Cancelled', `Cancelled while trying to ${operation}`, { cause: error });
  }
  if (isContentLimitError(error)) {
    return new DriveToolError('ContentTooLarge', `File content is over the size limit, stopped trying to ${operation}`, {
      cause: error,
    });
  }

  const status = getHttpStatus(error);
  const reasons = getErrorReasons(error);
  const detail = describe(error);
  const fail = (kind: ErrorKind, message: string) =>
    new DriveToolError(kind, `${message}: ${detail}`, { cause: error });

  if (status === 429 || (status === 403 && reasons.some((r) => RATE_LIMIT_REASONS.has(r)))) {
    return fail('RateLimited', `Drive rate limit hit while trying to ${operation}`);
  }
  if (status === 403 && reasons.includes('exportSizeLimitExceeded')) {
    return fail('ContentTooLarge', 'File is too large to export');
  }
  if (status === 401) {
    return fail('AuthRequired', 'Drive rejected the access token, re-authorization may be needed');
  }
  if (status === 403) {
    return fail('PermissionDenied', `Permission denied while trying to ${operation}`);
  }
  if (status === 404) {
    return fail('NotFound', 'File or folder not found');
  }
  if (status === 400) {
    return fail('InvalidArgument', `Drive rejected the request to ${operation}`);
  }

  if (isRecord(error) && typeof error.code === 'string' && TIMEOUT_CODES.has(error.code)) {
    return fail('RemoteTimeout', `Timed out while trying to ${operation}`);
  }

  return fail('RemoteServerError', `Drive failed while trying to ${operation}`);
}
