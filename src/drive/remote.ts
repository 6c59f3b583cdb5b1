/**
 * Remote call policy: per-attempt timeout, caller cancellation and
 * rate-limit retry, with every failure classified into a DriveToolError
 */

import type { Result } from '../types/index.js';
import type { RetryConfig } from '../utils/retry.js';
import type { DriveClient } from './client.js';
import { withRetry } from '../utils/retry.js';
import { withTimeout } from '../utils/timeout.js';
import { DriveToolError, classifyRemoteError } from '../errors.js';
import { debug } from '../utils/logger.js';

export interface RemotePolicy {
  /** Deadline for each attempt */
  timeoutMs: number;
  /** Backoff for rate-limited attempts */
  retry: RetryConfig;
}

/**
 * What a tool needs to talk to Drive during one call
 */
export interface RemoteContext {
  drive: DriveClient;
  policy: RemotePolicy;
  /** Caller cancellation */
  signal?: AbortSignal;
}

/**
 * Runs one Drive operation under the remote policy
 *
 * @param operation - Human-readable name used in error messages (e.g. "list files")
 * @param call - Receives the AbortSignal to hand to googleapis
 */
export async function callRemote<T>(
  context: RemoteContext,
  operation: string,
  call: (signal: AbortSignal) => Promise<T>
): Promise<Result<T, DriveToolError>> {
  const attempt = async (): Promise<Result<T, DriveToolError>> => {
    try {
      const value = await withTimeout(call, context.policy.timeoutMs, context.signal);
      return { ok: true, value };
    } catch (err) {
      const classified = classifyRemoteError(err, operation);
      debug('Remote call failed', { module: 'remote', operation, kind: classified.kind });
      return { ok: false, error: classified };
    }
  };

  try {
    return await withRetry(attempt, (error) => error.kind === 'RateLimited', context.policy.retry, context.signal);
  } catch (err) {
    // Only the backoff sleep throws, when the caller cancels
    return { ok: false, error: classifyRemoteError(err, operation) };
  }
}
