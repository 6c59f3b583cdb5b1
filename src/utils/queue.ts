/**
 * Concurrency cap for in-flight tool calls
 * Uses p-queue for concurrency control
 */

import PQueue from 'p-queue';
import { CancelledError } from './timeout.js';

const CANCELLED_MESSAGE = 'Tool call was cancelled';

/**
 * Queue statistics
 */
export interface QueueStats {
  /** Calls currently running */
  running: number;
  /** Calls waiting for a slot */
  waiting: number;
  completed: number;
  failed: number;
}

/**
 * Runs tool calls with at most `concurrency` in flight
 */
export class ToolCallQueue {
  private queue: PQueue;
  private completed: number = 0;
  private failed: number = 0;

  /**
   * @param concurrency - Maximum concurrent tool calls
   */
  constructor(concurrency: number) {
    this.queue = new PQueue({ concurrency });
  }

  /**
   * Adds a task to the queue
   *
   * @param task - Async function to execute
   * @param signal - Rejects at once with CancelledError when aborted; a task
   *   still waiting for a slot never starts
   * @returns Promise that resolves when the task completes
   */
  async add<T>(task: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    let onAbort: (() => void) | undefined;

    try {
      if (signal?.aborted) {
        throw new CancelledError(CANCELLED_MESSAGE);
      }

      // throwOnTimeout selects the overload that resolves to T instead of T | void
      const queued = this.queue.add(task, { throwOnTimeout: true, signal });
      let result: T;
      if (signal) {
        // p-queue rejects an aborted waiting task only when it reaches the front
        queued.catch(() => undefined);
        const cancelled = new Promise<never>((_, reject) => {
          onAbort = () => reject(new CancelledError(CANCELLED_MESSAGE));
          signal.addEventListener('abort', onAbort, { once: true });
        });
        result = await Promise.race([cancelled, queued]);
      } else {
        result = await queued;
      }

      this.completed++;
      return result;
    } catch (error) {
      this.failed++;
      throw error;
    } finally {
      if (signal && onAbort) {
        signal.removeEventListener('abort', onAbort);
      }
    }
  }

  /**
   * Gets current queue statistics
   */
  getStats(): QueueStats {
    return {
      running: this.queue.pending,
      waiting: this.queue.size,
      completed: this.completed,
      failed: this.failed,
    };
  }
}
