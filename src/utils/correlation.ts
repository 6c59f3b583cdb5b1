/**
 * Tool-call correlation ID management using AsyncLocalStorage
 * Lets every log line emitted during one tool call carry the same ID
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { randomUUID } from 'node:crypto';

/**
 * Correlation context stored in AsyncLocalStorage
 */
export interface CorrelationContext {
  /** Unique correlation ID for this tool call */
  correlationId: string;
  /** Tool being dispatched */
  toolName?: string;
  /** Start time of the call */
  startTime: number;
}

const correlationStorage = new AsyncLocalStorage<CorrelationContext>();

/**
 * Generates a new correlation ID
 */
export function generateCorrelationId(): string {
  return randomUUID();
}

/**
 * Gets the current correlation context (if any)
 */
export function getCorrelationContext(): CorrelationContext | undefined {
  return correlationStorage.getStore();
}

/**
 * Runs an async function within a correlation context
 *
 * @param fn - Async function to run
 * @param context - Optional partial context (correlationId is generated if not provided)
 * @returns Promise that resolves to the function result
 */
export async function withCorrelationAsync<T>(
  fn: () => Promise<T>,
  context?: Partial<CorrelationContext>
): Promise<T> {
  const fullContext: CorrelationContext = {
    correlationId: context?.correlationId ?? generateCorrelationId(),
    toolName: context?.toolName,
    startTime: context?.startTime ?? Date.now(),
  };

  return correlationStorage.run(fullContext, fn);
}

/**
 * Milliseconds since the current correlation context started, or 0 outside one
 */
export function getElapsedMs(): number {
  const context = correlationStorage.getStore();
  return context ? Date.now() - context.startTime : 0;
}
