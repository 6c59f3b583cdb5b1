/**
 * Tests for the tool-call concurrency queue
 */

import { describe, it, expect } from 'vitest';
import { ToolCallQueue } from './queue.js';
import { CancelledError } from './timeout.js';

function deferred<T>() {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('ToolCallQueue', () => {
  it('runs at most `concurrency` tasks at once', async () => {
    const queue = new ToolCallQueue(2);
    const gates = [deferred<void>(), deferred<void>(), deferred<void>()];
    let running = 0;
    let peak = 0;

    const tasks = gates.map((gate, i) =>
      queue.add(async () => {
        running++;
        peak = Math.max(peak, running);
        await gate.promise;
        running--;
        return i;
      })
    );

    await Promise.resolve();
    expect(queue.getStats()).toMatchObject({ running: 2, waiting: 1 });

    gates.forEach((gate) => gate.resolve());
    await expect(Promise.all(tasks)).resolves.toEqual([0, 1, 2]);
    expect(peak).toBe(2);
  });

  it('counts completed and failed tasks', async () => {
    const queue = new ToolCallQueue(1);

    await queue.add(async () => 'ok');
    await expect(queue.add(async () => { throw new Error('task failed'); })).rejects.toThrow('task failed');

    expect(queue.getStats()).toEqual({ running: 0, waiting: 0, completed: 1, failed: 1 });
  });

  it('drops a waiting task when its signal aborts', async () => {
    const queue = new ToolCallQueue(1);
    const gate = deferred<void>();
    const first = queue.add(() => gate.promise);

    const controller = new AbortController();
    let started = false;
    const second = queue.add(async () => {
      started = true;
    }, controller.signal);

    controller.abort();
    gate.resolve();

    await first;
    await expect(second).rejects.toBeInstanceOf(CancelledError);
    expect(started).toBe(false);
  });

  it('rejects a waiting task as soon as its signal aborts', async () => {
    const queue = new ToolCallQueue(1);
    const gate = deferred<void>();
    const first = queue.add(() => gate.promise);

    const controller = new AbortController();
    let started = false;
    const second = queue.add(async () => {
      started = true;
    }, controller.signal);

    controller.abort();

    await expect(second).rejects.toThrow('Tool call was cancelled');
    expect(queue.getStats()).toMatchObject({ running: 1, failed: 1 });

    gate.resolve();
    await first;
    expect(started).toBe(false);
  });

  it('rejects at once when the signal is already aborted', async () => {
    const queue = new ToolCallQueue(1);
    const controller = new AbortController();
    controller.abort();

    await expect(queue.add(async () => 'ok', controller.signal)).rejects.toBeInstanceOf(CancelledError);
  });
});
