/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * Bounded-concurrency batch dispatch.
 *
 * A fixed number of workers pull tasks from a shared queue. Once a task fails
 * the queue is closed (halt 'soon') and, under halt 'now', the running tasks
 * are killed through a shared AbortController. dispatch() returns only after
 * every started task has settled.
 */

import { BatchAbortedError, BatchFailedError } from '../errors.js';
import type { Batch, Task } from '../task.js';
import type { TaskExecuteOptions, TaskResult } from '../execution/interfaces.js';
import { EtaTracker } from './progress.js';
import { shuffle } from './shuffle.js';
import type { BatchResult, DispatchOptions, TaskOutcome } from './types.js';

/**
 * Run a batch on a worker pool of `batch.concurrency` workers.
 *
 * Task failures are reported in the result, never thrown.
 *
 * @example
 * ```ts
 * const result = await dispatch(
 *   { name: 'mutphi', tasks, concurrency: 80, halt: 'soon' },
 *   { runner: new LocalTaskRunner() }
 * );
 * if (!result.success) process.exitCode = 1;
 * ```
 */
export async function dispatch(batch: Batch, options: DispatchOptions): Promise<BatchResult> {
  const startTime = Date.now();
  const concurrency = Math.max(1, Math.floor(batch.concurrency));
  const queue = options.shuffle === false
    ? [...batch.tasks]
    : shuffle(batch.tasks, options.random);

  const tracker = new EtaTracker(queue.length, concurrency);
  const results: TaskOutcome[] = [];
  const killSwitch = new AbortController();
  let halted = false;
  let aborted = false;

  const onAbort = () => {
    aborted = true;
    halted = true;
    killSwitch.abort();
  };
  if (options.signal) {
    if (options.signal.aborted) {
      onAbort();
    } else {
      options.signal.addEventListener('abort', onAbort, { once: true });
    }
  }

  let next = 0;
  const take = (): Task | undefined => {
    if (halted || next >= queue.length) return undefined;
    return queue[next++];
  };

  const runOne = async (task: Task): Promise<TaskResult> => {
    const execOptions: TaskExecuteOptions = {
      signal: killSwitch.signal,
      timeout: options.timeout,
      onStdout: options.onStdout ? (data) => options.onStdout?.(task, data) : undefined,
      onStderr: options.onStderr ? (data) => options.onStderr?.(task, data) : undefined,
    };
    const taskStart = Date.now();
    try {
      return await options.runner.execute(task, execOptions);
    } catch (err) {
      // Runners report failures as results; a rejection is an internal error
      return {
        state: 'error',
        exitCode: null,
        signal: null,
        duration: Date.now() - taskStart,
        error: err instanceof Error ? err.message : String(err),
      };
    }
  };

  const worker = async (): Promise<void> => {
    for (let task = take(); task !== undefined; task = take()) {
      tracker.taskStarted();
      options.onTaskStart?.(task);

      const result = await runOne(task);
      results.push({ task, result });
      tracker.taskCompleted(result.duration, result.state === 'success');
      options.onTaskComplete?.(task, result);

      if (result.state !== 'success' && !aborted && batch.halt !== 'never') {
        halted = true;
        if (batch.halt === 'now') {
          killSwitch.abort();
        }
      }

      options.onProgress?.(tracker.snapshot());
    }
  };

  try {
    const workers = Array.from({ length: Math.min(concurrency, queue.length) }, () => worker());
    await Promise.all(workers);
  } finally {
    options.signal?.removeEventListener('abort', onAbort);
  }

  const failed = results.filter(({ result }) => result.state !== 'success').length;
  const notStarted = queue.length - results.length;

  return {
    batch: batch.name,
    success: !aborted && failed === 0 && notStarted === 0,
    aborted,
    total: queue.length,
    succeeded: results.length - failed,
    failed,
    notStarted,
    duration: Date.now() - startTime,
    results,
  };
}

/**
 * Dispatch a batch and throw unless every task succeeded.
 *
 * @throws {BatchAbortedError} If the batch was cancelled
 * @throws {BatchFailedError} If any task failed
 */
export async function dispatchOrThrow(batch: Batch, options: DispatchOptions): Promise<BatchResult> {
  const result = await dispatch(batch, options);
  if (result.aborted) {
    throw new BatchAbortedError(batch.name, result);
  }
  if (!result.success) {
    throw new BatchFailedError(batch.name, result);
  }
  return result;
}
