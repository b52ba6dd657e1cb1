/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * Options and helpers shared by the pipelines.
 */

import { BatchAbortedError, BatchFailedError, SweepError } from '../errors.js';
import { dispatchOrThrow } from '../dispatch/dispatch.js';
import { seededRandom } from '../dispatch/shuffle.js';
import type { BatchResult, ProgressSnapshot } from '../dispatch/types.js';
import type { TaskResult, TaskRunner } from '../execution/interfaces.js';
import { findOutputCollisions, type Batch, type Task } from '../task.js';

/**
 * Options accepted by every pipeline entry point.
 */
export interface PipelineOptions {
  /** Runner executing each task */
  runner: TaskRunner;
  /** AbortSignal for cancellation */
  signal?: AbortSignal;
  /** Randomize task order within each batch (default: true) */
  shuffle?: boolean;
  /** Random source for shuffling (default: seeded from config.seed, else Math.random) */
  random?: () => number;
  /** Per-task timeout in milliseconds (default: none) */
  timeout?: number;
  /** Callback for diagnostics: enumeration counts (`<label>\t<count>`) and restore failures */
  onDiagnostic?: (message: string) => void;
  /** Callback before a batch is dispatched */
  onBatchStart?: (batch: Batch) => void;
  /** Callback after a batch settles, successful or not */
  onBatchComplete?: (result: BatchResult) => void;
  /** Callback when a task starts */
  onTaskStart?: (task: Task) => void;
  /** Callback when a task settles */
  onTaskComplete?: (task: Task, result: TaskResult) => void;
  /** Callback after every settled task */
  onProgress?: (snapshot: ProgressSnapshot) => void;
  /** Callback for task stdout not redirected to a file */
  onStdout?: (task: Task, data: string) => void;
  /** Callback for task stderr not redirected to a file */
  onStderr?: (task: Task, data: string) => void;
}

/**
 * Pick the random source: explicit option, then the configured seed.
 */
export function resolveRandom(options: PipelineOptions, seed: number | undefined): () => number {
  if (options.random) return options.random;
  return seed !== undefined ? seededRandom(seed) : Math.random;
}

/**
 * Throw if two tasks claim the same output path.
 */
export function assertNoCollisions(batch: Batch): void {
  const collisions = findOutputCollisions(batch.tasks);
  if (collisions.size === 0) return;
  const [first] = collisions;
  const detail = first ? `'${first[0]}' is written by ${first[1].join(', ')}` : '';
  throw new SweepError(`Batch '${batch.name}' has ${collisions.size} conflicting output(s): ${detail}`);
}

/**
 * Dispatch one batch, reporting it through the pipeline callbacks.
 *
 * @throws {BatchFailedError} If any task failed
 * @throws {BatchAbortedError} If the batch was cancelled
 */
export async function runBatch(
  batch: Batch,
  options: PipelineOptions,
  random: () => number
): Promise<BatchResult> {
  assertNoCollisions(batch);
  options.onBatchStart?.(batch);
  try {
    const result = await dispatchOrThrow(batch, {
      runner: options.runner,
      shuffle: options.shuffle,
      random,
      signal: options.signal,
      timeout: options.timeout,
      onTaskStart: options.onTaskStart,
      onTaskComplete: options.onTaskComplete,
      onProgress: options.onProgress,
      onStdout: options.onStdout,
      onStderr: options.onStderr,
    });
    options.onBatchComplete?.(result);
    return result;
  } catch (err) {
    if (err instanceof BatchFailedError || err instanceof BatchAbortedError) {
      options.onBatchComplete?.(err.result);
    }
    throw err;
  }
}
