/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * Dispatcher types.
 */

import type { Task } from '../task.js';
import type { TaskResult, TaskRunner } from '../execution/interfaces.js';

/**
 * A settled task and its result.
 */
export interface TaskOutcome {
  task: Task;
  result: TaskResult;
}

/**
 * Point-in-time view of a running batch.
 */
export interface ProgressSnapshot {
  /** Tasks settled so far */
  done: number;
  /** Tasks in the batch */
  total: number;
  /** Tasks currently running */
  running: number;
  /** Settled tasks that did not succeed */
  failed: number;
  /** Milliseconds since the batch started */
  elapsed: number;
  /** Mean task duration in ms (null before the first completion) */
  average: number | null;
  /** Estimated milliseconds until the batch finishes (null before the first completion) */
  eta: number | null;
}

/**
 * Options for dispatch().
 */
export interface DispatchOptions {
  /** Runner executing each task */
  runner: TaskRunner;
  /** Randomize task order before dispatch (default: true) */
  shuffle?: boolean;
  /** Random source for shuffling, returning values in [0, 1) (default: Math.random) */
  random?: () => number;
  /** AbortSignal for cancelling the whole batch */
  signal?: AbortSignal;
  /** Per-task timeout in milliseconds (default: none) */
  timeout?: number;
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
 * Result of dispatching one batch.
 */
export interface BatchResult {
  /** Batch name */
  batch: string;
  /** True if every task ran and succeeded */
  success: boolean;
  /** True if the batch was cancelled through the AbortSignal */
  aborted: boolean;
  /** Number of tasks in the batch */
  total: number;
  /** Tasks that exited with code 0 */
  succeeded: number;
  /** Tasks that failed or could not be started */
  failed: number;
  /** Tasks never started because of the halt policy or an abort */
  notStarted: number;
  /** Total duration in milliseconds */
  duration: number;
  /** Settled tasks, in completion order */
  results: TaskOutcome[];
}
