/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * Task execution abstraction.
 *
 * The dispatcher only sees this interface, so the same worker pool drives
 * local processes in production and a mock runner in tests.
 */

import type { Task } from '../task.js';

/**
 * Options for task execution.
 */
export interface TaskExecuteOptions {
  /** AbortSignal for cancellation (kills the running process) */
  signal?: AbortSignal;
  /** Timeout in milliseconds (default: none) */
  timeout?: number;
  /** Callback for stdout data not redirected to a file */
  onStdout?: (data: string) => void;
  /** Callback for stderr data not redirected to a file */
  onStderr?: (data: string) => void;
}

/**
 * Result of a single task execution.
 */
export interface TaskResult {
  /**
   * Final state
   * - `success`: exited with code 0
   * - `failed`: nonzero exit, killed by a signal, timed out or aborted
   * - `error`: could not be started
   */
  state: 'success' | 'failed' | 'error';
  /** Process exit code (null if the process never exited normally) */
  exitCode: number | null;
  /** Signal that terminated the process, if any */
  signal: string | null;
  /** Wall-clock time in milliseconds */
  duration: number;
  /** Error message (null on success) */
  error: string | null;
}

/**
 * Task execution abstraction.
 *
 * Implementations:
 * - LocalTaskRunner: Spawns the task's program as a local process
 * - MockTaskRunner: Returns configured results without spawning anything
 */
export interface TaskRunner {
  /**
   * Execute a task. Never rejects for task-level failures; those are
   * reported through the result state.
   */
  execute(task: Task, options?: TaskExecuteOptions): Promise<TaskResult>;
}
