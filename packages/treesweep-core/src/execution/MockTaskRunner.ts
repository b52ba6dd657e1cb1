/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { isExistsError } from '../errors.js';
import type { Task } from '../task.js';
import type { TaskRunner, TaskExecuteOptions, TaskResult } from './interfaces.js';

/**
 * Record of a single task execution call.
 */
export interface MockTaskCall {
  task: Task;
  options?: TaskExecuteOptions;
}

/**
 * Options for MockTaskRunner.
 */
export interface MockTaskRunnerOptions {
  /** Delay before each call resolves, in ms (default: 0) */
  delay?: number;
  /** Create an empty file at each missing output of a successful task */
  writeOutputs?: boolean;
}

/** Successful result with zero duration */
export const MOCK_SUCCESS: TaskResult = {
  state: 'success',
  exitCode: 0,
  signal: null,
  duration: 0,
  error: null,
};

/**
 * Failed result with the given exit code.
 */
export function mockFailure(exitCode = 1): TaskResult {
  return {
    state: 'failed',
    exitCode,
    signal: null,
    duration: 0,
    error: `Exit code: ${exitCode}`,
  };
}

/**
 * TaskRunner mock for testing dispatch and pipelines without spawning processes.
 *
 * Allows configuring responses per task id and records all calls for assertions.
 */
export class MockTaskRunner implements TaskRunner {
  private results = new Map<string, TaskResult | ((task: Task) => TaskResult)>();
  private calls: MockTaskCall[] = [];
  private defaultResult: TaskResult = MOCK_SUCCESS;
  private running = 0;
  private maxRunning = 0;

  constructor(private readonly options: MockTaskRunnerOptions = {}) {}

  /**
   * Set result for a specific task id.
   *
   * @param id - The task id to configure
   * @param result - Either a static TaskResult or a function computing it from the task
   */
  setResult(id: string, result: TaskResult | ((task: Task) => TaskResult)): void {
    this.results.set(id, result);
  }

  /**
   * Set default result for tasks without specific results configured.
   */
  setDefaultResult(result: TaskResult): void {
    this.defaultResult = result;
  }

  /**
   * Get all recorded calls, in start order.
   */
  getCalls(): readonly MockTaskCall[] {
    return this.calls;
  }

  /**
   * Highest number of calls observed in flight at once.
   */
  getMaxConcurrency(): number {
    return this.maxRunning;
  }

  /**
   * Clear recorded calls.
   */
  clearCalls(): void {
    this.calls = [];
    this.maxRunning = 0;
  }

  async execute(task: Task, options?: TaskExecuteOptions): Promise<TaskResult> {
    this.calls.push({ task, options });
    this.running++;
    this.maxRunning = Math.max(this.maxRunning, this.running);

    try {
      const delay = this.options.delay ?? 0;
      if (delay > 0) {
        const aborted = await sleep(delay, options?.signal);
        if (aborted) {
          return { state: 'failed', exitCode: null, signal: 'SIGKILL', duration: delay, error: 'Aborted' };
        }
      }

      const configured = this.results.get(task.id);
      const result = configured
        ? typeof configured === 'function' ? configured(task) : configured
        : this.defaultResult;

      if (result.state === 'success' && this.options.writeOutputs) {
        for (const output of task.outputs) {
          await fs.mkdir(path.dirname(output), { recursive: true });
          await createIfMissing(output);
        }
      }
      return result;
    } finally {
      this.running--;
    }
  }
}

async function createIfMissing(file: string): Promise<void> {
  try {
    await fs.writeFile(file, '', { flag: 'wx' });
  } catch (err) {
    // Programs that rewrite their input in place leave it where it was
    if (!isExistsError(err)) throw err;
  }
}

/**
 * Wait `ms`, returning true early if the signal aborts.
 */
function sleep(ms: number, signal?: AbortSignal): Promise<boolean> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve(true);
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      resolve(true);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve(false);
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
