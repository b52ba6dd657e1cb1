/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * Local task execution.
 *
 * This module handles all local process-specific execution:
 * - Spawning the task's program with its argument vector (no shell)
 * - Redirecting stdout/stderr to the task's capture files
 * - Forcing single-threaded numeric libraries in every child
 * - Process lifecycle management (abort signals, timeouts)
 */

import * as fs from 'fs/promises';
import { spawn, type StdioOptions } from 'child_process';
import type { FileHandle } from 'fs/promises';
import type { Task } from '../task.js';
import type { TaskRunner, TaskExecuteOptions, TaskResult } from './interfaces.js';

/**
 * Environment forced on every dispatched program so that many concurrent
 * processes do not each start a full thread pool.
 */
export const DEFAULT_THREAD_ENV: Readonly<Record<string, string>> = Object.freeze({
  OMP_NUM_THREADS: '1',
});

/**
 * Options for LocalTaskRunner.
 */
export interface LocalTaskRunnerOptions {
  /** Variables set for every task (default: OMP_NUM_THREADS=1) */
  threadEnv?: Readonly<Record<string, string>>;
  /** Parent environment (default: process.env) */
  baseEnv?: NodeJS.ProcessEnv;
}

/**
 * TaskRunner implementation for local process execution.
 */
export class LocalTaskRunner implements TaskRunner {
  private readonly threadEnv: Readonly<Record<string, string>>;
  private readonly baseEnv: NodeJS.ProcessEnv;

  constructor(options: LocalTaskRunnerOptions = {}) {
    this.threadEnv = options.threadEnv ?? DEFAULT_THREAD_ENV;
    this.baseEnv = options.baseEnv ?? process.env;
  }

  async execute(task: Task, options: TaskExecuteOptions = {}): Promise<TaskResult> {
    const startTime = Date.now();
    const { command } = task;

    // Open capture files before spawning so a bad path is an 'error', not a
    // process that silently loses its output
    const handles: FileHandle[] = [];
    const openCapture = async (file: string): Promise<number> => {
      const handle = await fs.open(file, 'w');
      handles.push(handle);
      return handle.fd;
    };

    let stdio: StdioOptions;
    try {
      const out = command.stdout !== undefined
        ? await openCapture(command.stdout)
        : options.onStdout ? 'pipe' : 'inherit';
      const err = command.stderr !== undefined
        ? await openCapture(command.stderr)
        : options.onStderr ? 'pipe' : 'inherit';
      stdio = ['ignore', out, err];
    } catch (err) {
      await closeAll(handles);
      return {
        state: 'error',
        exitCode: null,
        signal: null,
        duration: Date.now() - startTime,
        error: `Failed to open capture file: ${err instanceof Error ? err.message : String(err)}`,
      };
    }

    try {
      return await this.runProcess(task, stdio, options, startTime);
    } finally {
      await closeAll(handles);
    }
  }

  private runProcess(
    task: Task,
    stdio: StdioOptions,
    options: TaskExecuteOptions,
    startTime: number
  ): Promise<TaskResult> {
    const { command } = task;

    // detached: true puts the child in its own process group so abort and
    // timeout can kill the program together with anything it spawned.
    const child = spawn(command.program, [...command.args], {
      cwd: command.cwd,
      env: { ...this.baseEnv, ...this.threadEnv, ...command.env },
      stdio,
      detached: true,
    });

    let timedOut = false;
    let aborted = false;

    const killProcessGroup = () => {
      if (child.pid) {
        try {
          process.kill(-child.pid, 'SIGKILL');
        } catch {
          // Process may have already exited
        }
      }
    };

    const onAbort = () => {
      aborted = true;
      killProcessGroup();
    };

    let timeoutId: NodeJS.Timeout | undefined;
    if (options.timeout !== undefined && options.timeout > 0) {
      timeoutId = setTimeout(() => {
        timedOut = true;
        killProcessGroup();
      }, options.timeout);
    }

    if (options.signal) {
      if (options.signal.aborted) {
        onAbort();
      } else {
        options.signal.addEventListener('abort', onAbort, { once: true });
      }
    }

    child.stdout?.on('data', (data: Buffer) => {
      options.onStdout?.(data.toString('utf-8'));
    });
    child.stderr?.on('data', (data: Buffer) => {
      options.onStderr?.(data.toString('utf-8'));
    });

    return new Promise<TaskResult>((resolve) => {
      const cleanup = () => {
        if (timeoutId) clearTimeout(timeoutId);
        options.signal?.removeEventListener('abort', onAbort);
      };

      child.on('error', (err) => {
        cleanup();
        resolve({
          state: 'error',
          exitCode: null,
          signal: null,
          duration: Date.now() - startTime,
          error: `Failed to spawn '${command.program}': ${err.message}`,
        });
      });

      child.on('close', (code, signal) => {
        cleanup();
        const duration = Date.now() - startTime;
        if (code === 0 && !aborted && !timedOut) {
          resolve({ state: 'success', exitCode: 0, signal: null, duration, error: null });
          return;
        }

        let error: string;
        if (aborted) {
          error = 'Aborted';
        } else if (timedOut) {
          error = `Timed out after ${options.timeout}ms`;
        } else if (signal) {
          error = `Killed by signal ${signal}`;
        } else {
          error = `Exit code: ${code}`;
        }
        resolve({ state: 'failed', exitCode: code, signal, duration, error });
      });
    });
  }
}

async function closeAll(handles: FileHandle[]): Promise<void> {
  await Promise.all(handles.map((handle) => handle.close()));
}
