/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * Shared formatting utilities for CLI commands.
 */

import type { BatchResult, ProgressSnapshot, Task, TaskOutcome, TaskResult } from '@treesweep/core';

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Format a duration as a short human-readable string.
 *
 * @param ms - Duration in milliseconds
 * @returns Formatted string like "850ms", "12s", "3m 05s", "1h 02m"
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) return `${Math.round(ms)}ms`;
  const totalSeconds = Math.round(ms / 1000);
  if (totalSeconds < 60) return `${totalSeconds}s`;
  const totalMinutes = Math.floor(totalSeconds / 60);
  if (totalMinutes < 60) return `${totalMinutes}m ${pad(totalSeconds % 60)}s`;
  return `${Math.floor(totalMinutes / 60)}h ${pad(totalMinutes % 60)}m`;
}

export function formatTaskStatus(result: TaskResult): string {
  switch (result.state) {
    case 'success':
      return 'DONE';
    case 'failed':
      return 'FAIL';
    case 'error':
      return 'ERR';
    default:
      return '???';
  }
}

/**
 * One line per settled task: `  [DONE] mutphi:pairtree/K3_S1 [1200ms]`
 */
export function formatTaskLine(task: Task, result: TaskResult): string {
  const duration = result.duration > 0 ? ` [${result.duration}ms]` : '';
  return `  [${formatTaskStatus(result)}] ${task.id}${duration}`;
}

/**
 * Why a task failed, and where its captured stderr is.
 */
export function formatFailure({ task, result }: TaskOutcome): string {
  const reason = result.state === 'failed' && result.exitCode !== null
    ? `exit code ${result.exitCode}`
    : result.error ?? result.state;
  const log = task.command.stderr ? ` (stderr: ${task.command.stderr})` : '';
  return `${task.id}: ${reason}${log}`;
}

/**
 * Progress line printed after each settled task when ETA reporting is on.
 */
export function formatProgress(snapshot: ProgressSnapshot): string {
  const eta = snapshot.eta === null ? '?' : formatDuration(snapshot.eta);
  const average = snapshot.average === null ? '?' : formatDuration(snapshot.average);
  return `Done: ${snapshot.done}/${snapshot.total} Running: ${snapshot.running} ` +
    `Failed: ${snapshot.failed} ETA: ${eta} Avg: ${average}`;
}

export function formatBatchSummary(result: BatchResult): string {
  const notStarted = result.notStarted > 0 ? `, ${result.notStarted} not started` : '';
  const aborted = result.aborted ? ' (aborted)' : '';
  return `Batch ${result.batch}: ${result.succeeded} succeeded, ${result.failed} failed` +
    `${notStarted} [${formatDuration(result.duration)}]${aborted}`;
}
