/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

import type { ProgressSnapshot } from './types.js';

/**
 * Tracks batch progress and estimates time remaining.
 *
 * The estimate assumes the remaining tasks cost the mean of those finished so
 * far and run `concurrency` at a time.
 */
export class EtaTracker {
  private readonly startTime: number;
  private done = 0;
  private running = 0;
  private failed = 0;
  private totalDuration = 0;

  constructor(
    private readonly total: number,
    private readonly concurrency: number,
    private readonly now: () => number = Date.now
  ) {
    this.startTime = now();
  }

  taskStarted(): void {
    this.running++;
  }

  taskCompleted(duration: number, success: boolean): void {
    this.running = Math.max(0, this.running - 1);
    this.done++;
    this.totalDuration += duration;
    if (!success) this.failed++;
  }

  snapshot(): ProgressSnapshot {
    const average = this.done > 0 ? this.totalDuration / this.done : null;
    const remaining = this.total - this.done;
    const eta = average === null
      ? null
      : Math.round((average * remaining) / Math.max(1, this.concurrency));

    return {
      done: this.done,
      total: this.total,
      running: this.running,
      failed: this.failed,
      elapsed: this.now() - this.startTime,
      average: average === null ? null : Math.round(average),
      eta,
    };
  }
}
