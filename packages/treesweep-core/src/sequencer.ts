/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * Stage sequencer: runs named stages strictly in order.
 *
 * Stages hand data to each other only through files at fixed paths, so any
 * stage can be disabled without changing what the others read or write.
 */

import { SequencerStateError, StageFailedError, SweepError } from './errors.js';

/**
 * One step of a pipeline.
 */
export interface Stage<C> {
  name: string;
  run(context: C): Promise<void>;
}

/**
 * Sequencer state.
 *
 * pending → running(0) → running(1) → … → completed, or running(i) → failed(i),
 * which is terminal.
 */
export type SequencerState =
  | { type: 'pending' }
  | { type: 'running'; stage: string; index: number }
  | { type: 'failed'; stage: string; index: number; error: Error }
  | { type: 'completed' };

/**
 * Outcome of one stage after run().
 */
export interface StageSummary {
  name: string;
  status: 'completed' | 'skipped' | 'failed' | 'not_run';
  /** Duration in milliseconds (0 unless the stage ran) */
  duration: number;
}

/**
 * Options for StageSequencer.
 */
export interface SequencerOptions {
  /** Names of the stages to run (default: all) */
  enabled?: readonly string[];
  /** Callback when a stage starts */
  onStageStart?: (name: string, index: number) => void;
  /** Callback when a stage finishes successfully */
  onStageComplete?: (name: string, duration: number) => void;
  /** Callback when a disabled stage is passed over */
  onStageSkipped?: (name: string) => void;
}

export class StageSequencer<C> {
  private current: SequencerState = { type: 'pending' };
  private readonly summaries: StageSummary[];
  private readonly enabled: ReadonlySet<string>;

  constructor(
    private readonly stages: readonly Stage<C>[],
    private readonly options: SequencerOptions = {}
  ) {
    const names = new Set<string>();
    for (const stage of stages) {
      if (names.has(stage.name)) {
        throw new SweepError(`Duplicate stage '${stage.name}'`);
      }
      names.add(stage.name);
    }
    for (const name of options.enabled ?? []) {
      if (!names.has(name)) {
        throw new SweepError(`Unknown stage '${name}' (expected one of: ${[...names].join(', ')})`);
      }
    }

    this.enabled = new Set(options.enabled ?? names);
    this.summaries = stages.map((stage): StageSummary => ({ name: stage.name, status: 'not_run', duration: 0 }));
  }

  get state(): SequencerState {
    return this.current;
  }

  /**
   * Per-stage outcome so far.
   */
  summary(): StageSummary[] {
    return this.summaries.map((s) => ({ ...s }));
  }

  /**
   * Run every enabled stage in order.
   *
   * @throws {StageFailedError} When a stage throws; later stages are not run
   * @throws {SequencerStateError} If called more than once
   */
  async run(context: C): Promise<StageSummary[]> {
    if (this.current.type !== 'pending') {
      throw new SequencerStateError(this.current.type);
    }

    for (let index = 0; index < this.stages.length; index++) {
      const stage = this.stages[index];
      const summary = this.summaries[index];
      if (!stage || !summary) continue;

      if (!this.enabled.has(stage.name)) {
        summary.status = 'skipped';
        this.options.onStageSkipped?.(stage.name);
        continue;
      }

      this.current = { type: 'running', stage: stage.name, index };
      this.options.onStageStart?.(stage.name, index);
      const startTime = Date.now();

      try {
        await stage.run(context);
      } catch (err) {
        const error = err instanceof Error ? err : new Error(String(err));
        summary.status = 'failed';
        summary.duration = Date.now() - startTime;
        this.current = { type: 'failed', stage: stage.name, index, error };
        throw new StageFailedError(stage.name, index, error);
      }

      summary.status = 'completed';
      summary.duration = Date.now() - startTime;
      this.options.onStageComplete?.(stage.name, summary.duration);
    }

    this.current = { type: 'completed' };
    return this.summary();
  }
}
