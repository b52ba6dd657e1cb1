/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * Tree evaluation pipeline.
 *
 * For every `<resultsDir>/<method>/<runId>/<runId><resultSuffix>` it computes
 * three artifacts next to the result file:
 *
 * - `<runId>.mutphi.npz`  mutation phis against the simulation input
 * - `<runId>.mutdist.npz` mutation distances against the true phis
 * - `<runId>.mutrel.npz`  pairwise mutation relations
 *
 * Each artifact type is its own batch. Mutation relations for large runs
 * (those carrying a size marker such as `K100_`) get a separate, smaller pool.
 */

import * as path from 'path';
import type { EvaluationConfig } from '../config.js';
import type { BatchResult } from '../dispatch/types.js';
import { enumerateMatching, type TaskBuilder } from '../enumerate.js';
import { partitionTasks } from '../partition.js';
import { command, createTask, type Batch, type Run, type Task } from '../task.js';
import { resolveRandom, runBatch, type PipelineOptions } from './common.js';

/** Artifact stages, in dispatch order */
export const EVALUATION_STAGES = ['mutphi', 'mutdist', 'mutrel'] as const;

export type EvaluationStage = (typeof EVALUATION_STAGES)[number];

/** Name of the reduced-concurrency mutrel batch */
export const LARGE_MUTREL_BATCH = 'mutrel.large';

/**
 * Result of an evaluation run.
 */
export interface EvaluationResult {
  /** Tasks enumerated across all methods */
  tasks: number;
  /** Dispatched batches, in order */
  batches: BatchResult[];
}

function needsImputation(config: EvaluationConfig, method: string): boolean {
  return config.imputeGarbageMethods.some((marker) => method.includes(marker));
}

/**
 * Task builders for one method's runs.
 */
export function evaluationBuilders(config: EvaluationConfig, method: string): TaskBuilder[] {
  const impute = needsImputation(config, method);
  const script = (name: string) => path.join(config.scriptsDir, name);

  const build = (stage: EvaluationStage, run: Run, args: string[], output: string): Task =>
    createTask({
      stage,
      runId: run.runId,
      method,
      command: command(config.python)
        .arg(script(`make_${stage}s.py`))
        .flag('--impute-garbage', impute && stage !== 'mutrel')
        .args(...args, output)
        .cwd(path.dirname(run.source))
        .envs(config.threadEnv)
        .build(),
      outputs: [output],
    });

  const base = (run: Run) => path.join(path.dirname(run.source), run.runId);

  return [
    (run) => build('mutphi', run, [
      run.source,
      path.join(config.inputsDir, `${run.runId}.ssm`),
    ], `${base(run)}.mutphi.npz`),
    (run) => build('mutdist', run, [
      run.source,
      path.join(config.truthDir, run.runId, `${run.runId}.phi.npz`),
    ], `${base(run)}.mutdist.npz`),
    (run) => build('mutrel', run, [run.source], `${base(run)}.mutrel.npz`),
  ];
}

/**
 * Enumerate evaluation tasks for every configured method.
 *
 * Reports `<method>\t<count>` per method through onDiagnostic.
 */
export async function enumerateEvaluation(
  config: EvaluationConfig,
  options: Pick<PipelineOptions, 'onDiagnostic'> = {}
): Promise<Task[]> {
  const tasks: Task[] = [];
  for (const method of config.methods) {
    const found = await enumerateMatching(
      config.resultsDir,
      `${method}/*/*${config.resultSuffix}`,
      evaluationBuilders(config, method),
      { label: method, method, onDiagnostic: options.onDiagnostic }
    );
    tasks.push(...found);
  }
  return tasks;
}

/**
 * Split evaluation tasks into ordered batches.
 *
 * @returns Batches `mutphi`, `mutdist`, `mutrel` and `mutrel.large`, in that order
 */
export function planEvaluation(config: EvaluationConfig, tasks: readonly Task[]): Batch[] {
  const byStage = (stage: EvaluationStage) => tasks.filter((task) => task.stage === stage);
  const batch = (name: string, batchTasks: Task[], concurrency: number): Batch => ({
    name,
    tasks: batchTasks,
    concurrency,
    halt: config.halt,
  });

  const mutrel = partitionTasks(
    byStage('mutrel'),
    [{ name: LARGE_MUTREL_BATCH, markers: config.largeMarkers }],
    'mutrel'
  );

  return [
    batch('mutphi', byStage('mutphi'), config.parallel),
    batch('mutdist', byStage('mutdist'), config.parallel),
    batch('mutrel', mutrel.get('mutrel') ?? [], config.parallel),
    batch(LARGE_MUTREL_BATCH, mutrel.get(LARGE_MUTREL_BATCH) ?? [], config.largeParallel),
  ];
}

/**
 * Enumerate, plan and dispatch the evaluation pipeline.
 *
 * Batches run one after another; the first failing batch stops the run.
 *
 * @throws {BatchFailedError} If any task fails
 */
export async function runEvaluation(
  config: EvaluationConfig,
  options: PipelineOptions
): Promise<EvaluationResult> {
  const random = resolveRandom(options, config.seed);
  const tasks = await enumerateEvaluation(config, options);
  const batches: BatchResult[] = [];

  for (const batch of planEvaluation(config, tasks)) {
    batches.push(await runBatch(batch, options, random));
  }

  return { tasks: tasks.length, batches };
}
