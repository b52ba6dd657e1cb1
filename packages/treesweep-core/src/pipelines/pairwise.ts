/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * Pairwise relationship pipeline.
 *
 * Seven stages, run in order by the StageSequencer:
 *
 * 1. rename            rename samples in each params file
 * 2. remove            drop hidden samples from each ssm/params pair
 * 3. pairwise          compute pairwise relations per sample
 * 4. plot              render one page per sample and output type
 * 5. add-tree-indices  annotate the plot summaries (gzipped while processed)
 * 6. write-index       write outDir/index.html linking every page
 * 7. publish           copy summaries into the results viewer and re-index it
 *
 * Stages only read earlier outputs from fixed paths in outDir, so any subset
 * can be enabled.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { PAIRWISE_STAGES, type OutputType, type PairwiseConfig, type PairwiseStageName } from '../config.js';
import type { BatchResult } from '../dispatch/types.js';
import { wrapError } from '../errors.js';
import { fileExists, formatCountDiagnostic, globFiles } from '../enumerate.js';
import { copyFiles, dateStamp, gunzipFile, gzipFile, listWithSuffix, removeMatching } from '../fsutil.js';
import { StageSequencer, type SequencerOptions, type Stage, type StageSummary } from '../sequencer.js';
import { command, createTask, runIdFromPath, type Batch, type Task } from '../task.js';
import { resolveRandom, runBatch, type PipelineOptions } from './common.js';

/**
 * Options for runPairwise().
 */
export interface PairwiseOptions extends PipelineOptions, Pick<SequencerOptions, 'onStageStart' | 'onStageComplete' | 'onStageSkipped'> {
  /** Clock used for the publish directory's date stamp (default: current time) */
  now?: () => Date;
}

/**
 * Everything a stage needs at run time.
 */
export interface PairwiseContext {
  config: PairwiseConfig;
  options: PairwiseOptions;
  random: () => number;
  now: () => Date;
  /** Batches dispatched so far, in order */
  batches: BatchResult[];
}

/**
 * Result of a pairwise run.
 */
export interface PairwiseResult {
  stages: StageSummary[];
  batches: BatchResult[];
}

/** Files removed from outDir before recomputing pairwise relations */
export const PAIRWISE_CLEAN_SUFFIXES = ['.pairwise.json', '.stdout', '.stderr'];

/** Files removed from outDir before plotting */
export const PLOT_CLEAN_SUFFIXES = ['.pairwise.html', '.js'];

// =============================================================================
// Path helpers
// =============================================================================

function script(config: PairwiseConfig, name: string): string {
  return path.join(config.scriptsDir, name);
}

function outFile(config: PairwiseConfig, sampid: string, suffix: string): string {
  return path.join(config.outDir, `${sampid}${suffix}`);
}

function ssmFile(config: PairwiseConfig, sampid: string): string {
  return path.join(config.ssmDir, `${sampid}.sampled.ssm`);
}

function paramsFile(config: PairwiseConfig, sampid: string): string {
  return path.join(config.ssmDir, `${sampid}.params.json`);
}

/**
 * Directory the publish stage copies summaries into.
 */
export function publishDir(config: PairwiseConfig, date: Date): string {
  return path.join(
    config.pwgsDir,
    'witness',
    'data',
    `${config.datasetPrefix}.${config.runName}.${dateStamp(date)}`
  );
}

async function enumerate(
  dir: string,
  pattern: string,
  onDiagnostic: ((message: string) => void) | undefined
): Promise<string[]> {
  const files = await globFiles(dir, pattern);
  onDiagnostic?.(formatCountDiagnostic(pattern, files.length));
  return files;
}

// =============================================================================
// Task enumeration (no side effects)
// =============================================================================

/**
 * Tasks renaming samples in every params file.
 */
export async function renameTasks(config: PairwiseConfig, onDiagnostic?: (message: string) => void): Promise<Task[]> {
  const files = await enumerate(config.ssmDir, '*.params.json', onDiagnostic);
  return files.map((params) => {
    const sampid = runIdFromPath(params);
    return createTask({
      stage: 'rename',
      runId: sampid,
      command: command(config.python)
        .arg(script(config, 'rename_samples.py'))
        .args(sampid, config.hiddenSamples, config.renamedSamples, params)
        .envs(config.threadEnv)
        .build(),
      outputs: [params],
    });
  });
}

/**
 * Tasks removing hidden samples from every ssm/params pair.
 */
export async function removeTasks(config: PairwiseConfig, onDiagnostic?: (message: string) => void): Promise<Task[]> {
  const files = await enumerate(config.ssmDir, '*.params.json', onDiagnostic);
  return files.map((params) => {
    const sampid = runIdFromPath(params);
    const ssm = ssmFile(config, sampid);
    return createTask({
      stage: 'remove',
      runId: sampid,
      command: command(config.python)
        .arg(script(config, 'remove_samples.py'))
        .args(sampid, ssm, params)
        .envs(config.threadEnv)
        .build(),
      outputs: [ssm, params],
    });
  });
}

/**
 * Tasks computing pairwise relations for every sampled ssm file.
 */
export async function pairwiseTasks(config: PairwiseConfig, onDiagnostic?: (message: string) => void): Promise<Task[]> {
  const files = await enumerate(config.ssmDir, '*.sampled.ssm', onDiagnostic);
  return files.map((ssm) => {
    const sampid = runIdFromPath(ssm);
    const json = outFile(config, sampid, '.pairwise.json');
    return createTask({
      stage: 'pairwise',
      runId: sampid,
      command: command(config.python)
        .arg(script(config, 'pairwise.py'))
        .args(ssm, json)
        .envs(config.threadEnv)
        .stdout(outFile(config, sampid, '.stdout'))
        .stderr(outFile(config, sampid, '.stderr'))
        .build(),
      outputs: [json],
    });
  });
}

/**
 * Plot tasks grouped by output type.
 *
 * Every output type rewrites the same summary files, so each type is a
 * separate batch. Samples without a hand-built tree are skipped.
 */
export async function plotTasks(
  config: PairwiseConfig,
  onDiagnostic?: (message: string) => void
): Promise<Map<OutputType, Task[]>> {
  const files = await enumerate(config.outDir, '*.pairwise.json', onDiagnostic);
  const perTypeLogs = config.outputTypes.length > 1;
  const result = new Map(config.outputTypes.map((type): [OutputType, Task[]] => [type, []]));

  for (const json of files) {
    const sampid = runIdFromPath(json);
    const handbuilt = path.join(config.handbuiltDir, `${sampid}.json`);
    if (!(await fileExists(handbuilt))) continue;

    for (const outputType of config.outputTypes) {
      const logPrefix = perTypeLogs ? `.${outputType}.plot` : '.plot';
      const html = outFile(config, sampid, `.${outputType}.pairwise.html`);
      const task = createTask({
        stage: `plot.${outputType}`,
        runId: sampid,
        command: command(config.python)
          .arg(script(config, 'plot.py'))
          .option('--output-type', outputType)
          .args(
            sampid,
            json,
            ssmFile(config, sampid),
            paramsFile(config, sampid),
            path.join(config.spreadsheetDir, `${sampid}.csv`),
            handbuilt,
            html,
            outFile(config, sampid, '.summ.json'),
            outFile(config, sampid, '.muts.json')
          )
          .envs(config.threadEnv)
          .stdout(outFile(config, sampid, `${logPrefix}.stdout`))
          .stderr(outFile(config, sampid, `${logPrefix}.stderr`))
          .build(),
        outputs: [html, outFile(config, sampid, '.summ.json'), outFile(config, sampid, '.muts.json')],
      });
      result.get(outputType)?.push(task);
    }
  }

  return result;
}

/**
 * Tasks adding tree indices to every plot summary.
 *
 * The commands name the gzipped summaries the stage creates before dispatch.
 */
export async function treeIndexTasks(config: PairwiseConfig, onDiagnostic?: (message: string) => void): Promise<Task[]> {
  const files = await enumerate(config.outDir, '*.summ.json', onDiagnostic);
  return files.map((summ) => {
    const sampid = runIdFromPath(summ);
    const summGz = `${summ}.gz`;
    const mutsGz = `${outFile(config, sampid, '.muts.json')}.gz`;
    return createTask({
      stage: 'add-tree-indices',
      runId: sampid,
      command: command(config.legacyPython)
        .arg(script(config, 'add_tree_indices.py'))
        .args(summGz, mutsGz)
        .env('PYTHONPATH', config.pwgsDir)
        .envs(config.threadEnv)
        .build(),
      outputs: [summGz, mutsGz],
    });
  });
}

/**
 * Task re-indexing the results viewer after publishing.
 */
export function publishTask(config: PairwiseConfig): Task {
  return createTask({
    stage: 'publish',
    runId: config.runName,
    command: command(config.legacyPython)
      .arg('index_data.py')
      .cwd(path.join(config.pwgsDir, 'witness'))
      .envs(config.threadEnv)
      .build(),
  });
}

/**
 * Render outDir/index.html: a heading per output type followed by one link
 * per rendered page.
 */
export async function renderIndex(config: PairwiseConfig): Promise<string> {
  const lines: string[] = [];
  for (const outputType of config.outputTypes) {
    lines.push(`<h3>${outputType}</h3>`);
    const pages = await globFiles(config.outDir, `${config.indexPattern}.${outputType}.pairwise.html`);
    for (const page of pages) {
      const name = path.basename(page);
      lines.push(`<a href=${name}>${runIdFromPath(name)}</a><br>`);
    }
  }
  return lines.map((line) => `${line}\n`).join('');
}

// =============================================================================
// Stages
// =============================================================================

function batchOf(ctx: PairwiseContext, name: string, tasks: Task[], concurrency = ctx.config.parallel): Batch {
  return { name, tasks, concurrency, halt: ctx.config.halt };
}

async function dispatchStage(ctx: PairwiseContext, batch: Batch): Promise<void> {
  ctx.batches.push(await runBatch(batch, ctx.options, ctx.random));
}

/**
 * Decompress every gzipped summary in `outDir`, attempting each one.
 *
 * @returns The errors of the restores that failed
 */
async function restoreSummaries(outDir: string): Promise<Error[]> {
  const errors: Error[] = [];
  for (const gz of [
    ...(await listWithSuffix(outDir, '.summ.json.gz')),
    ...(await listWithSuffix(outDir, '.muts.json.gz')),
  ]) {
    try {
      await gunzipFile(gz);
    } catch (err) {
      errors.push(wrapError(err, `Failed to restore '${gz}'`));
    }
  }
  return errors;
}

const stageRunners: Record<PairwiseStageName, (ctx: PairwiseContext) => Promise<void>> = {
  async rename(ctx) {
    await dispatchStage(ctx, batchOf(ctx, 'rename', await renameTasks(ctx.config, ctx.options.onDiagnostic)));
  },

  async remove(ctx) {
    await dispatchStage(ctx, batchOf(ctx, 'remove', await removeTasks(ctx.config, ctx.options.onDiagnostic)));
  },

  async pairwise(ctx) {
    await removeMatching(ctx.config.outDir, PAIRWISE_CLEAN_SUFFIXES);
    await dispatchStage(ctx, batchOf(ctx, 'pairwise', await pairwiseTasks(ctx.config, ctx.options.onDiagnostic)));
  },

  async plot(ctx) {
    const { config } = ctx;
    await removeMatching(config.outDir, PLOT_CLEAN_SUFFIXES);
    await copyFiles(config.assets.map((asset) => script(config, asset)), config.outDir);
    const byType = await plotTasks(config, ctx.options.onDiagnostic);
    for (const [outputType, tasks] of byType) {
      await dispatchStage(ctx, batchOf(ctx, `plot.${outputType}`, tasks));
    }
  },

  async 'add-tree-indices'(ctx) {
    const { config } = ctx;
    const tasks = await treeIndexTasks(config, ctx.options.onDiagnostic);
    try {
      for (const task of tasks) {
        await gzipFile(outFile(config, task.runId, '.summ.json'));
        await gzipFile(outFile(config, task.runId, '.muts.json'));
      }
      await dispatchStage(ctx, batchOf(ctx, 'add-tree-indices', tasks));
    } catch (err) {
      // The stage error wins; restore failures are only reported
      for (const restoreError of await restoreSummaries(config.outDir)) {
        ctx.options.onDiagnostic?.(restoreError.message);
      }
      throw err;
    }
    const [restoreError] = await restoreSummaries(config.outDir);
    if (restoreError) throw restoreError;
  },

  async 'write-index'(ctx) {
    const index = path.join(ctx.config.outDir, 'index.html');
    try {
      await fs.writeFile(index, await renderIndex(ctx.config));
    } catch (err) {
      throw wrapError(err, `Failed to write '${index}'`);
    }
  },

  async publish(ctx) {
    const { config } = ctx;
    const summaries = [
      ...(await listWithSuffix(config.outDir, '.summ.json')),
      ...(await listWithSuffix(config.outDir, '.muts.json')),
    ];
    const dest = publishDir(config, ctx.now());
    try {
      await copyFiles(summaries, dest);
    } catch (err) {
      throw wrapError(err, `Failed to publish summaries to '${dest}'`);
    }
    await dispatchStage(ctx, batchOf(ctx, 'publish', [publishTask(config)], 1));
  },
};

/**
 * The pipeline's stages, in execution order.
 */
export function pairwiseStages(stageNames: readonly PairwiseStageName[]): Stage<PairwiseContext>[] {
  return stageNames.map((name) => ({ name, run: stageRunners[name] }));
}

/**
 * What one stage would do, for dry runs.
 */
export interface PairwiseStagePlan {
  stage: PairwiseStageName;
  enabled: boolean;
  /** Tasks the stage would dispatch given the files currently on disk */
  tasks: Task[];
}

/**
 * Enumerate every enabled stage against the current state of the disk.
 *
 * Stages that consume earlier outputs (plot, add-tree-indices) only see what
 * already exists, so their lists may grow once earlier stages have run.
 */
export async function planPairwise(
  config: PairwiseConfig,
  options: Pick<PipelineOptions, 'onDiagnostic'> = {}
): Promise<PairwiseStagePlan[]> {
  const enabled = new Set<PairwiseStageName>(config.stages);
  const { onDiagnostic } = options;

  const enumerators: Record<PairwiseStageName, () => Promise<Task[]>> = {
    rename: () => renameTasks(config, onDiagnostic),
    remove: () => removeTasks(config, onDiagnostic),
    pairwise: () => pairwiseTasks(config, onDiagnostic),
    plot: async () => [...(await plotTasks(config, onDiagnostic)).values()].flat(),
    'add-tree-indices': () => treeIndexTasks(config, onDiagnostic),
    'write-index': async () => [],
    publish: async () => [publishTask(config)],
  };

  const plans: PairwiseStagePlan[] = [];
  for (const stage of PAIRWISE_STAGES) {
    const isEnabled = enabled.has(stage);
    plans.push({ stage, enabled: isEnabled, tasks: isEnabled ? await enumerators[stage]() : [] });
  }
  return plans;
}

/**
 * Run the pairwise pipeline.
 *
 * @throws {StageFailedError} When a stage fails; later stages are not run
 */
export async function runPairwise(
  config: PairwiseConfig,
  options: PairwiseOptions
): Promise<PairwiseResult> {
  await fs.mkdir(config.outDir, { recursive: true });

  const ctx: PairwiseContext = {
    config,
    options,
    random: resolveRandom(options, config.seed),
    now: options.now ?? (() => new Date()),
    batches: [],
  };

  const sequencer = new StageSequencer(pairwiseStages(PAIRWISE_STAGES), {
    enabled: config.stages,
    onStageStart: options.onStageStart,
    onStageComplete: options.onStageComplete,
    onStageSkipped: options.onStageSkipped,
  });

  const stages = await sequencer.run(ctx);
  return { stages, batches: ctx.batches };
}
