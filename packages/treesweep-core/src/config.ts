/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * Pipeline configuration.
 *
 * Each pipeline takes one explicit configuration object, normally loaded from
 * a JSON file. Defaults live in the schemas; relative paths resolve against
 * the working directory and a leading `~` expands to the home directory.
 */

import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { z } from 'zod';
import { ConfigError, isNotFoundError } from './errors.js';

/**
 * Expand a leading `~` and make the path absolute.
 */
export function expandPath(value: string): string {
  if (value === '~') return os.homedir();
  if (value.startsWith('~/')) return path.join(os.homedir(), value.slice(2));
  return path.resolve(value);
}

const PathSchema = z.string().min(1).transform(expandPath);
const NameSchema = z.string().min(1);
const EnvSchema = z.record(z.string());
const ParallelSchema = z.number().int().positive();

export const HaltPolicySchema = z.enum(['never', 'soon', 'now']);

// =============================================================================
// Evaluation pipeline
// =============================================================================

export const EvaluationConfigSchema = z.object({
  /** Root holding `<method>/<runId>/<runId>.<suffix>` */
  resultsDir: PathSchema,
  /** Directory holding `<runId>.ssm` simulation inputs */
  inputsDir: PathSchema,
  /** Root holding `<runId>/<runId>.phi.npz` truth files */
  truthDir: PathSchema,
  /** Directory holding the make_mut*.py evaluation scripts */
  scriptsDir: PathSchema,
  /** Method result directories under resultsDir, in dispatch order */
  methods: z.array(NameSchema).min(1),
  python: NameSchema.default('python3'),
  parallel: ParallelSchema.default(80),
  /** Concurrency for runs carrying a large-size marker */
  largeParallel: ParallelSchema.default(10),
  largeMarkers: z.array(NameSchema).default(['K30_', 'K100_']),
  /** Methods (by substring) whose trees need `--impute-garbage` */
  imputeGarbageMethods: z.array(NameSchema).default(['lichee']),
  resultSuffix: NameSchema.default('.neutree.pickle'),
  threadEnv: EnvSchema.default({ OMP_NUM_THREADS: '1' }),
  halt: HaltPolicySchema.default('soon'),
  /** Seed for reproducible task order */
  seed: z.number().int().optional(),
});

export type EvaluationConfig = z.infer<typeof EvaluationConfigSchema>;

// =============================================================================
// Pairwise pipeline
// =============================================================================

/** Pairwise pipeline stages, in execution order */
export const PAIRWISE_STAGES = [
  'rename',
  'remove',
  'pairwise',
  'plot',
  'add-tree-indices',
  'write-index',
  'publish',
] as const;

export type PairwiseStageName = (typeof PAIRWISE_STAGES)[number];

export const PairwiseStageSchema = z.enum(PAIRWISE_STAGES);

export const OutputTypeSchema = z.enum(['clustered', 'unclustered', 'condensed']);

export type OutputType = z.infer<typeof OutputTypeSchema>;

export const PairwiseConfigSchema = z.object({
  /** Name of this run, used in the published dataset directory */
  runName: NameSchema,
  /** Directory holding `<sampid>.sampled.ssm` and `<sampid>.params.json` */
  ssmDir: PathSchema,
  /** Directory receiving every pipeline output */
  outDir: PathSchema,
  /** Directory holding hand-built `<sampid>.json` trees */
  handbuiltDir: PathSchema,
  /** Directory holding `<sampid>.csv` spreadsheets */
  spreadsheetDir: PathSchema,
  renamedSamples: PathSchema,
  hiddenSamples: PathSchema,
  /** Directory holding the pipeline's scripts and plot assets */
  scriptsDir: PathSchema,
  /** PhyloWGS checkout (PYTHONPATH for index augmentation, home of witness/) */
  pwgsDir: PathSchema,
  python: NameSchema.default('python3'),
  /** Interpreter for the legacy index tools */
  legacyPython: NameSchema.default('python2'),
  outputTypes: z.array(OutputTypeSchema).min(1).default(['clustered']),
  parallel: ParallelSchema.default(40),
  stages: z.array(PairwiseStageSchema).default([...PAIRWISE_STAGES]),
  /** Glob prefix of the samples listed in index.html */
  indexPattern: NameSchema.default('S*'),
  datasetPrefix: NameSchema.default('steph'),
  /** Files copied from scriptsDir into outDir before plotting */
  assets: z.array(NameSchema).default(['highlight_table_labels.js']),
  threadEnv: EnvSchema.default({ OMP_NUM_THREADS: '1' }),
  halt: HaltPolicySchema.default('soon'),
  seed: z.number().int().optional(),
});

export type PairwiseConfig = z.infer<typeof PairwiseConfigSchema>;

// =============================================================================
// Loading
// =============================================================================

/**
 * Validate an already-parsed configuration value.
 *
 * @param source - Where the value came from, for error messages
 * @throws {ConfigError} If validation fails
 */
export function parseConfig<S extends z.ZodTypeAny>(
  value: unknown,
  schema: S,
  source = '<inline>'
): z.infer<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new ConfigError(
      source,
      result.error.issues.map((issue) => ({
        field: issue.path.join('.'),
        message: issue.message,
      }))
    );
  }
  return result.data;
}

/**
 * Load and validate a JSON configuration file.
 *
 * @param overrides - Fields replacing the file's own (undefined values are ignored)
 * @throws {ConfigError} If the file is missing, not JSON, or invalid
 */
export async function loadConfig<S extends z.ZodTypeAny>(
  file: string,
  schema: S,
  overrides: Record<string, unknown> = {}
): Promise<z.infer<S>> {
  let text: string;
  try {
    text = await fs.readFile(file, 'utf-8');
  } catch (err) {
    if (isNotFoundError(err)) {
      throw new ConfigError(file, [{ field: '', message: 'file not found' }]);
    }
    throw err;
  }

  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch (err) {
    throw new ConfigError(file, [
      { field: '', message: `invalid JSON: ${err instanceof Error ? err.message : String(err)}` },
    ]);
  }

  const defined = Object.entries(overrides).filter(([, override]) => override !== undefined);
  if (defined.length > 0 && typeof value === 'object' && value !== null && !Array.isArray(value)) {
    value = { ...value, ...Object.fromEntries(defined) };
  }

  return parseConfig(value, schema, file);
}
