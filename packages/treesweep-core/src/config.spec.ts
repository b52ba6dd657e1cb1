/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * Tests for config.ts - schema defaults, path expansion and loading
 */

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import { homedir } from 'node:os';
import { join, resolve } from 'node:path';
import {
  EvaluationConfigSchema,
  PAIRWISE_STAGES,
  PairwiseConfigSchema,
  expandPath,
  loadConfig,
  parseConfig,
} from './config.js';
import { ConfigError } from './errors.js';
import { createTempDir, removeTempDir, writeFiles } from './test-helpers.js';

const evaluationInput = {
  resultsDir: '/data/results',
  inputsDir: '/data/inputs',
  truthDir: '/data/truth',
  scriptsDir: '/opt/eval',
  methods: ['pairtree', 'lichee'],
};

const pairwiseInput = {
  runName: 'trial',
  ssmDir: '/data/ssms',
  outDir: '/data/out',
  handbuiltDir: '/data/handbuilt',
  spreadsheetDir: '/data/sheets',
  renamedSamples: '/data/renamed.txt',
  hiddenSamples: '/data/hidden.txt',
  scriptsDir: '/opt/pairwise',
  pwgsDir: '/opt/pwgs',
};

describe('config', () => {
  describe('expandPath', () => {
    it('expands a leading tilde', () => {
      assert.strictEqual(expandPath('~'), homedir());
      assert.strictEqual(expandPath('~/runs'), join(homedir(), 'runs'));
    });

    it('resolves relative paths against the working directory', () => {
      assert.strictEqual(expandPath('results'), resolve('results'));
      assert.strictEqual(expandPath('/abs/./path'), '/abs/path');
    });
  });

  describe('EvaluationConfigSchema', () => {
    it('fills in defaults', () => {
      const config = parseConfig(evaluationInput, EvaluationConfigSchema);

      assert.strictEqual(config.python, 'python3');
      assert.strictEqual(config.parallel, 80);
      assert.strictEqual(config.largeParallel, 10);
      assert.deepStrictEqual(config.largeMarkers, ['K30_', 'K100_']);
      assert.deepStrictEqual(config.imputeGarbageMethods, ['lichee']);
      assert.strictEqual(config.resultSuffix, '.neutree.pickle');
      assert.deepStrictEqual(config.threadEnv, { OMP_NUM_THREADS: '1' });
      assert.strictEqual(config.halt, 'soon');
      assert.strictEqual(config.seed, undefined);
    });

    it('requires at least one method', () => {
      assert.throws(() => parseConfig({ ...evaluationInput, methods: [] }, EvaluationConfigSchema), ConfigError);
    });

    it('rejects non-positive parallelism', () => {
      assert.throws(
        () => parseConfig({ ...evaluationInput, parallel: 0 }, EvaluationConfigSchema, 'eval.json'),
        (err: unknown) => {
          assert.ok(err instanceof ConfigError);
          assert.strictEqual(err.path, 'eval.json');
          assert.deepStrictEqual(err.issues.map((issue) => issue.field), ['parallel']);
          return true;
        }
      );
    });
  });

  describe('PairwiseConfigSchema', () => {
    it('fills in defaults', () => {
      const config = parseConfig(pairwiseInput, PairwiseConfigSchema);

      assert.deepStrictEqual(config.outputTypes, ['clustered']);
      assert.deepStrictEqual(config.stages, [...PAIRWISE_STAGES]);
      assert.strictEqual(config.parallel, 40);
      assert.strictEqual(config.legacyPython, 'python2');
      assert.strictEqual(config.indexPattern, 'S*');
      assert.strictEqual(config.datasetPrefix, 'steph');
      assert.deepStrictEqual(config.assets, ['highlight_table_labels.js']);
    });

    it('rejects unknown stages and output types', () => {
      assert.throws(
        () => parseConfig({ ...pairwiseInput, stages: ['plot', 'render'] }, PairwiseConfigSchema),
        (err: unknown) => err instanceof ConfigError && err.issues[0]?.field === 'stages.1'
      );
      assert.throws(
        () => parseConfig({ ...pairwiseInput, outputTypes: ['fancy'] }, PairwiseConfigSchema),
        (err: unknown) => err instanceof ConfigError && err.issues[0]?.field === 'outputTypes.0'
      );
    });
  });

  describe('loadConfig', () => {
    let dir: string;

    beforeEach(() => {
      dir = createTempDir();
    });

    afterEach(() => {
      removeTempDir(dir);
    });

    it('loads and validates a JSON file', async () => {
      writeFiles(dir, { 'eval.json': JSON.stringify({ ...evaluationInput, parallel: 12, seed: 3 }) });
      const config = await loadConfig(join(dir, 'eval.json'), EvaluationConfigSchema);

      assert.strictEqual(config.parallel, 12);
      assert.strictEqual(config.seed, 3);
      assert.strictEqual(config.resultsDir, '/data/results');
    });

    it('applies defined overrides over the file', async () => {
      writeFiles(dir, { 'eval.json': JSON.stringify({ ...evaluationInput, parallel: 12, halt: 'now' }) });
      const config = await loadConfig(join(dir, 'eval.json'), EvaluationConfigSchema, {
        parallel: 4,
        halt: undefined,
      });

      assert.strictEqual(config.parallel, 4);
      assert.strictEqual(config.halt, 'now');
    });

    it('validates overrides like the file itself', async () => {
      writeFiles(dir, { 'eval.json': JSON.stringify(evaluationInput) });
      await assert.rejects(
        loadConfig(join(dir, 'eval.json'), EvaluationConfigSchema, { halt: 'later' }),
        ConfigError
      );
    });

    it('reports a missing file', async () => {
      const file = join(dir, 'missing.json');
      await assert.rejects(loadConfig(file, EvaluationConfigSchema), {
        message: `Invalid configuration '${file}': file not found`,
      });
    });

    it('reports malformed JSON', async () => {
      writeFiles(dir, { 'bad.json': '{ "resultsDir": ' });
      await assert.rejects(
        loadConfig(join(dir, 'bad.json'), EvaluationConfigSchema),
        (err: unknown) => err instanceof ConfigError && (err.issues[0]?.message ?? '').startsWith('invalid JSON: ')
      );
    });
  });
});
