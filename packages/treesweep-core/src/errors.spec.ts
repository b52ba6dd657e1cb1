/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * Tests for errors.ts - error types and helper functions
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import {
  SweepError,
  ConfigError,
  EnumerationError,
  BatchFailedError,
  BatchAbortedError,
  StageFailedError,
  SequencerStateError,
  isNotFoundError,
  isExistsError,
  wrapError,
  exitCodeOf,
} from './errors.js';
import type { BatchResult } from './dispatch/types.js';
import { mockFailure, MOCK_SUCCESS } from './execution/MockTaskRunner.js';
import { fakeTask } from './test-helpers.js';

function batchResult(overrides: Partial<BatchResult> = {}): BatchResult {
  return {
    batch: 'mutphi',
    success: false,
    aborted: false,
    total: 3,
    succeeded: 1,
    failed: 1,
    notStarted: 1,
    duration: 10,
    results: [
      { task: fakeTask('R1'), result: MOCK_SUCCESS },
      { task: fakeTask('R2'), result: mockFailure(7) },
    ],
    ...overrides,
  };
}

describe('errors', () => {
  describe('SweepError base class', () => {
    it('sets name to constructor name', () => {
      const err = new SweepError('test message');
      assert.strictEqual(err.name, 'SweepError');
      assert.strictEqual(err.message, 'test message');
      assert.ok(err instanceof Error);
    });
  });

  describe('ConfigError', () => {
    it('lists every issue with its field', () => {
      const err = new ConfigError('eval.json', [
        { field: 'methods', message: 'Required' },
        { field: '', message: 'file not found' },
      ]);
      assert.strictEqual(err.message, "Invalid configuration 'eval.json': methods: Required; file not found");
      assert.strictEqual(err.path, 'eval.json');
      assert.strictEqual(err.issues.length, 2);
      assert.ok(err instanceof SweepError);
    });
  });

  describe('EnumerationError', () => {
    it('includes root and cause', () => {
      const err = new EnumerationError('/results', new Error('EACCES'));
      assert.strictEqual(err.message, "Failed to enumerate '/results': EACCES");
      assert.strictEqual(err.name, 'EnumerationError');
    });
  });

  describe('BatchFailedError', () => {
    it('summarizes failures and tasks not started', () => {
      const err = new BatchFailedError('mutphi', batchResult());
      assert.strictEqual(err.message, "Batch 'mutphi' failed: 1 of 3 task(s) failed, 1 not started");
    });

    it('omits the not-started count when zero', () => {
      const err = new BatchFailedError('mutphi', batchResult({ notStarted: 0, total: 2 }));
      assert.strictEqual(err.message, "Batch 'mutphi' failed: 1 of 2 task(s) failed");
    });

    it('reports the first failing exit code', () => {
      assert.strictEqual(new BatchFailedError('mutphi', batchResult()).exitCode, 7);
    });

    it('falls back to 1 when the failure has no exit code', () => {
      const result = batchResult({
        results: [{ task: fakeTask('R1'), result: { ...mockFailure(), exitCode: null } }],
      });
      assert.strictEqual(new BatchFailedError('mutphi', result).exitCode, 1);
    });
  });

  describe('BatchAbortedError', () => {
    it('keeps the partial result', () => {
      const result = batchResult({ aborted: true });
      const err = new BatchAbortedError('mutphi', result);
      assert.strictEqual(err.message, "Batch 'mutphi' was aborted");
      assert.strictEqual(err.result, result);
    });
  });

  describe('StageFailedError', () => {
    it('wraps the cause and propagates its exit code', () => {
      const cause = new BatchFailedError('pairwise', batchResult());
      const err = new StageFailedError('pairwise', 2, cause);
      assert.strictEqual(err.message, `Stage 'pairwise' failed: ${cause.message}`);
      assert.strictEqual(err.index, 2);
      assert.strictEqual(err.exitCode, 7);
    });
  });

  describe('SequencerStateError', () => {
    it('names the state', () => {
      assert.strictEqual(
        new SequencerStateError('completed').message,
        "Sequencer cannot start from state 'completed'"
      );
    });
  });

  describe('helpers', () => {
    it('isNotFoundError checks ENOENT', () => {
      const err = Object.assign(new Error('missing'), { code: 'ENOENT' });
      assert.strictEqual(isNotFoundError(err), true);
      assert.strictEqual(isNotFoundError(new Error('other')), false);
      assert.strictEqual(isNotFoundError('ENOENT'), false);
    });

    it('isExistsError checks EEXIST', () => {
      const err = Object.assign(new Error('exists'), { code: 'EEXIST' });
      assert.strictEqual(isExistsError(err), true);
    });

    it('wrapError passes SweepErrors through', () => {
      const original = new SweepError('kept');
      assert.strictEqual(wrapError(original, 'context'), original);
    });

    it('wrapError adds context to other errors', () => {
      const wrapped = wrapError(new Error('disk full'), 'Failed to write index');
      assert.strictEqual(wrapped.message, 'Failed to write index: disk full');
      assert.ok(wrapped instanceof SweepError);
    });

    it('exitCodeOf is 1 for errors other than task failures', () => {
      assert.strictEqual(exitCodeOf(new Error('x')), 1);
      assert.strictEqual(exitCodeOf(new BatchFailedError('b', batchResult())), 7);
    });
  });
});
