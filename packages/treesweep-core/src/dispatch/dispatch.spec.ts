/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * Tests for dispatch.ts - worker pool, halt policies and cancellation
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { dispatch, dispatchOrThrow } from './dispatch.js';
import type { ProgressSnapshot } from './types.js';
import { BatchAbortedError, BatchFailedError } from '../errors.js';
import type { TaskExecuteOptions, TaskResult, TaskRunner } from '../execution/interfaces.js';
import { MOCK_SUCCESS, MockTaskRunner, mockFailure } from '../execution/MockTaskRunner.js';
import type { Batch, HaltPolicy, Task } from '../task.js';
import { fakeTask } from '../test-helpers.js';

function batchOf(runIds: string[], concurrency: number, halt: HaltPolicy = 'soon'): Batch {
  return { name: 'test', tasks: runIds.map((runId) => fakeTask(runId)), concurrency, halt };
}

const calledRunIds = (runner: MockTaskRunner) => runner.getCalls().map((call) => call.task.runId);

/**
 * Runner where task `a` fails at once and every other task runs until it is
 * killed or `duration` elapses.
 */
function failFastRunner(duration: number): TaskRunner {
  return {
    async execute(task: Task, options?: TaskExecuteOptions) {
      if (task.runId === 'a') return mockFailure(2);
      return new Promise<TaskResult>((resolve) => {
        const timer = setTimeout(() => resolve(MOCK_SUCCESS), duration);
        options?.signal?.addEventListener(
          'abort',
          () => {
            clearTimeout(timer);
            resolve({ state: 'failed', exitCode: null, signal: 'SIGKILL', duration: 0, error: 'Aborted' });
          },
          { once: true }
        );
      });
    },
  };
}

describe('dispatch', () => {
  it('runs every task once and reports success', async () => {
    const runner = new MockTaskRunner();
    const result = await dispatch(batchOf(['a', 'b', 'c', 'd', 'e'], 2), { runner });

    assert.strictEqual(result.batch, 'test');
    assert.strictEqual(result.success, true);
    assert.strictEqual(result.aborted, false);
    assert.strictEqual(result.total, 5);
    assert.strictEqual(result.succeeded, 5);
    assert.strictEqual(result.failed, 0);
    assert.strictEqual(result.notStarted, 0);
    assert.deepStrictEqual([...calledRunIds(runner)].sort(), ['a', 'b', 'c', 'd', 'e']);
  });

  it('succeeds trivially on an empty batch', async () => {
    const result = await dispatch(batchOf([], 4), { runner: new MockTaskRunner() });
    assert.strictEqual(result.success, true);
    assert.strictEqual(result.total, 0);
  });

  it('never runs more than the concurrency limit at once', async () => {
    const runner = new MockTaskRunner({ delay: 20 });
    const ids = Array.from({ length: 10 }, (_, i) => `r${i}`);
    await dispatch(batchOf(ids, 3), { runner });

    assert.strictEqual(runner.getMaxConcurrency(), 3);
    assert.strictEqual(runner.getCalls().length, 10);
  });

  it('starts no more workers than tasks', async () => {
    const runner = new MockTaskRunner({ delay: 20 });
    await dispatch(batchOf(['a', 'b'], 8), { runner });
    assert.strictEqual(runner.getMaxConcurrency(), 2);
  });

  it('treats a concurrency below one as one', async () => {
    const runner = new MockTaskRunner({ delay: 5 });
    await dispatch(batchOf(['a', 'b', 'c'], 0), { runner });
    assert.strictEqual(runner.getMaxConcurrency(), 1);
  });

  describe('ordering', () => {
    it('keeps enumeration order without shuffle', async () => {
      const runner = new MockTaskRunner();
      await dispatch(batchOf(['a', 'b', 'c', 'd'], 1), { runner, shuffle: false });
      assert.deepStrictEqual(calledRunIds(runner), ['a', 'b', 'c', 'd']);
    });

    it('shuffles with the given random source', async () => {
      const runner = new MockTaskRunner();
      await dispatch(batchOf(['a', 'b', 'c', 'd'], 1), { runner, random: () => 0 });
      assert.deepStrictEqual(calledRunIds(runner), ['b', 'c', 'd', 'a']);
    });
  });

  describe('halt policies', () => {
    it("'soon' starts nothing new after a failure", async () => {
      const runner = new MockTaskRunner();
      runner.setResult('test:b', mockFailure(3));

      const result = await dispatch(batchOf(['a', 'b', 'c', 'd'], 1, 'soon'), { runner, shuffle: false });

      assert.deepStrictEqual(calledRunIds(runner), ['a', 'b']);
      assert.strictEqual(result.success, false);
      assert.strictEqual(result.succeeded, 1);
      assert.strictEqual(result.failed, 1);
      assert.strictEqual(result.notStarted, 2);
    });

    it("'soon' lets running tasks finish", async () => {
      const result = await dispatch(batchOf(['a', 'b', 'c'], 2, 'soon'), {
        runner: failFastRunner(30),
        shuffle: false,
      });

      const b = result.results.find(({ task }) => task.runId === 'b');
      assert.strictEqual(b?.result.state, 'success');
      assert.strictEqual(result.notStarted, 1);
    });

    it("'now' kills running tasks", async () => {
      const result = await dispatch(batchOf(['a', 'b', 'c'], 2, 'now'), {
        runner: failFastRunner(5000),
        shuffle: false,
      });

      const b = result.results.find(({ task }) => task.runId === 'b');
      assert.strictEqual(b?.result.error, 'Aborted');
      assert.strictEqual(result.failed, 2);
      assert.strictEqual(result.notStarted, 1);
      assert.strictEqual(result.aborted, false);
    });

    it("'never' runs everything and reports failures at the end", async () => {
      const runner = new MockTaskRunner();
      runner.setResult('test:b', mockFailure(3));

      const result = await dispatch(batchOf(['a', 'b', 'c', 'd'], 1, 'never'), { runner, shuffle: false });

      assert.strictEqual(runner.getCalls().length, 4);
      assert.strictEqual(result.success, false);
      assert.strictEqual(result.failed, 1);
      assert.strictEqual(result.notStarted, 0);
    });
  });

  describe('cancellation', () => {
    it('starts nothing when the signal is already aborted', async () => {
      const runner = new MockTaskRunner();
      const controller = new AbortController();
      controller.abort();

      const result = await dispatch(batchOf(['a', 'b'], 2), { runner, signal: controller.signal });

      assert.strictEqual(runner.getCalls().length, 0);
      assert.strictEqual(result.aborted, true);
      assert.strictEqual(result.success, false);
      assert.strictEqual(result.notStarted, 2);
    });

    it('kills running tasks when the signal aborts', async () => {
      const runner = new MockTaskRunner({ delay: 200 });
      const controller = new AbortController();
      setTimeout(() => controller.abort(), 10);

      const result = await dispatch(batchOf(['a', 'b', 'c', 'd'], 2), { runner, signal: controller.signal });

      assert.strictEqual(result.aborted, true);
      assert.strictEqual(result.results.length, 2);
      assert.ok(result.results.every(({ result: r }) => r.error === 'Aborted'));
      assert.strictEqual(result.notStarted, 2);
    });
  });

  it('turns a runner rejection into an error result', async () => {
    const runner: TaskRunner = {
      async execute() {
        throw new Error('runner exploded');
      },
    };
    const result = await dispatch(batchOf(['a'], 1), { runner });

    assert.strictEqual(result.failed, 1);
    assert.strictEqual(result.results[0]?.result.state, 'error');
    assert.strictEqual(result.results[0]?.result.error, 'runner exploded');
  });

  it('reports task events and progress', async () => {
    const started: string[] = [];
    const completed: string[] = [];
    const snapshots: ProgressSnapshot[] = [];

    await dispatch(batchOf(['a', 'b', 'c'], 2), {
      runner: new MockTaskRunner(),
      onTaskStart: (task) => started.push(task.runId),
      onTaskComplete: (task) => completed.push(task.runId),
      onProgress: (snapshot) => snapshots.push(snapshot),
    });

    assert.strictEqual(started.length, 3);
    assert.strictEqual(completed.length, 3);
    assert.deepStrictEqual(snapshots.map((s) => s.done), [1, 2, 3]);
    assert.strictEqual(snapshots[2]?.eta, 0);
  });

  it('passes the timeout to the runner', async () => {
    const runner = new MockTaskRunner();
    await dispatch(batchOf(['a'], 1), { runner, timeout: 1234 });
    assert.strictEqual(runner.getCalls()[0]?.options?.timeout, 1234);
  });
});

describe('dispatchOrThrow', () => {
  it('returns the result when every task succeeds', async () => {
    const result = await dispatchOrThrow(batchOf(['a'], 1), { runner: new MockTaskRunner() });
    assert.strictEqual(result.success, true);
  });

  it('throws BatchFailedError carrying the result', async () => {
    const runner = new MockTaskRunner();
    runner.setDefaultResult(mockFailure(5));

    await assert.rejects(dispatchOrThrow(batchOf(['a'], 1), { runner }), (err: unknown) => {
      assert.ok(err instanceof BatchFailedError);
      assert.strictEqual(err.exitCode, 5);
      assert.strictEqual(err.result.failed, 1);
      return true;
    });
  });

  it('throws BatchAbortedError when cancelled', async () => {
    const controller = new AbortController();
    controller.abort();
    await assert.rejects(
      dispatchOrThrow(batchOf(['a'], 1), { runner: new MockTaskRunner(), signal: controller.signal }),
      BatchAbortedError
    );
  });
});
