/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * Tests for the installed `treesweep` entry point
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { execFileSync, spawnSync } from 'node:child_process';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';

const binPath = fileURLToPath(new URL('../bin/treesweep.js', import.meta.url));
const packageJsonPath = fileURLToPath(new URL('../package.json', import.meta.url));

describe('treesweep bin', () => {
  it('is the JavaScript launcher', () => {
    const packageJson = JSON.parse(readFileSync(packageJsonPath, 'utf-8')) as { bin?: Record<string, string> };
    assert.deepStrictEqual(packageJson.bin, { treesweep: './bin/treesweep.js' });
  });

  it('starts from a directory outside the project', () => {
    const cwd = mkdtempSync(join(tmpdir(), 'treesweep-bin-'));
    try {
      const output = execFileSync(process.execPath, [binPath, '--version'], { cwd, encoding: 'utf-8' });
      assert.strictEqual(output, '0.1.0\n');
    } finally {
      rmSync(cwd, { recursive: true, force: true });
    }
  });

  it('exits with the failing command\'s code and lists it', () => {
    const cwd = mkdtempSync(join(tmpdir(), 'treesweep-bin-'));
    try {
      writeFileSync(join(cwd, 'commands.txt'), 'exit 3\n');
      const child = spawnSync(process.execPath, [binPath, 'run', 'commands.txt', '--jobs', '1'], {
        cwd,
        encoding: 'utf-8',
      });

      assert.strictEqual(child.status, 3);
      const stdout = child.stdout.split('\n');
      const listed = stdout.indexOf('Failed tasks:');
      assert.ok(listed >= 0);
      assert.strictEqual(stdout[listed + 1], '  run:1: exit code 3');
      assert.strictEqual(child.stderr.trimEnd().split('\n').at(-1), "Error: Batch 'run' failed: 1 of 1 task(s) failed");
    } finally {
      rmSync(cwd, { recursive: true, force: true });
    }
  });
});
