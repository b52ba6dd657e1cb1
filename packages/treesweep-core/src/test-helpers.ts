/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * Test helpers for treesweep-core
 * Provides utilities for building throwaway result trees
 */

import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';
import { command, createTask, type Task } from './task.js';

/**
 * Creates a temporary directory for testing
 * @returns Path to temporary directory
 */
export function createTempDir(): string {
  return mkdtempSync(join(tmpdir(), 'treesweep-test-'));
}

/**
 * Removes a temporary directory and all its contents
 * @param dir Path to directory to remove
 */
export function removeTempDir(dir: string): void {
  rmSync(dir, { recursive: true, force: true });
}

/**
 * Write files (creating parent directories) relative to `root`
 * @param files Relative path to content
 */
export function writeFiles(root: string, files: Record<string, string>): void {
  for (const [relative, content] of Object.entries(files)) {
    const file = join(root, relative);
    mkdirSync(dirname(file), { recursive: true });
    writeFileSync(file, content);
  }
}

/**
 * Minimal task running `true`, for dispatcher tests
 */
export function fakeTask(runId: string, stage = 'test', outputs: string[] = []): Task {
  return createTask({ stage, runId, command: command('true').arg(runId).build(), outputs });
}
