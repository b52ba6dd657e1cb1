/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * Core logic for the run command, kept free of process I/O for testing.
 */

import { createTask, selectTasks, shellCommand, type Task } from '@treesweep/core';

/**
 * Split a command list into shell lines.
 *
 * Blank lines and lines starting with `#` are ignored; surrounding whitespace
 * is trimmed.
 */
export function parseCommandList(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith('#'));
}

/**
 * One task per shell line, identified by its 1-based position in the list.
 */
export function buildShellTasks(lines: readonly string[]): Task[] {
  return lines.map((line, index) =>
    createTask({ stage: 'run', runId: String(index + 1), command: shellCommand(line) })
  );
}

/**
 * Keep tasks whose command line contains every `grep` pattern and no
 * `exclude` pattern.
 */
export function filterShellTasks(
  tasks: readonly Task[],
  grep: readonly string[],
  exclude: readonly string[]
): Task[] {
  let selected = selectTasks(tasks, '', exclude);
  for (const pattern of grep) {
    selected = selectTasks(selected, pattern);
  }
  return selected;
}
