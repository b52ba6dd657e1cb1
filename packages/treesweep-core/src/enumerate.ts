/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * Job enumeration: walk a directory tree for files matching a pattern and
 * turn each match into zero or more tasks.
 */

import * as fs from 'fs/promises';
import type { Dirent } from 'fs';
import * as path from 'path';
import { EnumerationError, isNotDirectoryError, isNotFoundError } from './errors.js';
import { runIdFromPath, type Run, type Task } from './task.js';

/**
 * Builds the task(s) for one run.
 *
 * Returning `null` skips the run silently, e.g. when a companion file the
 * stage needs is absent.
 */
export type TaskBuilder = (run: Run) => Task | Task[] | null | Promise<Task | Task[] | null>;

/**
 * Options for enumerateMatching().
 */
export interface EnumerateOptions {
  /** Label of the count diagnostic (default: the pattern) */
  label?: string;
  /** Method recorded on every run */
  method?: string;
  /** Receives the `<label>\t<count>` diagnostic */
  onDiagnostic?: (message: string) => void;
}

// =============================================================================
// Pattern matching
// =============================================================================

function hasWildcard(segment: string): boolean {
  return segment.includes('*') || segment.includes('?');
}

/**
 * Compile one path segment (`*` and `?` wildcards) to an anchored regex.
 */
export function segmentToRegExp(segment: string): RegExp {
  let source = '';
  for (const ch of segment) {
    if (ch === '*') {
      source += '[^/]*';
    } else if (ch === '?') {
      source += '[^/]';
    } else {
      source += ch.replace(/[\\^$.|+()[\]{}]/g, '\\$&');
    }
  }
  return new RegExp(`^${source}$`);
}

async function readDirectory(root: string, dir: string): Promise<Dirent[]> {
  try {
    return await fs.readdir(dir, { withFileTypes: true });
  } catch (err) {
    if (isNotFoundError(err) || isNotDirectoryError(err)) {
      return [];
    }
    throw new EnumerationError(root, err instanceof Error ? err : new Error(String(err)));
  }
}

async function entryKind(dir: string, entry: Dirent): Promise<'file' | 'directory' | 'other'> {
  if (entry.isFile()) return 'file';
  if (entry.isDirectory()) return 'directory';
  if (entry.isSymbolicLink()) {
    try {
      const stat = await fs.stat(path.join(dir, entry.name));
      if (stat.isFile()) return 'file';
      if (stat.isDirectory()) return 'directory';
    } catch (err) {
      // Dangling link
      if (!isNotFoundError(err)) throw err;
    }
  }
  return 'other';
}

async function statKind(file: string): Promise<'file' | 'directory' | 'missing'> {
  try {
    const stat = await fs.stat(file);
    return stat.isDirectory() ? 'directory' : 'file';
  } catch (err) {
    if (isNotFoundError(err) || isNotDirectoryError(err)) return 'missing';
    throw err;
  }
}

/**
 * Expand a glob pattern relative to `root`.
 *
 * Segments are separated by `/` and may contain `*` and `?`. Wildcards do not
 * match names starting with `.` unless the segment itself does. Intermediate
 * segments match directories, the last one matches files. A missing root or
 * directory yields no matches.
 *
 * @returns Absolute file paths in lexicographic order
 */
export async function globFiles(root: string, pattern: string): Promise<string[]> {
  const absRoot = path.resolve(root);
  const segments = pattern.split('/').filter((s) => s.length > 0 && s !== '.');
  if (segments.length === 0) return [];

  let current = [absRoot];
  for (let i = 0; i < segments.length; i++) {
    const segment = segments[i] ?? '';
    const wantFile = i === segments.length - 1;
    const next: string[] = [];

    for (const dir of current) {
      if (!hasWildcard(segment)) {
        const candidate = path.join(dir, segment);
        const kind = await statKind(candidate);
        if ((wantFile && kind === 'file') || (!wantFile && kind === 'directory')) {
          next.push(candidate);
        }
        continue;
      }

      const regex = segmentToRegExp(segment);
      const matchDotfiles = segment.startsWith('.');
      for (const entry of await readDirectory(absRoot, dir)) {
        if (!matchDotfiles && entry.name.startsWith('.')) continue;
        if (!regex.test(entry.name)) continue;
        const kind = await entryKind(dir, entry);
        if ((wantFile && kind === 'file') || (!wantFile && kind === 'directory')) {
          next.push(path.join(dir, entry.name));
        }
      }
    }

    current = next;
  }

  return current.sort();
}

/**
 * Check whether a regular file exists at `file`.
 */
export async function fileExists(file: string): Promise<boolean> {
  return (await statKind(file)) === 'file';
}

// =============================================================================
// Enumeration
// =============================================================================

/**
 * Format the enumeration count diagnostic.
 */
export function formatCountDiagnostic(label: string, count: number): string {
  return `${label}\t${count}`;
}

/**
 * Build tasks for a list of files.
 *
 * Every builder is called once per file, in file order then builder order.
 */
export async function enumerateTasks(
  files: readonly string[],
  builders: readonly TaskBuilder[],
  method?: string
): Promise<Task[]> {
  const tasks: Task[] = [];
  for (const source of files) {
    const run: Run = {
      runId: runIdFromPath(source),
      ...(method !== undefined ? { method } : {}),
      source,
    };
    for (const build of builders) {
      const built = await build(run);
      if (built === null) continue;
      if (Array.isArray(built)) {
        tasks.push(...built);
      } else {
        tasks.push(built);
      }
    }
  }
  return tasks;
}

/**
 * Glob `pattern` under `root`, report the match count, then build tasks.
 *
 * A zero count is reported like any other and yields an empty list.
 */
export async function enumerateMatching(
  root: string,
  pattern: string,
  builders: readonly TaskBuilder[],
  options: EnumerateOptions = {}
): Promise<Task[]> {
  const files = await globFiles(root, pattern);
  options.onDiagnostic?.(formatCountDiagnostic(options.label ?? pattern, files.length));
  return enumerateTasks(files, builders, options.method);
}
