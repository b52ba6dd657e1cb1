/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * File helpers used by the post-processing stages.
 */

import * as fs from 'fs/promises';
import { createReadStream, createWriteStream } from 'fs';
import * as path from 'path';
import type { Transform } from 'stream';
import { pipeline } from 'stream/promises';
import { createGunzip, createGzip } from 'zlib';
import { isNotFoundError, SweepError } from './errors.js';

/**
 * Delete the files in `dir` whose names end with any of `suffixes`.
 *
 * A missing directory is not an error.
 *
 * @returns Paths removed, sorted
 */
export async function removeMatching(dir: string, suffixes: readonly string[]): Promise<string[]> {
  let names: string[];
  try {
    names = await fs.readdir(dir);
  } catch (err) {
    if (isNotFoundError(err)) return [];
    throw err;
  }

  const removed: string[] = [];
  for (const name of names.sort()) {
    if (!suffixes.some((suffix) => name.endsWith(suffix))) continue;
    const file = path.join(dir, name);
    const stat = await fs.stat(file);
    if (!stat.isFile()) continue;
    await fs.rm(file, { force: true });
    removed.push(file);
  }
  return removed;
}

/**
 * List the files in `dir` whose names end with `suffix`, sorted.
 */
export async function listWithSuffix(dir: string, suffix: string): Promise<string[]> {
  let names: string[];
  try {
    names = await fs.readdir(dir);
  } catch (err) {
    if (isNotFoundError(err)) return [];
    throw err;
  }
  return names
    .filter((name) => name.endsWith(suffix))
    .sort()
    .map((name) => path.join(dir, name));
}

/** Stream `source` through `transform` into `target`, leaving no partial target on failure */
async function transcode(source: string, transform: Transform, target: string): Promise<void> {
  try {
    await pipeline(createReadStream(source), transform, createWriteStream(target));
  } catch (err) {
    await fs.rm(target, { force: true });
    throw err;
  }
}

/**
 * Compress `file` to `file.gz` and remove the original.
 *
 * @returns Path of the compressed file
 */
export async function gzipFile(file: string): Promise<string> {
  const target = `${file}.gz`;
  await transcode(file, createGzip(), target);
  await fs.rm(file);
  return target;
}

/**
 * Decompress `file.gz` to `file` and remove the compressed copy.
 *
 * @returns Path of the decompressed file
 */
export async function gunzipFile(file: string): Promise<string> {
  if (!file.endsWith('.gz')) {
    throw new SweepError(`Not a .gz file: '${file}'`);
  }
  const target = file.slice(0, -'.gz'.length);
  await transcode(file, createGunzip(), target);
  await fs.rm(file);
  return target;
}

/**
 * Copy files into `destDir` (created if needed), keeping names and timestamps.
 *
 * @returns Destination paths, in input order
 */
export async function copyFiles(files: readonly string[], destDir: string): Promise<string[]> {
  await fs.mkdir(destDir, { recursive: true });
  const copied: string[] = [];
  for (const file of files) {
    const target = path.join(destDir, path.basename(file));
    await fs.copyFile(file, target);
    const stat = await fs.stat(file);
    await fs.utimes(target, stat.atime, stat.mtime);
    copied.push(target);
  }
  return copied;
}

/**
 * Format a date as YYYYMMDD in local time.
 */
export function dateStamp(date: Date): string {
  const yyyy = String(date.getFullYear()).padStart(4, '0');
  const mm = String(date.getMonth() + 1).padStart(2, '0');
  const dd = String(date.getDate()).padStart(2, '0');
  return `${yyyy}${mm}${dd}`;
}
