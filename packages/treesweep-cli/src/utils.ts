/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * CLI utilities for option parsing and error reporting
 */

import {
  BatchAbortedError,
  BatchFailedError,
  HaltPolicySchema,
  StageFailedError,
  exitCodeOf,
  type BatchResult,
  type HaltPolicy,
} from '@treesweep/core';
import { formatFailure } from './format.js';

/**
 * Format error for CLI output.
 */
export function formatError(err: unknown): string {
  if (err instanceof Error) {
    return err.message;
  }
  return String(err);
}

/**
 * Exit with error message.
 */
export function exitError(message: string, code = 1): never {
  console.error(`Error: ${message}`);
  process.exit(code);
}

/**
 * Parse a positive integer option such as `--jobs 8`.
 *
 * @returns undefined when the option was not given
 */
export function parseCountOption(value: string | undefined, name: string): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new Error(`Invalid --${name} '${value}': expected a positive integer`);
  }
  return parsed;
}

/**
 * Parse an integer option such as `--seed 42`.
 */
export function parseIntOption(value: string | undefined, name: string): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new Error(`Invalid --${name} '${value}': expected an integer`);
  }
  return parsed;
}

/**
 * Parse `--halt never|soon|now`.
 */
export function parseHaltOption(value: string | undefined): HaltPolicy | undefined {
  if (value === undefined) return undefined;
  const parsed = HaltPolicySchema.safeParse(value);
  if (!parsed.success) {
    throw new Error(`Invalid --halt '${value}': expected one of never, soon, now`);
  }
  return parsed.data;
}

/**
 * Split a comma-separated option value, dropping empty items.
 */
export function parseListOption(value: string | undefined): string[] | undefined {
  if (value === undefined) return undefined;
  return value.split(',').map((item) => item.trim()).filter((item) => item.length > 0);
}

/**
 * Commander argument parser collecting a repeatable option into an array.
 */
export function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

/**
 * Abort the returned controller on SIGINT or SIGTERM.
 *
 * Running tasks are killed through the signal; the pipeline then reports the
 * abort and the command exits.
 */
export function abortOnSignals(): AbortController {
  const controller = new AbortController();
  const onSignal = (signal: NodeJS.Signals) => {
    console.error('');
    console.error(`Received ${signal}, stopping tasks...`);
    controller.abort();
  };
  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);
  return controller;
}

function failedBatch(err: unknown): BatchResult | undefined {
  if (err instanceof BatchFailedError || err instanceof BatchAbortedError) return err.result;
  if (err instanceof StageFailedError) return failedBatch(err.cause);
  return undefined;
}

/**
 * Report a pipeline error and exit.
 *
 * Task failures list every failed task and exit with the first failing
 * task's exit code; any other error exits 1.
 */
export function exitPipelineError(err: unknown): never {
  const batch = failedBatch(err);
  const failures = batch?.results.filter(({ result }) => result.state !== 'success') ?? [];
  if (failures.length > 0) {
    console.log('');
    console.log('Failed tasks:');
    for (const outcome of failures) {
      console.log(`  ${formatFailure(outcome)}`);
    }
  }
  exitError(formatError(err), exitCodeOf(err));
}
