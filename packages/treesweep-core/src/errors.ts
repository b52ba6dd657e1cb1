/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * Domain error types for treesweep-core.
 *
 * All treesweep errors extend SweepError, allowing callers to catch all domain
 * errors with `if (err instanceof SweepError)` or specific errors with their class.
 */

import type { BatchResult } from './dispatch/types.js';

// =============================================================================
// Base Error
// =============================================================================

/** Base class for all treesweep errors */
export class SweepError extends Error {
  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
  }
}

// =============================================================================
// Configuration Errors
// =============================================================================

/**
 * A single problem found while validating a configuration file.
 */
export interface ConfigIssue {
  /** Dotted path of the offending field ('' for the document itself) */
  field: string;
  /** Human-readable description */
  message: string;
}

export class ConfigError extends SweepError {
  constructor(
    public readonly path: string,
    public readonly issues: ConfigIssue[]
  ) {
    const details = issues
      .map((issue) => (issue.field ? `${issue.field}: ${issue.message}` : issue.message))
      .join('; ');
    super(`Invalid configuration '${path}': ${details}`);
  }
}

// =============================================================================
// Enumeration Errors
// =============================================================================

export class EnumerationError extends SweepError {
  constructor(
    public readonly root: string,
    public readonly cause: Error
  ) {
    super(`Failed to enumerate '${root}': ${cause.message}`);
  }
}

// =============================================================================
// Execution Errors
// =============================================================================

/**
 * Thrown when a batch finishes with at least one failed task.
 *
 * The attached result lists every task that ran, so callers can report which
 * ones failed and where their captured stderr lives.
 */
export class BatchFailedError extends SweepError {
  constructor(
    public readonly batch: string,
    public readonly result: BatchResult
  ) {
    super(
      `Batch '${batch}' failed: ${result.failed} of ${result.total} task(s) failed` +
        (result.notStarted > 0 ? `, ${result.notStarted} not started` : '')
    );
  }

  /** Exit code of the first failing task (1 if none was reported) */
  get exitCode(): number {
    for (const { result } of this.result.results) {
      if (result.state !== 'success') {
        return result.exitCode !== null && result.exitCode !== 0 ? result.exitCode : 1;
      }
    }
    return 1;
  }
}

/**
 * Thrown when a batch is cancelled through an AbortSignal.
 *
 * This is not a task failure - it indicates the dispatch was intentionally
 * stopped. The partial result contains the tasks that settled before the abort.
 */
export class BatchAbortedError extends SweepError {
  constructor(
    public readonly batch: string,
    public readonly result: BatchResult
  ) {
    super(`Batch '${batch}' was aborted`);
  }
}

// =============================================================================
// Sequencer Errors
// =============================================================================

export class StageFailedError extends SweepError {
  constructor(
    public readonly stage: string,
    public readonly index: number,
    public readonly cause: Error
  ) {
    super(`Stage '${stage}' failed: ${cause.message}`);
  }

  get exitCode(): number {
    return exitCodeOf(this.cause);
  }
}

export class SequencerStateError extends SweepError {
  constructor(public readonly state: string) {
    super(`Sequencer cannot start from state '${state}'`);
  }
}

// =============================================================================
// Helper Functions
// =============================================================================

/** Check if error is ENOENT (file not found) */
export function isNotFoundError(err: unknown): boolean {
  return (
    err instanceof Error && (err as NodeJS.ErrnoException).code === 'ENOENT'
  );
}

/** Check if error is ENOTDIR (path component is not a directory) */
export function isNotDirectoryError(err: unknown): boolean {
  return (
    err instanceof Error && (err as NodeJS.ErrnoException).code === 'ENOTDIR'
  );
}

/** Check if error is EEXIST (already exists) */
export function isExistsError(err: unknown): boolean {
  return (
    err instanceof Error && (err as NodeJS.ErrnoException).code === 'EEXIST'
  );
}

/** Wrap unknown errors with context */
export function wrapError(err: unknown, message: string): SweepError {
  if (err instanceof SweepError) return err;
  const cause = err instanceof Error ? err.message : String(err);
  return new SweepError(`${message}: ${cause}`);
}

/**
 * Process exit code to report for an error.
 *
 * Task failures propagate the failing program's exit code; anything else is 1.
 */
export function exitCodeOf(err: unknown): number {
  if (err instanceof BatchFailedError || err instanceof StageFailedError) {
    return err.exitCode;
  }
  return 1;
}
