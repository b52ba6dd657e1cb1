/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

export { dispatch, dispatchOrThrow } from './dispatch.js';
export { EtaTracker } from './progress.js';
export { shuffle, seededRandom } from './shuffle.js';
export type {
  BatchResult,
  DispatchOptions,
  ProgressSnapshot,
  TaskOutcome,
} from './types.js';
