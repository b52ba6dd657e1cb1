/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * Task execution layer: the runner abstraction and its implementations.
 */

export {
  type TaskExecuteOptions,
  type TaskResult,
  type TaskRunner,
} from './interfaces.js';

export {
  LocalTaskRunner,
  DEFAULT_THREAD_ENV,
  type LocalTaskRunnerOptions,
} from './LocalTaskRunner.js';

export {
  MockTaskRunner,
  MOCK_SUCCESS,
  mockFailure,
  type MockTaskCall,
  type MockTaskRunnerOptions,
} from './MockTaskRunner.js';
