/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * treesweep Core - Programmatic API for fanning analysis programs out over
 * simulation runs.
 *
 * This package has no UI dependencies: it reports progress through callbacks
 * and never writes to the console.
 */

// Task model
export {
  CommandBuilder,
  command,
  shellCommand,
  createTask,
  runIdFromPath,
  taskId,
  quoteArg,
  formatCommandLine,
  findOutputCollisions,
  type Run,
  type Command,
  type Task,
  type Batch,
  type HaltPolicy,
} from './task.js';

// Enumeration
export {
  globFiles,
  segmentToRegExp,
  fileExists,
  formatCountDiagnostic,
  enumerateTasks,
  enumerateMatching,
  type TaskBuilder,
  type EnumerateOptions,
} from './enumerate.js';

// Partitioning
export {
  selectTasks,
  partitionTasks,
  type PartitionGroup,
} from './partition.js';

// Execution
export * from './execution/index.js';

// Dispatch
export * from './dispatch/index.js';

// Sequencing
export {
  StageSequencer,
  type Stage,
  type SequencerState,
  type SequencerOptions,
  type StageSummary,
} from './sequencer.js';

// File helpers
export {
  removeMatching,
  listWithSuffix,
  gzipFile,
  gunzipFile,
  copyFiles,
  dateStamp,
} from './fsutil.js';

// Configuration
export {
  expandPath,
  parseConfig,
  loadConfig,
  HaltPolicySchema,
  EvaluationConfigSchema,
  PairwiseConfigSchema,
  PairwiseStageSchema,
  OutputTypeSchema,
  PAIRWISE_STAGES,
  type EvaluationConfig,
  type PairwiseConfig,
  type PairwiseStageName,
  type OutputType,
} from './config.js';

// Pipelines
export * from './pipelines/index.js';

// Errors
export {
  SweepError,
  ConfigError,
  EnumerationError,
  BatchFailedError,
  BatchAbortedError,
  StageFailedError,
  SequencerStateError,
  isNotFoundError,
  isNotDirectoryError,
  isExistsError,
  wrapError,
  exitCodeOf,
  type ConfigIssue,
} from './errors.js';
