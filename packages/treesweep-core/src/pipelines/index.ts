/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

export {
  resolveRandom,
  assertNoCollisions,
  runBatch,
  type PipelineOptions,
} from './common.js';

export {
  EVALUATION_STAGES,
  LARGE_MUTREL_BATCH,
  evaluationBuilders,
  enumerateEvaluation,
  planEvaluation,
  runEvaluation,
  type EvaluationStage,
  type EvaluationResult,
} from './evaluation.js';

export {
  PAIRWISE_CLEAN_SUFFIXES,
  PLOT_CLEAN_SUFFIXES,
  publishDir,
  renameTasks,
  removeTasks,
  pairwiseTasks,
  plotTasks,
  treeIndexTasks,
  publishTask,
  renderIndex,
  pairwiseStages,
  runPairwise,
  planPairwise,
  type PairwiseOptions,
  type PairwiseContext,
  type PairwiseResult,
  type PairwiseStagePlan,
} from './pairwise.js';
