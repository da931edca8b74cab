export { createBrainOrchestrator } from './app/bootstrap';
export type { AnswerOptions, BrainOrchestrator, CreateBrainOrchestratorParams } from './app/bootstrap';

export { BrainSelector } from './core/orchestration/brainSelector';
export type { BrainSelectorOptions } from './core/orchestration/brainSelector';
export { scoreBrain } from './core/orchestration/brainScoring';
export type { ScoreBreakdown, TopMatch } from './core/orchestration/brainScoring';
export { answerQuery } from './core/orchestration/brainPipeline';
export type { AnswerQueryParams, AnswerQueryResult, SelectionMode } from './core/orchestration/brainPipeline';
export type {
  WorkerIndex,
  WorkerIndexDocument,
  WorkerIndexMatch,
  WorkerIndexWriter,
} from './core/orchestration/workerIndex';

export {
  createWorkerRegistry,
  loadWorkerRegistry,
  sortByExecutionOrder,
  WorkerRegistry,
} from './core/registry/workerRegistry';
export type { ScoringWeights, WorkerId, WorkerRegistryDocument } from './core/registry/workerRegistry';
export { buildWorkerDocuments, indexWorkers } from './core/registry/workerIndexer';

export {
  combineInsights,
  createUnifiedResponse,
  identifyConflicts,
  mergeOutputs,
  mergeWithConflictReport,
  mergeWithConflictResolution,
  resolveConflict,
} from './core/aggregation/outputMerger';
export { isConflicting, isSimilar, jaccardSimilarity } from './core/aggregation/textSimilarity';
export { checkConsistency, shouldReevaluate } from './core/aggregation/consistency';
export type { ConsistencyReport, Inconsistency, ReevaluationPolicy } from './core/aggregation/consistency';
export { normalizeQuality, summarizeOutputQuality } from './core/aggregation/quality';
export type { OutputQualityStats } from './core/aggregation/quality';
export type {
  Conflict,
  ConflictMergeReport,
  ConflictResolution,
  MergedResponse,
  UnifiedResponse,
  WorkerOutput,
} from './core/aggregation/aggregation-types';

export { executeWorkers } from './core/execution/workerExecutor';
export type { ExecuteWorkersParams, RawWorkerResult, WorkerRunner } from './core/execution/workerExecutor';

export { AppError } from './shared/errors/app-error';
export type { ErrorCode } from './shared/errors/app-error';
