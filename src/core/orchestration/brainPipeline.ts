import { randomUUID } from 'node:crypto';
import { childLogger } from '../../shared/logging/logger';
import type { UnifiedResponse, WorkerOutput } from '../aggregation/aggregation-types';
import { checkConsistency, ConsistencyReport, ReevaluationPolicy, shouldReevaluate } from '../aggregation/consistency';
import { createUnifiedResponse } from '../aggregation/outputMerger';
import { summarizeOutputQuality } from '../aggregation/quality';
import { executeWorkers, WorkerRunner } from '../execution/workerExecutor';
import type { WorkerId } from '../registry/workerRegistry';
import type { BrainSelector } from './brainSelector';

export type SelectionMode =
  | { kind: 'core-specialist' }
  | { kind: 'ranked'; complexityLevel: number; topN: number };

export interface AnswerQueryParams {
  query: string;
  userId: string;
  selector: BrainSelector;
  runWorker: WorkerRunner;
  mode: SelectionMode;
  maxParallel: number;
  workerTimeoutMs: number;
  reevaluation: ReevaluationPolicy;
  /** Re-evaluation cycles already spent on this query by the caller. */
  completedCycles?: number;
  traceId?: string;
  now?: () => number;
}

export interface AnswerQueryResult {
  traceId: string;
  selectedWorkers: WorkerId[];
  outputs: WorkerOutput[];
  response: UnifiedResponse;
  consistency: ConsistencyReport;
  needsReevaluation: boolean;
}

/** Select workers, run them, and merge their outputs into one unified response. */
export async function answerQuery(params: AnswerQueryParams): Promise<AnswerQueryResult> {
  const traceId = params.traceId ?? randomUUID();
  const log = childLogger({ traceId, userId: params.userId });

  const selectedWorkers =
    params.mode.kind === 'ranked'
      ? await params.selector.selectTopBrains(
          params.query,
          params.mode.complexityLevel,
          params.userId,
          params.mode.topN,
        )
      : await params.selector.selectBrains(params.query);

  const outputs = await executeWorkers({
    workerIds: selectedWorkers,
    query: params.query,
    runWorker: params.runWorker,
    maxParallel: params.maxParallel,
    timeoutMs: params.workerTimeoutMs,
    traceId,
  });

  log.info({ selectedWorkers, stats: summarizeOutputQuality(outputs) }, 'Pipeline: worker outputs collected');

  const response = createUnifiedResponse(outputs, params.userId, params.now);
  const consistency = checkConsistency(outputs);
  const needsReevaluation = shouldReevaluate(response.quality, params.completedCycles ?? 0, params.reevaluation);

  if (needsReevaluation) {
    log.info(
      { quality: response.quality, completedCycles: params.completedCycles ?? 0 },
      'Pipeline: response below quality threshold, re-evaluation suggested',
    );
  }

  return { traceId, selectedWorkers, outputs, response, consistency, needsReevaluation };
}
