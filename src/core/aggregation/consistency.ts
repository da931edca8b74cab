import { logger } from '../../shared/logging/logger';
import type { WorkerId } from '../registry/workerRegistry';
import type { WorkerOutput } from './aggregation-types';
import { jaccardSimilarity } from './textSimilarity';

const LOW_SIMILARITY_THRESHOLD = 0.5;
const CONSISTENT_AVERAGE_THRESHOLD = 0.85;

export interface Inconsistency {
  first: WorkerId;
  second: WorkerId;
  similarity: number;
}

export interface ConsistencyReport {
  averageSimilarity: number;
  inconsistencies: Inconsistency[];
  consistent: boolean;
}

export interface ReevaluationPolicy {
  minQuality: number;
  maxCycles: number;
}

/** Pairwise word-overlap check across all outputs. */
export function checkConsistency(outputs: readonly WorkerOutput[] | null | undefined): ConsistencyReport {
  if (!outputs || outputs.length < 2) {
    return { averageSimilarity: 1, inconsistencies: [], consistent: true };
  }

  const inconsistencies: Inconsistency[] = [];
  let total = 0;
  let comparisons = 0;

  for (let i = 0; i < outputs.length; i += 1) {
    for (let j = i + 1; j < outputs.length; j += 1) {
      const similarity = jaccardSimilarity(outputs[i].content, outputs[j].content);
      total += similarity;
      comparisons += 1;
      if (similarity < LOW_SIMILARITY_THRESHOLD) {
        inconsistencies.push({ first: outputs[i].source, second: outputs[j].source, similarity });
      }
    }
  }

  const averageSimilarity = total / comparisons;
  const report: ConsistencyReport = {
    averageSimilarity,
    inconsistencies,
    consistent: averageSimilarity >= CONSISTENT_AVERAGE_THRESHOLD && inconsistencies.length === 0,
  };
  logger.debug(
    { averageSimilarity, inconsistencies: inconsistencies.length },
    'Consistency check: compared worker outputs',
  );
  return report;
}

export function shouldReevaluate(quality: number, completedCycles: number, policy: ReevaluationPolicy): boolean {
  return quality < policy.minQuality && completedCycles < policy.maxCycles;
}
