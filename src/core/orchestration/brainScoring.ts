import type { WorkerId, WorkerRegistry } from '../registry/workerRegistry';

const NON_TOP_MATCH_RELEVANCE_SHARE = 0.25;
const NEUTRAL_HISTORY_SHARE = 0.5;
const COMPLEXITY_SCALE = 10;

export interface ScoreBreakdown {
  workerId: WorkerId;
  relevance: number;
  complexityMatch: number;
  userHistory: number;
  performance: number;
  total: number;
}

/**
 * Outcome of the single top-1 relevance lookup for a query.
 * `unavailable` means the lookup failed and relevance scores zero for every worker.
 */
export type TopMatch = { status: 'found'; workerId: WorkerId | null } | { status: 'unavailable' };

export interface ScoreBrainParams {
  workerId: WorkerId;
  complexityLevel: number;
  userId: string;
  topMatch: TopMatch;
  registry: WorkerRegistry;
}

/** Binary relevance: full weight for the top-1 index match, a quarter of it otherwise. */
export function scoreRelevance(workerId: WorkerId, topMatch: TopMatch, weight: number): number {
  if (topMatch.status === 'unavailable' || topMatch.workerId === null) return 0;
  return topMatch.workerId === workerId ? weight : weight * NON_TOP_MATCH_RELEVANCE_SHARE;
}

export function scoreComplexityMatch(declared: number, complexityLevel: number, weight: number): number {
  const match = 1 - Math.abs(declared - complexityLevel) / COMPLEXITY_SCALE;
  return weight * Math.max(0, match);
}

// No per-user history signal exists yet; every worker gets the neutral half share.
export function scoreUserHistory(_workerId: WorkerId, _userId: string, weight: number): number {
  return weight * NEUTRAL_HISTORY_SHARE;
}

export function scorePerformance(latencyMs: number, latencyCeilingMs: number, weight: number): number {
  return weight * Math.max(0, 1 - latencyMs / latencyCeilingMs);
}

export function scoreBrain(params: ScoreBrainParams): ScoreBreakdown {
  const { workerId, userId, topMatch, registry } = params;
  const { weights } = registry;
  const complexityLevel = Number.isFinite(params.complexityLevel)
    ? params.complexityLevel
    : registry.defaultComplexity;

  const relevance = scoreRelevance(workerId, topMatch, weights.relevance);
  const complexityMatch = scoreComplexityMatch(
    registry.complexity(workerId),
    complexityLevel,
    weights.complexityMatch,
  );
  const userHistory = scoreUserHistory(workerId, userId, weights.userHistory);
  const performance = scorePerformance(registry.latencyMs(workerId), registry.latencyCeilingMs, weights.performance);

  return {
    workerId,
    relevance,
    complexityMatch,
    userHistory,
    performance,
    total: relevance + complexityMatch + userHistory + performance,
  };
}

/** Rank breakdowns by total score, highest first; equal totals keep input order. */
export function rankBreakdowns(breakdowns: readonly ScoreBreakdown[]): ScoreBreakdown[] {
  return [...breakdowns].sort((a, b) => b.total - a.total);
}
