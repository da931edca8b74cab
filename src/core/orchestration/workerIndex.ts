import type { WorkerId } from '../registry/workerRegistry';

/** One ranked hit from the embedding index over worker descriptions. */
export interface WorkerIndexMatch {
  content: string;
  /** External indexes may return hits without metadata. */
  metadata?: Record<string, unknown>;
}

/**
 * Semantic index over worker descriptions. Implementations may block on the
 * network; callers bound every call with a timeout.
 */
export interface WorkerIndex {
  search(query: string, topK: number): Promise<WorkerIndexMatch[]>;
  /**
   * Enumerate indexed workers. Backed by a similarity query for "*" with a large
   * topK, so completeness depends on the index honouring that topK.
   */
  catalog(topK: number): Promise<WorkerIndexMatch[]>;
}

export interface WorkerIndexDocument {
  content: string;
  metadata: {
    workerId: WorkerId;
    executionOrder: number;
  };
}

export interface WorkerIndexWriter {
  add(documents: WorkerIndexDocument[]): Promise<void>;
}

/** Extract worker ids from index hits, skipping hits without a usable id and repeats. */
export function workerIdsFromMatches(matches: readonly WorkerIndexMatch[]): WorkerId[] {
  const ids: WorkerId[] = [];
  for (const match of matches) {
    const raw = match.metadata?.workerId;
    if (typeof raw !== 'string') continue;
    const id = raw.trim();
    if (id.length === 0 || ids.includes(id)) continue;
    ids.push(id);
  }
  return ids;
}
