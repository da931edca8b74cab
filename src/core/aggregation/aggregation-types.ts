import type { WorkerId } from '../registry/workerRegistry';

/** One worker's answer. `quality` is always on the 0-1 scale. */
export interface WorkerOutput {
  readonly source: WorkerId;
  readonly content: string;
  readonly quality: number;
}

/** Unordered pair of outputs flagged as lexically contradictory. */
export interface Conflict {
  first: WorkerOutput;
  second: WorkerOutput;
}

/** Advisory outcome for a conflict; never applied to merged content. */
export interface ConflictResolution {
  preferred: WorkerOutput;
  other: WorkerOutput;
}

export interface MergedResponse {
  content: string;
  quality: number;
  sources: WorkerId[];
}

export interface UnifiedResponse extends MergedResponse {
  userId: string;
  createdAtEpochMillis: number;
}

export interface ConflictMergeReport {
  merged: MergedResponse;
  resolutions: ConflictResolution[];
}
