import { logger } from '../../shared/logging/logger';
import type {
  Conflict,
  ConflictMergeReport,
  ConflictResolution,
  MergedResponse,
  UnifiedResponse,
  WorkerOutput,
} from './aggregation-types';
import { isConflicting, isSimilar } from './textSimilarity';

const MERGE_SLOTS = 3;
const INSIGHT_PREFIX = 'Additional insight: ';
const PERSPECTIVE_PREFIX = 'Additional perspective: ';

type OutputList = readonly WorkerOutput[] | null | undefined;

function emptyMerge(): MergedResponse {
  return { content: '', quality: 0, sources: [] };
}

function byQualityDescending(outputs: readonly WorkerOutput[]): WorkerOutput[] {
  return [...outputs].sort((a, b) => b.quality - a.quality);
}

/**
 * Merge the three highest-quality outputs into one response.
 *
 * The best output is the primary text. The next two are appended as
 * "Additional insight" blocks unless they are near-duplicates of the primary.
 * Quality is averaged over every slot considered, including skipped duplicates.
 */
export function mergeOutputs(outputs: OutputList): MergedResponse {
  if (!outputs || outputs.length === 0) {
    logger.warn('Output merge: no outputs to merge');
    return emptyMerge();
  }

  const sorted = byQualityDescending(outputs);
  const [primary, ...rest] = sorted;
  const considered = Math.min(MERGE_SLOTS, sorted.length);

  let content = primary.content;
  const sources = [primary.source];
  let runningQuality = primary.quality;

  for (const secondary of rest.slice(0, considered - 1)) {
    if (isSimilar(primary.content, secondary.content)) continue;
    content += `\n\n${INSIGHT_PREFIX}${secondary.content}`;
    sources.push(secondary.source);
    runningQuality += secondary.quality;
  }

  const quality = runningQuality / considered;
  logger.info({ considered, sources, quality }, 'Output merge: merged top outputs');
  return { content, quality, sources };
}

export function identifyConflicts(outputs: OutputList): Conflict[] {
  if (!outputs) return [];
  const conflicts: Conflict[] = [];
  for (let i = 0; i < outputs.length; i += 1) {
    for (let j = i + 1; j < outputs.length; j += 1) {
      if (isConflicting(outputs[i].content, outputs[j].content)) {
        conflicts.push({ first: outputs[i], second: outputs[j] });
      }
    }
  }
  return conflicts;
}

/** The first member wins only with strictly higher quality; a tie goes to the second. */
export function resolveConflict(conflict: Conflict): ConflictResolution {
  const { first, second } = conflict;
  return first.quality > second.quality
    ? { preferred: first, other: second }
    : { preferred: second, other: first };
}

/**
 * Detect conflicts, record an advisory resolution for each, and merge the
 * untouched output set. Resolutions never change the merged content.
 */
export function mergeWithConflictReport(outputs: OutputList): ConflictMergeReport {
  if (!outputs || outputs.length === 0) {
    return { merged: emptyMerge(), resolutions: [] };
  }

  const resolutions = identifyConflicts(outputs).map(resolveConflict);
  if (resolutions.length > 0) {
    logger.info({ conflicts: resolutions.length }, 'Output merge: conflicts detected');
    for (const resolution of resolutions) {
      logger.info(
        {
          preferred: resolution.preferred.source,
          preferredQuality: resolution.preferred.quality,
          other: resolution.other.source,
          otherQuality: resolution.other.quality,
        },
        'Output merge: conflict resolved in favour of higher quality output',
      );
    }
  }

  return { merged: mergeOutputs(outputs), resolutions };
}

export function mergeWithConflictResolution(outputs: OutputList): MergedResponse {
  return mergeWithConflictReport(outputs).merged;
}

/**
 * Concatenate every output that is not a near-duplicate of the first one.
 * Unlike `mergeOutputs` there is no quality ordering and no top-3 cut.
 */
export function combineInsights(outputs: OutputList): string {
  if (!outputs || outputs.length === 0) return '';

  const [first, ...rest] = outputs;
  let combined = first.content;
  for (const output of rest) {
    if (!isSimilar(first.content, output.content)) {
      combined += `\n\n${PERSPECTIVE_PREFIX}${output.content}`;
    }
  }

  logger.info({ outputs: outputs.length }, 'Output merge: combined insights');
  return combined;
}

export function createUnifiedResponse(
  outputs: OutputList,
  userId: string,
  now: () => number = Date.now,
): UnifiedResponse {
  const merged = mergeWithConflictResolution(outputs);
  const response: UnifiedResponse = {
    ...merged,
    userId,
    createdAtEpochMillis: now(),
  };
  logger.info(
    { userId, quality: response.quality, sources: response.sources.length },
    'Output merge: unified response created',
  );
  return response;
}
