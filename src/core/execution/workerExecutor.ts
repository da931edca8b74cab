import { assertPositiveInteger, withTimeout } from '../../shared/async/resilience';
import { toErrorWithCode } from '../../shared/errors/app-error';
import { logger } from '../../shared/logging/logger';
import type { WorkerOutput } from '../aggregation/aggregation-types';
import { normalizeQuality } from '../aggregation/quality';
import type { WorkerId } from '../registry/workerRegistry';
import { limitConcurrency } from '../utils/concurrency';

/** What a worker hands back, with quality on whatever scale it reports. */
export interface RawWorkerResult {
  content: string;
  quality: number;
}

export type WorkerRunner = (workerId: WorkerId, query: string, signal: AbortSignal) => Promise<RawWorkerResult>;

export interface ExecuteWorkersParams {
  workerIds: readonly WorkerId[];
  query: string;
  runWorker: WorkerRunner;
  maxParallel: number;
  timeoutMs: number;
  traceId?: string;
}

async function runOne(
  workerId: WorkerId,
  params: ExecuteWorkersParams,
): Promise<WorkerOutput | null> {
  const controller = new AbortController();
  const startedAt = Date.now();

  try {
    const raw = await withTimeout(params.runWorker(workerId, params.query, controller.signal), {
      timeoutMs: params.timeoutMs,
      operation: `Worker ${workerId}`,
      onTimeout: () => controller.abort(),
    });
    const content = typeof raw.content === 'string' ? raw.content.trim() : '';
    if (content.length === 0) {
      logger.warn({ traceId: params.traceId, workerId }, 'Worker execution: empty output dropped');
      return null;
    }
    return { source: workerId, content, quality: normalizeQuality(raw.quality) };
  } catch (error) {
    const appError = toErrorWithCode(error, 'EXTERNAL_CALL_FAILED');
    logger.warn(
      {
        traceId: params.traceId,
        workerId,
        code: appError.code,
        error: appError.message,
        latencyMs: Math.max(0, Date.now() - startedAt),
      },
      'Worker execution: worker failed, continuing without it',
    );
    return null;
  }
}

/**
 * Run the selected workers with bounded parallelism and a per-worker deadline.
 *
 * Resolves with the outputs that completed, in request order; failed, timed-out
 * and empty workers are left out. Worker failures never reject; an invalid
 * `timeoutMs` rejects with a RangeError before any worker starts.
 */
export async function executeWorkers(params: ExecuteWorkersParams): Promise<WorkerOutput[]> {
  assertPositiveInteger(params.timeoutMs, 'timeoutMs');
  const limiter = limitConcurrency(Math.max(1, Math.floor(params.maxParallel)));
  const unique = Array.from(new Set(params.workerIds));

  const results = await Promise.all(unique.map((workerId) => limiter(() => runOne(workerId, params))));
  const outputs = results.filter((output): output is WorkerOutput => output !== null);

  logger.info(
    { traceId: params.traceId, requested: unique.length, completed: outputs.length },
    'Worker execution: finished',
  );
  return outputs;
}
