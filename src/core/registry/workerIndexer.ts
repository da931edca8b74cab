import { retry } from '../../shared/async/resilience';
import { logger } from '../../shared/logging/logger';
import type { WorkerIndexDocument, WorkerIndexWriter } from '../orchestration/workerIndex';
import type { WorkerRegistry } from './workerRegistry';

const INDEX_RETRY_BASE_DELAY_MS = 200;

export function buildWorkerDocuments(registry: WorkerRegistry): WorkerIndexDocument[] {
  return registry.knownWorkers().map((workerId) => ({
    content: registry.describe(workerId),
    metadata: {
      workerId,
      executionOrder: registry.executionOrder(workerId),
    },
  }));
}

/**
 * Write one description document per registry worker into the index.
 *
 * @returns Number of documents written.
 * @throws AppError EXTERNAL_CALL_FAILED once retries are exhausted.
 */
export async function indexWorkers(
  registry: WorkerRegistry,
  writer: WorkerIndexWriter,
  opts: { retries: number; baseDelayMs?: number },
): Promise<number> {
  const documents = buildWorkerDocuments(registry);

  await retry(() => writer.add(documents), {
    retries: opts.retries,
    baseDelayMs: opts.baseDelayMs ?? INDEX_RETRY_BASE_DELAY_MS,
    operationName: 'Worker index write',
    onRetry: (attempt, error) => {
      logger.warn({ attempt, error }, 'Worker indexing: write failed, retrying');
    },
  });

  logger.info({ indexed: documents.length }, 'Worker indexing: workers ready for semantic search');
  return documents.length;
}
