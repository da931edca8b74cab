import path from 'node:path';
import { AnswerQueryResult, answerQuery, SelectionMode } from '../core/orchestration/brainPipeline';
import { BrainSelector } from '../core/orchestration/brainSelector';
import type { WorkerIndex, WorkerIndexWriter } from '../core/orchestration/workerIndex';
import type { WorkerRunner } from '../core/execution/workerExecutor';
import { indexWorkers } from '../core/registry/workerIndexer';
import { loadWorkerRegistry, WorkerRegistry } from '../core/registry/workerRegistry';
import { AppConfig, config as defaultConfig } from '../shared/config/env';
import { AppError } from '../shared/errors/app-error';
import { logger } from '../shared/logging/logger';

export interface CreateBrainOrchestratorParams {
  index: WorkerIndex;
  runWorker: WorkerRunner;
  /** When given, registry documents are written to the index before the orchestrator is returned. */
  indexWriter?: WorkerIndexWriter;
  /** Skip loading from WORKER_REGISTRY_PATH. */
  registry?: WorkerRegistry;
  config?: AppConfig;
}

export interface AnswerOptions {
  mode?: SelectionMode;
  completedCycles?: number;
  traceId?: string;
}

export interface BrainOrchestrator {
  registry: WorkerRegistry;
  selector: BrainSelector;
  answer(query: string, userId: string, options?: AnswerOptions): Promise<AnswerQueryResult>;
}

export async function createBrainOrchestrator(params: CreateBrainOrchestratorParams): Promise<BrainOrchestrator> {
  const config = params.config ?? defaultConfig;

  try {
    const registry =
      params.registry ?? (await loadWorkerRegistry(path.resolve(process.cwd(), config.WORKER_REGISTRY_PATH)));

    if (params.indexWriter) {
      await indexWorkers(registry, params.indexWriter, { retries: config.WORKER_INDEX_WRITE_RETRIES });
    }

    const selector = new BrainSelector({
      registry,
      index: params.index,
      indexTimeoutMs: config.WORKER_INDEX_TIMEOUT_MS,
      specialistTopK: config.WORKER_INDEX_SPECIALIST_TOP_K,
      catalogTopK: config.WORKER_INDEX_CATALOG_TOP_K,
    });

    logger.info(
      { workers: registry.knownWorkers().length, coreWorkers: registry.coreWorkers() },
      'Brain orchestrator ready',
    );

    return {
      registry,
      selector,
      answer: (query, userId, options = {}) =>
        answerQuery({
          query,
          userId,
          selector,
          runWorker: params.runWorker,
          mode: options.mode ?? { kind: 'core-specialist' },
          maxParallel: config.WORKER_EXECUTION_MAX_PARALLEL,
          workerTimeoutMs: config.WORKER_EXECUTION_TIMEOUT_MS,
          reevaluation: {
            minQuality: config.AGGREGATION_MIN_QUALITY,
            maxCycles: config.AGGREGATION_MAX_REEVALUATION_CYCLES,
          },
          completedCycles: options.completedCycles,
          traceId: options.traceId,
        }),
    };
  } catch (error) {
    throw new AppError('BOOTSTRAP_FAILED', 'Brain orchestrator bootstrap failed', error);
  }
}
