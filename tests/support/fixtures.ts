import { vi } from 'vitest';
import type { WorkerOutput } from '../../src/core/aggregation/aggregation-types';
import type { WorkerIndex, WorkerIndexMatch } from '../../src/core/orchestration/workerIndex';
import { createWorkerRegistry, WorkerRegistry } from '../../src/core/registry/workerRegistry';

export const CORE_WORKERS = ['planner', 'toolRunner', 'judge', 'voice'];

export const ALL_WORKERS = [
  'planner',
  'toolRunner',
  'voice',
  'judge',
  'errorPredictor',
  'knowledgeGraph',
  'advancedCapabilities',
  'theoryOfMind',
  'codeReviewer',
];

export function buildTestRegistry(): WorkerRegistry {
  return createWorkerRegistry({
    coreWorkers: CORE_WORKERS,
    workers: [
      { id: 'planner', description: 'Plans steps', executionOrder: 0, complexity: 10, latencyMs: 10 },
      { id: 'toolRunner', description: 'Runs tools', executionOrder: 2, complexity: 10, latencyMs: 15 },
      { id: 'voice', description: 'Shapes tone', executionOrder: 800, complexity: 5, latencyMs: 50 },
      { id: 'judge', description: 'Reviews drafts', executionOrder: 1000, complexity: 10, latencyMs: 100 },
      { id: 'errorPredictor', description: 'Predicts bugs', complexity: 8, latencyMs: 80 },
      { id: 'knowledgeGraph', description: 'Maps dependencies', complexity: 9, latencyMs: 150 },
      { id: 'advancedCapabilities', description: 'Does maths', complexity: 8, latencyMs: 120 },
      { id: 'theoryOfMind', description: 'Models the user', complexity: 7 },
      { id: 'codeReviewer', description: 'Reviews style' },
    ],
  });
}

export function match(workerId: string): WorkerIndexMatch {
  return { content: `${workerId} description`, metadata: { workerId } };
}

export function createFakeIndex(opts: {
  specialists?: string[];
  topMatch?: string[];
  catalog?: string[];
} = {}) {
  const search = vi.fn(async (_query: string, topK: number): Promise<WorkerIndexMatch[]> =>
    (topK === 1 ? opts.topMatch ?? [] : opts.specialists ?? []).map(match),
  );
  const catalog = vi.fn(async (_topK: number): Promise<WorkerIndexMatch[]> =>
    (opts.catalog ?? ALL_WORKERS).map(match),
  );
  const index: WorkerIndex = { search, catalog };
  return { index, search, catalog };
}

export function output(source: string, content: string, quality: number): WorkerOutput {
  return { source, content, quality };
}
