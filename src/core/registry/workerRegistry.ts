/**
 * Load, validate, and expose the worker reference tables used by selection.
 *
 * The registry is hand-maintained data (core membership, execution order,
 * complexity and latency ratings, scoring weights) read once at startup and
 * treated as immutable afterwards.
 */
import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { AppError } from '../../shared/errors/app-error';

export type WorkerId = string;

const DEFAULT_EXECUTION_ORDER = 500;
const DEFAULT_COMPLEXITY = 5;
const DEFAULT_LATENCY_MS = 100;
const DEFAULT_LATENCY_CEILING_MS = 200;

const workerEntrySchema = z.object({
  id: z.string().trim().min(1),
  description: z.string().default(''),
  executionOrder: z.number().int().optional(),
  complexity: z.number().min(0).max(10).optional(),
  latencyMs: z.number().min(0).optional(),
});

const scoringWeightsSchema = z
  .object({
    relevance: z.number().min(0),
    complexityMatch: z.number().min(0),
    userHistory: z.number().min(0),
    performance: z.number().min(0),
  })
  .refine(
    (weights) =>
      Math.abs(weights.relevance + weights.complexityMatch + weights.userHistory + weights.performance - 100) <
      1e-9,
    'Scoring weights must sum to 100.',
  );

export const workerRegistrySchema = z
  .object({
    coreWorkers: z.array(z.string().trim().min(1)).min(1),
    defaults: z
      .object({
        executionOrder: z.number().int().default(DEFAULT_EXECUTION_ORDER),
        complexity: z.number().min(0).max(10).default(DEFAULT_COMPLEXITY),
        latencyMs: z.number().min(0).default(DEFAULT_LATENCY_MS),
      })
      .default({}),
    weights: scoringWeightsSchema.default({
      relevance: 40,
      complexityMatch: 30,
      userHistory: 20,
      performance: 10,
    }),
    latencyCeilingMs: z.number().positive().default(DEFAULT_LATENCY_CEILING_MS),
    workers: z.array(workerEntrySchema),
  })
  .superRefine((doc, ctx) => {
    const seen = new Set<string>();
    doc.workers.forEach((worker, index) => {
      if (seen.has(worker.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['workers', index, 'id'],
          message: `Duplicate worker id "${worker.id}".`,
        });
      }
      seen.add(worker.id);
    });

    const seenCore = new Set<string>();
    doc.coreWorkers.forEach((id, index) => {
      if (seenCore.has(id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['coreWorkers', index],
          message: `Duplicate core worker "${id}".`,
        });
      }
      seenCore.add(id);
      if (!seen.has(id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['coreWorkers', index],
          message: `Core worker "${id}" is not declared in workers.`,
        });
      }
    });
  });

export type WorkerRegistryDocument = z.input<typeof workerRegistrySchema>;
type ParsedRegistry = z.output<typeof workerRegistrySchema>;
export type ScoringWeights = ParsedRegistry['weights'];
export type WorkerEntry = ParsedRegistry['workers'][number];

/** Read-only view over the registry reference tables. Unknown ids resolve to defaults. */
export class WorkerRegistry {
  private readonly entries: ReadonlyMap<WorkerId, WorkerEntry>;
  private readonly core: readonly WorkerId[];
  private readonly defaults: ParsedRegistry['defaults'];
  readonly weights: Readonly<ScoringWeights>;
  readonly latencyCeilingMs: number;

  constructor(doc: ParsedRegistry) {
    this.entries = new Map(doc.workers.map((worker) => [worker.id, Object.freeze({ ...worker })]));
    this.core = Object.freeze([...doc.coreWorkers]);
    this.defaults = Object.freeze({ ...doc.defaults });
    this.weights = Object.freeze({ ...doc.weights });
    this.latencyCeilingMs = doc.latencyCeilingMs;
  }

  /** Core workers in declared order. Returns a fresh array. */
  coreWorkers(): WorkerId[] {
    return [...this.core];
  }

  isCore(id: WorkerId): boolean {
    return this.core.includes(id);
  }

  knownWorkers(): WorkerId[] {
    return Array.from(this.entries.keys());
  }

  has(id: WorkerId): boolean {
    return this.entries.has(id);
  }

  describe(id: WorkerId): string {
    return this.entries.get(id)?.description ?? '';
  }

  executionOrder(id: WorkerId): number {
    return this.entries.get(id)?.executionOrder ?? this.defaults.executionOrder;
  }

  complexity(id: WorkerId): number {
    return this.entries.get(id)?.complexity ?? this.defaults.complexity;
  }

  latencyMs(id: WorkerId): number {
    return this.entries.get(id)?.latencyMs ?? this.defaults.latencyMs;
  }

  get defaultComplexity(): number {
    return this.defaults.complexity;
  }
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${path}: ${issue.message}`;
  });
}

/**
 * Validate an in-memory registry document.
 *
 * @throws AppError REGISTRY_INVALID with the formatted zod issues in `details.issues`.
 */
export function createWorkerRegistry(doc: unknown): WorkerRegistry {
  const parsed = workerRegistrySchema.safeParse(doc);
  if (!parsed.success) {
    const issues = formatIssues(parsed.error);
    throw new AppError('REGISTRY_INVALID', `Invalid worker registry: ${issues.join('; ')}`, parsed.error, {
      issues,
    });
  }
  return new WorkerRegistry(parsed.data);
}

export async function loadWorkerRegistry(filePath: string): Promise<WorkerRegistry> {
  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(filePath, 'utf8'));
  } catch (error) {
    throw new AppError('REGISTRY_INVALID', `Unable to read worker registry at ${filePath}`, error, {
      filePath,
    });
  }
  return createWorkerRegistry(raw);
}

/** Stable sort by execution order; equal ranks keep their current relative order. */
export function sortByExecutionOrder(ids: readonly WorkerId[], registry: WorkerRegistry): WorkerId[] {
  return [...ids].sort((a, b) => registry.executionOrder(a) - registry.executionOrder(b));
}
