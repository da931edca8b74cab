import { assertPositiveInteger, withTimeout } from '../../shared/async/resilience';
import { toErrorWithCode } from '../../shared/errors/app-error';
import { logger } from '../../shared/logging/logger';
import { sortByExecutionOrder, WorkerId, WorkerRegistry } from '../registry/workerRegistry';
import { rankBreakdowns, scoreBrain, ScoreBreakdown, TopMatch } from './brainScoring';
import { WorkerIndex, workerIdsFromMatches } from './workerIndex';

export interface BrainSelectorOptions {
  registry: WorkerRegistry;
  index: WorkerIndex;
  indexTimeoutMs: number;
  specialistTopK?: number;
  catalogTopK?: number;
}

const DEFAULT_SPECIALIST_TOP_K = 4;
const DEFAULT_CATALOG_TOP_K = 100;

function errorMessage(error: unknown): string {
  return toErrorWithCode(error, 'INDEX_UNAVAILABLE').message;
}

/**
 * Decide which workers run for a query and in what order.
 *
 * Both selection modes always return every core worker exactly once and never
 * reject: an unreachable or slow index degrades to the core set.
 */
export class BrainSelector {
  private readonly registry: WorkerRegistry;
  private readonly index: WorkerIndex;
  private readonly indexTimeoutMs: number;
  private readonly specialistTopK: number;
  private readonly catalogTopK: number;

  /** @throws RangeError when indexTimeoutMs is not a positive integer. */
  constructor(options: BrainSelectorOptions) {
    assertPositiveInteger(options.indexTimeoutMs, 'indexTimeoutMs');
    this.registry = options.registry;
    this.index = options.index;
    this.indexTimeoutMs = options.indexTimeoutMs;
    this.specialistTopK = options.specialistTopK ?? DEFAULT_SPECIALIST_TOP_K;
    this.catalogTopK = options.catalogTopK ?? DEFAULT_CATALOG_TOP_K;
  }

  /** Core workers plus the index's top-K specialists, in execution order. */
  async selectBrains(query: string): Promise<WorkerId[]> {
    const core = this.registry.coreWorkers();

    try {
      const matches = await withTimeout(this.index.search(query, this.specialistTopK), {
        timeoutMs: this.indexTimeoutMs,
        operation: 'Worker index search',
      });
      const specialists = workerIdsFromMatches(matches);

      const brains = [...core];
      for (const id of specialists) {
        if (!brains.includes(id)) brains.push(id);
      }

      const ordered = sortByExecutionOrder(brains, this.registry);
      logger.info(
        { core: core.length, specialists: specialists.length, total: ordered.length, brains: ordered },
        'Brain selection: core + specialists',
      );
      return ordered;
    } catch (error) {
      logger.warn(
        { error: errorMessage(error), query: query.slice(0, 80) },
        'Brain selection: worker index unavailable, using core workers only',
      );
      return core;
    }
  }

  /**
   * Score every catalogued worker, keep the best `topN`, then force in any
   * missing core worker and order the result by execution order.
   */
  async selectTopBrains(
    query: string,
    complexityLevel: number,
    userId: string,
    topN: number,
  ): Promise<WorkerId[]> {
    try {
      const ranked = await this.scoreCatalog(query, complexityLevel, userId);
      const limit = Number.isNaN(topN) ? 0 : Math.max(0, Math.min(ranked.length, Math.floor(topN)));
      const top = ranked.slice(0, limit).map((breakdown) => breakdown.workerId);

      for (const coreId of this.registry.coreWorkers()) {
        if (!top.includes(coreId)) top.push(coreId);
      }

      const ordered = sortByExecutionOrder(top, this.registry);
      logger.info({ topN, complexityLevel, userId, brains: ordered }, 'Brain selection: ranked top brains');
      return ordered;
    } catch (error) {
      logger.warn(
        { error: errorMessage(error), userId, query: query.slice(0, 80) },
        'Brain selection: ranking failed, using core workers only',
      );
      return this.registry.coreWorkers();
    }
  }

  /** Full score breakdown for every catalogued worker, best first. Empty when the catalog is unavailable. */
  async rankBrains(query: string, complexityLevel: number, userId: string): Promise<ScoreBreakdown[]> {
    try {
      return await this.scoreCatalog(query, complexityLevel, userId);
    } catch (error) {
      logger.warn({ error: errorMessage(error) }, 'Brain ranking: worker catalog unavailable');
      return [];
    }
  }

  /** Worker ids known to the index. Empty when the catalog is unavailable. */
  async listBrains(): Promise<WorkerId[]> {
    try {
      return await this.fetchCatalog();
    } catch (error) {
      logger.warn({ error: errorMessage(error) }, 'Brain listing: worker catalog unavailable');
      return [];
    }
  }

  private async fetchCatalog(): Promise<WorkerId[]> {
    const matches = await withTimeout(this.index.catalog(this.catalogTopK), {
      timeoutMs: this.indexTimeoutMs,
      operation: 'Worker index catalog',
    });
    return workerIdsFromMatches(matches);
  }

  private async lookupTopMatch(query: string): Promise<TopMatch> {
    try {
      const matches = await withTimeout(this.index.search(query, 1), {
        timeoutMs: this.indexTimeoutMs,
        operation: 'Worker index relevance lookup',
      });
      const [first] = workerIdsFromMatches(matches);
      return { status: 'found', workerId: first ?? null };
    } catch (error) {
      logger.warn({ error: errorMessage(error) }, 'Brain scoring: relevance lookup failed, scoring relevance as 0');
      return { status: 'unavailable' };
    }
  }

  private async scoreCatalog(query: string, complexityLevel: number, userId: string): Promise<ScoreBreakdown[]> {
    const workers = await this.fetchCatalog();
    const topMatch = await this.lookupTopMatch(query);

    const breakdowns = workers.map((workerId) =>
      scoreBrain({ workerId, complexityLevel, userId, topMatch, registry: this.registry }),
    );
    for (const breakdown of breakdowns) {
      logger.debug(breakdown, 'Brain scoring: breakdown');
    }
    return rankBreakdowns(breakdowns);
  }
}
