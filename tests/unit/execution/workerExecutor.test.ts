import { beforeEach, describe, expect, it, vi } from 'vitest';
import { executeWorkers, RawWorkerResult, WorkerRunner } from '../../../src/core/execution/workerExecutor';
import { logger } from '../../../src/shared/logging/logger';

vi.mock('../../../src/shared/logging/logger', () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

function runnerFrom(results: Record<string, RawWorkerResult | Error>): WorkerRunner {
  return async (workerId) => {
    const result = results[workerId];
    if (result instanceof Error) throw result;
    return result;
  };
}

describe('executeWorkers', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('returns trimmed outputs on the unit quality scale in request order', async () => {
    const outputs = await executeWorkers({
      workerIds: ['planner', 'judge'],
      query: 'q',
      runWorker: runnerFrom({
        planner: { content: '  plan the work  ', quality: 0.6 },
        judge: { content: 'looks right', quality: 90 },
      }),
      maxParallel: 2,
      timeoutMs: 50,
    });

    expect(outputs).toEqual([
      { source: 'planner', content: 'plan the work', quality: 0.6 },
      { source: 'judge', content: 'looks right', quality: 0.9 },
    ]);
  });

  it('drops failed and empty workers and keeps the rest', async () => {
    const outputs = await executeWorkers({
      workerIds: ['planner', 'voice', 'judge'],
      query: 'q',
      runWorker: runnerFrom({
        planner: new Error('model overloaded'),
        voice: { content: '   ', quality: 0.9 },
        judge: { content: 'verdict', quality: 0.8 },
      }),
      maxParallel: 3,
      timeoutMs: 50,
      traceId: 'trace-1',
    });

    expect(outputs).toEqual([{ source: 'judge', content: 'verdict', quality: 0.8 }]);
    expect(logger.warn).toHaveBeenCalledWith(
      expect.objectContaining({ traceId: 'trace-1', workerId: 'planner', error: 'model overloaded' }),
      'Worker execution: worker failed, continuing without it',
    );
    expect(logger.warn).toHaveBeenCalledWith(
      { traceId: 'trace-1', workerId: 'voice' },
      'Worker execution: empty output dropped',
    );
  });

  it('aborts and drops a worker that exceeds its deadline', async () => {
    let seenSignal: AbortSignal | undefined;
    const runWorker: WorkerRunner = (workerId, _query, signal) => {
      if (workerId === 'slow') {
        seenSignal = signal;
        return new Promise<never>(() => {});
      }
      return Promise.resolve({ content: 'fast answer', quality: 0.7 });
    };

    const outputs = await executeWorkers({
      workerIds: ['slow', 'fast'],
      query: 'q',
      runWorker,
      maxParallel: 2,
      timeoutMs: 20,
    });

    expect(outputs).toEqual([{ source: 'fast', content: 'fast answer', quality: 0.7 }]);
    expect(seenSignal?.aborted).toBe(true);
    expect(logger.warn).toHaveBeenCalledWith(
      expect.objectContaining({ workerId: 'slow', code: 'TIMEOUT' }),
      'Worker execution: worker failed, continuing without it',
    );
  });

  it('never runs more workers at once than maxParallel', async () => {
    let inFlight = 0;
    let maxInFlight = 0;
    const runWorker: WorkerRunner = async (workerId) => {
      inFlight += 1;
      maxInFlight = Math.max(maxInFlight, inFlight);
      await new Promise((resolve) => setTimeout(resolve, 5));
      inFlight -= 1;
      return { content: `answer from ${workerId}`, quality: 0.5 };
    };

    const outputs = await executeWorkers({
      workerIds: ['a', 'b', 'c', 'd', 'e'],
      query: 'q',
      runWorker,
      maxParallel: 2,
      timeoutMs: 200,
    });

    expect(outputs.map((item) => item.source)).toEqual(['a', 'b', 'c', 'd', 'e']);
    expect(maxInFlight).toBe(2);
  });

  it('runs a repeated worker id once', async () => {
    const runWorker = vi.fn<WorkerRunner>(async () => ({ content: 'once', quality: 0.5 }));

    const outputs = await executeWorkers({
      workerIds: ['judge', 'judge'],
      query: 'q',
      runWorker,
      maxParallel: 1,
      timeoutMs: 50,
    });

    expect(outputs).toHaveLength(1);
    expect(runWorker).toHaveBeenCalledTimes(1);
  });

  it('resolves with no outputs when every worker fails', async () => {
    const outputs = await executeWorkers({
      workerIds: ['a'],
      query: 'q',
      runWorker: runnerFrom({ a: new Error('down') }),
      maxParallel: 1,
      timeoutMs: 50,
    });

    expect(outputs).toEqual([]);
  });

  it.each([0, 0.5, 1500.5])('rejects timeoutMs %s before starting any worker', async (timeoutMs) => {
    const runWorker = vi.fn<WorkerRunner>(async () => ({ content: 'never used', quality: 1 }));

    await expect(
      executeWorkers({ workerIds: ['a'], query: 'q', runWorker, maxParallel: 1, timeoutMs }),
    ).rejects.toThrow(new RangeError('timeoutMs must be a positive integer'));
    expect(runWorker).not.toHaveBeenCalled();
  });
});
