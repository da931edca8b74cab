export type ConcurrencyLimiter = <T>(fn: () => Promise<T>) => Promise<T>;

/**
 * Create a limiter that runs at most `concurrency` tasks at once.
 *
 * Queued tasks start in submission order as running ones settle. A rejected
 * task frees its slot the same way a resolved one does.
 *
 * @throws RangeError when concurrency is not a positive integer.
 */
export function limitConcurrency(concurrency: number): ConcurrencyLimiter {
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new RangeError('concurrency must be a positive integer');
  }

  let active = 0;
  const queue: Array<() => void> = [];

  const next = () => {
    active -= 1;
    const start = queue.shift();
    if (start) start();
  };

  return <T>(fn: () => Promise<T>): Promise<T> =>
    new Promise<T>((resolve, reject) => {
      const run = () => {
        active += 1;
        void Promise.resolve()
          .then(fn)
          .then(resolve, reject)
          .finally(next);
      };

      if (active < concurrency) {
        run();
      } else {
        queue.push(run);
      }
    });
}
