import { ConfigError, VerificationCancelledError } from "./errors.js";

function yieldToEventLoop(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

/**
 * Bounded worker pool over `items`. Results keep input order regardless
 * of completion order and are only returned once every worker is done.
 *
 * The abort signal is checked before each item; an aborted signal
 * rejects with `VerificationCancelledError`. The first failure stops
 * the remaining workers at their next item boundary. A limit below 1
 * or not finite is rejected with `ConfigError`.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  worker: (item: T, index: number) => R | Promise<R>,
  signal?: AbortSignal,
): Promise<R[]> {
  if (!Number.isFinite(limit) || limit < 1) {
    throw new ConfigError(`Invalid concurrency limit: ${limit}`);
  }
  const results: R[] = new Array<R>(items.length);
  let next = 0;
  let halted = false;

  const runWorker = async (): Promise<void> => {
    while (!halted) {
      if (signal?.aborted) {
        halted = true;
        throw new VerificationCancelledError();
      }
      const index = next++;
      if (index >= items.length) return;
      try {
        results[index] = await worker(items[index], index);
      } catch (err) {
        halted = true;
        throw err;
      }
      await yieldToEventLoop();
    }
  };

  const workerCount = Math.max(1, Math.min(Math.floor(limit), items.length));
  await Promise.all(Array.from({ length: workerCount }, () => runWorker()));
  return results;
}
