/**
 * Limit function returned by pLimit
 */
export interface LimitFunction {
  <T>(fn: () => Promise<T>): Promise<T>;
  /** Drop work that has not started yet; its promises never settle */
  clearQueue(): void;
}

/**
 * pLimit
 *
 * Limits the concurrency of async operations.
 * Similar to p-limit but lightweight and built-in.
 *
 * @param concurrency - Max number of concurrent operations
 * @returns A function that accepts a thunk (function returning a promise) and executes it with concurrency limit
 */
export function pLimit(concurrency: number): LimitFunction {
  if (!((Number.isInteger(concurrency) || concurrency === Infinity) && concurrency > 0)) {
    throw new TypeError('Expected `concurrency` to be a number from 1 and up');
  }

  const queue: (() => void)[] = [];
  let activeCount = 0;

  const next = () => {
    activeCount--;
    const nextFn = queue.shift();
    if (nextFn) {
      nextFn();
    }
  };

  const run = async <T>(fn: () => Promise<T>): Promise<T> => {
    const execute = async () => {
      activeCount++;
      try {
        return await fn();
      } finally {
        next();
      }
    };

    if (activeCount < concurrency) {
      return execute();
    }
    return new Promise<T>((resolve, reject) => {
      queue.push(() => {
        execute().then(resolve, reject);
      });
    });
  };

  return Object.assign(run, {
    clearQueue: () => {
      queue.length = 0;
    },
  });
}

export interface MapWithConcurrencyOptions {
  /** Aborts the signal handed to `fn`; calls not yet started reject with its reason */
  signal?: AbortSignal;
}

/**
 * Map items through an async function with at most `limit` calls in flight.
 * Results keep the order of `items`.
 *
 * The first rejection rejects the whole call, drops every call still queued
 * and aborts the signal passed to the calls in flight.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T, index: number, signal: AbortSignal) => Promise<R>,
  options: MapWithConcurrencyOptions = {}
): Promise<R[]> {
  const limitFn = pLimit(limit);
  const controller = new AbortController();
  const external = options.signal;
  const onExternalAbort = () => controller.abort(external?.reason);

  if (external?.aborted) {
    onExternalAbort();
  } else {
    external?.addEventListener('abort', onExternalAbort, { once: true });
  }

  try {
    return await Promise.all(
      items.map((item, index) =>
        limitFn(async () => {
          controller.signal.throwIfAborted();
          try {
            return await fn(item, index, controller.signal);
          } catch (error) {
            // Cleared before this slot frees up, so no queued call starts
            if (!controller.signal.aborted) {
              limitFn.clearQueue();
              controller.abort(error);
            }
            throw error;
          }
        })
      )
    );
  } finally {
    external?.removeEventListener('abort', onExternalAbort);
  }
}
