/** Raised when a fan-out is cancelled before every item has been started and joined. */
export class FanOutAbortedError extends Error {
  constructor() {
    super("Fan-out aborted before all calls completed.");
    this.name = "FanOutAbortedError";
  }
}

export interface FanOutOptions {
  signal?: AbortSignal;
}

/**
 * Run `worker` over every item with at most `limit` calls in flight, and
 * resolve once all of them have settled (the join barrier). Results keep the
 * order of `items` regardless of completion order.
 *
 * A rolling pool: as soon as one call finishes the next one starts. When the
 * signal aborts, no further calls are started and the returned promise
 * rejects with FanOutAbortedError; calls already in flight are abandoned.
 */
export function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  worker: (item: T, index: number) => Promise<R>,
  options: FanOutOptions = {},
): Promise<R[]> {
  const { signal } = options;
  const cap = Math.max(1, Math.floor(limit));

  return new Promise<R[]>((resolve, reject) => {
    const results = new Array<R>(items.length);
    let next = 0;
    let inFlight = 0;
    let completed = 0;
    let settled = false;

    const finish = (error?: unknown): void => {
      if (settled) {
        return;
      }
      settled = true;
      signal?.removeEventListener("abort", onAbort);
      if (error !== undefined) {
        reject(error);
      } else {
        resolve(results);
      }
    };

    function onAbort(): void {
      finish(new FanOutAbortedError());
    }

    const launch = (): void => {
      while (!settled && inFlight < cap && next < items.length) {
        if (signal?.aborted) {
          finish(new FanOutAbortedError());
          return;
        }
        const index = next++;
        inFlight++;
        worker(items[index], index).then(
          (value) => {
            results[index] = value;
            inFlight--;
            completed++;
            if (completed === items.length) {
              finish();
            } else {
              launch();
            }
          },
          (error: unknown) => finish(error),
        );
      }
    };

    if (signal?.aborted) {
      finish(new FanOutAbortedError());
      return;
    }
    signal?.addEventListener("abort", onAbort, { once: true });

    if (items.length === 0) {
      finish();
      return;
    }
    launch();
  });
}
