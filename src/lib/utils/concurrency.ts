export type Settled<R> =
  | { status: "fulfilled"; value: R }
  | { status: "rejected"; reason: unknown };

export class AbortError extends Error {
  constructor(message = "Operation aborted before it started") {
    super(message);
    this.name = "AbortError";
  }
}

/**
 * Runs `worker` over `items` with at most `limit` in flight. Results are returned in
 * input order. Once `signal` aborts, items that have not started settle as rejected.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  worker: (item: T, index: number) => Promise<R>,
  signal?: AbortSignal,
): Promise<Settled<R>[]> {
  if (!Number.isFinite(limit) || limit < 1) {
    throw new RangeError(`Concurrency limit must be a finite number >= 1, got ${limit}`);
  }

  const results = new Array<Settled<R>>(items.length);
  const maxConcurrency = Math.max(1, Math.min(Math.floor(limit), items.length));
  let nextIndex = 0;

  await Promise.all(
    Array.from({ length: maxConcurrency }, async () => {
      while (true) {
        const index = nextIndex;
        nextIndex += 1;
        if (index >= items.length) {
          return;
        }

        if (signal?.aborted) {
          results[index] = { status: "rejected", reason: new AbortError() };
          continue;
        }

        try {
          results[index] = { status: "fulfilled", value: await worker(items[index], index) };
        } catch (error) {
          results[index] = { status: "rejected", reason: error };
        }
      }
    }),
  );

  return results;
}
