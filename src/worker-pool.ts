/**
 * Runs `worker` over every item of `source` with at most `concurrency` calls in
 * flight. Results are returned (and passed to `onResult`) in completion order.
 * The first failure closes the source, rejects the returned promise and stops
 * workers from taking further items. Calls already in flight are left to settle
 * and their results are dropped.
 */
export async function runPool<T, R>(
  source: Iterable<T> | AsyncIterable<T>,
  concurrency: number,
  worker: (item: T) => Promise<R>,
  onResult?: (result: R) => void
): Promise<R[]> {
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new RangeError(`Concurrency must be a positive integer, got ${concurrency}.`);
  }

  const iterator = toAsyncIterator(source);
  const results: R[] = [];
  let failed = false;

  const runWorker = async (): Promise<void> => {
    try {
      while (!failed) {
        const next = await iterator.next();
        if (next.done || failed) {
          return;
        }

        const result = await worker(next.value);
        if (failed) {
          return;
        }

        results.push(result);
        onResult?.(result);
      }
    } catch (error) {
      if (!failed) {
        failed = true;
        await iterator.return?.();
      }
      throw error;
    }
  };

  const workers = Array.from({ length: concurrency }, () => runWorker());
  await Promise.all(workers);
  return results;
}

function toAsyncIterator<T>(source: Iterable<T> | AsyncIterable<T>): AsyncIterator<T> {
  if (isAsyncIterable(source)) {
    return source[Symbol.asyncIterator]();
  }

  const iterator = source[Symbol.iterator]();
  return {
    next: async () => iterator.next(),
    return: async () => iterator.return?.() ?? { done: true, value: undefined }
  };
}

function isAsyncIterable<T>(source: Iterable<T> | AsyncIterable<T>): source is AsyncIterable<T> {
  return Symbol.asyncIterator in source;
}
