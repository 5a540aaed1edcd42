/**
 * Runs `task` over every item with at most `concurrency` tasks in flight.
 * Results keep the order of `items`. The first rejection rejects the whole run,
 * so callers that must not stop early catch inside `task`.
 */
export const mapWithConcurrency = async <I, O>(
  items: readonly I[],
  concurrency: number,
  task: (item: I, index: number) => Promise<O>
): Promise<O[]> => {
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new Error("concurrency must be an integer >= 1");
  }

  const results = new Array<O>(items.length);
  let nextIndex = 0;

  const worker = async (): Promise<void> => {
    while (nextIndex < items.length) {
      const index = nextIndex;
      nextIndex += 1;
      results[index] = await task(items[index], index);
    }
  };

  const workerCount = Math.min(concurrency, items.length);
  await Promise.all(Array.from({ length: workerCount }, () => worker()));
  return results;
};
