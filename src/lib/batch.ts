/**
 * Truncate to the first `urlLimit` URLs, then cut into contiguous batches of at
 * most `batchSize`. Only the last batch may be short.
 */
export function planBatches(
  urls: readonly string[],
  urlLimit: number,
  batchSize: number
): string[][] {
  if (!Number.isInteger(batchSize) || batchSize < 1) {
    throw new RangeError(`batchSize must be a positive integer, got ${batchSize}`);
  }

  const capped = urls.slice(0, Math.max(0, urlLimit));
  const batches: string[][] = [];

  for (let i = 0; i < capped.length; i += batchSize) {
    batches.push(capped.slice(i, i + batchSize));
  }

  return batches;
}
