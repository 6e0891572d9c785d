export const DEFAULT_BATCH_SIZE = 20;

// Split into contiguous, ordered slices; the last one may be short
export function toBatches<T>(points: readonly T[], batchSize: number = DEFAULT_BATCH_SIZE): T[][] {
  if (!Number.isInteger(batchSize) || batchSize <= 0) {
    throw new RangeError(`Batch size must be a positive integer, got ${batchSize}`);
  }

  const batches: T[][] = [];
  for (let i = 0; i < points.length; i += batchSize) {
    batches.push(points.slice(i, i + batchSize));
  }
  return batches;
}
