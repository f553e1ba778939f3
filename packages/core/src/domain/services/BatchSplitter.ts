/**
 * Domain service that groups a sequence into fixed-size batches.
 *
 * Pure logic without I/O. The enricher uses it to decide when
 * to persist: one snapshot per batch of rows.
 */
export class BatchSplitter {
  constructor(private readonly batchSize: number) {
    if (!Number.isInteger(batchSize) || batchSize < 1) {
      throw new Error('Batch size must be an integer of at least 1');
    }
  }

  /**
   * Yields a `{ items, batchIndex }` tuple for each full batch.
   * The final batch may contain fewer items than `batchSize`.
   *
   * @param startIndex - Starting batch index. Default: `0`.
   */
  *split<T>(items: Iterable<T>, startIndex = 0): Iterable<{ readonly items: readonly T[]; readonly batchIndex: number }> {
    let buffer: T[] = [];
    let batchIndex = startIndex;

    for (const item of items) {
      buffer.push(item);

      if (buffer.length >= this.batchSize) {
        yield { items: buffer, batchIndex };
        buffer = [];
        batchIndex++;
      }
    }

    if (buffer.length > 0) {
      yield { items: buffer, batchIndex };
    }
  }
}
