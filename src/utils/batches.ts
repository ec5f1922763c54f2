/**
 * Runs `fn` over `items` in slices of `concurrency`, each slice with
 * Promise.all. Result order follows input order.
 */
export async function mapInBatches<T, R>(
    items: readonly T[],
    concurrency: number,
    fn: (item: T, index: number) => Promise<R>,
    onBatch?: (processed: number, total: number) => void
): Promise<R[]> {
    const size = Math.max(1, Math.floor(concurrency));
    const results: R[] = [];

    for (let i = 0; i < items.length; i += size) {
        const batch = items.slice(i, i + size);
        const batchResults = await Promise.all(batch.map((item, offset) => fn(item, i + offset)));
        results.push(...batchResults);
        onBatch?.(Math.min(i + size, items.length), items.length);
    }

    return results;
}
