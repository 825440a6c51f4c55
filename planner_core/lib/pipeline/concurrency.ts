/**
 * Runs `task` over `items` with at most `limit` in flight. Results are stored
 * by input index, so completion order never shows in the output.
 */
export async function mapWithConcurrency<T, R>(
    items: readonly T[],
    limit: number,
    task: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
    const workers = Math.max(1, Math.min(Math.trunc(limit) || 1, items.length));
    const results = new Array<R>(items.length);
    let next = 0;

    const worker = async (): Promise<void> => {
        while (next < items.length) {
            const index = next;
            next += 1;
            results[index] = await task(items[index], index);
        }
    };

    await Promise.all(Array.from({ length: workers }, () => worker()));
    return results;
}
