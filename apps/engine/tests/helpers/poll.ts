export const sleep = (ms: number) => new Promise(resolve => setTimeout(resolve, ms));

/** Polls until the predicate holds; rejects with `what` in the message on timeout. */
export async function waitUntil(
    predicate: () => Promise<boolean> | boolean,
    what = 'condition',
    timeoutMs = 3000,
    intervalMs = 5,
): Promise<void> {
    const start = Date.now();
    while (Date.now() - start < timeoutMs) {
        if (await predicate()) return;
        await sleep(intervalMs);
    }
    throw new Error(`waitUntil timed out after ${timeoutMs}ms waiting for ${what}`);
}
