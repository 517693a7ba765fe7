export const MS_PER_S = 1000;

/**
 * Converts seconds (number) to milliseconds for setTimeout.
 * Rounded to avoid float residue (0.1 * 1000).
 */
export function secondsToMs(seconds: number): number {
    return Math.round(seconds * MS_PER_S);
}

/**
 * Whole seconds between two wall-clock instants, the way `date +%s`
 * differences behave. Never negative (clock steps backwards are ignored).
 */
export function elapsedSeconds(startMs: number, nowMs: number): number {
    const delta = Math.floor((nowMs - startMs) / MS_PER_S);
    return delta > 0 ? delta : 0;
}

/** Largest delay setTimeout takes; anything above is clamped to 1 ms. */
export const MAX_TIMEOUT_MS = 2 ** 31 - 1;

function sleepChunk(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise<void>((resolve) => {
        const onAbort = () => {
            clearTimeout(timer);
            resolve();
        };
        const timer = setTimeout(() => {
            signal?.removeEventListener("abort", onAbort);
            resolve();
        }, ms);
        signal?.addEventListener("abort", onAbort, { once: true });
    });
}

/**
 * Sleeps `ms`, or less if `signal` aborts first. Delays longer than
 * MAX_TIMEOUT_MS (~24.8 days) are slept in several timeouts.
 *
 * setTimeout does not guarantee precision, only "not before". The caller
 * reads the clock again after waking up.
 */
export async function sleepMs(ms: number, signal?: AbortSignal): Promise<void> {
    let remaining = Number.isNaN(ms) ? 0 : Math.max(0, ms);
    while (!signal?.aborted) {
        const chunk = Math.min(remaining, MAX_TIMEOUT_MS);
        await sleepChunk(chunk, signal);
        remaining -= chunk;
        if (remaining <= 0) return;
    }
}
