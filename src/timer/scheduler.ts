import { sleepMs } from "./timing.js";

/**
 * Time as seen by the loop. Swapped for a manual clock in tests so that
 * nothing really sleeps.
 */
export interface Scheduler {
    /** wall clock, epoch milliseconds */
    now(): number;
    sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

export const systemScheduler: Scheduler = {
    now: () => Date.now(),
    sleep: (ms, signal) => sleepMs(ms, signal),
};

export interface TickTiming {
    tickId: number; // 0,1,2,... one per yielded tick
    startMs: number;
    dtMs: number; // startMs[n] - startMs[n-1], 0 on the first tick
}

/**
 * Fixed-delay ticks: the first one immediately, then `intervalMs` of sleep
 * after the consumer is done with the previous tick. Work time is not
 * compensated, so ticks drift by the time spent in the loop body.
 */
export async function* fixedDelayTicks(
    options: {
        intervalMs: number,
        scheduler?: Scheduler,
        signal?: AbortSignal,
    }
): AsyncGenerator<TickTiming> {
    if (!Number.isFinite(options.intervalMs) || options.intervalMs <= 0) {
        throw new Error("fixedDelayTicks: intervalMs must be a positive number");
    }
    const scheduler = options.scheduler ?? systemScheduler;

    let tickId = 0;
    let prevStartMs: number | null = null;

    while (!options.signal?.aborted) {
        if (prevStartMs !== null) {
            await scheduler.sleep(options.intervalMs, options.signal);
            if (options.signal?.aborted) break;
        }

        const startMs = scheduler.now();
        const dtMs = prevStartMs === null ? 0 : startMs - prevStartMs;

        yield { tickId, startMs, dtMs };

        prevStartMs = startMs;
        tickId++;
    }
}
