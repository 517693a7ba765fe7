import { stat } from "node:fs/promises";
import { renderDisplay } from "../display/render.js";
import type { Display } from "../display/terminal-display.js";
import { appendRecord, ensureHeader } from "../record/csv-record.js";
import type { BatteryReader } from "../sensors/battery/BatteryReader.js";
import { fixedDelayTicks, systemScheduler } from "../timer/scheduler.js";
import type { Scheduler } from "../timer/scheduler.js";
import { elapsedSeconds, secondsToMs } from "../timer/timing.js";
import type { BatteryLoggerConfig, BatterySample, SessionState } from "../types.js";

export type LoopLogger = Pick<Console, 'error' | 'warn'>;

export interface LoopOptions {
    config: BatteryLoggerConfig;
    reader: Pick<BatteryReader, 'sample'>;
    /** required when config.displayEnabled is true */
    display?: Display;
    scheduler?: Scheduler;
    signal?: AbortSignal;
    logger?: LoopLogger;
}

export type StopReason = 'max-runtime' | 'aborted';

export interface SessionSummary {
    ticks: number;
    recordsWritten: number;
    elapsedSeconds: number;
    reason: StopReason;
    lastSample: BatterySample | null;
}

/**
 * Bytes allocated on disk, as `du` counts them: st_blocks is in 512-byte units.
 */
export async function diskUsage(file: string): Promise<number | null> {
    try {
        return (await stat(file)).blocks * 512;
    } catch {
        return null;
    }
}

export function maxRuntimeReached(elapsed: number, maxRuntimeSeconds: number): boolean {
    return maxRuntimeSeconds > 0 && elapsed >= maxRuntimeSeconds;
}

/**
 * Sample, log, render, sleep, until the max runtime is reached or the
 * signal aborts. Per-tick I/O failures are reported and the loop goes on.
 */
export async function runBatteryLogger(options: LoopOptions): Promise<SessionSummary> {
    const { config, reader, signal } = options;
    const scheduler = options.scheduler ?? systemScheduler;
    const logger = options.logger ?? console;
    const display = config.displayEnabled ? options.display : undefined;

    if (config.displayEnabled && !display) {
        throw new Error("runBatteryLogger: displayEnabled requires a display");
    }

    const session: SessionState = {
        startTimeMs: scheduler.now(),
        lastSample: null,
        ticks: 0,
    };

    let recordsWritten = 0;
    let elapsed = 0;
    let reason: StopReason = 'aborted';

    for await (const tick of fixedDelayTicks({
        intervalMs: secondsToMs(config.intervalSeconds),
        scheduler,
        signal,
    })) {
        elapsed = elapsedSeconds(session.startTimeMs, tick.startMs);

        if (maxRuntimeReached(elapsed, config.maxRuntimeSeconds)) {
            display?.announce(`Reached maximum runtime of ${config.maxRuntimeSeconds} seconds. Exiting.`);
            reason = 'max-runtime';
            break;
        }

        const sample = await reader.sample(new Date(tick.startMs));
        session.lastSample = sample;
        session.ticks++;

        if (config.logPath !== null) {
            try {
                await ensureHeader(config.logPath);
                await appendRecord(config.logPath, sample);
                recordsWritten++;
            } catch (error) {
                logger.error(`Error writing ${config.logPath}:`, error);
            }
        }

        if (display) {
            const logFileBytes = config.logPath !== null ? await diskUsage(config.logPath) : null;
            display.show(renderDisplay({
                config,
                session,
                sample,
                elapsedSeconds: elapsed,
                logFileBytes,
            }));
        }
    }

    return {
        ticks: session.ticks,
        recordsWritten,
        elapsedSeconds: elapsed,
        reason,
        lastSample: session.lastSample,
    };
}
