import { DEFAULT_LOG_FILE, formatReading, formatTimestamp } from "../record/csv-record.js";
import type { BatteryLoggerConfig, BatterySample, Reading, SessionState } from "../types.js";

export const PROGRESS_BAR_WIDTH = 40;

const BANNER = "========================= BATTERY LOGGER =========================";
const DATA_BANNER = "======================== Current Battery Data =====================";
const RULE = "==================================================================";

export const INDEFINITE_MESSAGE = "Running indefinitely... Press CTRL+C to stop.";

export interface DisplayView {
    config: Pick<BatteryLoggerConfig, 'logPath' | 'intervalSeconds' | 'batteryPath' | 'maxRuntimeSeconds'>;
    session: Pick<SessionState, 'startTimeMs'>;
    sample: BatterySample;
    elapsedSeconds: number;
    /** disk usage of the log file (allocated blocks, like du), null when logging is off or the file is missing */
    logFileBytes: number | null;
}

function pad2(n: number) {
    return String(n).padStart(2, '0');
}

/**
 * `MM:SS`, minutes are not capped at 59.
 */
export function formatRemaining(seconds: number): string {
    const s = Math.max(0, Math.floor(seconds));
    return `${pad2(Math.floor(s / 60))}:${pad2(s % 60)}`;
}

/**
 * du -h style: 512B, 4.0K, 1.5M, 20M. Rounded up like du, before the
 * decimal and unit boundaries are picked (1023.4K shows as 1.0M).
 */
export function formatSize(bytes: number): string {
    const units = ['B', 'K', 'M', 'G', 'T'];
    if (bytes < 1024) return `${bytes}B`;

    let value = bytes;
    let unit = 0;
    while (value >= 1024 && unit < units.length - 1) {
        value /= 1024;
        unit++;
    }

    const tenths = Math.ceil(value * 10) / 10;
    if (tenths < 10) return `${tenths.toFixed(1)}${units[unit]}`;

    const whole = Math.ceil(value);
    if (whole >= 1024 && unit < units.length - 1) return `1.0${units[unit + 1]}`;
    return `${whole}${units[unit]}`;
}

export function progressBar(elapsedSeconds: number, maxRuntimeSeconds: number, width = PROGRESS_BAR_WIDTH): string {
    const ratio = maxRuntimeSeconds > 0 ? elapsedSeconds / maxRuntimeSeconds : 0;
    const filled = Math.min(width, Math.max(0, Math.floor(width * ratio)));
    return '#'.repeat(filled) + ' '.repeat(width - filled);
}

function field(label: string, value: Reading, unit: string, fractionDigits?: number) {
    const text = formatReading(value, fractionDigits);
    return `${label.padEnd(17)}: ${value === null ? text : `${text} ${unit}`}`;
}

/**
 * Full snapshot of the session, rebuilt from scratch on every tick.
 */
export function renderDisplay(view: DisplayView): string {
    const { config, session, sample, elapsedSeconds, logFileBytes } = view;

    const lines = [
        BANNER,
        `Log File: ${config.logPath ?? `${DEFAULT_LOG_FILE} (logging off)`}`,
        `Interval: ${config.intervalSeconds} seconds`,
        `Battery Path: ${config.batteryPath}`,
        `Start Time: ${formatTimestamp(new Date(session.startTimeMs))}`,
    ];

    if (config.logPath !== null && logFileBytes !== null) {
        lines.push(RULE, `Current Log File Size: ${formatSize(logFileBytes)}`);
    }

    lines.push(
        '',
        DATA_BANNER,
        field('current_now', sample.currentMicroamps, 'µA'),
        field('charge_now', sample.chargeMicroampHours, 'µAh'),
        field('capacity', sample.capacityPercent, '%'),
        field('voltage_now', sample.voltageMicrovolts, 'µV'),
        field('temperature', sample.temperatureCelsius, '°C', 1),
        `${'charging status'.padEnd(17)}: ${sample.status}`,
        RULE,
    );

    if (config.maxRuntimeSeconds > 0) {
        const remaining = config.maxRuntimeSeconds - elapsedSeconds;
        lines.push(`Progress: |${progressBar(elapsedSeconds, config.maxRuntimeSeconds)}| Remaining Time: ${formatRemaining(remaining)}`);
    } else {
        lines.push(INDEFINITE_MESSAGE);
    }

    return lines.join('\n');
}
