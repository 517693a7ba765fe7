import { appendFile, writeFile } from "node:fs/promises";
import { extractErrorCode } from "../../utils/file-utils.js";
import type { BatterySample, Reading } from "../types.js";

export const LOG_HEADER = "Timestamp,Current (µA),Voltage (µV),Capacity (%),Charge (µAh),Temperature (°C),Charging";

export const UNAVAILABLE_TOKEN = "N/A";

/** The output path that, when left as is, keeps logging off. */
export const DEFAULT_LOG_FILE = "battery_log.csv";

function pad2(n: number) {
    return String(n).padStart(2, '0');
}

/**
 * Local time, `YYYY-MM-DD HH:MM:SS`.
 */
export function formatTimestamp(date: Date): string {
    const day = `${date.getFullYear()}-${pad2(date.getMonth() + 1)}-${pad2(date.getDate())}`;
    const time = `${pad2(date.getHours())}:${pad2(date.getMinutes())}:${pad2(date.getSeconds())}`;
    return `${day} ${time}`;
}

export function formatReading(value: Reading, fractionDigits?: number): string {
    if (value === null) return UNAVAILABLE_TOKEN;
    return fractionDigits === undefined ? String(value) : value.toFixed(fractionDigits);
}

export function formatRecord(sample: BatterySample): string {
    return [
        formatTimestamp(sample.timestamp),
        formatReading(sample.currentMicroamps),
        formatReading(sample.voltageMicrovolts),
        formatReading(sample.capacityPercent),
        formatReading(sample.chargeMicroampHours),
        formatReading(sample.temperatureCelsius, 1),
        sample.isCharging ? '1' : '0',
    ].join(',');
}

/**
 * Creates the log file with its header line if it does not exist yet.
 * The exclusive create makes repeated calls a no-op on an existing file.
 *
 * @returns true when the file was created by this call
 */
export async function ensureHeader(logPath: string): Promise<boolean> {
    try {
        await writeFile(logPath, `${LOG_HEADER}\n`, { encoding: 'utf-8', flag: 'wx' });
        return true;
    } catch (error) {
        if (extractErrorCode(error) === 'EEXIST') return false;
        throw error;
    }
}

/**
 * One line per call; the file is opened, written and closed each time.
 */
export async function appendRecord(logPath: string, sample: BatterySample): Promise<void> {
    await appendFile(logPath, `${formatRecord(sample)}\n`, 'utf-8');
}

/**
 * Logging is off when no explicit path was given: an empty path or the
 * built-in default file name both count as "not given".
 */
export function isLoggingPath(output: string | undefined | null): output is string {
    return !!output && output !== DEFAULT_LOG_FILE;
}
