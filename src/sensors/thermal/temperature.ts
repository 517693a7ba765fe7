import { execFile } from "node:child_process";
import { readFile } from "node:fs/promises";
import { promisify } from "node:util";
import { extractErrorCode, reasonFromCode } from "../../../utils/file-utils.js";
import type { Reading, ReaderLog } from "../../types.js";

const execFileAsync = promisify(execFile);

const DEFAULT_THERMAL_ZONE = '/sys/class/thermal/thermal_zone0/temp';

export interface TemperatureSource {
    readonly name: string;
    /** Never rejects: an unavailable facility yields null. */
    read(): Promise<Reading>;
}

export type TemperatureMode = 'acpi' | 'thermal-zone' | 'auto' | 'none';

export const TEMPERATURE_MODES: readonly TemperatureMode[] = ['acpi', 'thermal-zone', 'auto', 'none'];

export function isTemperatureMode(value: string): value is TemperatureMode {
    return TEMPERATURE_MODES.some((mode) => mode === value);
}

/**
 * `acpi -t` prints one line per sensor, e.g. `Thermal 0: ok, 45.0 degrees C`.
 * Only the first line is used; its 4th field is the temperature.
 */
export function parseAcpiTemperature(output: string): Reading {
    const firstLine = output.split('\n').find((line) => line.trim().length > 0);
    if (!firstLine) return null;
    const field = firstLine.trim().split(/\s+/)[3];
    if (field === undefined) return null;
    const value = Number(field.replace(/,$/, ''));
    return Number.isFinite(value) ? value : null;
}

interface AcpiTemperatureSourceOptions {
    command?: string;
    args?: string[];
    timeoutMs?: number;
    log?: ReaderLog;
}

export class AcpiTemperatureSource implements TemperatureSource {
    readonly name = 'acpi';
    private command: string;
    private args: string[];
    private timeoutMs: number;
    private log: ReaderLog;

    constructor(options: AcpiTemperatureSourceOptions = {}) {
        this.command = options.command ?? 'acpi';
        this.args = options.args ?? ['-t'];
        this.timeoutMs = options.timeoutMs ?? 2000;
        this.log = options.log ?? 'silent';
    }

    async read(): Promise<Reading> {
        try {
            // no shell: the command is resolved through PATH by execFile
            const { stdout } = await execFileAsync(this.command, this.args, {
                timeout: this.timeoutMs,
                encoding: 'utf-8',
            });
            return parseAcpiTemperature(stdout);
        } catch (error) {
            if (this.log === 'debug') {
                console.error(`temperature (${this.command}): ${reasonFromCode(extractErrorCode(error))}`);
            }
            return null;
        }
    }
}

interface ThermalZoneTemperatureSourceOptions {
    path?: string;
    log?: ReaderLog;
}

/**
 * sysfs thermal zones report millidegrees Celsius.
 */
export class ThermalZoneTemperatureSource implements TemperatureSource {
    readonly name = 'thermal-zone';
    private path: string;
    private log: ReaderLog;

    constructor(options: ThermalZoneTemperatureSourceOptions = {}) {
        this.path = options.path ?? DEFAULT_THERMAL_ZONE;
        this.log = options.log ?? 'silent';
    }

    async read(): Promise<Reading> {
        try {
            const raw = (await readFile(this.path, 'utf-8')).trim();
            const milli = raw.length ? Number(raw) : NaN;
            return Number.isFinite(milli) ? milli / 1000 : null;
        } catch (error) {
            if (this.log === 'debug') {
                console.error(`temperature (${this.path}): ${reasonFromCode(extractErrorCode(error))}`);
            }
            return null;
        }
    }
}

/**
 * First source that yields a value wins.
 */
export class FallbackTemperatureSource implements TemperatureSource {
    readonly name: string;

    constructor(private sources: TemperatureSource[]) {
        this.name = sources.map((s) => s.name).join('+') || 'none';
    }

    async read(): Promise<Reading> {
        for (const source of this.sources) {
            const value = await source.read();
            if (value !== null) return value;
        }
        return null;
    }
}

export interface TemperatureSourceFactoryOptions {
    mode?: TemperatureMode;
    thermalZonePath?: string;
    log?: ReaderLog;
}

export function createTemperatureSource(options: TemperatureSourceFactoryOptions = {}): TemperatureSource {
    const { mode = 'acpi', thermalZonePath, log } = options;

    switch (mode) {
        case 'acpi':
            return new AcpiTemperatureSource({ log });
        case 'thermal-zone':
            return new ThermalZoneTemperatureSource({ path: thermalZonePath, log });
        case 'auto':
            return new FallbackTemperatureSource([
                new AcpiTemperatureSource({ log }),
                new ThermalZoneTemperatureSource({ path: thermalZonePath, log }),
            ]);
        case 'none':
            return new FallbackTemperatureSource([]);
    }
}
