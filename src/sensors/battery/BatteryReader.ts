import { readFile } from "node:fs/promises";
import path from "node:path";
import { extractErrorCode, reasonFromCode } from "../../../utils/file-utils.js";
import { CHARGING_STATUS, UNKNOWN_STATUS } from "../../types.js";
import type { BatterySample, Reading, ReaderLog } from "../../types.js";
import type { TemperatureSource } from "../thermal/temperature.js";

export const BATTERY_ATTRIBUTES = ['current_now', 'voltage_now', 'capacity', 'charge_now', 'status'] as const;

export type BatteryAttribute = typeof BATTERY_ATTRIBUTES[number];

export interface BatteryReaderOptions {
    batteryPath: string;
    temperatureSource?: TemperatureSource;
    log?: ReaderLog;
}

type AttributeRead = | { ok: true, value: string } | { ok: false, error: string };

export function parseReading(raw: string): Reading {
    const trimmed = raw.trim();
    if (!trimmed.length) return null;
    const value = Number(trimmed);
    return Number.isFinite(value) ? value : null;
}

export class BatteryReader {
    readonly batteryPath: string;
    private temperatureSource: TemperatureSource | null;
    private log: ReaderLog;

    constructor(options: BatteryReaderOptions) {
        this.batteryPath = options.batteryPath;
        this.temperatureSource = options.temperatureSource ?? null;
        this.log = options.log ?? 'silent';
    }

    private async readAttribute(attribute: BatteryAttribute): Promise<AttributeRead> {
        try {
            const raw = await readFile(path.join(this.batteryPath, attribute), 'utf-8');
            return { ok: true, value: raw };
        } catch (error) {
            return { ok: false, error: reasonFromCode(extractErrorCode(error)) };
        }
    }

    private async readTemperature(): Promise<Reading> {
        if (!this.temperatureSource) return null;
        try {
            return await this.temperatureSource.read();
        } catch (error) {
            if (this.log === 'debug') {
                console.error(`temperature (${this.temperatureSource.name}): ${String(error)}`);
            }
            return null;
        }
    }

    /**
     * Each attribute is read on its own: a missing file only blanks its field.
     * Never rejects.
     */
    async sample(now: Date = new Date()): Promise<BatterySample> {
        const [reads, temperatureCelsius] = await Promise.all([
            Promise.all(BATTERY_ATTRIBUTES.map((attribute) => this.readAttribute(attribute))),
            this.readTemperature(),
        ]);

        const values = new Map<BatteryAttribute, string | null>();
        BATTERY_ATTRIBUTES.forEach((attribute, i) => {
            const read = reads[i];
            if (read.ok) {
                values.set(attribute, read.value);
                return;
            }
            values.set(attribute, null);
            if (this.log === 'debug') {
                console.error(`${attribute}: ${read.error} (${this.batteryPath})`);
            }
        });

        const numeric = (attribute: BatteryAttribute): Reading => {
            const raw = values.get(attribute);
            return raw == null ? null : parseReading(raw);
        };

        const status = values.get('status')?.trim() || UNKNOWN_STATUS;

        return {
            timestamp: now,
            currentMicroamps: numeric('current_now'),
            voltageMicrovolts: numeric('voltage_now'),
            capacityPercent: numeric('capacity'),
            chargeMicroampHours: numeric('charge_now'),
            temperatureCelsius,
            status,
            isCharging: status === CHARGING_STATUS,
        };
    }
}
