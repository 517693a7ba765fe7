import { join } from 'path';
import { mkdir, writeFile } from 'fs/promises';
import { Writable } from 'node:stream';
import type { Scheduler } from '../src/timer/scheduler.js';
import type { TemperatureSource } from '../src/sensors/thermal/temperature.js';
import type { Reading } from '../src/types.js';

export type BatteryAttributes = Partial<Record<'current_now' | 'voltage_now' | 'capacity' | 'charge_now' | 'status' | 'type', string>>;

export const DEFAULT_ATTRIBUTES: BatteryAttributes = {
    current_now: '1250000',
    voltage_now: '12100000',
    capacity: '87',
    charge_now: '4300000',
    status: 'Charging',
    type: 'Battery',
};

/**
 * Fake sysfs power_supply device: one file per attribute, each ending with a
 * newline like the kernel does. Attributes absent from `attributes` are not created.
 */
export async function createBatteryDevice(baseDir: string, nodeName: string, attributes: BatteryAttributes = DEFAULT_ATTRIBUTES) {
    const dir = join(baseDir, nodeName);
    await mkdir(dir, { recursive: true });

    await Promise.all(
        Object.entries(attributes).map(([name, value]) =>
            value === undefined ? null : writeFile(join(dir, name), `${value}\n`, 'utf8'))
    );

    return { dir, file: (name: string) => join(dir, name) };
}

/**
 * Virtual clock: `sleep` returns at once and moves time forward.
 * `onSleep` runs after each sleep with the number of sleeps so far.
 */
export class ManualScheduler implements Scheduler {
    readonly sleeps: number[] = [];

    constructor(private nowMs: number, private onSleep?: (count: number) => void) {}

    now(): number {
        return this.nowMs;
    }

    advance(ms: number) {
        this.nowMs += ms;
    }

    async sleep(ms: number): Promise<void> {
        this.sleeps.push(ms);
        this.nowMs += ms;
        this.onSleep?.(this.sleeps.length);
    }
}

export class StaticTemperatureSource implements TemperatureSource {
    readonly name = 'static';
    reads = 0;

    constructor(private value: Reading) {}

    async read(): Promise<Reading> {
        this.reads++;
        return this.value;
    }
}

export function captureStream() {
    const chunks: string[] = [];
    const stream = new Writable({
        write(chunk, _encoding, callback) {
            chunks.push(String(chunk));
            callback();
        },
    });
    return { stream, text: () => chunks.join('') };
}
