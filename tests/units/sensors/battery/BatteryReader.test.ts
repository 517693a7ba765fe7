import test from 'node:test';
import assert from 'node:assert/strict';
import fs from 'node:fs/promises';
import path from 'node:path';
import os from 'node:os';
import process from 'node:process';
import { BatteryReader, formatRecord, parseReading } from '../../../../src/index.js';
import type { TemperatureSource } from '../../../../src/index.js';
import { StaticTemperatureSource, createBatteryDevice } from '../../../../utils/test-utils.js';

const at = new Date(2026, 9, 19, 8, 30, 0);

test('BatteryReader test suite', async (t) => {
    const tmpRoot = path.join(os.tmpdir(), `battery-reader-tests-${process.pid}`);

    await fs.rm(tmpRoot, { recursive: true, force: true });
    await fs.mkdir(tmpRoot, { recursive: true });

    t.after(async () => {
        await fs.rm(tmpRoot, { recursive: true, force: true });
    });

    await t.test('ALL PRESENT: every attribute is parsed', async () => {
        const { dir } = await createBatteryDevice(tmpRoot, 'BAT0');
        const temperatureSource = new StaticTemperatureSource(41.5);
        const reader = new BatteryReader({ batteryPath: dir, temperatureSource });

        const sample = await reader.sample(at);

        assert.deepStrictEqual(sample, {
            timestamp: at,
            currentMicroamps: 1250000,
            voltageMicrovolts: 12100000,
            capacityPercent: 87,
            chargeMicroampHours: 4300000,
            temperatureCelsius: 41.5,
            status: 'Charging',
            isCharging: true,
        });
        assert.strictEqual(temperatureSource.reads, 1);
    });

    await t.test('MISSING capacity: only that field is unavailable', async () => {
        const { dir } = await createBatteryDevice(tmpRoot, 'BAT1', {
            current_now: '900000',
            voltage_now: '11800000',
            charge_now: '3000000',
            status: 'Discharging',
        });
        const reader = new BatteryReader({ batteryPath: dir, temperatureSource: new StaticTemperatureSource(38) });

        const sample = await reader.sample(at);

        assert.strictEqual(sample.capacityPercent, null);
        assert.strictEqual(sample.currentMicroamps, 900000);
        assert.strictEqual(sample.voltageMicrovolts, 11800000);
        assert.strictEqual(sample.chargeMicroampHours, 3000000);
        assert.strictEqual(sample.status, 'Discharging');
        assert.strictEqual(sample.isCharging, false);
        assert.strictEqual(formatRecord(sample), '2026-10-19 08:30:00,900000,11800000,N/A,3000000,38.0,0');
    });

    await t.test('MISSING directory: the sample degrades, it never rejects', async () => {
        const reader = new BatteryReader({ batteryPath: path.join(tmpRoot, 'BAT9'), log: 'debug' });

        const sample = await reader.sample(at);

        assert.deepStrictEqual(sample, {
            timestamp: at,
            currentMicroamps: null,
            voltageMicrovolts: null,
            capacityPercent: null,
            chargeMicroampHours: null,
            temperatureCelsius: null,
            status: 'Unknown',
            isCharging: false,
        });
    });

    await t.test('GARBAGE content: empty or non numeric files are unavailable', async () => {
        const { dir } = await createBatteryDevice(tmpRoot, 'BAT2', {
            current_now: '',
            voltage_now: 'n/a',
            capacity: ' 42 ',
            charge_now: '-',
            status: '',
        });
        const reader = new BatteryReader({ batteryPath: dir });

        const sample = await reader.sample(at);

        assert.strictEqual(sample.currentMicroamps, null);
        assert.strictEqual(sample.voltageMicrovolts, null);
        assert.strictEqual(sample.capacityPercent, 42);
        assert.strictEqual(sample.chargeMicroampHours, null);
        assert.strictEqual(sample.status, 'Unknown');
        assert.strictEqual(sample.isCharging, false);
    });

    await t.test('TEMPERATURE source failing: temperature is unavailable', async () => {
        const { dir } = await createBatteryDevice(tmpRoot, 'BAT3');
        const broken: TemperatureSource = {
            name: 'broken',
            read: async () => { throw new Error('sensor gone'); },
        };
        const reader = new BatteryReader({ batteryPath: dir, temperatureSource: broken });

        const sample = await reader.sample(at);

        assert.strictEqual(sample.temperatureCelsius, null);
        assert.strictEqual(sample.capacityPercent, 87);
    });

    await t.test('NEGATIVE current: discharging laptops may report signed values', async () => {
        const { dir } = await createBatteryDevice(tmpRoot, 'BAT4', { current_now: '-1500000', status: 'Discharging' });
        const reader = new BatteryReader({ batteryPath: dir });

        const sample = await reader.sample(at);

        assert.strictEqual(sample.currentMicroamps, -1500000);
    });
});

test('parseReading', () => {
    assert.strictEqual(parseReading('87\n'), 87);
    assert.strictEqual(parseReading('0'), 0);
    assert.strictEqual(parseReading(''), null);
    assert.strictEqual(parseReading('   '), null);
    assert.strictEqual(parseReading('abc'), null);
});
