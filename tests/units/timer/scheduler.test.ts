import test from 'node:test';
import assert from 'node:assert/strict';
import { fixedDelayTicks, systemScheduler } from '../../../src/timer/scheduler.js';
import type { TickTiming } from '../../../src/timer/scheduler.js';
import { MAX_TIMEOUT_MS, elapsedSeconds, secondsToMs, sleepMs } from '../../../src/timer/timing.js';
import { ManualScheduler } from '../../../utils/test-utils.js';

test('timing helpers', async (t) => {
    await t.test('secondsToMs', () => {
        assert.strictEqual(secondsToMs(60), 60_000);
        assert.strictEqual(secondsToMs(0.1), 100);
    });

    await t.test('elapsedSeconds: whole seconds, never negative', () => {
        assert.strictEqual(elapsedSeconds(1_000, 1_000), 0);
        assert.strictEqual(elapsedSeconds(1_000, 1_999), 0);
        assert.strictEqual(elapsedSeconds(1_000, 151_000), 150);
        assert.strictEqual(elapsedSeconds(1_000, 151_999), 150);
        assert.strictEqual(elapsedSeconds(5_000, 1_000), 0);
    });

    await t.test('sleepMs returns at once on an aborted signal', async () => {
        const controller = new AbortController();
        controller.abort();
        const started = Date.now();
        await sleepMs(60_000, controller.signal);
        assert.ok(Date.now() - started < 1_000);
    });

    await t.test('sleepMs is cut short by abort', async () => {
        const controller = new AbortController();
        const pending = sleepMs(60_000, controller.signal);
        controller.abort();
        await pending;
    });

    await t.test('sleepMs does not wake early on delays past the setTimeout limit', async () => {
        const controller = new AbortController();
        const requested = secondsToMs(2_147_484);
        assert.ok(requested > MAX_TIMEOUT_MS);

        let woke = false;
        const pending = sleepMs(requested, controller.signal).then(() => { woke = true; });
        await sleepMs(100);
        assert.strictEqual(woke, false);

        controller.abort();
        await pending;
        assert.strictEqual(woke, true);
    });

    await t.test('systemScheduler sleeps at least the requested time', async () => {
        const started = systemScheduler.now();
        await systemScheduler.sleep(20);
        assert.ok(systemScheduler.now() - started >= 15);
    });
});

test('fixedDelayTicks', async (t) => {
    await t.test('first tick at once, then one sleep between ticks', async () => {
        const scheduler = new ManualScheduler(10_000);
        const ticks: TickTiming[] = [];

        for await (const tick of fixedDelayTicks({ intervalMs: 60_000, scheduler })) {
            ticks.push(tick);
            scheduler.advance(250); // work inside the tick, not compensated
            if (ticks.length === 3) break;
        }

        assert.deepStrictEqual(ticks, [
            { tickId: 0, startMs: 10_000, dtMs: 0 },
            { tickId: 1, startMs: 70_250, dtMs: 60_250 },
            { tickId: 2, startMs: 130_500, dtMs: 60_250 },
        ]);
        assert.deepStrictEqual(scheduler.sleeps, [60_000, 60_000]);
    });

    await t.test('stops when the signal aborts during a sleep', async () => {
        const controller = new AbortController();
        const scheduler = new ManualScheduler(0, (count) => {
            if (count === 2) controller.abort();
        });
        let count = 0;

        for await (const _tick of fixedDelayTicks({ intervalMs: 1_000, scheduler, signal: controller.signal })) {
            count++;
        }

        assert.strictEqual(count, 2);
    });

    await t.test('rejects a non positive interval', async () => {
        const iterator = fixedDelayTicks({ intervalMs: 0 });
        await assert.rejects(iterator.next(), /intervalMs must be a positive number/);
    });
});
