import fs from "node:fs/promises";
import path from "node:path";
import { accessReadable, listEntries } from "../../../utils/file-utils.js";

type BatteryProbeStatus = 'OK' | 'FAILED';

export interface BatteryInfo {
  node: string;
  path: string;
  type: string | null;
  /** readability of the `status` attribute, a cheap liveness check */
  readable: boolean;
  reason: string | null;
}

export interface BatteryProbeResult {
  status: BatteryProbeStatus;
  batteries: BatteryInfo[];
  hint: string | null;
}

export const DEFAULT_POWER_SUPPLY_PATH = '/sys/class/power_supply';

/**
 * Lists the battery devices exposed by the kernel under the sysfs
 * `power_supply` class.
 *
 * Devices named `BAT*` come first, sorted by name (`BAT0`, `BAT1`, ...);
 * other devices are kept only when their `type` file reads `Battery`
 * (some vendors name it `CMB0` or `battery`). AC adapters and USB supplies
 * are skipped.
 *
 * Never throws: a missing base path or an empty class yields `FAILED`
 * with a `hint` for the user.
 *
 * @param basePath root of the power_supply class, overridable for tests
 */
export async function batteryProbe(basePath: string = DEFAULT_POWER_SUPPLY_PATH): Promise<BatteryProbeResult> {

    let entries: string[] | null;

    try {
        entries = await listEntries(basePath);
    } catch {
        entries = null;
    }

    if (!entries) {
        return { status: 'FAILED', batteries: [], hint: `${basePath} not found` };
    }

    const named: BatteryInfo[] = [];
    const typed: BatteryInfo[] = [];

    for (const node of [...entries].sort()) {
        const devicePath = path.join(basePath, node);
        const type = await fs.readFile(path.join(devicePath, 'type'), 'utf-8')
            .then((raw) => raw.trim())
            .catch(() => null);

        const isNamedBattery = node.startsWith('BAT');
        if (!isNamedBattery && type !== 'Battery') {
            continue;
        }

        const readable = await accessReadable(path.join(devicePath, 'status'));
        const info: BatteryInfo = {
            node,
            path: devicePath,
            type,
            readable: readable.ok,
            reason: readable.ok ? null : readable.error,
        };
        (isNamedBattery ? named : typed).push(info);
    }

    const batteries = [...named, ...typed];

    if (batteries.length === 0) {
        return { status: 'FAILED', batteries: [], hint: `No battery (BAT*) found in ${basePath}. Desktop or VM without battery ? Use --battery <path>` };
    }

    return { status: 'OK', batteries, hint: null };
}
