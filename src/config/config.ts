import { readFile } from "fs/promises";
import { extractErrorCode } from "../../utils/file-utils.js";
import { isTemperatureMode } from "../sensors/thermal/temperature.js";
import type { TemperatureMode } from "../sensors/thermal/temperature.js";

/**
 * Fatal configuration problem: bad flag, bad value, unreadable --config file.
 * Reported to the user with the usage text, exit status 1.
 */
export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "ConfigError";
    }
}

/**
 * Defaults read from a --config JSON file. Flags given on the command line win.
 *
 * ```json
 * { "output": "/var/log/battery.csv", "interval": 30, "time": 3600, "interface": false }
 * ```
 */
export interface FileConfig {
    output?: string;
    interval?: number;
    battery?: string;
    time?: number;
    interface?: boolean;
    temperature?: TemperatureMode;
}

function expectString(source: Record<string, unknown>, key: string): string | undefined {
    const value = source[key];
    if (value === undefined) return undefined;
    if (typeof value !== "string") throw new ConfigError(`--config: "${key}" must be a string`);
    return value;
}

function expectInteger(source: Record<string, unknown>, key: string): number | undefined {
    const value = source[key];
    if (value === undefined) return undefined;
    if (typeof value !== "number" || !Number.isInteger(value)) {
        throw new ConfigError(`--config: "${key}" must be an integer`);
    }
    return value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function parseFileConfig(parsed: unknown): FileConfig {
    if (!isRecord(parsed)) {
        throw new ConfigError("--config: invalid JSON object");
    }

    const iface = parsed["interface"];
    if (iface !== undefined && typeof iface !== "boolean") {
        throw new ConfigError(`--config: "interface" must be a boolean`);
    }

    const temperature = expectString(parsed, "temperature");
    if (temperature !== undefined && !isTemperatureMode(temperature)) {
        throw new ConfigError(`--config: "temperature" must be one of acpi, thermal-zone, auto, none`);
    }

    return {
        output: expectString(parsed, "output"),
        interval: expectInteger(parsed, "interval"),
        battery: expectString(parsed, "battery"),
        time: expectInteger(parsed, "time"),
        interface: iface,
        temperature,
    };
}

export async function loadConfig(configPath: string): Promise<FileConfig> {
    let raw: string;
    try {
        raw = await readFile(configPath, 'utf-8');
    } catch (error) {
        const code = extractErrorCode(error);
        if (code === 'ENOENT') throw new ConfigError(`[--config]: no such file ${configPath}`);
        throw new ConfigError(`[--config]: cannot read ${configPath} (${code ?? 'unknown error'})`);
    }

    let parsed: unknown;
    try {
        parsed = JSON.parse(raw);
    } catch {
        throw new ConfigError(`[--config]: ${configPath} is not valid JSON`);
    }
    return parseFileConfig(parsed);
}
