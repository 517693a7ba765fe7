import { parseArgs } from "node:util";
import { DEFAULT_LOG_FILE, isLoggingPath } from "../record/csv-record.js";
import { batteryProbe } from "../sensors/battery/battery-probe.js";
import type { BatteryProbeResult } from "../sensors/battery/battery-probe.js";
import { isTemperatureMode } from "../sensors/thermal/temperature.js";
import type { TemperatureMode } from "../sensors/thermal/temperature.js";
import type { BatteryLoggerConfig } from "../types.js";
import { extractErrorCode } from "../../utils/file-utils.js";
import { ConfigError } from "./config.js";
import type { FileConfig } from "./config.js";

export const DEFAULT_INTERVAL_SECONDS = 60;

/** Raw flags, before defaults and autodetection. */
export interface CliOptions {
    help: boolean;
    output?: string;
    interval?: number;
    battery?: string;
    time?: number;
    noInterface: boolean;
    configPath?: string;
    temperature?: TemperatureMode;
}

export interface ResolvedConfig {
    config: BatteryLoggerConfig;
    temperatureMode: TemperatureMode;
    /** set when the battery path was autodetected */
    probe: BatteryProbeResult | null;
}

export function parseInteger(name: string, v: string | undefined, { min }: { min: number }): number | undefined {
    if (v === undefined) return undefined;
    const trimmed = v.trim();
    const n = /^\d+$/.test(trimmed) ? Number(trimmed) : NaN;
    if (!Number.isSafeInteger(n) || n < min) {
        throw new ConfigError(min > 0
            ? `${name} must be a positive integer (got '${v}')`
            : `${name} must be a non-negative integer (got '${v}')`);
    }
    return n;
}

function describeParseError(error: unknown): string {
    const message = error instanceof Error ? error.message : String(error);
    if (extractErrorCode(error) === 'ERR_PARSE_ARGS_UNKNOWN_OPTION') {
        const match = /Unknown option '([^']+)'/.exec(message);
        if (match) return `Unknown option: ${match[1]}`;
    }
    return message;
}

function parseRawArgs(argv: string[]) {
    try {
        return parseArgs({
            args: argv,
            options: {
                help: { type: "boolean", short: "h" },
                output: { type: "string", short: "o" },
                interval: { type: "string", short: "i" },
                battery: { type: "string", short: "b" },
                time: { type: "string", short: "t" },
                "no-interface": { type: "boolean" },
                config: { type: "string", short: "c" },
                temperature: { type: "string" },
            },
            strict: true,
            allowPositionals: false,
        }).values;
    } catch (error) {
        throw new ConfigError(describeParseError(error));
    }
}

export function parseCliArgs(argv: string[]): CliOptions {
    const values = parseRawArgs(argv);

    const temperature = values.temperature;
    if (temperature !== undefined && !isTemperatureMode(temperature)) {
        throw new ConfigError(`--temperature must be one of acpi, thermal-zone, auto, none (got '${temperature}')`);
    }

    return {
        help: !!values.help,
        output: values.output,
        interval: parseInteger('--interval', values.interval, { min: 1 }),
        battery: values.battery,
        time: parseInteger('--time', values.time, { min: 0 }),
        noInterface: !!values["no-interface"],
        configPath: values.config,
        temperature,
    };
}

export interface ResolveDeps {
    fileConfig?: FileConfig;
    /** autodetection, only called when no battery path is given */
    probe?: () => Promise<BatteryProbeResult>;
}

/**
 * Flags > config file > defaults. The battery path is autodetected last,
 * and logging is switched off unless an explicit output path was given.
 */
export async function resolveConfig(cli: CliOptions, deps: ResolveDeps = {}): Promise<ResolvedConfig> {
    const file = deps.fileConfig ?? {};

    const output = cli.output ?? file.output ?? DEFAULT_LOG_FILE;
    const intervalSeconds = cli.interval ?? file.interval ?? DEFAULT_INTERVAL_SECONDS;
    const maxRuntimeSeconds = cli.time ?? file.time ?? 0;

    if (!Number.isInteger(intervalSeconds) || intervalSeconds <= 0) {
        throw new ConfigError(`interval must be a positive integer (got ${intervalSeconds})`);
    }
    if (!Number.isInteger(maxRuntimeSeconds) || maxRuntimeSeconds < 0) {
        throw new ConfigError(`time must be a non-negative integer (got ${maxRuntimeSeconds})`);
    }

    let batteryPath = cli.battery ?? file.battery;
    let probe: BatteryProbeResult | null = null;
    if (batteryPath === undefined) {
        probe = await (deps.probe ?? (() => batteryProbe()))();
        batteryPath = probe.batteries[0]?.path ?? '';
    }

    return {
        config: {
            logPath: isLoggingPath(output) ? output : null,
            intervalSeconds,
            batteryPath,
            maxRuntimeSeconds,
            displayEnabled: !cli.noInterface && file.interface !== false,
        },
        temperatureMode: cli.temperature ?? file.temperature ?? 'acpi',
        probe,
    };
}
