export { BatteryReader, BATTERY_ATTRIBUTES, parseReading } from "./sensors/battery/BatteryReader.js";
export type { BatteryReaderOptions, BatteryAttribute } from "./sensors/battery/BatteryReader.js";

export { batteryProbe, DEFAULT_POWER_SUPPLY_PATH } from "./sensors/battery/battery-probe.js";
export type { BatteryInfo, BatteryProbeResult } from "./sensors/battery/battery-probe.js";

export {
    AcpiTemperatureSource,
    ThermalZoneTemperatureSource,
    FallbackTemperatureSource,
    createTemperatureSource,
    parseAcpiTemperature,
    isTemperatureMode,
    TEMPERATURE_MODES,
} from "./sensors/thermal/temperature.js";
export type { TemperatureSource, TemperatureMode, TemperatureSourceFactoryOptions } from "./sensors/thermal/temperature.js";

export * from "./record/csv-record.js";
export * from "./display/render.js";
export { TerminalDisplay } from "./display/terminal-display.js";
export type { Display } from "./display/terminal-display.js";

export * from "./timer/timing.js";
export * from "./timer/scheduler.js";
export * from "./loop/loop.js";
export * from "./types.js";

export { ConfigError, loadConfig, parseFileConfig } from "./config/config.js";
export type { FileConfig } from "./config/config.js";
export { parseCliArgs, resolveConfig, parseInteger, DEFAULT_INTERVAL_SECONDS } from "./config/resolve-config.js";
export type { CliOptions, ResolvedConfig, ResolveDeps } from "./config/resolve-config.js";
