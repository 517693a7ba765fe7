/**
 * A numeric sensor value, or `null` when it could not be read this tick.
 * `null` is never the same thing as `0`.
 */
export type Reading = number | null;

export interface BatterySample {
    timestamp: Date;
    currentMicroamps: Reading;     // µA
    voltageMicrovolts: Reading;    // µV
    capacityPercent: Reading;      // %
    chargeMicroampHours: Reading;  // µAh
    temperatureCelsius: Reading;   // °C
    status: string;
    isCharging: boolean;
}

export interface BatteryLoggerConfig {
    /** null when logging is disabled for the session */
    logPath: string | null;
    intervalSeconds: number;
    batteryPath: string;
    /** 0 = run until interrupted */
    maxRuntimeSeconds: number;
    displayEnabled: boolean;
}

export interface SessionState {
    startTimeMs: number;
    lastSample: BatterySample | null;
    ticks: number;
}

export type ReaderLog = 'silent' | 'debug';

export const UNKNOWN_STATUS = "Unknown";
export const CHARGING_STATUS = "Charging";
