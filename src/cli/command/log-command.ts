import { Console } from "node:console";
import process from "node:process";
import { ConfigError, loadConfig } from "../../config/config.js";
import { parseCliArgs, resolveConfig } from "../../config/resolve-config.js";
import type { CliOptions, ResolvedConfig } from "../../config/resolve-config.js";
import { TerminalDisplay } from "../../display/terminal-display.js";
import { runBatteryLogger } from "../../loop/loop.js";
import { BatteryReader } from "../../sensors/battery/BatteryReader.js";
import { batteryProbe } from "../../sensors/battery/battery-probe.js";
import { createTemperatureSource } from "../../sensors/thermal/temperature.js";
import type { TemperatureSource } from "../../sensors/thermal/temperature.js";
import type { Scheduler } from "../../timer/scheduler.js";
import { isDirectory } from "../../../utils/file-utils.js";
import { extractVerbosity } from "./command-utils.js";
import { printHelp } from "./help-command.js";

export interface LogCommandDeps {
  stdout?: NodeJS.WritableStream;
  stderr?: NodeJS.WritableStream;
  scheduler?: Scheduler;
  signal?: AbortSignal;
  /** root of the power_supply class used for autodetection */
  powerSupplyPath?: string;
  temperatureSource?: TemperatureSource;
}

async function resolve(cli: CliOptions, deps: LogCommandDeps): Promise<ResolvedConfig> {
  const fileConfig = cli.configPath ? await loadConfig(cli.configPath) : undefined;
  return resolveConfig(cli, {
    fileConfig,
    probe: () => batteryProbe(deps.powerSupplyPath),
  });
}

/**
 * @returns the process exit status
 */
export async function logCommand(argv: string[] = process.argv.slice(2), deps: LogCommandDeps = {}): Promise<number> {
  const stdout = deps.stdout ?? process.stdout;
  const stderr = deps.stderr ?? process.stderr;
  const out = new Console({ stdout, stderr });

  const { level: verbosity, rest } = extractVerbosity(argv);
  const verbose = verbosity >= 1;

  let resolved: ResolvedConfig;
  try {
    const cli = parseCliArgs(rest);
    if (cli.help) {
      printHelp(stdout);
      return 0;
    }
    resolved = await resolve(cli, deps);
  } catch (error) {
    if (error instanceof ConfigError) {
      out.error(error.message);
      printHelp(stderr);
      return 1;
    }
    throw error;
  }

  const { config, temperatureMode, probe } = resolved;

  // fail fast: nothing is created or opened before this check
  if (!(await isDirectory(config.batteryPath))) {
    out.error(`Error: Battery path '${config.batteryPath}' not found!`);
    if (probe?.hint) out.error(probe.hint);
    return 1;
  }

  const log = verbosity >= 2 ? 'debug' : 'silent';
  const temperatureSource = deps.temperatureSource ?? createTemperatureSource({ mode: temperatureMode, log });
  const reader = new BatteryReader({ batteryPath: config.batteryPath, temperatureSource, log });

  //--- optional context in verbose mode
  if (verbose) {
    if (probe) out.error(`Battery autodetected: ${config.batteryPath} (${probe.batteries.length} found)`);
    out.error(`Log file: ${config.logPath ?? 'disabled (no --output given)'}`);
    out.error(`Interval: ${config.intervalSeconds} s, max runtime: ${config.maxRuntimeSeconds || 'indefinite'}`);
    out.error(`Temperature source: ${temperatureSource.name}`);
  }

  const summary = await runBatteryLogger({
    config,
    reader,
    display: config.displayEnabled ? new TerminalDisplay(stdout) : undefined,
    scheduler: deps.scheduler,
    signal: deps.signal,
    logger: out,
  });

  if (verbose) {
    out.error(`Session ended (${summary.reason}): ${summary.ticks} ticks, ${summary.recordsWritten} records, ${summary.elapsedSeconds} s`);
  }

  return 0;
}
