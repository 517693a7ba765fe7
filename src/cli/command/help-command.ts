import process from "node:process";

export function printHelp(out: NodeJS.WritableStream = process.stdout) {
    out.write(`
Usage:
  battery-logger [-o OUTPUT_FILE] [-i INTERVAL] [-b BATTERY_PATH] [-t MAX_TIME] [--no-interface]

Options:
  -o, --output <file>      CSV log file (default: battery_log.csv, which keeps logging off)
  -i, --interval <s>       Sampling interval in seconds (default: 60)
  -b, --battery <path>     Battery sysfs directory (default: autodetected BAT* device)
  -t, --time <s>           Maximum runtime in seconds (default: 0, indefinite)
      --no-interface       Disable the terminal interface
  -c, --config <file>      JSON file with defaults (output, interval, battery, time, interface, temperature)
      --temperature <m>    Temperature source: acpi | thermal-zone | auto | none (default: acpi)

  -v / --verbose           Print resolved configuration and session summary on stderr
  -vv                      Also report every unreadable sensor attribute
  -h, --help               Display this help message
`);
}
