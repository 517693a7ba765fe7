export type Verbosity = 0 | 1 | 2;

/**
 * level : 0 | 1 | 2
 * 0 === quiet (display and errors only)
 * 1 === --verbose or -v (resolved config, probe, session summary on stderr)
 * 2 === -vv (adds per-attribute read errors from the sensors)
 */
export function extractVerbosity(args: string[]): { level: Verbosity, rest: string[] } {
  let count = 0;
  const rest: string[] = [];

  for (const arg of args) {
    if (arg === "--verbose" || arg === "-v") {
      count += 1;
      continue;
    }

    if (/^-v{2,}$/.test(arg)) {
      count += arg.length - 1; // -vv
      continue;
    }

    rest.push(arg);
  }

  const level: Verbosity = count >= 2 ? 2 : count === 1 ? 1 : 0;
  return { level, rest };
}
