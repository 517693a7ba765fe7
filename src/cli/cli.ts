#!/usr/bin/env node
import process from "node:process";
import { logCommand } from "./command/log-command.js";

const controller = new AbortController();

// Ctrl-C ends the session between two records, then the process exits normally
process.once("SIGINT", () => {
  process.stdout.write("\n");
  controller.abort();
});

await logCommand(process.argv.slice(2), { signal: controller.signal })
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    console.error("Fatal error:", err instanceof Error ? err.message : err);
    process.exit(1);
  });
