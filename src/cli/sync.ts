import type { Command } from "commander";

import type { SyncReport } from "../core/config-store.js";
import { runAction } from "./context.js";
import { printJson } from "./output.js";

type SyncOptions = { presets?: boolean; json?: boolean };

export function registerSyncCommand(program: Command): void {
  program
    .command("sync")
    .description("Upgrade the configuration file to the current schema")
    .option("--presets", "Add the built-in CC profiles that are missing", false)
    .option("--json", "Emit JSON output", false)
    .action((opts: SyncOptions, command: Command) => {
      runAction(command, "Configuration sync failed.", ({ envSwitch }) => {
        const report = envSwitch.sync({ presets: opts.presets });
        if (opts.json) {
          printJson(report);
          return;
        }
        printSyncReport(report);
      });
    });
}

function printSyncReport(report: SyncReport): void {
  for (const change of report.changes) {
    console.log(`- ${change}`);
  }
  if (report.presetsAdded.length > 0) {
    console.log(`- Added presets: ${report.presetsAdded.join(", ")}`);
  }

  console.log(
    report.written
      ? `Configuration at ${report.configPath} is at schema_version ${report.toVersion}.`
      : `Configuration at ${report.configPath} is already up to date.`,
  );
}
