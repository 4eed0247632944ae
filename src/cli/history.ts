import { Command, Option } from "commander";

import { ENVIRONMENT_KINDS, type EnvironmentKind } from "../core/environments.js";
import { readHistory } from "../core/history.js";
import type { HistoryEvent } from "../core/logger.js";
import { historyLogPath } from "../core/paths.js";
import { usageError } from "./command-errors.js";
import { runAction } from "./context.js";
import { formatTimestamp, printJson, printTable } from "./output.js";

type HistoryOptions = { limit: string; kind?: EnvironmentKind; json?: boolean };

const DEFAULT_HISTORY_LIMIT = 20;

export function registerHistoryCommand(program: Command): void {
  program
    .command("history")
    .description("Show recent switches and configuration changes")
    .option("--limit <n>", "Maximum number of events", String(DEFAULT_HISTORY_LIMIT))
    .addOption(new Option("--kind <kind>", "Only events for one kind").choices([...ENVIRONMENT_KINDS]))
    .option("--json", "Emit JSON output", false)
    .action((opts: HistoryOptions, command: Command) => {
      runAction(command, "Could not read history.", ({ ctx }) => {
        const limit = Number(opts.limit);
        if (!Number.isInteger(limit) || limit <= 0) {
          throw usageError("Limit must be a positive integer.");
        }

        const result = readHistory(historyLogPath(ctx.paths), { limit, kind: opts.kind });
        if (result.skippedLines > 0) {
          console.warn(`Warning: skipped ${result.skippedLines} unreadable history line(s).`);
        }

        if (opts.json) {
          printJson(result.events);
          return;
        }
        if (result.events.length === 0) {
          console.log("No history recorded yet.");
          return;
        }

        printTable<HistoryEvent>(
          [
            { header: "Time", value: (row) => formatTimestamp(row.ts) },
            { header: "Event", value: (row) => row.type },
            { header: "Kind", value: (row) => row.kind ?? "-" },
            { header: "Name", value: (row) => row.name ?? "-" },
          ],
          result.events,
        );
      });
    });
}
