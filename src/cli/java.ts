import path from "node:path";

import { Command, Option } from "commander";

import type { ScanResult } from "../app/switch.js";
import { InvalidEnvironmentError } from "../core/errors.js";
import { expandHomeDir } from "../core/paths.js";
import { containsPlaceholder } from "../core/placeholders.js";
import { isJavaHome, type FingerprintPolicy } from "../java/scanner.js";
import { registerEnvironmentCommands, stringOption } from "./environment-commands.js";
import { runAction } from "./context.js";
import { printJson, printWarnings } from "./output.js";

type ScanOptions = { fingerprintPolicy: FingerprintPolicy; json?: boolean };

// =============================================================================
// COMMAND REGISTRATION
// =============================================================================

export function registerJavaCommand(program: Command): void {
  const java = program.command("java").description("Manage JDK installations");

  registerEnvironmentCommands(java, {
    kind: "java",
    withDefault: true,
    configureAdd: (command) => command.requiredOption("--home <path>", "JDK home directory"),
    buildEnvironment: (name, opts, ctx) => {
      const rawHome = stringOption(opts, "home").trim();
      if (!rawHome) {
        throw new InvalidEnvironmentError("Java home cannot be empty.");
      }
      const home = containsPlaceholder(rawHome)
        ? rawHome
        : path.resolve(ctx.ambient.cwd, expandHomeDir(rawHome, ctx.ambient.homeDir));

      return {
        kind: "java",
        name,
        home,
        description: stringOption(opts, "description"),
        source: "manual",
      };
    },
    afterAdd: (environment, ctx) => {
      if (environment.kind !== "java" || containsPlaceholder(environment.home)) return;
      if (!isJavaHome(environment.home, ctx.ambient.platform)) {
        console.warn(
          `Warning: ${environment.home} does not look like a JDK (no release file or bin/java).`,
        );
      }
    },
  });

  java
    .command("scan")
    .description("Discover installed JDKs and register the new ones")
    .addOption(
      new Option("--fingerprint-policy <policy>", "How to treat installs with the same vendor@version")
        .choices(["first-discovered", "keep-all"])
        .default("first-discovered"),
    )
    .option("--json", "Emit JSON output", false)
    .action((opts: ScanOptions, command: Command) => {
      runAction(command, "Java scan failed.", ({ envSwitch }) => {
        const result = envSwitch.scan({ fingerprintPolicy: opts.fingerprintPolicy });
        if (opts.json) {
          printJson(result);
        } else {
          printScanResult(result);
        }
        printWarnings(result.report.warnings);
      });
    });
}

// =============================================================================
// OUTPUT
// =============================================================================

function printScanResult(result: ScanResult): void {
  console.log(
    `Scanned ${result.roots.length} root(s); found ${result.report.candidates.length} installation(s).`,
  );

  for (const outcome of result.merge.outcomes) {
    const { candidate } = outcome;
    if (outcome.status === "added") {
      console.log(`Added ${candidate.name}: ${candidate.home} (${candidate.vendor} ${candidate.version})`);
      continue;
    }
    const existing = outcome.existing ? ` (${outcome.existing})` : "";
    const detail = outcome.detail ? ` ${outcome.detail}` : "";
    console.log(`Skipped ${candidate.name}: ${candidate.home} [${outcome.reason}${existing}]${detail}`);
  }

  for (const skipped of result.report.skipped) {
    console.log(
      `Skipped ${skipped.candidate.home} [${skipped.reason} of ${skipped.keptHome}]`,
    );
  }

  if (result.merge.added.length === 0) {
    console.log("No new Java environments added.");
  }
}
