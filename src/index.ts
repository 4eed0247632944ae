#!/usr/bin/env node
import fs from "node:fs";
import { pathToFileURL } from "node:url";

import { CommanderError, type Command } from "commander";

import { usageError } from "./cli/command-errors.js";
import { renderCliError } from "./cli/error-format.js";
import { buildCli } from "./cli/index.js";
import { resolveDebugFlagFromArgv } from "./core/logger.js";

// =============================================================================
// ERROR HANDLING
// =============================================================================

function configureCliErrorHandling(command: Command): void {
  command.configureOutput({
    outputError: (_message: string, _write: (chunk: string) => void) => undefined,
  });
  command.exitOverride();

  for (const sub of command.commands) {
    configureCliErrorHandling(sub);
  }
}

function isHelpOrVersionExit(error: unknown): boolean {
  if (!(error instanceof CommanderError)) {
    return false;
  }

  return (
    error.code === "commander.helpDisplayed" ||
    error.code === "commander.version" ||
    error.code === "commander.help"
  );
}

function toReportableError(error: unknown): unknown {
  if (error instanceof CommanderError) {
    return usageError(error.message.replace(/^error:\s*/i, ""), "Run `envswitch --help` for usage.");
  }
  return error;
}

function resolveColorOption(argv: string[]): boolean | undefined {
  const args = argv.slice(0, argv.includes("--") ? argv.indexOf("--") : argv.length);
  return args.includes("--no-color") ? false : undefined;
}

function resolveExitCode(error: unknown): number {
  if (error instanceof CommanderError) {
    return error.exitCode;
  }
  return 1;
}

export async function main(argv: string[]): Promise<void> {
  const program = buildCli();
  configureCliErrorHandling(program);

  try {
    await program.parseAsync(argv);
  } catch (error) {
    if (isHelpOrVersionExit(error)) {
      process.exitCode = resolveExitCode(error);
      return;
    }

    const debug = resolveDebugFlagFromArgv(argv) ?? false;
    console.error(
      renderCliError(toReportableError(error), { debug, useColor: resolveColorOption(argv) }),
    );
    process.exitCode = 1;
  }
}

// =============================================================================
// DIRECT EXECUTION
// =============================================================================

// npm installs the bin as a symlink; compare against the resolved script path.
function isDirectExecution(scriptPath: string | undefined): boolean {
  if (!scriptPath) return false;
  try {
    return import.meta.url === pathToFileURL(fs.realpathSync(scriptPath)).href;
  } catch {
    return import.meta.url === pathToFileURL(scriptPath).href;
  }
}

if (isDirectExecution(process.argv[1])) {
  void main(process.argv);
}
