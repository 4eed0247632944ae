import { Command } from "commander";

import { registerCcCommand } from "./cc.js";
import { registerEnvCommand } from "./env.js";
import { registerHistoryCommand } from "./history.js";
import { registerHookCommand } from "./hook.js";
import { registerJavaCommand } from "./java.js";
import { registerLlmCommand } from "./llm.js";
import { registerSyncCommand } from "./sync.js";

export const CLI_VERSION = "0.1.0";

export function buildCli(): Command {
  const program = new Command();

  program
    .name("envswitch")
    .description("Switch Java, Claude Code and LLM provider environments from one registry")
    .version(CLI_VERSION)
    .option(
      "--config <path>",
      "Override the configuration file (defaults to $ENVSWITCH_HOME/config.yaml or ~/.envswitch/config.yaml)",
    )
    .option("--debug", "Show stack traces and error details", false)
    .option("--no-color", "Disable colored error output");

  registerJavaCommand(program);
  registerCcCommand(program);
  registerLlmCommand(program);
  registerEnvCommand(program);
  registerHookCommand(program);
  registerSyncCommand(program);
  registerHistoryCommand(program);

  return program;
}
