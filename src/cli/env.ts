import type { Command } from "commander";

import { resolveShell, runAction } from "./context.js";
import { printWarnings, writeScript } from "./output.js";

type EnvOptions = { shell?: string };

export function registerEnvCommand(program: Command): void {
  program
    .command("env")
    .description("Print a script that applies every default environment")
    .option("--shell <shell>", "Target shell: bash, zsh, fish, powershell or cmd")
    .action((opts: EnvOptions, command: Command) => {
      runAction(command, "Could not apply default environments.", ({ ctx, envSwitch }) => {
        const shell = resolveShell(opts.shell, ctx);
        const activation = envSwitch.activateDefaults(shell);
        writeScript(activation.script);
        printWarnings(activation.warnings);
      });
    });
}
