import type { Command } from "commander";

import { generateHookScript } from "../shell/hook.js";
import { resolveShell, runAction } from "./context.js";
import { writeScript } from "./output.js";

type HookOptions = { shell?: string; bin?: string };

export function registerHookCommand(program: Command): void {
  program
    .command("hook")
    .description("Print the shell integration to evaluate from your shell's startup file")
    .option("--shell <shell>", "Target shell: bash, zsh, fish, powershell or cmd")
    .option("--bin <command>", "Command the integration should call", "envswitch")
    .action((opts: HookOptions, command: Command) => {
      runAction(command, "Could not generate the shell hook.", ({ ctx }) => {
        const shell = resolveShell(opts.shell, ctx);
        writeScript(generateHookScript(shell, { bin: opts.bin }));
      });
    });
}
