import type { Command } from "commander";

import { registerEnvironmentCommands, stringOption, validateBaseUrl } from "./environment-commands.js";

export function registerCcCommand(program: Command): void {
  const cc = program.command("cc").description("Manage Claude-Code-compatible API profiles");

  registerEnvironmentCommands(cc, {
    kind: "cc",
    withDefault: true,
    configureAdd: (command) =>
      command
        .requiredOption("--api-key <key>", "API key or ${VAR} placeholder")
        .option("--base-url <url>", "API base URL", "")
        .option("--model <model>", "Model identifier", "")
        .option("--provider <provider>", "Provider tag", "anthropic"),
    buildEnvironment: (name, opts) => {
      const baseUrl = stringOption(opts, "baseUrl").trim();
      validateBaseUrl(baseUrl);
      return {
        kind: "cc",
        name,
        provider: stringOption(opts, "provider") || "anthropic",
        apiKey: stringOption(opts, "apiKey"),
        baseUrl,
        model: stringOption(opts, "model").trim(),
        description: stringOption(opts, "description"),
      };
    },
  });
}
