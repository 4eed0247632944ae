import type { Command } from "commander";

import type { LlmEnvironment } from "../core/environments.js";
import { InvalidEnvironmentError } from "../core/errors.js";
import { LLM_PROVIDERS, findLlmProvider, type LlmProvider } from "../llm/providers.js";
import { runAction } from "./context.js";
import { registerEnvironmentCommands, stringOption, validateBaseUrl } from "./environment-commands.js";
import { printJson, printTable } from "./output.js";

type ProvidersOptions = { json?: boolean };

// =============================================================================
// COMMAND REGISTRATION
// =============================================================================

export function registerLlmCommand(program: Command): void {
  const llm = program.command("llm").description("Manage LLM provider profiles");

  registerEnvironmentCommands(llm, {
    kind: "llm",
    withDefault: false,
    configureAdd: (command) =>
      command
        .requiredOption("--provider <provider>", "Provider id (see `envswitch llm providers`)")
        .requiredOption("--api-key <key>", "API key or ${VAR} placeholder")
        .option("--base-url <url>", "API base URL", "")
        .option("--model <model>", "Model identifier", "")
        .option("--temperature <n>", "Sampling temperature (0-2)")
        .option("--max-tokens <n>", "Maximum tokens per response"),
    buildEnvironment: (name, opts) => {
      const baseUrl = stringOption(opts, "baseUrl").trim();
      validateBaseUrl(baseUrl);

      const environment: LlmEnvironment = {
        kind: "llm",
        name,
        provider: stringOption(opts, "provider").trim().toLowerCase(),
        apiKey: stringOption(opts, "apiKey"),
        baseUrl,
        model: stringOption(opts, "model").trim(),
        description: stringOption(opts, "description"),
      };
      if (!environment.provider) {
        throw new InvalidEnvironmentError("Provider cannot be empty.");
      }

      const temperature = parseTemperature(stringOption(opts, "temperature"));
      if (temperature !== undefined) environment.temperature = temperature;
      const maxTokens = parseMaxTokens(stringOption(opts, "maxTokens"));
      if (maxTokens !== undefined) environment.maxTokens = maxTokens;

      return environment;
    },
    afterAdd: (environment) => {
      if (environment.kind === "llm" && !findLlmProvider(environment.provider)) {
        console.warn(
          `Warning: provider "${environment.provider}" is not in the provider table; generic LLM_* variables will be used.`,
        );
      }
    },
  });

  llm
    .command("providers")
    .description("List supported LLM providers and the variables they set")
    .option("--json", "Emit JSON output", false)
    .action((opts: ProvidersOptions, command: Command) => {
      runAction(command, "Could not list LLM providers.", () => {
        if (opts.json) {
          printJson(LLM_PROVIDERS);
          return;
        }
        printTable<LlmProvider>(
          [
            { header: "Provider", value: (row) => row.id },
            { header: "Name", value: (row) => row.label },
            { header: "API key", value: (row) => row.variables.apiKey },
            { header: "Base URL", value: (row) => row.variables.baseUrl },
            { header: "Model", value: (row) => row.variables.model },
          ],
          [...LLM_PROVIDERS],
        );
        console.log("Other providers use LLM_API_KEY, LLM_BASE_URL and LLM_MODEL.");
      });
    });
}

// =============================================================================
// VALIDATION
// =============================================================================

export function parseTemperature(raw: string): number | undefined {
  if (raw.trim() === "") return undefined;
  const value = Number(raw);
  if (!Number.isFinite(value) || value < 0 || value > 2) {
    throw new InvalidEnvironmentError(`Temperature must be a number between 0 and 2 (got "${raw}").`);
  }
  return value;
}

export function parseMaxTokens(raw: string): number | undefined {
  if (raw.trim() === "") return undefined;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new InvalidEnvironmentError(`Max tokens must be a positive integer (got "${raw}").`);
  }
  return value;
}
