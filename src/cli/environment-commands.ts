import { Command } from "commander";

import type { AppContext } from "../app/context.js";
import type { CurrentReport } from "../app/switch.js";
import {
  ENVIRONMENT_KIND_LABELS,
  describeEnvironment,
  type Environment,
  type EnvironmentKind,
} from "../core/environments.js";
import { InvalidEnvironmentError } from "../core/errors.js";
import { containsPlaceholder } from "../core/placeholders.js";
import { usageError } from "./command-errors.js";
import { resolveShell, runAction, type CommandScope } from "./context.js";
import { maskSecret, printJson, printTable, printWarnings, writeScript } from "./output.js";

// =============================================================================
// TYPES
// =============================================================================

export type EnvironmentCommandDefinition = {
  kind: EnvironmentKind;
  /** Adds the kind-specific options to `<kind> add`. */
  configureAdd: (command: Command) => Command;
  /** Builds the entry from `<kind> add` options; throws InvalidEnvironmentError on bad input. */
  buildEnvironment: (name: string, opts: Record<string, unknown>, ctx: AppContext) => Environment;
  /** Runs after a successful add, e.g. to warn about a suspicious value. */
  afterAdd?: (environment: Environment, ctx: AppContext) => void;
  withDefault: boolean;
};

type ListOptions = { json?: boolean };
type UseOptions = { shell?: string };
type DefaultOptions = { unset?: boolean };

// =============================================================================
// COMMAND REGISTRATION
// =============================================================================

export function registerEnvironmentCommands(parent: Command, definition: EnvironmentCommandDefinition): void {
  const { kind } = definition;
  const label = ENVIRONMENT_KIND_LABELS[kind];

  parent
    .command("list")
    .description(`List ${label} environments`)
    .option("--json", "Emit JSON output", false)
    .action((opts: ListOptions, command: Command) => {
      runAction(command, `Could not list ${label} environments.`, (scope) => {
        listCommand(scope, kind, opts);
      });
    });

  definition
    .configureAdd(
      parent
        .command("add")
        .description(`Add a ${label} environment`)
        .argument("<name>", "Environment name")
        .option("--description <text>", "Human-readable description", ""),
    )
    .action((name: string, opts: Record<string, unknown>, command: Command) => {
      runAction(command, `Could not add ${label} environment.`, (scope) => {
        const environment = definition.buildEnvironment(name, opts, scope.ctx);
        scope.envSwitch.add(environment);
        console.log(`Added ${label} environment "${environment.name}".`);
        definition.afterAdd?.(environment, scope.ctx);
      });
    });

  parent
    .command("remove")
    .description(`Remove a ${label} environment`)
    .argument("<name>", "Environment name")
    .action((name: string, _opts: unknown, command: Command) => {
      runAction(command, `Could not remove ${label} environment.`, ({ envSwitch }) => {
        const result = envSwitch.remove(kind, name);
        console.log(`Removed ${label} environment "${name}".`);
        if (result.clearedDefault) {
          console.log(`Cleared the default ${label} environment.`);
        }
      });
    });

  parent
    .command("use")
    .description(`Print a script that activates a ${label} environment for this shell session`)
    .argument("<name>", "Environment name")
    .option("--shell <shell>", "Target shell: bash, zsh, fish, powershell or cmd")
    .action((name: string, opts: UseOptions, command: Command) => {
      runAction(command, `Could not switch ${label} environment.`, ({ ctx, envSwitch }) => {
        const shell = resolveShell(opts.shell, ctx);
        const generated = envSwitch.use(kind, name, shell);
        writeScript(generated.script);
        printWarnings(generated.warnings);
      });
    });

  parent
    .command("current")
    .description(`Show the active ${label} environment`)
    .option("--json", "Emit JSON output", false)
    .action((opts: ListOptions, command: Command) => {
      runAction(command, `Could not resolve the current ${label} environment.`, ({ envSwitch }) => {
        const report = envSwitch.current(kind);
        if (opts.json) {
          printJson(report);
          return;
        }
        console.log(formatCurrentReport(report));
      });
    });

  if (definition.withDefault) {
    parent
      .command("default")
      .description(`Show, set or clear the default ${label} environment`)
      .argument("[name]", "Environment to make the default")
      .option("--unset", "Clear the default", false)
      .action((name: string | undefined, opts: DefaultOptions, command: Command) => {
        runAction(command, `Could not update the default ${label} environment.`, (scope) => {
          defaultCommand(scope, kind, name, opts);
        });
      });
  }
}

// =============================================================================
// COMMANDS
// =============================================================================

function listCommand({ envSwitch }: CommandScope, kind: EnvironmentKind, opts: ListOptions): void {
  const label = ENVIRONMENT_KIND_LABELS[kind];
  const { environments, defaultName } = envSwitch.list(kind);

  if (opts.json) {
    printJson(
      environments.map((environment) => ({
        ...environment,
        default: environment.name === defaultName,
      })),
    );
    return;
  }

  if (environments.length === 0) {
    console.log(`No ${label} environments configured.`);
    return;
  }

  printTable<Environment>(
    [
      { header: " ", value: (row) => (row.name === defaultName ? "*" : " ") },
      { header: "Name", value: (row) => row.name },
      { header: "Details", value: (row) => describeEnvironment(row) },
      { header: "Key", value: (row) => (row.kind === "java" ? "-" : maskSecret(row.apiKey)) },
      { header: "Description", value: (row) => row.description },
    ],
    environments,
  );
}

function defaultCommand(
  { envSwitch }: CommandScope,
  kind: EnvironmentKind,
  name: string | undefined,
  opts: DefaultOptions,
): void {
  const label = ENVIRONMENT_KIND_LABELS[kind];

  if (name !== undefined && opts.unset) {
    throw usageError("Pass either a name or --unset, not both.");
  }

  if (opts.unset) {
    const { previous } = envSwitch.unsetDefault(kind);
    console.log(
      previous === undefined
        ? `No default ${label} environment was set.`
        : `Cleared the default ${label} environment (was "${previous}").`,
    );
    return;
  }

  if (name !== undefined) {
    envSwitch.setDefault(kind, name);
    console.log(`Default ${label} environment set to "${name}".`);
    return;
  }

  const query = envSwitch.queryDefault(kind);
  console.log(
    query.state === "DefaultActive" ? query.name : `No default ${label} environment set.`,
  );
}

// =============================================================================
// FORMATTING
// =============================================================================

export function formatCurrentReport(report: CurrentReport): string {
  const label = ENVIRONMENT_KIND_LABELS[report.kind];
  if (report.state === "NoEnvironment" || report.name === undefined) {
    return `No ${label} environment active.`;
  }

  const details: string[] = [];
  if (report.state === "SessionOverride") {
    details.push("session");
    if (report.defaultName !== undefined) details.push(`default: ${report.defaultName}`);
  } else {
    details.push(report.source === "default" ? "default, not applied in this shell" : "default");
  }
  if (!report.registered) {
    details.push("no longer configured");
  }

  return `${report.name} (${details.join("; ")})`;
}

// =============================================================================
// OPTION HELPERS
// =============================================================================

export function stringOption(opts: Record<string, unknown>, key: string): string {
  const value = opts[key];
  return typeof value === "string" ? value : "";
}

export function validateBaseUrl(value: string): void {
  if (value.length === 0 || containsPlaceholder(value)) return;
  try {
    new URL(value);
  } catch {
    throw new InvalidEnvironmentError(`Base URL "${value}" is not a valid URL.`);
  }
}
