import type { Environment } from "../core/environments.js";
import type { UnresolvedPlaceholderWarning } from "../core/warnings.js";
import { dialectFor, type ShellDialect } from "./dialects.js";
import { pathStyleFor } from "./path-reconcile.js";
import type { ShellTarget } from "./targets.js";
import { planVariables, scopeValue, type ActivationMode, type ScriptOperation } from "./variables.js";

// =============================================================================
// TYPES
// =============================================================================

export type Ambient = {
  env: Record<string, string | undefined>;
  platform: NodeJS.Platform;
};

export type GeneratedScript = {
  script: string;
  warnings: UnresolvedPlaceholderWarning[];
};

// =============================================================================
// PUBLIC API
// =============================================================================

/**
 * Renders the activation script for one environment. Output depends only on the arguments:
 * the same environment, shell, mode and ambient values give the same bytes.
 */
export function generateActivationScript(
  environment: Environment,
  shell: ShellTarget,
  mode: ActivationMode,
  ambient: Ambient,
): GeneratedScript {
  const dialect = dialectFor(shell);
  const pathStyle = pathStyleFor(shell, ambient.platform);
  const plan = planVariables(environment, { mode, env: ambient.env, pathStyle });

  const lines = [
    dialect.comment(
      `envswitch: ${environment.kind} environment ${environment.name} (${scopeValue(mode)})`,
    ),
    ...plan.operations.map((operation) => renderOperation(dialect, operation, pathStyle.delimiter)),
  ];

  return { script: `${lines.join("\n")}\n`, warnings: plan.warnings };
}

function renderOperation(dialect: ShellDialect, operation: ScriptOperation, delimiter: string): string {
  switch (operation.op) {
    case "set":
      return dialect.setVariable(operation.name, operation.value);
    case "unset":
      return dialect.unsetVariable(operation.name);
    case "path":
      return dialect.setPath(operation.segments, delimiter);
  }
}
