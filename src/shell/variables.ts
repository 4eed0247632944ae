import type {
  CcEnvironment,
  Environment,
  EnvironmentKind,
  JavaEnvironment,
  LlmEnvironment,
} from "../core/environments.js";
import { ERROR_KINDS } from "../core/errors.js";
import { resolvePlaceholders } from "../core/placeholders.js";
import type { UnresolvedPlaceholderWarning } from "../core/warnings.js";
import { resolveProviderVariables } from "../llm/providers.js";
import { javaBinDir, reconcileJavaPath, readAmbientPath, type PathStyle } from "./path-reconcile.js";

// =============================================================================
// TYPES
// =============================================================================

export type ActivationMode = "persist" | "session";

export type ScriptOperation =
  | { op: "set"; name: string; value: string }
  | { op: "unset"; name: string }
  | { op: "path"; segments: string[] };

type VariableOperation = Exclude<ScriptOperation, { op: "path" }>;

export type VariablePlan = {
  operations: ScriptOperation[];
  warnings: UnresolvedPlaceholderWarning[];
};

export type PlanContext = {
  mode: ActivationMode;
  env: Record<string, string | undefined>;
  pathStyle: PathStyle;
};

export const CC_API_TIMEOUT_MS = "3000000";

// =============================================================================
// TRACKING
// =============================================================================

export function currentVariableName(kind: EnvironmentKind): string {
  return `ENVSWITCH_CURRENT_${kind.toUpperCase()}`;
}

export function scopeVariableName(kind: EnvironmentKind): string {
  return `ENVSWITCH_${kind.toUpperCase()}_SCOPE`;
}

export function scopeValue(mode: ActivationMode): "session" | "default" {
  return mode === "session" ? "session" : "default";
}

// =============================================================================
// PLANS
// =============================================================================

export function planVariables(environment: Environment, ctx: PlanContext): VariablePlan {
  const warnings: UnresolvedPlaceholderWarning[] = [];
  const resolve = (field: string, value: string): string => {
    const resolution = resolvePlaceholders(value, ctx.env);
    for (const variable of resolution.missing) {
      warnings.push({
        kind: ERROR_KINDS.unresolvedPlaceholder,
        variable,
        field,
        environment: environment.name,
      });
    }
    return resolution.value;
  };

  const operations = planForKind(environment, ctx, resolve);
  operations.push(
    { op: "set", name: currentVariableName(environment.kind), value: environment.name },
    { op: "set", name: scopeVariableName(environment.kind), value: scopeValue(ctx.mode) },
  );

  return { operations, warnings };
}

type Resolve = (field: string, value: string) => string;

function planForKind(environment: Environment, ctx: PlanContext, resolve: Resolve): ScriptOperation[] {
  switch (environment.kind) {
    case "java":
      return planJava(environment, ctx, resolve);
    case "cc":
      return planCc(environment, resolve);
    case "llm":
      return planLlm(environment, resolve);
  }
}

function planJava(environment: JavaEnvironment, ctx: PlanContext, resolve: Resolve): ScriptOperation[] {
  const home = resolve("java_home", environment.home);
  const binDir = javaBinDir(home, ctx.pathStyle);
  return [
    { op: "set", name: "JAVA_HOME", value: home },
    { op: "path", segments: reconcileJavaPath(readAmbientPath(ctx.env), binDir, ctx.pathStyle) },
  ];
}

function planCc(environment: CcEnvironment, resolve: Resolve): ScriptOperation[] {
  const model = optional("ANTHROPIC_MODEL", "model", environment.model, resolve);
  return [
    { op: "set", name: "ANTHROPIC_AUTH_TOKEN", value: resolve("api_key", environment.apiKey) },
    optional("ANTHROPIC_BASE_URL", "base_url", environment.baseUrl, resolve),
    model,
    // Claude Code picks its Sonnet-tier model from here; it follows ANTHROPIC_MODEL.
    { ...model, name: "ANTHROPIC_DEFAULT_SONNET_MODEL" },
    { op: "set", name: "API_TIMEOUT_MS", value: CC_API_TIMEOUT_MS },
    { op: "set", name: "CLAUDE_CODE_DISABLE_NONESSENTIAL_TRAFFIC", value: "1" },
  ];
}

function planLlm(environment: LlmEnvironment, resolve: Resolve): ScriptOperation[] {
  const variables = resolveProviderVariables(environment.provider);
  return [
    { op: "set", name: variables.apiKey, value: resolve("api_key", environment.apiKey) },
    optional(variables.baseUrl, "base_url", environment.baseUrl, resolve),
    optional(variables.model, "model", environment.model, resolve),
    { op: "set", name: "LLM_PROVIDER", value: environment.provider },
    environment.temperature === undefined
      ? { op: "unset", name: "LLM_TEMPERATURE" }
      : { op: "set", name: "LLM_TEMPERATURE", value: String(environment.temperature) },
    environment.maxTokens === undefined
      ? { op: "unset", name: "LLM_MAX_TOKENS" }
      : { op: "set", name: "LLM_MAX_TOKENS", value: String(environment.maxTokens) },
  ];
}

// An empty stored value clears the variable; a placeholder that resolves to "" is still assigned.
function optional(name: string, field: string, stored: string, resolve: Resolve): VariableOperation {
  if (stored.length === 0) {
    return { op: "unset", name };
  }
  return { op: "set", name, value: resolve(field, stored) };
}
