// =============================================================================
// KINDS
// =============================================================================

export const ENVIRONMENT_KINDS = ["java", "cc", "llm"] as const;

export type EnvironmentKind = (typeof ENVIRONMENT_KINDS)[number];

/** Kinds that carry a persisted default pointer. LLM profiles are only ever used per session. */
export const DEFAULTABLE_KINDS = ["java", "cc"] as const;

export type DefaultableKind = (typeof DEFAULTABLE_KINDS)[number];

export const ENVIRONMENT_KIND_LABELS: Record<EnvironmentKind, string> = {
  java: "Java",
  cc: "CC",
  llm: "LLM",
};

export function isDefaultableKind(kind: EnvironmentKind): kind is DefaultableKind {
  return DEFAULTABLE_KINDS.some((defaultable) => defaultable === kind);
}

// =============================================================================
// ENVIRONMENTS
// =============================================================================

export type EnvironmentSource = "manual" | "scanned";

export type JavaEnvironment = {
  kind: "java";
  name: string;
  home: string;
  description: string;
  source: EnvironmentSource;
};

export type CcEnvironment = {
  kind: "cc";
  name: string;
  provider: string;
  apiKey: string;
  baseUrl: string;
  model: string;
  description: string;
};

export type LlmEnvironment = {
  kind: "llm";
  name: string;
  provider: string;
  apiKey: string;
  baseUrl: string;
  model: string;
  temperature?: number;
  maxTokens?: number;
  description: string;
};

export type Environment = JavaEnvironment | CcEnvironment | LlmEnvironment;

export type EnvironmentOfKind<K extends EnvironmentKind> = Extract<Environment, { kind: K }>;

// =============================================================================
// NAMES
// =============================================================================

const MAX_NAME_LENGTH = 100;
const FORBIDDEN_NAME_CHARS = ["/", "\\", ":", "*", "?", '"', "<", ">", "|"];

/** Returns a description of what is wrong with the name, or null when it is usable. */
export function findEnvironmentNameProblem(name: string): string | null {
  if (name.trim().length === 0) {
    return "Environment name cannot be empty.";
  }
  if (name.length > MAX_NAME_LENGTH) {
    return `Environment name is too long (max ${MAX_NAME_LENGTH} characters).`;
  }
  if (name.startsWith(".")) {
    return "Environment name cannot start with a dot.";
  }
  if (/[\u0000-\u001f\u007f]/.test(name)) {
    return "Environment name cannot contain control characters.";
  }

  const forbidden = FORBIDDEN_NAME_CHARS.find((ch) => name.includes(ch));
  if (forbidden) {
    return `Environment name cannot contain '${forbidden}'.`;
  }

  return null;
}

export function describeEnvironment(environment: Environment): string {
  switch (environment.kind) {
    case "java":
      return environment.home;
    case "cc":
      return [environment.baseUrl, environment.model].filter(Boolean).join(" ");
    case "llm":
      return [environment.provider, environment.model].filter(Boolean).join(" ");
  }
}
