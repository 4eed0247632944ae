import { z, type ZodIssue } from "zod";

import {
  findEnvironmentNameProblem,
  type CcEnvironment,
  type Environment,
  type EnvironmentKind,
  type JavaEnvironment,
  type LlmEnvironment,
} from "./environments.js";
import { ConfigParseError } from "./errors.js";
import {
  CONFIG_SCHEMA_VERSION,
  EnvironmentSet,
  type Configuration,
} from "./registry.js";

// =============================================================================
// DOCUMENT SCHEMA
// =============================================================================

const optionalString = z
  .string()
  .nullish()
  .transform((value) => value ?? undefined);

function listOf<T extends z.ZodTypeAny>(item: T) {
  return z
    .array(item)
    .nullish()
    .transform((value) => value ?? []);
}

export const JavaEntrySchema = z.object({
  name: z.string(),
  java_home: z.string(),
  description: z.string().default(""),
  source: z.enum(["manual", "scanned"]).default("manual"),
});

export const CcEntrySchema = z.object({
  name: z.string(),
  provider: z.string().default("anthropic"),
  api_key: z.string().default(""),
  base_url: z.string().default(""),
  model: z.string().default(""),
  description: z.string().default(""),
});

export const LlmEntrySchema = z.object({
  name: z.string(),
  provider: z.string(),
  api_key: z.string().default(""),
  base_url: z.string().default(""),
  model: z.string().default(""),
  temperature: z.number().min(0).max(2).optional(),
  max_tokens: z.number().int().positive().optional(),
  description: z.string().default(""),
});

export const ConfigDocumentSchema = z
  .object({
    schema_version: z.number().int().nonnegative().optional(),
    java_environments: listOf(JavaEntrySchema),
    cc_environments: listOf(CcEntrySchema),
    llm_environments: listOf(LlmEntrySchema),
    default_java_env: optionalString,
    default_cc_env: optionalString,
    custom_java_scan_paths: listOf(z.string()),
    removed_java_names: listOf(z.string()),
  })
  .passthrough();

export type JavaEntry = z.infer<typeof JavaEntrySchema>;
export type CcEntry = z.infer<typeof CcEntrySchema>;
export type LlmEntry = z.infer<typeof LlmEntrySchema>;
export type ConfigDocument = z.infer<typeof ConfigDocumentSchema>;

export const KNOWN_DOCUMENT_KEYS: readonly string[] = Object.keys(ConfigDocumentSchema.shape);

const SECTION_KEYS: Record<EnvironmentKind, string> = {
  java: "java_environments",
  cc: "cc_environments",
  llm: "llm_environments",
};

// =============================================================================
// ISSUE FORMATTING
// =============================================================================

export function formatIssues(issues: ZodIssue[]): string {
  return issues
    .map((issue) => {
      const location = issue.path.length > 0 ? issue.path.join(".") : "<root>";

      if (issue.code === "invalid_type") {
        return `${location}: Expected ${issue.expected}, received ${issue.received}`;
      }
      if (issue.code === "invalid_enum_value") {
        const options = issue.options.map((o) => JSON.stringify(o)).join(", ");
        return `${location}: Expected one of ${options}, received ${JSON.stringify(issue.received)}`;
      }

      return `${location}: ${issue.message}`;
    })
    .join("\n");
}

export function parseConfigDocument(doc: unknown, file: string): ConfigDocument {
  const parsed = ConfigDocumentSchema.safeParse(doc);
  if (!parsed.success) {
    const details = formatIssues(parsed.error.issues);
    throw new ConfigParseError(`Invalid configuration at ${file}:\n${details}`, parsed.error);
  }
  return parsed.data;
}

// =============================================================================
// DOCUMENT -> CONFIGURATION
// =============================================================================

export function documentToConfiguration(doc: ConfigDocument, file: string): Configuration {
  const schemaVersion = doc.schema_version ?? 0;
  if (schemaVersion > CONFIG_SCHEMA_VERSION) {
    throw new ConfigParseError(
      `Configuration at ${file} uses schema_version ${schemaVersion}; this build understands up to ${CONFIG_SCHEMA_VERSION}.`,
    );
  }

  const problems: string[] = [];

  const java = collectSet<JavaEnvironment>(
    "java",
    doc.java_environments.map(javaFromEntry),
    problems,
  );
  const cc = collectSet<CcEnvironment>("cc", doc.cc_environments.map(ccFromEntry), problems);
  const llm = collectSet<LlmEnvironment>("llm", doc.llm_environments.map(llmFromEntry), problems);

  if (problems.length > 0) {
    throw new ConfigParseError(`Invalid configuration at ${file}:\n${problems.join("\n")}`);
  }

  const defaults: Configuration["defaults"] = {};
  if (doc.default_java_env !== undefined) defaults.java = doc.default_java_env;
  if (doc.default_cc_env !== undefined) defaults.cc = doc.default_cc_env;

  return {
    schemaVersion,
    environments: { java, cc, llm },
    defaults,
    customScanPaths: [...doc.custom_java_scan_paths],
    removedJavaNames: [...doc.removed_java_names],
    extras: pickExtras(doc),
  };
}

function collectSet<T extends Environment>(
  kind: EnvironmentKind,
  items: T[],
  problems: string[],
): EnvironmentSet<T> {
  const set = new EnvironmentSet<T>();

  items.forEach((item, index) => {
    const location = `${SECTION_KEYS[kind]}.${index}.name`;
    const nameProblem = findEnvironmentNameProblem(item.name);
    if (nameProblem) {
      problems.push(`${location}: ${nameProblem}`);
      return;
    }
    if (set.has(item.name)) {
      problems.push(`${location}: Duplicate name "${item.name}"`);
      return;
    }
    set.add(item);
  });

  return set;
}

function pickExtras(doc: ConfigDocument): Record<string, unknown> {
  const extras: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(doc)) {
    if (!KNOWN_DOCUMENT_KEYS.includes(key)) {
      extras[key] = value;
    }
  }
  return extras;
}

function javaFromEntry(entry: JavaEntry): JavaEnvironment {
  return {
    kind: "java",
    name: entry.name,
    home: entry.java_home,
    description: entry.description,
    source: entry.source,
  };
}

function ccFromEntry(entry: CcEntry): CcEnvironment {
  return {
    kind: "cc",
    name: entry.name,
    provider: entry.provider,
    apiKey: entry.api_key,
    baseUrl: entry.base_url,
    model: entry.model,
    description: entry.description,
  };
}

function llmFromEntry(entry: LlmEntry): LlmEnvironment {
  const environment: LlmEnvironment = {
    kind: "llm",
    name: entry.name,
    provider: entry.provider,
    apiKey: entry.api_key,
    baseUrl: entry.base_url,
    model: entry.model,
    description: entry.description,
  };
  if (entry.temperature !== undefined) environment.temperature = entry.temperature;
  if (entry.max_tokens !== undefined) environment.maxTokens = entry.max_tokens;
  return environment;
}

// =============================================================================
// CONFIGURATION -> DOCUMENT
// =============================================================================

// js-yaml refuses to dump `undefined`, so optional keys are only set when present.
export function configurationToDocument(config: Configuration): Record<string, unknown> {
  const doc: Record<string, unknown> = {
    schema_version: CONFIG_SCHEMA_VERSION,
    java_environments: config.environments.java.list().map(javaToEntry),
    cc_environments: config.environments.cc.list().map(ccToEntry),
    llm_environments: config.environments.llm.list().map(llmToEntry),
  };

  if (config.defaults.java !== undefined) doc.default_java_env = config.defaults.java;
  if (config.defaults.cc !== undefined) doc.default_cc_env = config.defaults.cc;

  doc.custom_java_scan_paths = [...config.customScanPaths];
  doc.removed_java_names = [...config.removedJavaNames];

  for (const [key, value] of Object.entries(config.extras)) {
    if (!KNOWN_DOCUMENT_KEYS.includes(key)) {
      doc[key] = value;
    }
  }

  return doc;
}

function javaToEntry(environment: JavaEnvironment): JavaEntry {
  return {
    name: environment.name,
    java_home: environment.home,
    description: environment.description,
    source: environment.source,
  };
}

function ccToEntry(environment: CcEnvironment): CcEntry {
  return {
    name: environment.name,
    provider: environment.provider,
    api_key: environment.apiKey,
    base_url: environment.baseUrl,
    model: environment.model,
    description: environment.description,
  };
}

function llmToEntry(environment: LlmEnvironment): LlmEntry {
  const entry: LlmEntry = {
    name: environment.name,
    provider: environment.provider,
    api_key: environment.apiKey,
    base_url: environment.baseUrl,
    model: environment.model,
    description: environment.description,
  };
  if (environment.temperature !== undefined) entry.temperature = environment.temperature;
  if (environment.maxTokens !== undefined) entry.max_tokens = environment.maxTokens;
  return entry;
}
