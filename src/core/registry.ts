import {
  findEnvironmentNameProblem,
  isDefaultableKind,
  type DefaultableKind,
  type Environment,
  type EnvironmentKind,
  type EnvironmentOfKind,
  type JavaEnvironment,
  type CcEnvironment,
  type LlmEnvironment,
} from "./environments.js";
import {
  DuplicateNameError,
  EnvironmentNotFoundError,
  InvalidEnvironmentError,
} from "./errors.js";

// =============================================================================
// ENVIRONMENT SET
// =============================================================================

/**
 * Ordered name -> environment mapping. Names are unique and compared case-sensitively;
 * iteration follows insertion order.
 */
export class EnvironmentSet<T extends Environment> {
  private readonly entries = new Map<string, T>();

  constructor(items: Iterable<T> = []) {
    for (const item of items) {
      this.add(item);
    }
  }

  get size(): number {
    return this.entries.size;
  }

  has(name: string): boolean {
    return this.entries.has(name);
  }

  get(name: string): T | undefined {
    return this.entries.get(name);
  }

  list(): T[] {
    return [...this.entries.values()];
  }

  names(): string[] {
    return [...this.entries.keys()];
  }

  find(predicate: (item: T) => boolean): T | undefined {
    return this.list().find(predicate);
  }

  add(item: T): void {
    if (this.entries.has(item.name)) {
      throw new DuplicateNameError(item.kind, item.name);
    }
    this.entries.set(item.name, item);
  }

  remove(name: string): T | undefined {
    const existing = this.entries.get(name);
    if (existing) {
      this.entries.delete(name);
    }
    return existing;
  }
}

// =============================================================================
// CONFIGURATION AGGREGATE
// =============================================================================

export type EnvironmentSets = {
  [K in EnvironmentKind]: EnvironmentSet<EnvironmentOfKind<K>>;
};

export type DefaultPointers = {
  [K in DefaultableKind]?: string;
};

export type Configuration = {
  schemaVersion: number;
  environments: EnvironmentSets;
  defaults: DefaultPointers;
  customScanPaths: string[];
  removedJavaNames: string[];
  /** Top-level document keys this version does not know about; written back untouched. */
  extras: Record<string, unknown>;
};

export const CONFIG_SCHEMA_VERSION = 1;

export function createEmptyConfiguration(): Configuration {
  return {
    schemaVersion: CONFIG_SCHEMA_VERSION,
    environments: {
      java: new EnvironmentSet<JavaEnvironment>(),
      cc: new EnvironmentSet<CcEnvironment>(),
      llm: new EnvironmentSet<LlmEnvironment>(),
    },
    defaults: {},
    customScanPaths: [],
    removedJavaNames: [],
    extras: {},
  };
}

// =============================================================================
// LOOKUPS
// =============================================================================

export function findEnvironment<K extends EnvironmentKind>(
  config: Configuration,
  kind: K,
  name: string,
): EnvironmentOfKind<K> | undefined {
  const set: EnvironmentSet<EnvironmentOfKind<K>> = config.environments[kind];
  return set.get(name);
}

export function requireEnvironment<K extends EnvironmentKind>(
  config: Configuration,
  kind: K,
  name: string,
): EnvironmentOfKind<K> {
  const environment = findEnvironment(config, kind, name);
  if (!environment) {
    throw new EnvironmentNotFoundError(kind, name);
  }
  return environment;
}

export function listEnvironments<K extends EnvironmentKind>(
  config: Configuration,
  kind: K,
): EnvironmentOfKind<K>[] {
  const set: EnvironmentSet<EnvironmentOfKind<K>> = config.environments[kind];
  return set.list();
}

// =============================================================================
// MUTATIONS
// =============================================================================

export function addEnvironment(config: Configuration, environment: Environment): void {
  const problem = findEnvironmentNameProblem(environment.name);
  if (problem) {
    throw new InvalidEnvironmentError(`${problem} (got "${environment.name}")`);
  }

  switch (environment.kind) {
    case "java":
      config.environments.java.add(environment);
      config.removedJavaNames = config.removedJavaNames.filter((n) => n !== environment.name);
      return;
    case "cc":
      config.environments.cc.add(environment);
      return;
    case "llm":
      config.environments.llm.add(environment);
      return;
  }
}

export type RemoveEnvironmentResult<K extends EnvironmentKind> = {
  removed: EnvironmentOfKind<K>;
  clearedDefault: boolean;
};

export function removeEnvironment<K extends EnvironmentKind>(
  config: Configuration,
  kind: K,
  name: string,
): RemoveEnvironmentResult<K> {
  const set: EnvironmentSet<EnvironmentOfKind<K>> = config.environments[kind];
  const removed = set.remove(name);
  if (!removed) {
    throw new EnvironmentNotFoundError(kind, name);
  }

  let clearedDefault = false;
  if (isDefaultableKind(kind) && config.defaults[kind] === name) {
    delete config.defaults[kind];
    clearedDefault = true;
  }

  if (kind === "java" && !config.removedJavaNames.includes(name)) {
    config.removedJavaNames.push(name);
  }

  return { removed, clearedDefault };
}

export function getDefaultName(config: Configuration, kind: DefaultableKind): string | undefined {
  return config.defaults[kind];
}

export function setDefaultName(config: Configuration, kind: DefaultableKind, name: string): void {
  requireEnvironment(config, kind, name);
  config.defaults[kind] = name;
}

export function clearDefaultName(config: Configuration, kind: DefaultableKind): string | undefined {
  const previous = config.defaults[kind];
  delete config.defaults[kind];
  return previous;
}

/** Default pointers that name no existing entry. */
export function findDanglingDefaults(config: Configuration): DefaultableKind[] {
  const dangling: DefaultableKind[] = [];
  const pointers: [DefaultableKind, string | undefined][] = [
    ["java", config.defaults.java],
    ["cc", config.defaults.cc],
  ];

  for (const [kind, name] of pointers) {
    if (name !== undefined && !findEnvironment(config, kind, name)) {
      dangling.push(kind);
    }
  }

  return dangling;
}
