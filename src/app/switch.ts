/**
 * EnvironmentSwitch is the façade every CLI command goes through.
 * Purpose: decide whether a request is session-scoped (only emits a script) or persistent
 * (written back through the ConfigStore), and keep the default pointers consistent.
 * Assumptions: one instance per invocation; the configuration is loaded once and cached.
 */

import type { ConfigStore, SyncOptions, SyncReport } from "../core/config-store.js";
import {
  isDefaultableKind,
  type DefaultableKind,
  type Environment,
  type EnvironmentKind,
  type EnvironmentOfKind,
} from "../core/environments.js";
import { UnsupportedOperationError } from "../core/errors.js";
import type { HistoryEventInput, HistoryRecorder } from "../core/logger.js";
import { resolvePlaceholders } from "../core/placeholders.js";
import {
  addEnvironment,
  clearDefaultName,
  getDefaultName,
  listEnvironments,
  removeEnvironment,
  requireEnvironment,
  setDefaultName,
  type Configuration,
  type RemoveEnvironmentResult,
} from "../core/registry.js";
import type { EnvswitchWarning } from "../core/warnings.js";
import { mergeScanCandidates, type MergeReport } from "../java/merge.js";
import { resolveScanRoots, type ScanRoot } from "../java/roots.js";
import { canonicalPath, scanJavaRoots, type FingerprintPolicy, type ScanReport } from "../java/scanner.js";
import { generateActivationScript, type GeneratedScript } from "../shell/generator.js";
import type { ShellTarget } from "../shell/targets.js";
import { currentVariableName } from "../shell/variables.js";
import type { AmbientProcess } from "./context.js";

// =============================================================================
// TYPES
// =============================================================================

export type SwitchState = "NoEnvironment" | "DefaultActive" | "SessionOverride";

export type DefaultQuery =
  | { state: "NoEnvironment" }
  | { state: "DefaultActive"; name: string };

export type CurrentSource = "tracking-variable" | "java-home" | "cc-token" | "default" | "none";

export type CurrentReport = {
  kind: EnvironmentKind;
  state: SwitchState;
  name?: string;
  defaultName?: string;
  source: CurrentSource;
  /** False when the ambient indicator names an entry that is no longer registered. */
  registered: boolean;
};

export type ListResult<K extends EnvironmentKind> = {
  environments: EnvironmentOfKind<K>[];
  defaultName?: string;
};

export type UnsetDefaultResult = {
  previous?: string;
};

export type ScanRequest = {
  fingerprintPolicy?: FingerprintPolicy;
};

export type ScanResult = {
  roots: ScanRoot[];
  report: ScanReport;
  merge: MergeReport;
  saved: boolean;
};

export type DefaultsActivation = {
  script: string;
  warnings: EnvswitchWarning[];
  activated: Environment[];
};

// =============================================================================
// SWITCH
// =============================================================================

export class EnvironmentSwitch {
  private cached: Configuration | null = null;

  constructor(
    private readonly store: ConfigStore,
    private readonly ambient: AmbientProcess,
    private readonly history?: HistoryRecorder,
  ) {}

  config(): Configuration {
    if (!this.cached) {
      this.cached = this.store.load();
    }
    return this.cached;
  }

  // ---------------------------------------------------------------------------
  // Read-only operations
  // ---------------------------------------------------------------------------

  list<K extends EnvironmentKind>(kind: K): ListResult<K> {
    const config = this.config();
    const result: ListResult<K> = { environments: listEnvironments(config, kind) };
    if (isDefaultableKind(kind)) {
      const defaultName = getDefaultName(config, kind);
      if (defaultName !== undefined) result.defaultName = defaultName;
    }
    return result;
  }

  get<K extends EnvironmentKind>(kind: K, name: string): EnvironmentOfKind<K> {
    return requireEnvironment(this.config(), kind, name);
  }

  /** Session activation: emits a script and never touches the stored configuration. */
  use(kind: EnvironmentKind, name: string, shell: ShellTarget): GeneratedScript {
    const environment = requireEnvironment(this.config(), kind, name);
    const generated = generateActivationScript(environment, shell, "session", this.ambient);
    this.record({ type: "env.use", kind, name, payload: { shell } });
    return generated;
  }

  queryDefault(kind: EnvironmentKind): DefaultQuery {
    const defaultable = this.requireDefaultable(kind);
    const name = getDefaultName(this.config(), defaultable);
    return name === undefined ? { state: "NoEnvironment" } : { state: "DefaultActive", name };
  }

  current(kind: EnvironmentKind): CurrentReport {
    const config = this.config();
    const defaultName = isDefaultableKind(kind) ? getDefaultName(config, kind) : undefined;
    const withDefault = (report: CurrentReport): CurrentReport =>
      defaultName === undefined ? report : { ...report, defaultName };

    const ambientMatch = this.findAmbientEnvironment(kind);
    if (ambientMatch) {
      return withDefault({
        kind,
        state: ambientMatch.name === defaultName ? "DefaultActive" : "SessionOverride",
        name: ambientMatch.name,
        source: ambientMatch.source,
        registered: ambientMatch.registered,
      });
    }

    if (defaultName !== undefined) {
      return withDefault({
        kind,
        state: "DefaultActive",
        name: defaultName,
        source: "default",
        registered: true,
      });
    }

    return { kind, state: "NoEnvironment", source: "none", registered: false };
  }

  /** Scripts for every stored default, java first, in persist mode. */
  activateDefaults(shell: ShellTarget): DefaultsActivation {
    const config = this.config();
    const scripts: string[] = [];
    const warnings: EnvswitchWarning[] = [];
    const activated: Environment[] = [];

    const kinds: DefaultableKind[] = ["java", "cc"];
    for (const kind of kinds) {
      const name = getDefaultName(config, kind);
      if (name === undefined) continue;

      const environment = requireEnvironment(config, kind, name);
      const generated = generateActivationScript(environment, shell, "persist", this.ambient);
      scripts.push(generated.script);
      warnings.push(...generated.warnings);
      activated.push(environment);
    }

    return { script: scripts.join(""), warnings, activated };
  }

  // ---------------------------------------------------------------------------
  // Persistent operations
  // ---------------------------------------------------------------------------

  add(environment: Environment): void {
    const config = this.config();
    addEnvironment(config, environment);
    this.store.save(config);
    this.record({ type: "env.add", kind: environment.kind, name: environment.name });
  }

  remove<K extends EnvironmentKind>(kind: K, name: string): RemoveEnvironmentResult<K> {
    const config = this.config();
    const result = removeEnvironment(config, kind, name);
    this.store.save(config);
    this.record({
      type: "env.remove",
      kind,
      name,
      payload: { cleared_default: result.clearedDefault },
    });
    return result;
  }

  setDefault(kind: EnvironmentKind, name: string): void {
    const defaultable = this.requireDefaultable(kind);
    const config = this.config();
    setDefaultName(config, defaultable, name);
    this.store.save(config);
    this.record({ type: "env.default.set", kind, name });
  }

  unsetDefault(kind: EnvironmentKind): UnsetDefaultResult {
    const defaultable = this.requireDefaultable(kind);
    const config = this.config();
    if (getDefaultName(config, defaultable) === undefined) {
      return {};
    }

    const previous = clearDefaultName(config, defaultable);
    this.store.save(config);
    this.record({ type: "env.default.unset", kind, name: previous });
    return { previous };
  }

  scan(request: ScanRequest = {}): ScanResult {
    const config = this.config();
    const roots = resolveScanRoots({
      platform: this.ambient.platform,
      env: this.ambient.env,
      customPaths: config.customScanPaths,
      homeDir: this.ambient.homeDir,
    });
    const report = scanJavaRoots(roots, {
      platform: this.ambient.platform,
      fingerprintPolicy: request.fingerprintPolicy,
    });
    const merge = mergeScanCandidates(config, report.candidates);

    const saved = merge.added.length > 0;
    if (saved) {
      this.store.save(config);
    }

    this.record({
      type: "java.scan",
      kind: "java",
      payload: {
        roots: roots.length,
        found: report.candidates.length,
        added: merge.added.map((environment) => environment.name),
        warnings: report.warnings.length,
      },
    });

    return { roots, report, merge, saved };
  }

  sync(options: SyncOptions = {}): SyncReport {
    const report = this.store.sync(options);
    this.cached = null;
    if (report.written) {
      this.record({
        type: "config.sync",
        payload: {
          from_version: report.fromVersion,
          to_version: report.toVersion,
          presets_added: report.presetsAdded,
        },
      });
    }
    return report;
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private requireDefaultable(kind: EnvironmentKind): DefaultableKind {
    if (!isDefaultableKind(kind)) {
      throw new UnsupportedOperationError(`${kind} environments have no default.`);
    }
    return kind;
  }

  private findAmbientEnvironment(
    kind: EnvironmentKind,
  ): { name: string; source: CurrentSource; registered: boolean } | null {
    const config = this.config();
    const env = this.ambient.env;

    const tracked = env[currentVariableName(kind)];
    if (tracked) {
      return {
        name: tracked,
        source: "tracking-variable",
        registered: config.environments[kind].has(tracked),
      };
    }

    if (kind === "java" && env.JAVA_HOME) {
      const javaHome = canonicalPath(env.JAVA_HOME);
      const match = config.environments.java.find(
        (entry) => canonicalPath(resolvePlaceholders(entry.home, env).value) === javaHome,
      );
      if (match) return { name: match.name, source: "java-home", registered: true };
    }

    if (kind === "cc" && env.ANTHROPIC_AUTH_TOKEN) {
      const token = env.ANTHROPIC_AUTH_TOKEN;
      const baseUrl = env.ANTHROPIC_BASE_URL ?? "";
      const match = config.environments.cc.find(
        (entry) =>
          resolvePlaceholders(entry.apiKey, env).value === token &&
          resolvePlaceholders(entry.baseUrl, env).value === baseUrl,
      );
      if (match) return { name: match.name, source: "cc-token", registered: true };
    }

    return null;
  }

  private record(event: HistoryEventInput): void {
    this.history?.record(event);
  }
}
