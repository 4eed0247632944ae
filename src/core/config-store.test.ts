import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import yaml from "js-yaml";
import { afterEach, describe, expect, it } from "vitest";

import { ConfigStore } from "./config-store.js";
import { ConfigIoError, ConfigParseError } from "./errors.js";
import { addEnvironment, createEmptyConfiguration, setDefaultName } from "./registry.js";

// =============================================================================
// HELPERS
// =============================================================================

const tempDirs: string[] = [];

afterEach(() => {
  for (const dir of tempDirs.splice(0)) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
});

function makeTempDir(): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "envswitch-config-"));
  tempDirs.push(dir);
  return dir;
}

function tempConfigPath(): string {
  const dir = makeTempDir();
  return path.join(dir, "config.yaml");
}

function storeWith(content: string): ConfigStore {
  const configPath = tempConfigPath();
  fs.writeFileSync(configPath, content);
  return new ConfigStore(configPath);
}

const LEGACY_DOCUMENT = [
  "current_java_env: jdk17",
  "java_environments:",
  "  - name: jdk17",
  "    java_home: /opt/jdk17",
  "",
].join("\n");

// =============================================================================
// LOAD / SAVE
// =============================================================================

describe("ConfigStore.load", () => {
  it("returns an empty configuration without creating the file", () => {
    const store = new ConfigStore(tempConfigPath());

    const config = store.load();

    expect(config.environments.java.size).toBe(0);
    expect(config.defaults).toEqual({});
    expect(store.exists()).toBe(false);
  });

  it("round-trips every kind, the defaults and unknown top-level keys", () => {
    const store = storeWith("team_notes:\n  owner: platform\n");
    const config = store.load();

    addEnvironment(config, {
      kind: "java",
      name: "jdk17",
      home: "/usr/lib/jvm/java-17-openjdk",
      description: "",
      source: "scanned",
    });
    addEnvironment(config, {
      kind: "cc",
      name: "glmcc",
      provider: "anthropic",
      apiKey: "${GLM_API_KEY}",
      baseUrl: "https://open.bigmodel.cn/api/paas/v4",
      model: "glm-4-6",
      description: "GLM",
    });
    addEnvironment(config, {
      kind: "llm",
      name: "deepseek-chat",
      provider: "deepseek",
      apiKey: "test-secret",
      baseUrl: "",
      model: "deepseek-chat",
      temperature: 0.7,
      maxTokens: 4096,
      description: "",
    });
    setDefaultName(config, "java", "jdk17");
    setDefaultName(config, "cc", "glmcc");
    store.save(config);

    const reloaded = new ConfigStore(store.configPath).load();

    expect(reloaded.environments.java.get("jdk17")?.source).toBe("scanned");
    expect(reloaded.environments.cc.get("glmcc")?.apiKey).toBe("${GLM_API_KEY}");
    expect(reloaded.environments.llm.get("deepseek-chat")).toEqual({
      kind: "llm",
      name: "deepseek-chat",
      provider: "deepseek",
      apiKey: "test-secret",
      baseUrl: "",
      model: "deepseek-chat",
      temperature: 0.7,
      maxTokens: 4096,
      description: "",
    });
    expect(reloaded.defaults).toEqual({ java: "jdk17", cc: "glmcc" });
    expect(reloaded.extras).toEqual({ team_notes: { owner: "platform" } });
  });

  it("writes schema_version and snake_case keys", () => {
    const store = new ConfigStore(tempConfigPath());
    const config = createEmptyConfiguration();
    addEnvironment(config, {
      kind: "java",
      name: "jdk21",
      home: "/opt/jdk21",
      description: "",
      source: "manual",
    });

    store.save(config);

    const written = yaml.load(fs.readFileSync(store.configPath, "utf8"));
    expect(written).toEqual({
      schema_version: 1,
      java_environments: [{ name: "jdk21", java_home: "/opt/jdk21", description: "", source: "manual" }],
      cc_environments: [],
      llm_environments: [],
      custom_java_scan_paths: [],
      removed_java_names: [],
    });
  });

  it("does not leave temp files behind after saving", () => {
    const store = new ConfigStore(tempConfigPath());
    store.save(createEmptyConfiguration());

    expect(fs.readdirSync(path.dirname(store.configPath))).toEqual(["config.yaml"]);
  });

  it("upgrades legacy documents in memory without rewriting them", () => {
    const store = storeWith(LEGACY_DOCUMENT);

    const config = store.load();

    expect(config.defaults.java).toBe("jdk17");
    expect(fs.readFileSync(store.configPath, "utf8")).toBe(LEGACY_DOCUMENT);
  });

  it("reports YAML syntax errors with their location", () => {
    const store = storeWith("java_environments:\n  - name: [jdk17\n");

    expect(() => store.load()).toThrow(ConfigParseError);
    expect(() => store.load()).toThrow(/\(line \d+, column \d+\)/);
  });

  it("reports schema violations by path", () => {
    const store = storeWith("schema_version: 1\njava_environments:\n  - name: jdk17\n");

    expect(() => store.load()).toThrow(
      `Invalid configuration at ${store.configPath}:\njava_environments.0.java_home: Expected string, received undefined`,
    );
  });

  it("rejects duplicate names within a kind", () => {
    const store = storeWith(
      [
        "schema_version: 1",
        "cc_environments:",
        "  - name: glmcc",
        "  - name: glmcc",
        "",
      ].join("\n"),
    );

    expect(() => store.load()).toThrow('cc_environments.1.name: Duplicate name "glmcc"');
  });

  it("rejects a default that names no entry", () => {
    const store = storeWith("schema_version: 1\ndefault_java_env: jdk8\n");

    expect(() => store.load()).toThrow(
      'default_java_env: "jdk8" does not match any entry in java_environments',
    );
  });

  it("rejects documents written by a newer schema", () => {
    const store = storeWith("schema_version: 2\n");

    expect(() => store.load()).toThrow(/uses schema_version 2/);
  });

  it("rejects a document whose root is not a mapping", () => {
    const store = storeWith("- jdk17\n");

    expect(() => store.load()).toThrow("<root>: Expected object, received array");
  });

  it("wraps read failures in ConfigIoError", () => {
    const configPath = tempConfigPath();
    fs.mkdirSync(configPath);

    expect(() => new ConfigStore(configPath).load()).toThrow(ConfigIoError);
  });

  it("wraps write failures in ConfigIoError and keeps the old file", () => {
    const dir = makeTempDir();
    const blocker = path.join(dir, "blocker");
    fs.writeFileSync(blocker, "");
    const store = new ConfigStore(path.join(blocker, "config.yaml"));

    expect(() => store.save(createEmptyConfiguration())).toThrow(
      /^Failed to write configuration at /,
    );
    expect(fs.readFileSync(blocker, "utf8")).toBe("");
  });
});

// =============================================================================
// SYNC
// =============================================================================

describe("ConfigStore.sync", () => {
  it("migrates a legacy document and writes it once", () => {
    const store = storeWith(LEGACY_DOCUMENT);

    const first = store.sync();

    expect(first.fromVersion).toBe(0);
    expect(first.toVersion).toBe(1);
    expect(first.written).toBe(true);
    expect(first.changes).toEqual([
      'Moved current_java_env "jdk17" to default_java_env.',
      "Removed obsolete current_java_env key.",
      "Upgraded schema_version 0 -> 1.",
    ]);

    const written = yaml.load(fs.readFileSync(store.configPath, "utf8"));
    expect(written).toMatchObject({ schema_version: 1, default_java_env: "jdk17" });

    const second = store.sync();
    expect(second.written).toBe(false);
    expect(second.changes).toEqual([]);
  });

  it("keeps an explicit default over the legacy pointer", () => {
    const store = storeWith(
      [
        "current_java_env: jdk11",
        "default_java_env: jdk17",
        "java_environments:",
        "  - name: jdk11",
        "    java_home: /opt/jdk11",
        "  - name: jdk17",
        "    java_home: /opt/jdk17",
        "",
      ].join("\n"),
    );

    const report = store.sync();

    expect(report.changes).toEqual([
      "Removed obsolete current_java_env key.",
      "Upgraded schema_version 0 -> 1.",
    ]);
    expect(store.load().defaults.java).toBe("jdk17");
  });

  it("clears dangling defaults instead of failing", () => {
    const store = storeWith("schema_version: 1\ndefault_cc_env: gone\n");

    const report = store.sync();

    expect(report.changes).toEqual(['Cleared default_cc_env "gone" (no such entry).']);
    expect(store.load().defaults).toEqual({});
  });

  it("creates the file with the built-in presets", () => {
    const store = new ConfigStore(tempConfigPath());

    const report = store.sync({ presets: true });

    expect(report.created).toBe(true);
    expect(report.fromVersion).toBe(1);
    expect(report.presetsAdded).toEqual(["anthropic-cc", "moonshot-cc", "glmcc", "anycc", "kimicc"]);
    expect(report.changes).toEqual([`Created ${store.configPath}.`]);
    expect(store.load().environments.cc.get("glmcc")?.apiKey).toBe("${GLM_API_KEY}");
  });

  it("never replaces an entry that already uses a preset name", () => {
    const store = storeWith(
      [
        "schema_version: 1",
        "cc_environments:",
        "  - name: glmcc",
        "    api_key: test-secret",
        "",
      ].join("\n"),
    );

    const report = store.sync({ presets: true });

    expect(report.presetsAdded).toEqual(["anthropic-cc", "moonshot-cc", "anycc", "kimicc"]);
    expect(store.load().environments.cc.get("glmcc")?.apiKey).toBe("test-secret");
  });
});
