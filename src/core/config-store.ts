import fs from "node:fs";
import path from "node:path";
import { randomUUID } from "node:crypto";

import fse from "fs-extra";
import yaml from "js-yaml";

import {
  configurationToDocument,
  documentToConfiguration,
  parseConfigDocument,
} from "./config.js";
import { migrateDocument, readSchemaVersion, type RawConfigDocument } from "./config-migrate.js";
import { formatErrorMessage } from "./error-format.js";
import { ConfigIoError, ConfigParseError } from "./errors.js";
import { CC_PRESETS } from "./presets.js";
import {
  CONFIG_SCHEMA_VERSION,
  clearDefaultName,
  createEmptyConfiguration,
  findDanglingDefaults,
  type Configuration,
} from "./registry.js";

// =============================================================================
// TYPES
// =============================================================================

export type SyncOptions = {
  /** Add the built-in CC profiles whose names are not taken yet. */
  presets?: boolean;
};

export type SyncReport = {
  configPath: string;
  fromVersion: number;
  toVersion: number;
  created: boolean;
  changes: string[];
  presetsAdded: string[];
  written: boolean;
};

const DEFAULT_KEYS = { java: "default_java_env", cc: "default_cc_env" } as const;
const SECTION_KEYS = { java: "java_environments", cc: "cc_environments" } as const;

// =============================================================================
// STORE
// =============================================================================

/**
 * Owns the single YAML configuration file. Reads never write; every save replaces the
 * file through a same-directory temp file and a rename.
 */
export class ConfigStore {
  constructor(public readonly configPath: string) {}

  exists(): boolean {
    return fs.existsSync(this.configPath);
  }

  load(): Configuration {
    const raw = this.readRaw();
    if (raw === null) {
      return createEmptyConfiguration();
    }

    const { document } = migrateDocument(parseYamlDocument(raw, this.configPath));
    const config = documentToConfiguration(
      parseConfigDocument(document, this.configPath),
      this.configPath,
    );

    const dangling = findDanglingDefaults(config);
    if (dangling.length > 0) {
      const details = dangling.map(
        (kind) =>
          `${DEFAULT_KEYS[kind]}: "${config.defaults[kind] ?? ""}" does not match any entry in ${SECTION_KEYS[kind]}`,
      );
      throw new ConfigParseError(
        `Invalid configuration at ${this.configPath}:\n${details.join("\n")}`,
      );
    }

    return config;
  }

  save(config: Configuration): void {
    writeFileAtomic(this.configPath, serializeConfiguration(config));
    config.schemaVersion = CONFIG_SCHEMA_VERSION;
  }

  sync(options: SyncOptions = {}): SyncReport {
    const raw = this.readRaw();
    const created = raw === null;
    const rawDoc: RawConfigDocument = raw === null ? {} : parseYamlDocument(raw, this.configPath);
    const fromVersion = raw === null ? CONFIG_SCHEMA_VERSION : readSchemaVersion(rawDoc);

    const migration = migrateDocument(rawDoc);
    const changes = raw === null ? [] : [...migration.changes];
    const config = documentToConfiguration(
      parseConfigDocument(migration.document, this.configPath),
      this.configPath,
    );

    for (const kind of findDanglingDefaults(config)) {
      const previous = clearDefaultName(config, kind);
      changes.push(`Cleared ${DEFAULT_KEYS[kind]} "${previous ?? ""}" (no such entry).`);
    }

    const presetsAdded: string[] = [];
    if (options.presets) {
      for (const preset of CC_PRESETS) {
        if (!config.environments.cc.has(preset.name)) {
          config.environments.cc.add({ ...preset });
          presetsAdded.push(preset.name);
        }
      }
    }

    const serialized = serializeConfiguration(config);
    const written = serialized !== raw;
    if (written) {
      writeFileAtomic(this.configPath, serialized);
      if (created) {
        changes.push(`Created ${this.configPath}.`);
      }
    }

    return {
      configPath: this.configPath,
      fromVersion,
      toVersion: CONFIG_SCHEMA_VERSION,
      created: created && written,
      changes,
      presetsAdded,
      written,
    };
  }

  private readRaw(): string | null {
    if (!fs.existsSync(this.configPath)) {
      return null;
    }

    try {
      return fs.readFileSync(this.configPath, "utf8");
    } catch (err) {
      throw new ConfigIoError(
        `Failed to read configuration at ${this.configPath}: ${formatErrorMessage(err)}`,
        err,
      );
    }
  }
}

// =============================================================================
// SERIALIZATION
// =============================================================================

export function serializeConfiguration(config: Configuration): string {
  return yaml.dump(configurationToDocument(config), { lineWidth: -1, noRefs: true });
}

function parseYamlDocument(raw: string, file: string): RawConfigDocument {
  let doc: unknown;
  try {
    doc = yaml.load(raw);
  } catch (err) {
    const location =
      err instanceof yaml.YAMLException
        ? ` (line ${err.mark.line + 1}, column ${err.mark.column + 1})`
        : "";
    throw new ConfigParseError(
      `Failed to parse YAML configuration at ${file}${location}: ${formatErrorMessage(err)}`,
      err,
    );
  }

  if (doc === undefined || doc === null) {
    return {};
  }
  if (!isPlainObject(doc)) {
    throw new ConfigParseError(
      `Invalid configuration at ${file}:\n<root>: Expected object, received ${Array.isArray(doc) ? "array" : typeof doc}`,
    );
  }

  return doc;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// =============================================================================
// ATOMIC WRITE
// =============================================================================

export function writeFileAtomic(filePath: string, content: string): void {
  const tmpPath = `${filePath}.${randomUUID()}.tmp`;

  try {
    fse.ensureDirSync(path.dirname(filePath));

    const fd = fs.openSync(tmpPath, "w");
    try {
      fs.writeFileSync(fd, content, "utf8");
      fs.fsyncSync(fd);
    } finally {
      fs.closeSync(fd);
    }

    fs.renameSync(tmpPath, filePath);
  } catch (err) {
    if (fs.existsSync(tmpPath)) {
      fse.removeSync(tmpPath);
    }
    throw new ConfigIoError(
      `Failed to write configuration at ${filePath}: ${formatErrorMessage(err)}`,
      err,
    );
  }
}
