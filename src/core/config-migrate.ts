import { CONFIG_SCHEMA_VERSION } from "./registry.js";

// =============================================================================
// TYPES
// =============================================================================

export type RawConfigDocument = Record<string, unknown>;

export type MigrationResult = {
  document: RawConfigDocument;
  fromVersion: number;
  toVersion: number;
  changes: string[];
};

type Migration = {
  from: number;
  apply: (doc: RawConfigDocument, changes: string[]) => void;
};

// =============================================================================
// MIGRATIONS
// =============================================================================

const MIGRATIONS: Migration[] = [
  {
    // Version 0 predates schema_version and tracked the active JDK in current_java_env.
    from: 0,
    apply: (doc, changes) => {
      if ("current_java_env" in doc) {
        const current = doc.current_java_env;
        const hasDefault = doc.default_java_env !== undefined && doc.default_java_env !== null;
        if (typeof current === "string" && current.length > 0 && !hasDefault) {
          doc.default_java_env = current;
          changes.push(`Moved current_java_env "${current}" to default_java_env.`);
        }
        delete doc.current_java_env;
        changes.push("Removed obsolete current_java_env key.");
      }
    },
  },
];

/** Declared schema_version, or 0 for documents written before the key existed. */
export function readSchemaVersion(doc: RawConfigDocument): number {
  const version = doc.schema_version;
  return typeof version === "number" && Number.isInteger(version) && version >= 0 ? version : 0;
}

/**
 * Upgrades a raw document to the current schema in memory. Documents already at (or past)
 * the current version come back unchanged; the schema check rejects newer ones later.
 */
export function migrateDocument(raw: RawConfigDocument): MigrationResult {
  const fromVersion = readSchemaVersion(raw);
  const document: RawConfigDocument = { ...raw };
  const changes: string[] = [];

  if (fromVersion >= CONFIG_SCHEMA_VERSION) {
    return { document, fromVersion, toVersion: fromVersion, changes };
  }

  for (const migration of MIGRATIONS) {
    if (migration.from >= fromVersion) {
      migration.apply(document, changes);
    }
  }

  document.schema_version = CONFIG_SCHEMA_VERSION;
  changes.push(`Upgraded schema_version ${fromVersion} -> ${CONFIG_SCHEMA_VERSION}.`);

  return { document, fromVersion, toVersion: CONFIG_SCHEMA_VERSION, changes };
}
