import { describe, expect, it } from "vitest";

import { migrateDocument, readSchemaVersion } from "./config-migrate.js";

describe("readSchemaVersion", () => {
  it("treats a missing or malformed version as 0", () => {
    expect(readSchemaVersion({})).toBe(0);
    expect(readSchemaVersion({ schema_version: "1" })).toBe(0);
    expect(readSchemaVersion({ schema_version: 1 })).toBe(1);
  });
});

describe("migrateDocument", () => {
  it("returns current documents unchanged", () => {
    const raw = { schema_version: 1, default_java_env: "jdk17" };

    const result = migrateDocument(raw);

    expect(result).toEqual({ document: raw, fromVersion: 1, toVersion: 1, changes: [] });
  });

  it("stamps the version on documents that predate it", () => {
    const result = migrateDocument({ java_environments: [] });

    expect(result.document).toEqual({ java_environments: [], schema_version: 1 });
    expect(result.changes).toEqual(["Upgraded schema_version 0 -> 1."]);
  });

  it("does not mutate the input document", () => {
    const raw: Record<string, unknown> = { current_java_env: "jdk17" };

    migrateDocument(raw);

    expect(raw).toEqual({ current_java_env: "jdk17" });
  });

  it("drops an empty legacy pointer without setting a default", () => {
    const result = migrateDocument({ current_java_env: "" });

    expect(result.document).toEqual({ schema_version: 1 });
  });
});
