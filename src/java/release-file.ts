import fs from "node:fs";
import path from "node:path";

// =============================================================================
// JDK `release` METADATA
// =============================================================================

export const RELEASE_FILE_NAME = "release";

export type ReleaseInfo = Record<string, string>;

/**
 * Parses the KEY="value" lines of a JDK `release` file. Unquoted values are accepted;
 * lines without `=` are ignored.
 */
export function parseReleaseFile(content: string): ReleaseInfo {
  const info: ReleaseInfo = {};

  for (const rawLine of content.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line || line.startsWith("#")) continue;

    const eq = line.indexOf("=");
    if (eq <= 0) continue;

    const key = line.slice(0, eq).trim();
    let value = line.slice(eq + 1).trim();
    if (value.length >= 2 && value.startsWith('"') && value.endsWith('"')) {
      value = value.slice(1, -1);
    }
    info[key] = value;
  }

  return info;
}

/** Reads `<home>/release`; null when the file is absent. I/O errors propagate. */
export function readReleaseFile(home: string): ReleaseInfo | null {
  const releasePath = path.join(home, RELEASE_FILE_NAME);
  if (!fs.existsSync(releasePath)) {
    return null;
  }
  return parseReleaseFile(fs.readFileSync(releasePath, "utf8"));
}
