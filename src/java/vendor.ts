// =============================================================================
// VENDOR / VERSION INFERENCE
// =============================================================================

export const UNKNOWN = "unknown";

const VENDOR_PATTERNS: Array<{ pattern: RegExp; vendor: string }> = [
  { pattern: /adoptium|adoptopenjdk|temurin/, vendor: "Eclipse Adoptium" },
  { pattern: /amazon|corretto/, vendor: "Amazon Corretto" },
  { pattern: /microsoft/, vendor: "Microsoft" },
  { pattern: /oracle/, vendor: "Oracle" },
  { pattern: /openlogic/, vendor: "OpenLogic" },
  { pattern: /zulu|azul/, vendor: "Azul Zulu" },
  { pattern: /liberica|bellsoft/, vendor: "BellSoft Liberica" },
  { pattern: /graalvm/, vendor: "GraalVM" },
  { pattern: /openjdk/, vendor: "OpenJDK" },
];

/** Vendor guessed from well-known directory names, or null when nothing matches. */
export function inferVendorFromPath(home: string): string | null {
  const lower = home.toLowerCase();
  const match = VENDOR_PATTERNS.find(({ pattern }) => pattern.test(lower));
  return match ? match.vendor : null;
}

/**
 * First dotted number in a directory name: `java-17-openjdk-amd64` -> `17`,
 * `jdk-17.0.2+8` -> `17.0.2`, `jdk1.8.0_292` -> `1.8.0`.
 */
export function inferVersionFromName(name: string): string | null {
  const match = /(?:^|\D)(\d+(?:\.\d+){0,3})(?!\d)/.exec(name);
  return match ? match[1] : null;
}

export function javaFingerprint(vendor: string, version: string): string | undefined {
  if (version === UNKNOWN) return undefined;
  return `${vendor}@${version}`;
}

/** Registry name for a discovered JDK directory: `jdk-17` -> `jdk17`, `temurin-21.jdk` -> `temurin-21`. */
export function deriveJavaName(dirName: string): string {
  return dirName.replace(/\.jdk$/i, "").replaceAll("jdk-", "jdk").replaceAll("jre-", "jre");
}
