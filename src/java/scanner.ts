import fs from "node:fs";
import path from "node:path";

import { formatErrorMessage } from "../core/error-format.js";
import { ERROR_KINDS } from "../core/errors.js";
import { errorCode } from "../core/utils.js";
import type { ScanPathUnreadableWarning } from "../core/warnings.js";
import { readReleaseFile } from "./release-file.js";
import { isExplicitRoot, javaExecutableName, type ScanRoot, type ScanRootOrigin } from "./roots.js";
import {
  UNKNOWN,
  deriveJavaName,
  inferVendorFromPath,
  inferVersionFromName,
  javaFingerprint,
} from "./vendor.js";

// =============================================================================
// TYPES
// =============================================================================

export type ScanCandidate = {
  /** Home path as discovered under its root. */
  home: string;
  /** Symlink-free home path; identical values mean the same installation. */
  canonicalHome: string;
  version: string;
  vendor: string;
  /** `vendor@version`; absent when the version is unknown. */
  fingerprint?: string;
  name: string;
  origin: ScanRootOrigin;
  root: string;
};

export type SkipReason = "duplicate-path" | "duplicate-fingerprint";

export type SkippedCandidate = {
  candidate: ScanCandidate;
  reason: SkipReason;
  /** Home of the accepted candidate this one duplicates. */
  keptHome: string;
};

/**
 * How two installations with the same vendor@version but different canonical paths are
 * treated. `first-discovered` keeps the one found first in root order and reports the
 * rest as skipped; `keep-all` keeps every one of them.
 */
export type FingerprintPolicy = "first-discovered" | "keep-all";

export type ScanOptions = {
  platform?: NodeJS.Platform;
  fingerprintPolicy?: FingerprintPolicy;
};

export type ScanReport = {
  candidates: ScanCandidate[];
  skipped: SkippedCandidate[];
  warnings: ScanPathUnreadableWarning[];
};

const MAC_BUNDLE_HOME = path.join("Contents", "Home");

// =============================================================================
// PUBLIC API
// =============================================================================

export function scanJavaRoots(roots: ScanRoot[], options: ScanOptions = {}): ScanReport {
  const platform = options.platform ?? process.platform;
  const policy = options.fingerprintPolicy ?? "first-discovered";

  const warnings: ScanPathUnreadableWarning[] = [];
  const found: ScanCandidate[] = [];
  for (const root of roots) {
    found.push(...probeRoot(root, platform, warnings));
  }

  const candidates: ScanCandidate[] = [];
  const skipped: SkippedCandidate[] = [];
  const byCanonical = new Map<string, ScanCandidate>();
  const byFingerprint = new Map<string, ScanCandidate>();

  for (const candidate of found) {
    const samePath = byCanonical.get(candidate.canonicalHome);
    if (samePath) {
      skipped.push({ candidate, reason: "duplicate-path", keptHome: samePath.home });
      continue;
    }

    const sameFingerprint =
      policy === "first-discovered" && candidate.fingerprint
        ? byFingerprint.get(candidate.fingerprint)
        : undefined;
    if (sameFingerprint) {
      skipped.push({ candidate, reason: "duplicate-fingerprint", keptHome: sameFingerprint.home });
      continue;
    }

    byCanonical.set(candidate.canonicalHome, candidate);
    if (candidate.fingerprint && !byFingerprint.has(candidate.fingerprint)) {
      byFingerprint.set(candidate.fingerprint, candidate);
    }
    candidates.push(candidate);
  }

  return { candidates, skipped, warnings };
}

/** True when the directory looks like a JDK home: a `release` file or `bin/java`. */
export function isJavaHome(dir: string, platform: NodeJS.Platform = process.platform): boolean {
  return (
    isFile(path.join(dir, "release")) || isFile(path.join(dir, "bin", javaExecutableName(platform)))
  );
}

/** Resolves symlinks; falls back to the absolute path when the target cannot be resolved. */
export function canonicalPath(target: string): string {
  try {
    return fs.realpathSync(target);
  } catch {
    return path.resolve(target);
  }
}

// =============================================================================
// PROBING
// =============================================================================

function probeRoot(
  root: ScanRoot,
  platform: NodeJS.Platform,
  warnings: ScanPathUnreadableWarning[],
): ScanCandidate[] {
  let stat: fs.Stats;
  try {
    stat = fs.statSync(root.path);
  } catch (err) {
    if (errorCode(err) === "ENOENT" && !isExplicitRoot(root)) {
      return [];
    }
    warnings.push(unreadable(root.path, describeFsError(err)));
    return [];
  }

  if (!stat.isDirectory()) {
    warnings.push(unreadable(root.path, "not a directory"));
    return [];
  }

  if (isJavaHome(root.path, platform)) {
    return [buildCandidate(root.path, homeDirName(root.path), root, warnings)];
  }

  let entries: fs.Dirent[];
  try {
    entries = fs.readdirSync(root.path, { withFileTypes: true });
  } catch (err) {
    warnings.push(unreadable(root.path, describeFsError(err)));
    return [];
  }

  const candidates: ScanCandidate[] = [];
  const names = entries
    .filter((entry) => entry.isDirectory() || entry.isSymbolicLink())
    .map((entry) => entry.name)
    .filter((name) => !name.startsWith("."))
    .sort();

  for (const name of names) {
    const child = path.join(root.path, name);
    const home = resolveChildHome(child, platform, warnings);
    if (!home) continue;

    candidates.push(buildCandidate(home, name, root, warnings));
  }

  return candidates;
}

function resolveChildHome(
  child: string,
  platform: NodeJS.Platform,
  warnings: ScanPathUnreadableWarning[],
): string | null {
  try {
    if (!fs.statSync(child).isDirectory()) return null;
  } catch (err) {
    // Dangling symlinks are not installations.
    if (errorCode(err) !== "ENOENT") {
      warnings.push(unreadable(child, describeFsError(err)));
    }
    return null;
  }

  if (isJavaHome(child, platform)) return child;

  const bundleHome = path.join(child, MAC_BUNDLE_HOME);
  if (isJavaHome(bundleHome, platform)) return bundleHome;

  return null;
}

function buildCandidate(
  home: string,
  dirName: string,
  root: ScanRoot,
  warnings: ScanPathUnreadableWarning[],
): ScanCandidate {
  let release: Record<string, string> | null;
  try {
    release = readReleaseFile(home);
  } catch (err) {
    warnings.push(unreadable(path.join(home, "release"), describeFsError(err)));
    release = null;
  }

  const version =
    nonEmpty(release?.JAVA_VERSION) ?? inferVersionFromName(dirName) ?? UNKNOWN;
  const vendor = nonEmpty(release?.IMPLEMENTOR) ?? inferVendorFromPath(home) ?? UNKNOWN;

  const candidate: ScanCandidate = {
    home,
    canonicalHome: canonicalPath(home),
    version,
    vendor,
    name: deriveJavaName(dirName),
    origin: root.origin,
    root: root.path,
  };

  const fingerprint = javaFingerprint(vendor, version);
  if (fingerprint) candidate.fingerprint = fingerprint;

  return candidate;
}

// =============================================================================
// INTERNALS
// =============================================================================

function unreadable(target: string, detail: string): ScanPathUnreadableWarning {
  return { kind: ERROR_KINDS.scanPathUnreadable, path: target, detail };
}

function describeFsError(err: unknown): string {
  return errorCode(err) ?? formatErrorMessage(err);
}

/** Directory name that identifies a home; `<x>.jdk/Contents/Home` is named after `<x>.jdk`. */
function homeDirName(home: string): string {
  const base = path.basename(home);
  const parent = path.dirname(home);
  if (base === "Home" && path.basename(parent) === "Contents") {
    return path.basename(path.dirname(parent));
  }
  return base;
}

function nonEmpty(value: string | undefined): string | undefined {
  return value && value.trim().length > 0 ? value.trim() : undefined;
}

function isFile(candidate: string): boolean {
  try {
    return fs.statSync(candidate).isFile();
  } catch {
    return false;
  }
}
