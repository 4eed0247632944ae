import { findEnvironmentNameProblem, type JavaEnvironment } from "../core/environments.js";
import type { Configuration } from "../core/registry.js";
import { UNKNOWN } from "./vendor.js";
import { canonicalPath, type ScanCandidate } from "./scanner.js";

// =============================================================================
// TYPES
// =============================================================================

export type MergeSkipReason =
  | "already-registered"
  | "name-collision"
  | "previously-removed"
  | "invalid-name";

export type MergeOutcome =
  | { status: "added"; candidate: ScanCandidate; environment: JavaEnvironment }
  | {
      status: "skipped";
      candidate: ScanCandidate;
      reason: MergeSkipReason;
      /** Name of the registered entry involved, when there is one. */
      existing?: string;
      detail?: string;
    };

export type MergeReport = {
  outcomes: MergeOutcome[];
  added: JavaEnvironment[];
};

// =============================================================================
// MERGE
// =============================================================================

/**
 * Adds scan candidates to the Java set. Never replaces or renames a registered entry;
 * names the user removed earlier stay removed.
 */
export function mergeScanCandidates(
  config: Configuration,
  candidates: ScanCandidate[],
): MergeReport {
  const javaSet = config.environments.java;
  const registeredHomes = new Map<string, string>();
  for (const entry of javaSet.list()) {
    registeredHomes.set(canonicalPath(entry.home), entry.name);
  }

  const outcomes: MergeOutcome[] = [];
  const added: JavaEnvironment[] = [];

  for (const candidate of candidates) {
    const sameHome = registeredHomes.get(candidate.canonicalHome);
    if (sameHome !== undefined) {
      outcomes.push({ status: "skipped", candidate, reason: "already-registered", existing: sameHome });
      continue;
    }

    // Directory names become entry names; load() would reject the saved file otherwise.
    const nameProblem = findEnvironmentNameProblem(candidate.name);
    if (nameProblem) {
      outcomes.push({ status: "skipped", candidate, reason: "invalid-name", detail: nameProblem });
      continue;
    }

    if (config.removedJavaNames.includes(candidate.name)) {
      outcomes.push({ status: "skipped", candidate, reason: "previously-removed" });
      continue;
    }

    if (javaSet.has(candidate.name)) {
      outcomes.push({
        status: "skipped",
        candidate,
        reason: "name-collision",
        existing: candidate.name,
      });
      continue;
    }

    const environment: JavaEnvironment = {
      kind: "java",
      name: candidate.name,
      home: candidate.home,
      description: describeCandidate(candidate),
      source: "scanned",
    };
    javaSet.add(environment);
    registeredHomes.set(candidate.canonicalHome, environment.name);
    added.push(environment);
    outcomes.push({ status: "added", candidate, environment });
  }

  return { outcomes, added };
}

export function describeCandidate(candidate: ScanCandidate): string {
  const parts = [candidate.vendor, candidate.version].filter((part) => part !== UNKNOWN);
  return parts.length > 0 ? parts.join(" ") : "Detected Java installation";
}
