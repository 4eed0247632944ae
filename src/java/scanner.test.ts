import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, describe, expect, it, vi } from "vitest";

import type { ScanRoot } from "./roots.js";
import { canonicalPath, isJavaHome, scanJavaRoots } from "./scanner.js";

// =============================================================================
// FIXTURES
// =============================================================================

type JdkFixture = {
  release?: Record<string, string>;
  executable?: boolean;
};

const tempDirs: string[] = [];

afterEach(() => {
  for (const dir of tempDirs.splice(0)) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
});

function makeBase(): string {
  const dir = fs.realpathSync(fs.mkdtempSync(path.join(os.tmpdir(), "envswitch-scan-")));
  tempDirs.push(dir);
  return dir;
}

function permissionDenied(target: string): Error {
  return Object.assign(new Error(`EACCES: permission denied, open '${target}'`), { code: "EACCES" });
}

function makeJdk(home: string, fixture: JdkFixture = {}): string {
  fs.mkdirSync(path.join(home, "bin"), { recursive: true });
  if (fixture.executable !== false) {
    fs.writeFileSync(path.join(home, "bin", "java"), "");
  }
  if (fixture.release) {
    const lines = Object.entries(fixture.release).map(([key, value]) => `${key}="${value}"`);
    fs.writeFileSync(path.join(home, "release"), `${lines.join("\n")}\n`);
  }
  return home;
}

function customRoot(rootPath: string): ScanRoot {
  return { path: rootPath, origin: "custom" };
}

const ADOPTIUM_17 = { IMPLEMENTOR: "Eclipse Adoptium", JAVA_VERSION: "17.0.2" };

// =============================================================================
// TESTS
// =============================================================================

describe("isJavaHome", () => {
  it("accepts a release file or bin/java", () => {
    const base = makeBase();
    const withRelease = makeJdk(path.join(base, "a"), { executable: false, release: ADOPTIUM_17 });
    const withBinary = makeJdk(path.join(base, "b"));
    const empty = makeJdk(path.join(base, "c"), { executable: false });

    expect(isJavaHome(withRelease, "linux")).toBe(true);
    expect(isJavaHome(withBinary, "linux")).toBe(true);
    expect(isJavaHome(empty, "linux")).toBe(false);
  });
});

describe("scanJavaRoots", () => {
  it("builds candidates from release metadata", () => {
    const base = makeBase();
    const home = makeJdk(path.join(base, "jdk-17"), { release: ADOPTIUM_17 });

    const report = scanJavaRoots([customRoot(base)], { platform: "linux" });

    expect(report.warnings).toEqual([]);
    expect(report.candidates).toEqual([
      {
        home,
        canonicalHome: home,
        version: "17.0.2",
        vendor: "Eclipse Adoptium",
        fingerprint: "Eclipse Adoptium@17.0.2",
        name: "jdk17",
        origin: "custom",
        root: base,
      },
    ]);
  });

  it("reports a symlinked installation once", () => {
    const base = makeBase();
    const home = makeJdk(path.join(base, "jdk-17"), { release: ADOPTIUM_17 });
    fs.symlinkSync(home, path.join(base, "current"));

    const report = scanJavaRoots([customRoot(base)], { platform: "linux" });

    expect(report.candidates.map((candidate) => candidate.home)).toEqual([
      path.join(base, "current"),
    ]);
    expect(report.skipped).toEqual([
      {
        candidate: expect.objectContaining({ home }),
        reason: "duplicate-path",
        keptHome: path.join(base, "current"),
      },
    ]);
  });

  it("keeps the first of two copies with the same vendor and version", () => {
    const base = makeBase();
    makeJdk(path.join(base, "jdk-17-copy"), { release: ADOPTIUM_17 });
    makeJdk(path.join(base, "temurin-17"), { release: ADOPTIUM_17 });

    const report = scanJavaRoots([customRoot(base)], { platform: "linux" });

    expect(report.candidates.map((candidate) => candidate.name)).toEqual(["jdk17-copy"]);
    expect(report.skipped.map((skip) => skip.reason)).toEqual(["duplicate-fingerprint"]);
    expect(report.skipped[0].keptHome).toBe(path.join(base, "jdk-17-copy"));
  });

  it("keeps every copy under the keep-all policy", () => {
    const base = makeBase();
    makeJdk(path.join(base, "jdk-17-copy"), { release: ADOPTIUM_17 });
    makeJdk(path.join(base, "temurin-17"), { release: ADOPTIUM_17 });

    const report = scanJavaRoots([customRoot(base)], {
      platform: "linux",
      fingerprintPolicy: "keep-all",
    });

    expect(report.candidates.map((candidate) => candidate.name)).toEqual([
      "jdk17-copy",
      "temurin-17",
    ]);
    expect(report.skipped).toEqual([]);
  });

  it("never merges installations whose version is unknown", () => {
    const base = makeBase();
    makeJdk(path.join(base, "build-a"));
    makeJdk(path.join(base, "build-b"));

    const report = scanJavaRoots([customRoot(base)], { platform: "linux" });

    expect(report.candidates).toHaveLength(2);
    expect(report.candidates.every((candidate) => candidate.version === "unknown")).toBe(true);
    expect(report.candidates.every((candidate) => candidate.fingerprint === undefined)).toBe(true);
  });

  it("finds macOS bundle homes and names them after the bundle", () => {
    const base = makeBase();
    const home = makeJdk(path.join(base, "temurin-21.jdk", "Contents", "Home"));

    const report = scanJavaRoots([customRoot(base)], { platform: "darwin" });

    expect(report.candidates).toHaveLength(1);
    expect(report.candidates[0]).toMatchObject({
      home,
      name: "temurin-21",
      version: "21",
      vendor: "Eclipse Adoptium",
    });
  });

  it("accepts a root that is itself a JDK home", () => {
    const base = makeBase();
    const home = makeJdk(path.join(base, "jdk-21"), {
      release: { IMPLEMENTOR: "Oracle Corporation", JAVA_VERSION: "21.0.1" },
    });

    const report = scanJavaRoots([{ path: home, origin: "java-home" }], { platform: "linux" });

    expect(report.candidates.map((candidate) => [candidate.name, candidate.origin])).toEqual([
      ["jdk21", "java-home"],
    ]);
  });

  it("ignores hidden entries and directories that are not JDKs", () => {
    const base = makeBase();
    makeJdk(path.join(base, ".cache"));
    fs.mkdirSync(path.join(base, "docs"));
    fs.writeFileSync(path.join(base, "README"), "");

    const report = scanJavaRoots([customRoot(base)], { platform: "linux" });

    expect(report.candidates).toEqual([]);
    expect(report.warnings).toEqual([]);
  });

  it("warns about explicit roots that are missing or not directories", () => {
    const base = makeBase();
    const file = path.join(base, "not-a-dir");
    fs.writeFileSync(file, "");
    const missing = path.join(base, "missing");

    const report = scanJavaRoots([customRoot(file), customRoot(missing)], { platform: "linux" });

    expect(report.candidates).toEqual([]);
    expect(report.warnings).toEqual([
      { kind: "ScanPathUnreadable", path: file, detail: "not a directory" },
      { kind: "ScanPathUnreadable", path: missing, detail: "ENOENT" },
    ]);
  });

  it("keeps scanning other roots when a root cannot be listed", () => {
    const locked = makeBase();
    const open = makeBase();
    const home = makeJdk(path.join(open, "jdk-17"), { release: ADOPTIUM_17 });
    vi.spyOn(fs, "readdirSync").mockImplementationOnce(() => {
      throw permissionDenied(locked);
    });

    const report = scanJavaRoots([customRoot(locked), customRoot(open)], { platform: "linux" });

    expect(report.warnings).toEqual([
      { kind: "ScanPathUnreadable", path: locked, detail: "EACCES" },
    ]);
    expect(report.candidates.map((candidate) => candidate.home)).toEqual([home]);
  });

  it("still reports an installation whose release file cannot be read", () => {
    const base = makeBase();
    const home = makeJdk(path.join(base, "jdk-17"), { release: ADOPTIUM_17 });
    vi.spyOn(fs, "readFileSync").mockImplementationOnce(() => {
      throw permissionDenied(path.join(home, "release"));
    });

    const report = scanJavaRoots([customRoot(base)], { platform: "linux" });

    expect(report.warnings).toEqual([
      { kind: "ScanPathUnreadable", path: path.join(home, "release"), detail: "EACCES" },
    ]);
    expect(report.candidates).toHaveLength(1);
    expect(report.candidates[0]).toMatchObject({ home, name: "jdk17", version: "17" });
  });

  it("stays silent about missing platform defaults", () => {
    const base = makeBase();

    const report = scanJavaRoots([{ path: path.join(base, "missing"), origin: "platform" }], {
      platform: "linux",
    });

    expect(report.warnings).toEqual([]);
  });

  it("skips dangling symlinks", () => {
    const base = makeBase();
    fs.symlinkSync(path.join(base, "gone"), path.join(base, "jdk-8"));

    const report = scanJavaRoots([customRoot(base)], { platform: "linux" });

    expect(report.candidates).toEqual([]);
    expect(report.warnings).toEqual([]);
  });

  it("gives the same result when run twice", () => {
    const base = makeBase();
    makeJdk(path.join(base, "jdk-17"), { release: ADOPTIUM_17 });
    makeJdk(path.join(base, "jdk-21"));

    const first = scanJavaRoots([customRoot(base)], { platform: "linux" });
    const second = scanJavaRoots([customRoot(base)], { platform: "linux" });

    expect(second).toEqual(first);
  });
});

describe("canonicalPath", () => {
  it("falls back to the absolute path for missing targets", () => {
    expect(canonicalPath("/definitely/not/here/../there")).toBe("/definitely/not/there");
  });
});
