import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, describe, expect, it } from "vitest";

import { parseReleaseFile, readReleaseFile } from "./release-file.js";

const tempDirs: string[] = [];

afterEach(() => {
  for (const dir of tempDirs.splice(0)) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
});

function makeTempDir(prefix: string): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), prefix));
  tempDirs.push(dir);
  return dir;
}

describe("parseReleaseFile", () => {
  it("reads quoted and unquoted values and skips comments", () => {
    const info = parseReleaseFile(
      [
        "# generated",
        'IMPLEMENTOR="Eclipse Adoptium"',
        'JAVA_VERSION="17.0.2"',
        "OS_ARCH=x86_64",
        "not a pair",
        "",
      ].join("\r\n"),
    );

    expect(info).toEqual({
      IMPLEMENTOR: "Eclipse Adoptium",
      JAVA_VERSION: "17.0.2",
      OS_ARCH: "x86_64",
    });
  });
});

describe("readReleaseFile", () => {
  it("returns null when the home has no release file", () => {
    const home = makeTempDir("release-file-");

    expect(readReleaseFile(home)).toBeNull();
  });
});
