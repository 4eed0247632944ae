import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, describe, expect, it } from "vitest";

import { parseHistoryLine, readHistory } from "./history.js";

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

function writeLog(lines: string[]): string {
  const dir = makeTempDir("history-read-");
  const logPath = path.join(dir, "history.jsonl");
  fs.writeFileSync(logPath, `${lines.join("\n")}\n`);
  return logPath;
}

const EVENTS = [
  { ts: "2024-01-01T00:00:00.000Z", type: "env.add", kind: "java", name: "jdk17" },
  { ts: "2024-01-02T00:00:00.000Z", type: "env.use", kind: "cc", name: "glmcc", payload: { shell: "zsh" } },
  { ts: "2024-01-03T00:00:00.000Z", type: "env.use", kind: "java", name: "jdk17" },
  { ts: "2024-01-04T00:00:00.000Z", type: "config.sync", payload: { from_version: 0 } },
];

describe("readHistory", () => {
  it("returns nothing when the log does not exist", () => {
    expect(readHistory(path.join(os.tmpdir(), "missing-envswitch-history.jsonl"))).toEqual({
      events: [],
      skippedLines: 0,
    });
  });

  it("filters by kind and keeps the most recent events", () => {
    const logPath = writeLog(EVENTS.map((event) => JSON.stringify(event)));

    const javaOnly = readHistory(logPath, { kind: "java" });
    expect(javaOnly.events.map((event) => event.ts)).toEqual([
      "2024-01-01T00:00:00.000Z",
      "2024-01-03T00:00:00.000Z",
    ]);

    const lastTwo = readHistory(logPath, { limit: 2 });
    expect(lastTwo.events.map((event) => event.type)).toEqual(["env.use", "config.sync"]);
  });

  it("counts lines that are not history events", () => {
    const logPath = writeLog([
      JSON.stringify(EVENTS[0]),
      "{not json",
      JSON.stringify({ ts: "2024-01-05T00:00:00.000Z", type: "task.start" }),
    ]);

    const result = readHistory(logPath);
    expect(result.events).toHaveLength(1);
    expect(result.skippedLines).toBe(2);
  });
});

describe("parseHistoryLine", () => {
  it("keeps nested payload values", () => {
    const event = parseHistoryLine(
      JSON.stringify({
        ts: "2024-01-06T00:00:00.000Z",
        type: "java.scan",
        kind: "java",
        payload: { added: ["jdk17", "jdk21"], roots: 3 },
      }),
    );

    expect(event?.payload).toEqual({ added: ["jdk17", "jdk21"], roots: 3 });
  });
});
