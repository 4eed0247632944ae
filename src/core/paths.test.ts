import path from "node:path";

import { describe, expect, it } from "vitest";

import { createPathsContext, expandHomeDir, historyLogPath, resolveEnvswitchHome } from "./paths.js";

describe("resolveEnvswitchHome", () => {
  it("prefers the explicit option, then ENVSWITCH_HOME, then ~/.envswitch", () => {
    expect(resolveEnvswitchHome({ envswitchHome: "/srv/es", env: { ENVSWITCH_HOME: "/x" } })).toBe(
      "/srv/es",
    );
    expect(resolveEnvswitchHome({ env: { ENVSWITCH_HOME: "/x" } })).toBe("/x");
    expect(resolveEnvswitchHome({ env: {}, homeDir: "/home/dev" })).toBe("/home/dev/.envswitch");
  });
});

describe("createPathsContext", () => {
  it("places the config and history inside the home unless overridden", () => {
    const paths = createPathsContext({ env: { ENVSWITCH_HOME: "/srv/es" } });

    expect(paths).toEqual({ envswitchHome: "/srv/es", configPath: "/srv/es/config.yaml" });
    expect(historyLogPath(paths)).toBe("/srv/es/history.jsonl");

    const overridden = createPathsContext({ env: {}, homeDir: "/home/dev", configPath: "alt.yaml" });
    expect(overridden.configPath).toBe(path.resolve("alt.yaml"));
  });
});

describe("expandHomeDir", () => {
  it("expands a leading tilde only", () => {
    expect(expandHomeDir("~", "/home/dev")).toBe("/home/dev");
    expect(expandHomeDir("~/jdks/jdk-17", "/home/dev")).toBe("/home/dev/jdks/jdk-17");
    expect(expandHomeDir("/opt/~jdk", "/home/dev")).toBe("/opt/~jdk");
  });
});
