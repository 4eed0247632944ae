import os from "node:os";
import path from "node:path";

// =============================================================================
// TYPES
// =============================================================================

export type PathsContext = {
  envswitchHome: string;
  configPath: string;
};

export type ResolvePathsOptions = {
  envswitchHome?: string;
  configPath?: string;
  env?: Record<string, string | undefined>;
  homeDir?: string;
};

export const CONFIG_FILE_NAME = "config.yaml";
export const HISTORY_FILE_NAME = "history.jsonl";

// =============================================================================
// CONTEXT
// =============================================================================

export function resolveEnvswitchHome(opts: ResolvePathsOptions = {}): string {
  if (opts.envswitchHome) {
    return path.resolve(opts.envswitchHome);
  }

  const env = opts.env ?? process.env;
  if (env.ENVSWITCH_HOME) {
    return path.resolve(env.ENVSWITCH_HOME);
  }

  return path.join(opts.homeDir ?? os.homedir(), ".envswitch");
}

export function createPathsContext(opts: ResolvePathsOptions = {}): PathsContext {
  const envswitchHome = resolveEnvswitchHome(opts);
  const configPath = opts.configPath
    ? path.resolve(opts.configPath)
    : path.join(envswitchHome, CONFIG_FILE_NAME);

  return { envswitchHome, configPath };
}

// =============================================================================
// PATH HELPERS
// =============================================================================

export function historyLogPath(paths: PathsContext): string {
  return path.join(paths.envswitchHome, HISTORY_FILE_NAME);
}

export function expandHomeDir(value: string, homeDir: string = os.homedir()): string {
  if (value === "~") return homeDir;
  if (value.startsWith("~/") || value.startsWith("~\\")) {
    return path.join(homeDir, value.slice(2));
  }
  return value;
}
