/**
 * AppContext resolves the envswitch home, config path and ambient process state once per
 * invocation, without mutating globals.
 * Usage: const ctx = createAppContext({ configPath: opts.config, debug: opts.debug }).
 */

import os from "node:os";

import { ConfigStore } from "../core/config-store.js";
import { HistoryRecorder } from "../core/logger.js";
import { createPathsContext, historyLogPath, type PathsContext } from "../core/paths.js";

// =============================================================================
// TYPES
// =============================================================================

export type AmbientProcess = {
  env: Record<string, string | undefined>;
  platform: NodeJS.Platform;
  homeDir: string;
  cwd: string;
};

export type AppContext = {
  paths: PathsContext;
  ambient: AmbientProcess;
  debug: boolean;
  store: ConfigStore;
  history: HistoryRecorder;
};

export type CreateAppContextInput = {
  configPath?: string;
  envswitchHome?: string;
  env?: Record<string, string | undefined>;
  platform?: NodeJS.Platform;
  homeDir?: string;
  cwd?: string;
  debug?: boolean;
};

// =============================================================================
// PUBLIC API
// =============================================================================

export function createAppContext(input: CreateAppContextInput = {}): AppContext {
  const env = input.env ?? process.env;
  const homeDir = input.homeDir ?? os.homedir();
  const paths = createPathsContext({
    envswitchHome: input.envswitchHome,
    configPath: input.configPath,
    env,
    homeDir,
  });
  const debug = input.debug ?? false;

  return {
    paths,
    ambient: {
      env,
      platform: input.platform ?? process.platform,
      homeDir,
      cwd: input.cwd ?? process.cwd(),
    },
    debug,
    store: new ConfigStore(paths.configPath),
    history: new HistoryRecorder(historyLogPath(paths), { debug }),
  };
}
