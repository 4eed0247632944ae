import type { Command } from "commander";

import { createAppContext, type AppContext } from "../app/context.js";
import { EnvironmentSwitch } from "../app/switch.js";
import { detectShell, parseShellTarget, type ShellTarget } from "../shell/targets.js";
import { normalizeCommandError } from "./command-errors.js";

// =============================================================================
// TYPES
// =============================================================================

export type GlobalOptions = {
  config?: string;
  debug?: boolean;
};

export type CommandScope = {
  ctx: AppContext;
  envSwitch: EnvironmentSwitch;
};

// =============================================================================
// ACTION WRAPPER
// =============================================================================

/**
 * Builds the per-invocation context from the global options, runs the action and turns
 * anything it throws into a UserFacingError titled for the command.
 */
export function runAction(command: Command, title: string, action: (scope: CommandScope) => void): void {
  const globals = command.optsWithGlobals<GlobalOptions>();
  const ctx = createAppContext({ configPath: globals.config, debug: globals.debug });
  const envSwitch = new EnvironmentSwitch(ctx.store, ctx.ambient, ctx.history);

  try {
    action({ ctx, envSwitch });
  } catch (error) {
    throw normalizeCommandError(error, { title, configPath: ctx.paths.configPath });
  } finally {
    ctx.history.close();
  }
}

export function resolveShell(value: string | undefined, ctx: AppContext): ShellTarget {
  return value === undefined
    ? detectShell(ctx.ambient.env, ctx.ambient.platform)
    : parseShellTarget(value);
}
