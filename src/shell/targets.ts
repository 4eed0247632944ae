import path from "node:path";

import { UnsupportedShellError } from "../core/errors.js";

// =============================================================================
// SHELL TARGETS
// =============================================================================

export const SHELL_TARGETS = ["bash", "zsh", "fish", "powershell", "cmd"] as const;

export type ShellTarget = (typeof SHELL_TARGETS)[number];

const SHELL_ALIASES: Record<string, ShellTarget> = {
  pwsh: "powershell",
  "powershell.exe": "powershell",
  "pwsh.exe": "powershell",
  "cmd.exe": "cmd",
};

export function isShellTarget(value: string): value is ShellTarget {
  return SHELL_TARGETS.some((target) => target === value);
}

export function parseShellTarget(value: string): ShellTarget {
  const normalized = value.trim().toLowerCase();
  if (isShellTarget(normalized)) return normalized;

  const alias = SHELL_ALIASES[normalized];
  if (alias) return alias;

  throw new UnsupportedShellError(value);
}

/**
 * Best guess for the calling shell: `SHELL` on Unix-likes (and Git Bash), PowerShell when
 * `PSModulePath` is set, otherwise cmd on Windows and bash elsewhere.
 */
export function detectShell(
  env: Record<string, string | undefined>,
  platform: NodeJS.Platform,
): ShellTarget {
  const shell = env.SHELL;
  if (shell) {
    const name = path.basename(shell.replaceAll("\\", "/")).toLowerCase();
    const candidate = name.replace(/\.exe$/, "");
    if (candidate === "bash" || candidate === "zsh" || candidate === "fish") {
      return candidate;
    }
    if (candidate === "pwsh" || candidate === "powershell") {
      return "powershell";
    }
  }

  if (env.PSModulePath) {
    return "powershell";
  }

  return platform === "win32" ? "cmd" : "bash";
}
