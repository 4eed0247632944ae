import type { ShellTarget } from "./targets.js";

// =============================================================================
// DIALECTS
// =============================================================================

/**
 * Per-shell rendering. Values always pass through `quote` (or the cmd escaper) before they
 * reach the output; variable names are fixed identifiers chosen by the generator.
 */
export type ShellDialect = {
  target: ShellTarget;
  quote: (value: string) => string;
  setVariable: (name: string, value: string) => string;
  unsetVariable: (name: string) => string;
  setPath: (segments: string[], delimiter: string) => string;
  comment: (text: string) => string;
};

// =============================================================================
// ESCAPING
// =============================================================================

export function quotePosix(value: string): string {
  return `"${value.replace(/[\\"$`]/g, "\\$&")}"`;
}

export function quoteFish(value: string): string {
  return `'${value.replace(/[\\']/g, "\\$&")}'`;
}

// PowerShell treats the typographic single quotes as quote characters too.
export function quotePowerShell(value: string): string {
  return `'${value.replace(/['\u2018\u2019\u201A\u201B]/g, "$&$&")}'`;
}

/**
 * Escapes a value for an unquoted `set NAME=value` line in a batch file: line breaks are
 * dropped, metacharacters are caret-escaped and `%` is doubled.
 */
export function escapeCmd(value: string): string {
  return value
    .replace(/[\r\n]/g, "")
    .replace(/[\^&|<>()"]/g, "^$&")
    .replace(/%/g, "%%");
}

export function sanitizeComment(text: string): string {
  return text.replace(/[^A-Za-z0-9 ._@+:,=()/-]/g, "?");
}

// =============================================================================
// STRATEGY TABLE
// =============================================================================

const posixDialect = (target: "bash" | "zsh"): ShellDialect => ({
  target,
  quote: quotePosix,
  setVariable: (name, value) => `export ${name}=${quotePosix(value)}`,
  unsetVariable: (name) => `unset ${name}`,
  setPath: (segments, delimiter) => `export PATH=${quotePosix(segments.join(delimiter))}`,
  comment: (text) => `# ${sanitizeComment(text)}`,
});

export const SHELL_DIALECTS: Record<ShellTarget, ShellDialect> = {
  bash: posixDialect("bash"),
  zsh: posixDialect("zsh"),
  fish: {
    target: "fish",
    quote: quoteFish,
    setVariable: (name, value) => `set -gx ${name} ${quoteFish(value)}`,
    unsetVariable: (name) => `set -e ${name}`,
    // fish keeps PATH as a list; one argument per segment.
    setPath: (segments) => ["set -gx PATH", ...segments.map(quoteFish)].join(" "),
    comment: (text) => `# ${sanitizeComment(text)}`,
  },
  powershell: {
    target: "powershell",
    quote: quotePowerShell,
    setVariable: (name, value) => `$env:${name} = ${quotePowerShell(value)}`,
    unsetVariable: (name) => `Remove-Item Env:\\${name} -ErrorAction SilentlyContinue`,
    setPath: (segments, delimiter) => `$env:PATH = ${quotePowerShell(segments.join(delimiter))}`,
    comment: (text) => `# ${sanitizeComment(text)}`,
  },
  cmd: {
    target: "cmd",
    quote: (value) => `"${value.replace(/[\r\n"]/g, "").replace(/%/g, "%%")}"`,
    setVariable: (name, value) => `@set ${name}=${escapeCmd(value)}`,
    unsetVariable: (name) => `@set ${name}=`,
    setPath: (segments, delimiter) => `@set PATH=${escapeCmd(segments.join(delimiter))}`,
    comment: (text) => `@REM ${sanitizeComment(text)}`,
  },
};

export function dialectFor(shell: ShellTarget): ShellDialect {
  return SHELL_DIALECTS[shell];
}
