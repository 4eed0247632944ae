import type { ShellTarget } from "./targets.js";

// =============================================================================
// PATH RECONCILIATION
// =============================================================================

export type PathStyle = {
  delimiter: string;
  separator: string;
};

const POSIX_STYLE: PathStyle = { delimiter: ":", separator: "/" };
const WINDOWS_STYLE: PathStyle = { delimiter: ";", separator: "\\" };

// Segments that look like a previously activated JDK.
const STALE_JAVA_SEGMENT = /java|jdk/i;

export function pathStyleFor(shell: ShellTarget, platform: NodeJS.Platform): PathStyle {
  if (shell === "cmd") return WINDOWS_STYLE;
  if (shell === "powershell" && platform === "win32") return WINDOWS_STYLE;
  return POSIX_STYLE;
}

export function javaBinDir(home: string, style: PathStyle): string {
  let trimmed = home;
  while (trimmed.length > 1 && (trimmed.endsWith("/") || trimmed.endsWith("\\"))) {
    trimmed = trimmed.slice(0, -1);
  }
  return `${trimmed}${style.separator}bin`;
}

export function readAmbientPath(env: Record<string, string | undefined>): string {
  return env.PATH ?? env.Path ?? "";
}

/** `binDir` followed by the ambient segments that do not mention java/jdk. */
export function reconcileJavaPath(ambientPath: string, binDir: string, style: PathStyle): string[] {
  const kept = ambientPath
    .split(style.delimiter)
    .filter((segment) => segment.length > 0 && !STALE_JAVA_SEGMENT.test(segment));
  return [binDir, ...kept];
}
