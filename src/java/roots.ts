import fs from "node:fs";
import os from "node:os";
import path from "node:path";

// =============================================================================
// TYPES
// =============================================================================

export type ScanRootOrigin = "platform" | "custom" | "env" | "java-home" | "path";

export type ScanRoot = {
  path: string;
  origin: ScanRootOrigin;
};

export type ResolveScanRootsOptions = {
  platform?: NodeJS.Platform;
  env?: Record<string, string | undefined>;
  customPaths?: string[];
  homeDir?: string;
};

export const JAVA_PATHS_ENV = "ENVSWITCH_JAVA_PATHS";

// =============================================================================
// PLATFORM DEFAULTS
// =============================================================================

export function platformScanRoots(
  platform: NodeJS.Platform,
  env: Record<string, string | undefined>,
  homeDir: string,
): string[] {
  if (platform === "win32") {
    const programFiles = env.ProgramFiles ?? "C:\\Program Files";
    const programFilesX86 = env["ProgramFiles(x86)"] ?? "C:\\Program Files (x86)";
    return [
      path.win32.join(programFiles, "Java"),
      path.win32.join(programFiles, "Eclipse Adoptium"),
      path.win32.join(programFiles, "Amazon Corretto"),
      path.win32.join(programFiles, "Microsoft", "jdk"),
      path.win32.join(programFiles, "Zulu"),
      path.win32.join(programFilesX86, "Java"),
    ];
  }

  if (platform === "darwin") {
    return [
      "/Library/Java/JavaVirtualMachines",
      path.posix.join(homeDir, "Library", "Java", "JavaVirtualMachines"),
      "/opt/homebrew/opt",
      "/usr/local/opt",
    ];
  }

  return [
    "/usr/lib/jvm",
    "/usr/local/java",
    "/opt/java",
    "/usr/java",
    path.posix.join(homeDir, ".sdkman", "candidates", "java"),
    path.posix.join(homeDir, ".jdks"),
  ];
}

export function javaExecutableName(platform: NodeJS.Platform): string {
  return platform === "win32" ? "java.exe" : "java";
}

// =============================================================================
// RESOLUTION
// =============================================================================

/**
 * Ordered, de-duplicated scan roots: platform defaults, configured custom paths,
 * ENVSWITCH_JAVA_PATHS, JAVA_HOME, then the home of every `java` executable on PATH,
 * found by following its links.
 */
export function resolveScanRoots(opts: ResolveScanRootsOptions = {}): ScanRoot[] {
  const platform = opts.platform ?? process.platform;
  const env = opts.env ?? process.env;
  const homeDir = opts.homeDir ?? os.homedir();
  const pathApi = platform === "win32" ? path.win32 : path.posix;

  const roots: ScanRoot[] = [];
  const seen = new Set<string>();
  const push = (rootPath: string, origin: ScanRootOrigin): void => {
    const trimmed = rootPath.trim();
    if (!trimmed) return;
    const normalized = pathApi.resolve(trimmed);
    const key = platform === "win32" ? normalized.toLowerCase() : normalized;
    if (seen.has(key)) return;
    seen.add(key);
    roots.push({ path: normalized, origin });
  };

  for (const root of platformScanRoots(platform, env, homeDir)) {
    push(root, "platform");
  }
  for (const root of opts.customPaths ?? []) {
    push(root, "custom");
  }
  for (const root of splitPathList(env[JAVA_PATHS_ENV], pathApi.delimiter)) {
    push(root, "env");
  }
  if (env.JAVA_HOME) {
    push(env.JAVA_HOME, "java-home");
  }
  for (const binDir of splitPathList(readPathVariable(env), pathApi.delimiter)) {
    const executable = pathApi.join(binDir, javaExecutableName(platform));
    if (isFile(executable)) {
      // Launchers such as /usr/bin/java are usually links into the real JDK.
      const target = realExecutable(executable, pathApi);
      push(pathApi.dirname(pathApi.dirname(target)), "path");
    }
  }

  return roots;
}

function realExecutable(executable: string, pathApi: path.PlatformPath): string {
  try {
    return fs.realpathSync(executable);
  } catch {
    return pathApi.resolve(executable);
  }
}

/** Roots whose absence is worth a warning; platform defaults simply may not exist. */
export function isExplicitRoot(root: ScanRoot): boolean {
  return root.origin === "custom" || root.origin === "env" || root.origin === "java-home";
}

function splitPathList(value: string | undefined, delimiter: string): string[] {
  if (!value) return [];
  return value.split(delimiter).filter((segment) => segment.trim().length > 0);
}

function readPathVariable(env: Record<string, string | undefined>): string | undefined {
  return env.PATH ?? env.Path;
}

function isFile(candidate: string): boolean {
  try {
    return fs.statSync(candidate).isFile();
  } catch {
    return false;
  }
}
