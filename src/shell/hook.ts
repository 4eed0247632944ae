import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";

import Handlebars from "handlebars";

import { dialectFor } from "./dialects.js";
import type { ShellTarget } from "./targets.js";

// =============================================================================
// TYPES
// =============================================================================

export type HookOptions = {
  /** Command the hook invokes; defaults to `envswitch` on PATH. */
  bin?: string;
};

export const DEFAULT_HOOK_BIN = "envswitch";

// =============================================================================
// PUBLIC API
// =============================================================================

export function generateHookScript(shell: ShellTarget, options: HookOptions = {}): string {
  const template = loadTemplate(shell);
  const bin = options.bin?.trim() || DEFAULT_HOOK_BIN;
  const output = template({ bin });
  return output.endsWith("\n") ? output : `${output}\n`;
}

// =============================================================================
// INTERNALS
// =============================================================================

const TEMPLATE_CACHE = new Map<ShellTarget, Handlebars.TemplateDelegate>();

function loadTemplate(shell: ShellTarget): Handlebars.TemplateDelegate {
  const cached = TEMPLATE_CACHE.get(shell);
  if (cached) return cached;

  const templatePath = path.join(resolveHooksDir(), `${shell}.hbs`);
  if (!fs.existsSync(templatePath)) {
    throw new Error(`Hook template not found: ${templatePath}`);
  }

  const dialect = dialectFor(shell);
  const handlebars = Handlebars.create();
  handlebars.registerHelper("quote", (value: unknown) => dialect.quote(String(value)));

  const raw = fs.readFileSync(templatePath, "utf8");
  const compiled = handlebars.compile(raw, { noEscape: true, strict: true });

  TEMPLATE_CACHE.set(shell, compiled);
  return compiled;
}

function resolveHooksDir(): string {
  const packageRoot = findPackageRoot(fileURLToPath(new URL(".", import.meta.url)));
  return path.join(packageRoot, "templates", "hooks");
}

// Walk upward until we find the package root so compiled builds resolve templates correctly.
function findPackageRoot(startDir: string): string {
  let current = startDir;

  while (true) {
    const candidate = path.join(current, "package.json");
    if (fs.existsSync(candidate)) return current;

    const parent = path.dirname(current);
    if (parent === current) break;

    current = parent;
  }

  throw new Error("package.json not found while resolving hook templates");
}
