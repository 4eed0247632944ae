import { ERROR_KINDS } from "./errors.js";

// =============================================================================
// NON-FATAL CONDITIONS
// =============================================================================

export type ScanPathUnreadableWarning = {
  kind: typeof ERROR_KINDS.scanPathUnreadable;
  path: string;
  detail: string;
};

export type UnresolvedPlaceholderWarning = {
  kind: typeof ERROR_KINDS.unresolvedPlaceholder;
  variable: string;
  field: string;
  environment: string;
};

export type EnvswitchWarning = ScanPathUnreadableWarning | UnresolvedPlaceholderWarning;

export function formatWarning(warning: EnvswitchWarning): string {
  switch (warning.kind) {
    case ERROR_KINDS.scanPathUnreadable:
      return `${warning.kind}: skipped ${warning.path} (${warning.detail})`;
    case ERROR_KINDS.unresolvedPlaceholder:
      return `${warning.kind}: \${${warning.variable}} referenced by ${warning.environment}.${warning.field} is not set; using an empty value`;
  }
}

export function emitWarnings(warnings: EnvswitchWarning[]): void {
  for (const warning of warnings) {
    console.warn(`Warning: ${formatWarning(warning)}`);
  }
}
