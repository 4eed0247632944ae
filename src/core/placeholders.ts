// =============================================================================
// ${VAR} PLACEHOLDERS
// =============================================================================

const PLACEHOLDER_PATTERN = /\$\{([A-Za-z_][A-Za-z0-9_]*)\}/g;

export type PlaceholderResolution = {
  value: string;
  /** Variable names that were referenced but not set; each became an empty string. */
  missing: string[];
};

export function containsPlaceholder(value: string): boolean {
  return new RegExp(PLACEHOLDER_PATTERN.source).test(value);
}

export function resolvePlaceholders(
  value: string,
  env: Record<string, string | undefined>,
): PlaceholderResolution {
  const missing: string[] = [];

  const resolved = value.replace(PLACEHOLDER_PATTERN, (_match, varName: string) => {
    const envValue = env[varName];
    if (envValue === undefined) {
      if (!missing.includes(varName)) missing.push(varName);
      return "";
    }
    return envValue;
  });

  return { value: resolved, missing };
}
