export function isoNow(): string {
  return new Date().toISOString();
}

/** The `code` of a Node.js system error (ENOENT, EACCES, ...), when there is one. */
export function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

