import type { EnvironmentKind } from "./environments.js";

// =============================================================================
// ERROR KINDS
// =============================================================================

export const ERROR_KINDS = {
  environmentNotFound: "EnvironmentNotFound",
  duplicateName: "DuplicateName",
  invalidEnvironment: "InvalidEnvironment",
  configParse: "ConfigParseError",
  configIo: "ConfigIoError",
  scanPathUnreadable: "ScanPathUnreadable",
  unsupportedShell: "UnsupportedShell",
  unresolvedPlaceholder: "UnresolvedPlaceholder",
  unsupportedOperation: "UnsupportedOperation",
} as const;

export type ErrorKind = (typeof ERROR_KINDS)[keyof typeof ERROR_KINDS];

// =============================================================================
// DOMAIN ERRORS
// =============================================================================

export class EnvswitchError extends Error {
  constructor(
    public readonly kind: ErrorKind,
    message: string,
    cause?: unknown,
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = "EnvswitchError";
  }
}

export class EnvironmentNotFoundError extends EnvswitchError {
  constructor(
    public readonly environmentKind: EnvironmentKind,
    public readonly environmentName: string,
  ) {
    super(
      ERROR_KINDS.environmentNotFound,
      `${environmentKind} environment "${environmentName}" not found.`,
    );
    this.name = "EnvironmentNotFoundError";
  }
}

export class DuplicateNameError extends EnvswitchError {
  constructor(
    public readonly environmentKind: EnvironmentKind,
    public readonly environmentName: string,
  ) {
    super(
      ERROR_KINDS.duplicateName,
      `${environmentKind} environment "${environmentName}" already exists.`,
    );
    this.name = "DuplicateNameError";
  }
}

export class InvalidEnvironmentError extends EnvswitchError {
  constructor(message: string, cause?: unknown) {
    super(ERROR_KINDS.invalidEnvironment, message, cause);
    this.name = "InvalidEnvironmentError";
  }
}

export class ConfigParseError extends EnvswitchError {
  constructor(message: string, cause?: unknown) {
    super(ERROR_KINDS.configParse, message, cause);
    this.name = "ConfigParseError";
  }
}

export class ConfigIoError extends EnvswitchError {
  constructor(message: string, cause?: unknown) {
    super(ERROR_KINDS.configIo, message, cause);
    this.name = "ConfigIoError";
  }
}

export class UnsupportedShellError extends EnvswitchError {
  constructor(public readonly shell: string) {
    super(ERROR_KINDS.unsupportedShell, `Unsupported shell "${shell}".`);
    this.name = "UnsupportedShellError";
  }
}

export class UnsupportedOperationError extends EnvswitchError {
  constructor(message: string) {
    super(ERROR_KINDS.unsupportedOperation, message);
    this.name = "UnsupportedOperationError";
  }
}

// =============================================================================
// USER-FACING ERRORS
// =============================================================================

export const USER_FACING_ERROR_CODES = {
  ...ERROR_KINDS,
  usage: "UsageError",
  unexpected: "UnexpectedError",
} as const;

export type UserFacingErrorCode =
  (typeof USER_FACING_ERROR_CODES)[keyof typeof USER_FACING_ERROR_CODES];

export type UserFacingErrorInput = {
  code: UserFacingErrorCode;
  title: string;
  message: string;
  hint?: string;
  next?: string;
  cause?: unknown;
};

export class UserFacingError extends Error {
  readonly code: UserFacingErrorCode;
  readonly title: string;
  readonly hint?: string;
  readonly next?: string;

  constructor(input: UserFacingErrorInput) {
    super(input.message, input.cause === undefined ? undefined : { cause: input.cause });
    this.name = "UserFacingError";
    this.code = input.code;
    this.title = input.title;
    this.hint = input.hint;
    this.next = input.next;
  }
}
