import { formatErrorMessage } from "../core/error-format.js";
import {
  ERROR_KINDS,
  EnvironmentNotFoundError,
  EnvswitchError,
  DuplicateNameError,
  USER_FACING_ERROR_CODES,
  UserFacingError,
} from "../core/errors.js";
import { SHELL_TARGETS } from "../shell/targets.js";

// =============================================================================
// ERROR NORMALIZATION
// =============================================================================

export type CommandErrorContext = {
  title: string;
  configPath?: string;
};

export function normalizeCommandError(error: unknown, ctx: CommandErrorContext): UserFacingError {
  if (error instanceof UserFacingError) {
    return error;
  }

  if (error instanceof EnvswitchError) {
    return new UserFacingError({
      code: error.kind,
      title: ctx.title,
      message: error.message,
      ...resolveGuidance(error, ctx),
      cause: error,
    });
  }

  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.unexpected,
    title: ctx.title,
    message: formatErrorMessage(error),
    cause: error,
  });
}

export function usageError(message: string, hint?: string): UserFacingError {
  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.usage,
    title: "Invalid command usage.",
    message,
    hint,
  });
}

type Guidance = {
  hint?: string;
  /** A command to run next, printed on its own line. */
  next?: string;
};

function resolveGuidance(error: EnvswitchError, ctx: CommandErrorContext): Guidance {
  if (error instanceof EnvironmentNotFoundError) {
    return { next: `envswitch ${error.environmentKind} list` };
  }
  if (error instanceof DuplicateNameError) {
    return {
      hint: "Choose another name, or remove the existing entry first.",
      next: `envswitch ${error.environmentKind} remove ${error.environmentName}`,
    };
  }

  const configLabel = ctx.configPath ?? "the configuration file";
  switch (error.kind) {
    case ERROR_KINDS.configParse:
      return {
        hint: `Fix ${configLabel} by hand, or upgrade a file an older version wrote.`,
        next: "envswitch sync",
      };
    case ERROR_KINDS.configIo:
      return {
        hint: "Check that the envswitch home is writable, or point ENVSWITCH_HOME / --config elsewhere.",
      };
    case ERROR_KINDS.unsupportedShell:
      return { hint: `Supported shells: ${SHELL_TARGETS.join(", ")}.` };
    case ERROR_KINDS.invalidEnvironment:
      return { hint: "Check the name and values passed to `add`." };
    default:
      return {};
  }
}
