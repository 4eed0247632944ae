import fs from "node:fs";
import path from "node:path";

import fse from "fs-extra";

import type { EnvironmentKind } from "./environments.js";
import { formatErrorLines, formatErrorMessage } from "./error-format.js";
import { isoNow } from "./utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type JsonValue = string | number | boolean | null | JsonArray | JsonObject;
export type JsonArray = JsonValue[];
export interface JsonObject {
  [key: string]: JsonValue;
}

export const HISTORY_EVENT_TYPES = [
  "env.add",
  "env.remove",
  "env.use",
  "env.default.set",
  "env.default.unset",
  "java.scan",
  "config.sync",
] as const;

export type HistoryEventType = (typeof HISTORY_EVENT_TYPES)[number];

export type HistoryEvent = {
  ts: string;
  type: HistoryEventType;
  kind?: EnvironmentKind;
  name?: string;
  payload?: JsonObject;
};

export type HistoryEventInput = {
  type: HistoryEventType;
  kind?: EnvironmentKind;
  name?: string;
  payload?: JsonObject;
  ts?: string | Date;
};

export type LoggerOptions = {
  debug?: boolean;
};

type LogFailureAction = "open" | "write" | "close";

// =============================================================================
// LOGGER
// =============================================================================

export class JsonlLogger {
  private readonly fileDescriptor: number;
  private readonly isDebugEnabled: boolean;
  private closed = false;

  constructor(
    public readonly filePath: string,
    options: LoggerOptions = {},
  ) {
    fse.ensureDirSync(path.dirname(filePath));
    this.fileDescriptor = fs.openSync(filePath, "a");
    this.isDebugEnabled = options.debug ?? resolveLoggerDebugEnabled();
  }

  log(event: HistoryEventInput): void {
    this.append(eventWithTs(event));
  }

  close(): void {
    if (this.closed) return;
    try {
      fs.fsyncSync(this.fileDescriptor);
      fs.closeSync(this.fileDescriptor);
    } catch (err) {
      console.warn(formatLogFailureWarning("close", this.filePath, err, this.isDebugEnabled));
    } finally {
      this.closed = true;
    }
  }

  private append(event: HistoryEvent): void {
    if (this.closed) return;
    try {
      fs.writeSync(this.fileDescriptor, `${JSON.stringify(event)}\n`);
      fs.fsyncSync(this.fileDescriptor);
    } catch (err) {
      console.warn(formatLogFailureWarning("write", this.filePath, err, this.isDebugEnabled));
    }
  }
}

// =============================================================================
// RECORDER
// =============================================================================

/**
 * Opens the history log on the first recorded event, so commands that record nothing
 * never touch the envswitch home.
 */
export class HistoryRecorder {
  private logger: JsonlLogger | null = null;
  private failed = false;

  constructor(
    public readonly filePath: string,
    private readonly options: LoggerOptions = {},
  ) {}

  record(event: HistoryEventInput): void {
    const logger = this.open();
    logger?.log(event);
  }

  close(): void {
    this.logger?.close();
    this.logger = null;
  }

  private open(): JsonlLogger | null {
    if (this.logger || this.failed) return this.logger;

    try {
      this.logger = new JsonlLogger(this.filePath, this.options);
    } catch (err) {
      this.failed = true;
      const debug = this.options.debug ?? resolveLoggerDebugEnabled();
      console.warn(formatLogFailureWarning("open", this.filePath, err, debug));
    }
    return this.logger;
  }
}

// =============================================================================
// EVENT HELPERS
// =============================================================================

export function eventWithTs(event: HistoryEventInput): HistoryEvent {
  const { ts, type, kind, name, payload } = event;
  const normalizedTs =
    typeof ts === "string" ? ts : ts instanceof Date ? ts.toISOString() : isoNow();

  const result: HistoryEvent = { ts: normalizedTs, type };
  if (kind) result.kind = kind;
  if (name !== undefined) result.name = name;
  if (payload && Object.keys(payload).length > 0) {
    result.payload = payload;
  }

  return result;
}

// =============================================================================
// INTERNALS
// =============================================================================

function formatLogFailureWarning(
  action: LogFailureAction,
  filePath: string,
  error: unknown,
  isDebugEnabled: boolean,
): string {
  const summary = formatErrorMessage(error);
  const actionLabel =
    action === "write"
      ? `write history event to ${filePath}`
      : action === "open"
        ? `open history log ${filePath}`
        : `close history log ${filePath}`;
  const message = `Warning: failed to ${actionLabel}: ${summary}`;

  if (!isDebugEnabled) {
    return message;
  }

  const stack = resolveDebugStack(error);
  if (!stack) {
    return message;
  }

  return `${message}\n${stack}`;
}

function resolveDebugStack(error: unknown): string | undefined {
  const lines = formatErrorLines(error, { mode: "debug" });
  const stackLine = lines.find((line) => line.kind === "stack");
  return stackLine?.text;
}

function resolveLoggerDebugEnabled(): boolean {
  return resolveDebugFlagFromArgv(process.argv) ?? false;
}

export function resolveDebugFlagFromArgv(argv: string[]): boolean | undefined {
  let debugFlag: boolean | undefined;

  for (const arg of argv) {
    if (arg === "--") {
      break;
    }

    if (arg === "--debug") {
      debugFlag = true;
    }

    if (arg === "--no-debug") {
      debugFlag = false;
    }
  }

  return debugFlag;
}
