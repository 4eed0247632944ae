import fs from "node:fs";

import { z } from "zod";

import { ENVIRONMENT_KINDS, type EnvironmentKind } from "./environments.js";
import { HISTORY_EVENT_TYPES, type HistoryEvent, type JsonValue } from "./logger.js";

export type HistoryFilter = {
  kind?: EnvironmentKind;
  /** Keep only the most recent N matching events. */
  limit?: number;
};

export type HistoryReadResult = {
  events: HistoryEvent[];
  /** Lines that were not valid history events. */
  skippedLines: number;
};

const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(JsonValueSchema),
  ]),
);

const HistoryEventSchema = z.object({
  ts: z.string(),
  type: z.enum(HISTORY_EVENT_TYPES),
  kind: z.enum(ENVIRONMENT_KINDS).optional(),
  name: z.string().optional(),
  payload: z.record(JsonValueSchema).optional(),
});

// =============================================================================
// QUERIES
// =============================================================================

export function readHistory(filePath: string, filter: HistoryFilter = {}): HistoryReadResult {
  if (!fs.existsSync(filePath)) {
    return { events: [], skippedLines: 0 };
  }

  const lines = fs.readFileSync(filePath, "utf8").split(/\r?\n/).filter(Boolean);
  const events: HistoryEvent[] = [];
  let skippedLines = 0;

  for (const line of lines) {
    const event = parseHistoryLine(line);
    if (!event) {
      skippedLines += 1;
      continue;
    }
    if (filter.kind && event.kind !== filter.kind) {
      continue;
    }
    events.push(event);
  }

  const limited =
    filter.limit !== undefined && filter.limit >= 0
      ? events.slice(Math.max(0, events.length - filter.limit))
      : events;

  return { events: limited, skippedLines };
}

export function parseHistoryLine(line: string): HistoryEvent | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch {
    return null;
  }

  const result = HistoryEventSchema.safeParse(parsed);
  return result.success ? result.data : null;
}
