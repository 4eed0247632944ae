import { containsPlaceholder } from "../core/placeholders.js";
import { emitWarnings, type EnvswitchWarning } from "../core/warnings.js";

// =============================================================================
// SCRIPTS
// =============================================================================

/** Shell code goes to stdout untouched; the calling shell evaluates it. */
export function writeScript(script: string): void {
  if (script.length > 0) {
    process.stdout.write(script);
  }
}

export function printWarnings(warnings: EnvswitchWarning[]): void {
  emitWarnings(warnings);
}

export function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

// =============================================================================
// TABLES
// =============================================================================

export type TableColumn<Row> = {
  header: string;
  value: (row: Row) => string;
};

export function formatTable<Row>(columns: TableColumn<Row>[], rows: Row[]): string[] {
  const cells = rows.map((row) => columns.map((column) => column.value(row)));
  const widths = columns.map((column, index) =>
    columnWidth(
      cells.map((cellRow) => cellRow[index] ?? ""),
      column.header,
    ),
  );

  const render = (values: string[]): string =>
    values
      .map((value, index) => pad(value, widths[index] ?? value.length))
      .join("  ")
      .trimEnd();

  return [render(columns.map((column) => column.header)), ...cells.map(render)];
}

export function printTable<Row>(columns: TableColumn<Row>[], rows: Row[]): void {
  for (const line of formatTable(columns, rows)) {
    console.log(line);
  }
}

// =============================================================================
// UTILITIES
// =============================================================================

function columnWidth(values: string[], header: string): number {
  const lengths = values.map((value) => value.length);
  return Math.max(header.length, ...lengths);
}

function pad(value: string, width: number): string {
  return value.padEnd(width);
}

export function formatTimestamp(ts: string): string {
  const parsed = new Date(ts);
  if (Number.isNaN(parsed.getTime())) return ts;
  return parsed
    .toISOString()
    .replace("T", " ")
    .replace(/\.\d+Z$/, "Z");
}

/** Placeholders are shown as stored; literal keys are shortened. */
export function maskSecret(value: string): string {
  if (value.length === 0) return "(none)";
  if (containsPlaceholder(value)) return value;
  if (value.length <= 8) return "********";
  return `${value.slice(0, 4)}...${value.slice(-4)}`;
}
