import {
  createAnsiFormatter,
  formatErrorLines,
  resolveColorEnabled,
  type AnsiFormatter,
  type AnsiStyle,
  type ErrorFormatLine,
  type ErrorFormatLineKind,
} from "../core/error-format.js";

// =============================================================================
// TYPES
// =============================================================================

export type CliErrorFormatOptions = {
  debug?: boolean;
  /** `false` under --no-color. Color stays off whenever the stream is not a TTY. */
  useColor?: boolean;
  stream?: { isTTY?: boolean };
};

type LabelledLineKind = Exclude<ErrorFormatLineKind, "title" | "message">;

const LINE_LABELS: Record<LabelledLineKind, { label: string; style: AnsiStyle }> = {
  hint: { label: "Hint:", style: "yellow" },
  next: { label: "Next:", style: "cyan" },
  code: { label: "Code:", style: "dim" },
  name: { label: "Name:", style: "dim" },
  cause: { label: "Cause:", style: "dim" },
  stack: { label: "Stack:", style: "dim" },
};

// =============================================================================
// OUTPUT
// =============================================================================

/** Renders an error for stderr: `Error:` title, message, then labelled guidance and metadata. */
export function renderCliError(error: unknown, options: CliErrorFormatOptions = {}): string {
  const lines = formatErrorLines(error, { mode: options.debug ? "debug" : "short" });
  const format = createAnsiFormatter(
    resolveColorEnabled({ stream: options.stream ?? process.stderr, useColor: options.useColor }),
  );

  return lines.map((line) => renderLine(line, format)).join("\n");
}

// =============================================================================
// INTERNALS
// =============================================================================

function renderLine(line: ErrorFormatLine, format: AnsiFormatter): string {
  if (line.kind === "title") {
    return `${format("Error:", ["red", "bold"])} ${format(line.text, ["bold"])}`;
  }
  if (line.kind === "message") {
    return line.text;
  }

  const { label, style } = LINE_LABELS[line.kind];
  const prefix = format(label, [style]);
  if (line.kind === "stack") {
    const indented = line.text
      .split("\n")
      .map((stackLine) => `  ${stackLine}`)
      .join("\n");
    return `${prefix}\n${format(indented, ["dim"])}`;
  }

  // Guidance keeps its text plain; metadata is dimmed with its label.
  const text = style === "dim" ? format(line.text, ["dim"]) : line.text;
  return `${prefix} ${text}`;
}
