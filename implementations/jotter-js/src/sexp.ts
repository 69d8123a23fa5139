import { Document } from "./document.js";
import type { ParseError } from "./errors.js";
import { escapeString, formatDouble } from "./formatter.js";
import type { Sequence } from "./sequence.js";
import type { Span, Value } from "./types.js";

function spanStr(span: Span | undefined): string {
  return span ? `[${span.start}, ${span.end}]` : "[-1, -1]";
}

function indent(level: number): string {
  return "  ".repeat(level);
}

/**
 * Dump a tree one node per line, each value with its variant:
 *
 * ```
 * (document
 *   (entry "id"
 *     (int32 7)))
 * ```
 */
export function toSexp(tree: Document | Sequence): string {
  return containerLines(tree, 0).join("\n");
}

/** Dump a parse error with its span. */
export function errorToSexp(error: ParseError): string {
  return `(error ${spanStr(error.span)} "${escapeString(error.message)}")`;
}

function containerLines(tree: Document | Sequence, level: number): string[] {
  const pad = indent(level);
  const lines: string[] = [];

  if (tree instanceof Document) {
    const entries = tree.typedEntries();
    if (entries.length === 0) return [`${pad}(document)`];
    lines.push(`${pad}(document`);
    for (const [key, value] of entries) {
      lines.push(`${indent(level + 1)}(entry "${escapeString(key)}"`);
      lines.push(...valueLines(value, level + 2));
      close(lines);
    }
  } else {
    const values = tree.typedValues();
    if (values.length === 0) return [`${pad}(sequence)`];
    lines.push(`${pad}(sequence`);
    for (const value of values) {
      lines.push(...valueLines(value, level + 1));
    }
  }
  close(lines);
  return lines;
}

function valueLines(value: Value, level: number): string[] {
  const pad = indent(level);
  switch (value.type) {
    case "document":
    case "sequence":
      return containerLines(value.value, level);
    case "null":
      return [`${pad}(null)`];
    case "bool":
      return [`${pad}(bool ${value.value})`];
    case "int32":
      return [`${pad}(int32 ${value.value})`];
    case "int64":
      return [`${pad}(int64 ${value.value.toString()})`];
    case "float64":
      return [`${pad}(float64 ${formatDouble(value.value)})`];
    case "string":
      return [`${pad}(string "${escapeString(value.value)}")`];
  }
}

/** Append `)` to the last line. */
function close(lines: string[]): void {
  const last = lines.length - 1;
  lines[last] = `${lines[last] ?? ""})`;
}
