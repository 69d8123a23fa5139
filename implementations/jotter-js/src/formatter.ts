import type { Document } from "./document.js";
import type { Sequence } from "./sequence.js";
import type { Scalar, Value } from "./types.js";

/**
 * Receives a tree walk and accumulates text. Containers nested under a key or
 * in an array arrive as `startObject`/`startArray` calls rather than values.
 */
export interface Formatter {
  startObject(): void;
  endObject(): void;
  startArray(): void;
  endArray(): void;
  comma(): void;
  objectKey(key: string): void;
  objectValue(value: Scalar): void;
  arrayValue(value: Scalar): void;
  result(): string;
}

export type FormatterFactory = () => Formatter;

/** `"key":value` pairs, no whitespace between tokens. */
export class CompactFormatter implements Formatter {
  protected readonly buf: string[] = [];

  startObject(): void {
    this.buf.push("{");
  }

  endObject(): void {
    this.buf.push("}");
  }

  startArray(): void {
    this.buf.push("[");
  }

  endArray(): void {
    this.buf.push("]");
  }

  comma(): void {
    this.buf.push(",");
  }

  objectKey(key: string): void {
    this.buf.push(`"${escapeString(key)}":`);
  }

  objectValue(value: Scalar): void {
    this.buf.push(formatScalar(value));
  }

  arrayValue(value: Scalar): void {
    this.buf.push(formatScalar(value));
  }

  result(): string {
    return this.buf.join("");
  }
}

export interface PrettyFormatterOptions {
  /** Indent string per level (default two spaces) */
  indent?: string;
  /** Newline (default "\n") */
  newline?: string;
}

/**
 * Same walk as {@link CompactFormatter}; the result is broken onto lines, one
 * entry per line, with a space after each colon.
 */
export class PrettyFormatter extends CompactFormatter {
  private readonly indent: string;
  private readonly newline: string;

  constructor(options: PrettyFormatterOptions = {}) {
    super();
    this.indent = options.indent ?? "  ";
    this.newline = options.newline ?? "\n";
  }

  override result(): string {
    return reindent(super.result(), this.indent, this.newline);
  }
}

/** Lay out compact text on indented lines. Quoted strings are copied untouched. */
export function reindent(compact: string, indent = "  ", newline = "\n"): string {
  const out: string[] = [];
  let level = 0;
  let inQuote = false;
  let escaped = false;

  const breakLine = () => {
    out.push(newline, indent.repeat(level));
  };

  for (let i = 0; i < compact.length; i++) {
    const ch = compact[i] ?? "";

    if (inQuote) {
      out.push(ch);
      if (escaped) escaped = false;
      else if (ch === "\\") escaped = true;
      else if (ch === '"') inQuote = false;
      continue;
    }

    switch (ch) {
      case '"':
        inQuote = true;
        out.push(ch);
        break;
      case "{":
      case "[": {
        const close = ch === "{" ? "}" : "]";
        out.push(ch);
        if (compact[i + 1] === close) {
          out.push(close);
          i++;
          break;
        }
        level++;
        breakLine();
        break;
      }
      case "}":
      case "]":
        level--;
        breakLine();
        out.push(ch);
        break;
      case ",":
        out.push(ch);
        breakLine();
        break;
      case ":":
        out.push(": ");
        break;
      default:
        out.push(ch);
    }
  }
  return out.join("");
}

export function escapeString(s: string): string {
  let result = "";
  for (const ch of s) {
    switch (ch) {
      case '"':
        result += '\\"';
        break;
      case "\\":
        result += "\\\\";
        break;
      case "\n":
        result += "\\n";
        break;
      case "\r":
        result += "\\r";
        break;
      case "\t":
        result += "\\t";
        break;
      case "\b":
        result += "\\b";
        break;
      case "\f":
        result += "\\f";
        break;
      default:
        if (ch.charCodeAt(0) < 32) {
          result += `\\u${ch.charCodeAt(0).toString(16).padStart(4, "0")}`;
        } else {
          result += ch;
        }
    }
  }
  return result;
}

/**
 * Decimal text that always carries a point and never an exponent, so the
 * lexer reads it back as the same double.
 */
export function formatDouble(value: number): string {
  if (Object.is(value, -0)) return "-0.0";
  const text = String(value);
  const exp = text.indexOf("e");
  if (exp === -1) {
    return Number.isInteger(value) ? `${text}.0` : text;
  }

  const negative = text.startsWith("-");
  const mantissa = text.slice(negative ? 1 : 0, exp);
  const exponent = Number(text.slice(exp + 1));
  const point = mantissa.indexOf(".");
  const digits = mantissa.replace(".", "");
  const position = (point === -1 ? mantissa.length : point) + exponent;

  let expanded: string;
  if (position <= 0) {
    expanded = `0.${"0".repeat(-position)}${digits}`;
  } else if (position >= digits.length) {
    expanded = `${digits}${"0".repeat(position - digits.length)}.0`;
  } else {
    expanded = `${digits.slice(0, position)}.${digits.slice(position)}`;
  }
  return negative ? `-${expanded}` : expanded;
}

export function formatScalar(value: Scalar): string {
  switch (value.type) {
    case "null":
      return "null";
    case "bool":
      return value.value ? "true" : "false";
    case "int32":
      return String(value.value);
    case "int64":
      return value.value.toString();
    case "float64":
      return formatDouble(value.value);
    case "string":
      return `"${escapeString(value.value)}"`;
  }
}

/** Walk a document through `formatter`. */
export function writeDocument(formatter: Formatter, document: Document): void {
  formatter.startObject();
  let first = true;
  for (const [key, value] of document.typedEntries()) {
    if (!first) formatter.comma();
    first = false;
    formatter.objectKey(key);
    writeValue(formatter, value, "object");
  }
  formatter.endObject();
}

/** Walk a sequence through `formatter`. */
export function writeSequence(formatter: Formatter, sequence: Sequence): void {
  formatter.startArray();
  let first = true;
  for (const value of sequence.typedValues()) {
    if (!first) formatter.comma();
    first = false;
    writeValue(formatter, value, "array");
  }
  formatter.endArray();
}

function writeValue(formatter: Formatter, value: Value, parent: "object" | "array"): void {
  switch (value.type) {
    case "document":
      writeDocument(formatter, value.value);
      break;
    case "sequence":
      writeSequence(formatter, value.value);
      break;
    default:
      if (parent === "object") formatter.objectValue(value);
      else formatter.arrayValue(value);
  }
}
