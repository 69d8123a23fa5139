import { ParseError } from "./errors.js";
import { saturate, type Span } from "./types.js";

export type PunctuationKind =
  | "objectOpen"
  | "objectClose"
  | "arrayOpen"
  | "arrayClose"
  | "comma"
  | "colon";

export type TokenKind = PunctuationKind | "null" | "bool" | "integer" | "double" | "string";

export type Token =
  | { kind: PunctuationKind; span: Span }
  | { kind: "null"; span: Span }
  | { kind: "bool"; value: boolean; span: Span }
  | { kind: "integer"; value: bigint; span: Span }
  | { kind: "double"; value: number; span: Span }
  | { kind: "string"; value: string; span: Span };

/** A token that carries a literal value */
export type LiteralToken = Extract<Token, { kind: "null" | "bool" | "integer" | "double" | "string" }>;

export interface LexerOptions {
  /** Max input length in characters (default 50_000_000) */
  maxInputLength?: number;
}

export const DEFAULT_MAX_INPUT_LENGTH = 50_000_000;

const PUNCTUATION: Record<string, PunctuationKind> = {
  "{": "objectOpen",
  "}": "objectClose",
  "[": "arrayOpen",
  "]": "arrayClose",
  ",": "comma",
  ":": "colon",
};

const SIMPLE_ESCAPES: Record<string, string> = {
  b: "\b",
  t: "\t",
  n: "\n",
  f: "\f",
  r: "\r",
  '"': '"',
  "'": "'",
  "\\": "\\",
  "/": "/",
};

const WHITESPACE = new Set([" ", "\t", "\n", "\r", "\f", "\v"]);

export function isLiteral(token: Token): token is LiteralToken {
  return (
    token.kind === "null" ||
    token.kind === "bool" ||
    token.kind === "integer" ||
    token.kind === "double" ||
    token.kind === "string"
  );
}

export class Lexer {
  private pos = 0;

  constructor(private readonly source: string) {}

  private peek(offset = 0): string {
    return this.source[this.pos + offset] ?? "";
  }

  private advance(): string {
    if (this.pos >= this.source.length) return "";
    return this.source[this.pos++] ?? "";
  }

  private get atEnd(): boolean {
    return this.pos >= this.source.length;
  }

  private skipWhitespace(): void {
    while (!this.atEnd && WHITESPACE.has(this.peek())) {
      this.advance();
    }
  }

  /** Next token, or null once the input is exhausted. */
  nextToken(): Token | null {
    this.skipWhitespace();
    if (this.atEnd) return null;

    const start = this.pos;
    const ch = this.peek();

    const punctuation = PUNCTUATION[ch];
    if (punctuation) {
      this.advance();
      return { kind: punctuation, span: { start, end: this.pos } };
    }

    if (ch === '"') {
      return this.readString(start);
    }

    if (ch === "-" || isDigit(ch)) {
      return this.readNumber(start);
    }

    if (isLetter(ch)) {
      return this.readLiteral(start);
    }

    throw new ParseError(`unexpected character ${JSON.stringify(ch)}`, { start, end: start + 1 });
  }

  private readNumber(start: number): Token {
    let text = this.advance();
    let decimal = false;

    while (!this.atEnd) {
      const ch = this.peek();
      if (isDigit(ch)) {
        text += this.advance();
      } else if (ch === ".") {
        if (decimal) {
          throw new ParseError("second decimal point in number", { start, end: this.pos + 1 });
        }
        decimal = true;
        text += this.advance();
      } else {
        break;
      }
    }

    const span = { start, end: this.pos };
    if (text.endsWith(".")) {
      throw new ParseError("number cannot end with a decimal point", span);
    }
    if (text.endsWith("-")) {
      throw new ParseError("expected digits after negative sign", span);
    }

    if (decimal) {
      return { kind: "double", value: toDouble(text), span };
    }
    return { kind: "integer", value: toInteger(text), span };
  }

  private readLiteral(start: number): Token {
    let text = "";
    while (!this.atEnd && isLetter(this.peek())) {
      text += this.advance();
    }

    const span = { start, end: this.pos };
    switch (text) {
      case "null":
        return { kind: "null", span };
      case "true":
        return { kind: "bool", value: true, span };
      case "false":
        return { kind: "bool", value: false, span };
      default:
        throw new ParseError(`invalid literal ${JSON.stringify(text)}`, span);
    }
  }

  private readString(start: number): Token {
    this.advance(); // opening "
    let text = "";

    while (!this.atEnd) {
      const ch = this.advance();
      if (ch === '"') {
        return { kind: "string", value: text, span: { start, end: this.pos } };
      }
      if (ch === "\r" || ch === "\n") {
        throw new ParseError("unterminated string", { start, end: this.pos });
      }
      if (ch === "\\") {
        text += this.readEscape(start);
      } else {
        text += ch;
      }
    }

    throw new ParseError("unterminated string", { start, end: this.pos });
  }

  private readEscape(stringStart: number): string {
    const escapeStart = this.pos - 1;
    if (this.atEnd) {
      throw new ParseError("unterminated escape sequence", { start: stringStart, end: this.pos });
    }

    const escaped = this.advance();
    const simple = SIMPLE_ESCAPES[escaped];
    if (simple !== undefined) return simple;

    if (escaped !== "u") {
      throw new ParseError(`invalid escape sequence: \\${escaped}`, {
        start: escapeStart,
        end: this.pos,
      });
    }

    // \uXXXX, one UTF-16 code unit
    let hex = "";
    for (let i = 0; i < 4; i++) {
      if (this.atEnd) {
        throw new ParseError("incomplete unicode escape", { start: escapeStart, end: this.pos });
      }
      hex += this.advance();
    }
    if (!/^[0-9a-fA-F]{4}$/.test(hex)) {
      throw new ParseError(`invalid unicode escape: \\u${hex}`, { start: escapeStart, end: this.pos });
    }
    return String.fromCharCode(parseInt(hex, 16));
  }
}

function isDigit(ch: string): boolean {
  return ch >= "0" && ch <= "9";
}

function isLetter(ch: string): boolean {
  return ch !== "" && /\p{L}/u.test(ch);
}

/** Out-of-range integers saturate at the int64 bounds. */
function toInteger(text: string): bigint {
  return saturate(BigInt(text));
}

/** Out-of-range decimals saturate at the largest finite double. */
function toDouble(text: string): number {
  const value = Number(text);
  if (value === Number.POSITIVE_INFINITY) return Number.MAX_VALUE;
  if (value === Number.NEGATIVE_INFINITY) return -Number.MAX_VALUE;
  return value;
}

export function tokenize(source: string, options: LexerOptions = {}): Token[] {
  const maxLen = options.maxInputLength ?? DEFAULT_MAX_INPUT_LENGTH;
  if (source.length > maxLen) {
    throw new ParseError(`input exceeds maximum length (${source.length} > ${maxLen})`);
  }

  const lexer = new Lexer(source);
  const tokens: Token[] = [];
  for (let token = lexer.nextToken(); token !== null; token = lexer.nextToken()) {
    tokens.push(token);
  }
  return tokens;
}
