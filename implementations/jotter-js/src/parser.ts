import { Document } from "./document.js";
import { ArgumentError, ParseError } from "./errors.js";
import { isLiteral, tokenize, type LexerOptions, type LiteralToken, type Token } from "./lexer.js";
import { Sequence } from "./sequence.js";
import { NULL, integer, type Span, type Value } from "./types.js";

export interface ParseOptions extends LexerOptions {
  /** Max container nesting depth (default 256) */
  maxDepth?: number;
}

export const DEFAULT_MAX_DEPTH = 256;

const CLOSER: Partial<Record<Token["kind"], Token["kind"]>> = {
  objectOpen: "objectClose",
  arrayOpen: "arrayClose",
};

const DESCRIPTION: Record<Token["kind"], string> = {
  objectOpen: "`{`",
  objectClose: "`}`",
  arrayOpen: "`[`",
  arrayClose: "`]`",
  comma: "`,`",
  colon: "`:`",
  null: "null",
  bool: "boolean",
  integer: "integer",
  double: "decimal",
  string: "string",
};

/**
 * Builds a tree from a flat token list. Each call to {@link Parser.parseInto}
 * handles the interior of one `{...}` or `[...]`, the delimiters themselves
 * already stripped, and recurses into nested spans.
 */
export class Parser {
  constructor(
    private readonly tokens: readonly Token[],
    private readonly maxDepth: number = DEFAULT_MAX_DEPTH,
  ) {}

  private token(index: number): Token {
    const token = this.tokens[index];
    if (!token) {
      throw new ParseError("unexpected end of input", this.endSpan());
    }
    return token;
  }

  private endSpan(): Span {
    const last = this.tokens[this.tokens.length - 1];
    return last ? { start: last.span.end, end: last.span.end } : { start: 0, end: 0 };
  }

  /** Populate `target` from tokens in `[start, end)`. */
  parseInto(target: Document | Sequence, start: number, end: number, depth = 1): void {
    if (depth > this.maxDepth) {
      throw new ParseError(`maximum nesting depth exceeded (${this.maxDepth})`, this.token(start).span);
    }

    let expectingComma = false;
    let i = start;
    while (i < end) {
      const token = this.token(i);

      if (expectingComma) {
        if (token.kind !== "comma") {
          throw new ParseError(`malformed JSON: expected \`,\`, found ${DESCRIPTION[token.kind]}`, token.span);
        }
        if (i === end - 1) {
          throw new ParseError("malformed JSON: trailing `,`", token.span);
        }
        expectingComma = false;
        i++;
        continue;
      }

      if (target instanceof Sequence) {
        const [value, next] = this.readValue(i, end, depth);
        target.appendValue(value);
        i = next;
      } else {
        if (token.kind !== "string") {
          throw new ParseError(`malformed JSON: expected string key, found ${DESCRIPTION[token.kind]}`, token.span);
        }
        if (i + 1 >= end) {
          throw new ParseError("malformed JSON: expected `:`, found end of object", token.span);
        }
        const colon = this.token(i + 1);
        if (colon.kind !== "colon") {
          throw new ParseError(`malformed JSON: expected \`:\`, found ${DESCRIPTION[colon.kind]}`, colon.span);
        }
        if (i + 2 >= end) {
          throw new ParseError("malformed JSON: expected value, found end of object", colon.span);
        }
        const [value, next] = this.readValue(i + 2, end, depth);
        target.putValue(token.value, value);
        i = next;
      }
      expectingComma = true;
    }
  }

  /** Read one value starting at `index`; returns it with the index after it. */
  private readValue(index: number, end: number, depth: number): [Value, number] {
    const token = this.token(index);
    if (isLiteral(token)) {
      return [literalValue(token), index + 1];
    }

    if (token.kind === "arrayOpen" || token.kind === "objectOpen") {
      const close = this.matchBracket(index, end);
      const child = token.kind === "arrayOpen" ? new Sequence() : new Document();
      if (close > index + 1) {
        this.parseInto(child, index + 1, close, depth + 1);
      }
      const value: Value =
        child instanceof Sequence ? { type: "sequence", value: child } : { type: "document", value: child };
      return [value, close + 1];
    }

    throw new ParseError(`malformed JSON: unexpected ${DESCRIPTION[token.kind]}`, token.span);
  }

  /** Index of the bracket closing the one at `open`, searching before `end`. */
  matchBracket(open: number, end: number): number {
    const expected: Token["kind"][] = [];
    for (let i = open; i < end; i++) {
      const token = this.token(i);
      const closer = CLOSER[token.kind];
      if (closer) {
        expected.push(closer);
        continue;
      }
      if (token.kind === "objectClose" || token.kind === "arrayClose") {
        if (expected.pop() !== token.kind) {
          throw new ParseError(`malformed JSON: mismatched ${DESCRIPTION[token.kind]}`, token.span);
        }
        if (expected.length === 0) return i;
      }
    }

    const opener = this.token(open);
    const missing = opener.kind === "arrayOpen" ? "`]`" : "`}`";
    throw new ParseError(`malformed JSON: ${missing} not found`, opener.span);
  }
}

function literalValue(token: LiteralToken): Value {
  switch (token.kind) {
    case "null":
      return NULL;
    case "bool":
      return { type: "bool", value: token.value };
    case "integer":
      return integer(token.value);
    case "double":
      return { type: "float64", value: token.value };
    case "string":
      return { type: "string", value: token.value };
  }
}

/**
 * Tokenize `source` and check the outer delimiters. Returns the tokens and the
 * parser, or throws before anything is built.
 */
function prepare(source: string, options: ParseOptions): { tokens: Token[]; parser: Parser } {
  if (typeof source !== "string") {
    throw new ArgumentError("provided text is not a string");
  }
  if (source.length === 0) {
    throw new ArgumentError("provided text is empty");
  }

  const tokens = tokenize(source, options);
  const parser = new Parser(tokens, options.maxDepth ?? DEFAULT_MAX_DEPTH);
  if (tokens.length < 2) {
    throw new ParseError("too few tokens", tokens[0]?.span);
  }
  return { tokens, parser };
}

function parseContainer<T extends Document | Sequence>(
  target: T,
  tokens: Token[],
  parser: Parser,
): T {
  const first = tokens[0];
  const last = tokens[tokens.length - 1];
  const isArray = target instanceof Sequence;
  const openKind = isArray ? "arrayOpen" : "objectOpen";
  const closeKind = isArray ? "arrayClose" : "objectClose";

  if (first?.kind !== openKind || last?.kind !== closeKind) {
    const what = isArray ? "an array must start with `[` and end with `]`" : "an object must start with `{` and end with `}`";
    throw new ParseError(what, first?.span);
  }
  const close = parser.matchBracket(0, tokens.length);
  if (close !== tokens.length - 1) {
    const trailing = tokens[close + 1];
    throw new ParseError("unexpected content after the closing bracket", trailing?.span);
  }

  if (tokens.length > 2) {
    parser.parseInto(target, 1, tokens.length - 1);
  }
  return target;
}

export function parseDocument(source: string, options: ParseOptions = {}): Document {
  const { tokens, parser } = prepare(source, options);
  return parseContainer(new Document(), tokens, parser);
}

export function parseSequence(source: string, options: ParseOptions = {}): Sequence {
  const { tokens, parser } = prepare(source, options);
  return parseContainer(new Sequence(), tokens, parser);
}

/** Parse an object or an array, whichever the text holds. */
export function parse(source: string, options: ParseOptions = {}): Document | Sequence {
  const { tokens, parser } = prepare(source, options);
  if (tokens[0]?.kind === "arrayOpen") {
    return parseContainer(new Sequence(), tokens, parser);
  }
  return parseContainer(new Document(), tokens, parser);
}
