import type { Span, ValueType } from "./types.js";

type ErrorOptions = { cause?: unknown };

/** Base class of every error the library raises. */
export class JotterError extends Error {
  override readonly name: string = "JotterError";

  constructor(message: string, options?: ErrorOptions) {
    super(message);
    if (options?.cause !== undefined) this.cause = options.cause;
    Object.setPrototypeOf(this, JotterError.prototype);
  }
}

/** A required input was missing, empty or of an unusable kind. */
export class ArgumentError extends JotterError {
  override readonly name = "ArgumentError";

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    Object.setPrototypeOf(this, ArgumentError.prototype);
  }
}

/** Text could not be tokenized or parsed. No partial tree is ever returned. */
export class ParseError extends JotterError {
  override readonly name = "ParseError";
  readonly span?: Span;

  constructor(message: string, span?: Span, options?: ErrorOptions) {
    super(message, options);
    this.span = span;
    Object.setPrototypeOf(this, ParseError.prototype);
  }

  /** Human-readable location string */
  get location(): string {
    if (!this.span) return "";
    return `characters ${this.span.start}..${this.span.end}`;
  }

  override toString(): string {
    const loc = this.location;
    return loc ? `${this.name}: ${this.message} (${loc})` : `${this.name}: ${this.message}`;
  }
}

/** A typed getter found a value of a different variant. */
export class TypeMismatchError extends JotterError {
  override readonly name = "TypeMismatchError";

  constructor(
    readonly at: string | number,
    readonly expected: ValueType,
    readonly actual: ValueType,
  ) {
    super(`${typeof at === "number" ? `index ${at}` : JSON.stringify(at)} holds ${actual}, not ${expected}`);
    Object.setPrototypeOf(this, TypeMismatchError.prototype);
  }
}

/** An object could not be built from, or described as, a document. */
export class MappingError extends JotterError {
  override readonly name: string = "MappingError";

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    Object.setPrototypeOf(this, MappingError.prototype);
  }
}

/** Arrays of arrays cannot be mapped onto object fields. */
export class NestedArrayError extends MappingError {
  override readonly name = "NestedArrayError";

  constructor(readonly property: string) {
    super(`field ${JSON.stringify(property)} declares an array element type; nested arrays are not supported`);
    Object.setPrototypeOf(this, NestedArrayError.prototype);
  }
}
