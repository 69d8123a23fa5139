import { assertAcyclic, coerce } from "./coerce.js";
import { isType, plain, type ContainerOptions, type Document } from "./document.js";
import { ArgumentError, TypeMismatchError } from "./errors.js";
import { CompactFormatter, writeSequence, type FormatterFactory } from "./formatter.js";
import { sequenceToArray, type ElementOf } from "./mapper.js";
import { parseSequence, type ParseOptions } from "./parser.js";
import type { ElementType, MappingRegistry } from "./registry.js";
import { unwrap, type RawValue, type Value, type ValueType } from "./types.js";

const compact: FormatterFactory = () => new CompactFormatter();

/** An ordered, 0-indexed list of values; the array node of a tree. */
export class Sequence implements Iterable<RawValue> {
  private readonly items: Value[] = [];
  private formatter: FormatterFactory;
  private registry: MappingRegistry | undefined;

  constructor(options: ContainerOptions = {}) {
    this.formatter = options.formatter ?? compact;
    this.registry = options.registry;
  }

  /** Parse `[...]` text. */
  static parse(source: string, options?: ParseOptions): Sequence {
    return parseSequence(source, options);
  }

  /** Convert each element as by {@link Sequence.append}. */
  static from(values: readonly unknown[], options: ContainerOptions = {}): Sequence {
    if (values === null || values === undefined) {
      throw new ArgumentError("provided array is null");
    }
    const sequence = new Sequence(options);
    const ancestors = new Set<object>([values]);
    for (const value of values) {
      sequence.appendValue(coerce(value, options.registry, ancestors));
    }
    return sequence;
  }

  useFormatter(formatter: FormatterFactory): this {
    if (!formatter) {
      throw new ArgumentError("provided formatter is null");
    }
    this.formatter = formatter;
    return this;
  }

  useRegistry(registry: MappingRegistry | undefined): this {
    this.registry = registry;
    return this;
  }

  /** Convert and add each value at the end. */
  append(...values: unknown[]): this {
    const converted = values.map((value) => coerce(value, this.registry, new Set()));
    for (const value of converted) {
      assertAcyclic(this, value);
    }
    this.items.push(...converted);
    return this;
  }

  /** Add an already canonical value at the end. */
  appendValue(value: Value): this {
    assertAcyclic(this, value);
    this.items.push(value);
    return this;
  }

  /** Remove the element at `index` and return it. */
  delete(index: number): RawValue {
    if (!Number.isInteger(index) || index < 0 || index >= this.items.length) {
      throw new ArgumentError(`index ${index} is out of range for length ${this.items.length}`);
    }
    const [removed] = this.items.splice(index, 1);
    return removed ? unwrap(removed) : null;
  }

  /** The element with its tag, or undefined when out of range. */
  typed(index: number): Value | undefined {
    if (!Number.isInteger(index) || index < 0 || index >= this.items.length) return undefined;
    return this.items[index];
  }

  typeOf(index: number): ValueType | null {
    return this.typed(index)?.type ?? null;
  }

  /** The element at `index`, or null when out of range. */
  get(index: number): RawValue {
    const value = this.typed(index);
    return value ? unwrap(value) : null;
  }

  getString(index: number): string | null {
    const value = this.expect(index, "string");
    return value ? value.value : null;
  }

  getInteger(index: number): number | null {
    const value = this.expect(index, "int32");
    return value ? value.value : null;
  }

  getLong(index: number): bigint | null {
    const value = this.expect(index, "int64");
    return value ? value.value : null;
  }

  getDouble(index: number): number | null {
    const value = this.expect(index, "float64");
    return value ? value.value : null;
  }

  getBoolean(index: number): boolean | null {
    const value = this.expect(index, "bool");
    return value ? value.value : null;
  }

  getDocument(index: number): Document | null {
    const value = this.expect(index, "document");
    return value ? value.value : null;
  }

  getSequence(index: number): Sequence | null {
    const value = this.expect(index, "sequence");
    return value ? value.value : null;
  }

  private expect<T extends ValueType>(index: number, type: T): Extract<Value, { type: T }> | null {
    const value = this.typed(index);
    if (!value || value.type === "null") return null;
    if (!isType(value, type)) {
      throw new TypeMismatchError(index, type, value.type);
    }
    return value;
  }

  get length(): number {
    return this.items.length;
  }

  isEmpty(): boolean {
    return this.items.length === 0;
  }

  toArray(): RawValue[] {
    return this.items.map(unwrap);
  }

  typedValues(): Value[] {
    return [...this.items];
  }

  /** Plain array copy, nested containers included. */
  toPlainArray(): unknown[] {
    return this.items.map(plain);
  }

  [Symbol.iterator](): Iterator<RawValue> {
    return this.toArray()[Symbol.iterator]();
  }

  /** Render as text with this sequence's formatter. */
  marshal(): string;
  /**
   * Keep the elements of `type`, converting documents when `type` is a
   * class. Elements of any other kind are skipped.
   */
  marshal<E extends ElementType>(type: E, options?: { registry?: MappingRegistry }): ElementOf<E>[];
  marshal<E extends ElementType>(type?: E, options: { registry?: MappingRegistry } = {}): string | ElementOf<E>[] {
    if (type === undefined) {
      const formatter = this.formatter();
      writeSequence(formatter, this);
      return formatter.result();
    }
    return sequenceToArray(this, type, options.registry ?? this.registry);
  }

  toString(): string {
    return this.marshal();
  }
}
