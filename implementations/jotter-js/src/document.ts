import { assertAcyclic, coerce, mapToDocument } from "./coerce.js";
import { ArgumentError, TypeMismatchError } from "./errors.js";
import { CompactFormatter, writeDocument, type FormatterFactory } from "./formatter.js";
import { documentToObject, mapObject, type MapperOptions } from "./mapper.js";
import { parseDocument, type ParseOptions } from "./parser.js";
import type { Constructor, MappingRegistry } from "./registry.js";
import type { Sequence } from "./sequence.js";
import type { EntryStore } from "./store.js";
import { unwrap, type RawValue, type Value, type ValueType } from "./types.js";

export interface ContainerOptions {
  /** Declarations used when objects are stored or marshalled */
  registry?: MappingRegistry;
  /** Formatter used by `marshal()` (default compact) */
  formatter?: FormatterFactory;
}

export interface DocumentOptions extends ContainerOptions {
  /** Backing store (default a `Map`, insertion ordered) */
  store?: EntryStore;
}

export interface MarshalOptions {
  /** Keys (or property names) left out of the mapping */
  ignore?: readonly string[];
  /** Overrides the document's own registry */
  registry?: MappingRegistry;
}

const compact: FormatterFactory = () => new CompactFormatter();

/** A string-keyed set of values; the object node of a tree. */
export class Document {
  private store: EntryStore;
  private formatter: FormatterFactory;
  private registry: MappingRegistry | undefined;

  constructor(options: DocumentOptions = {}) {
    this.store = options.store ?? new Map<string, Value>();
    this.store.clear();
    this.formatter = options.formatter ?? compact;
    this.registry = options.registry;
  }

  /** Parse `{...}` text. */
  static parse(source: string, options?: ParseOptions): Document {
    return parseDocument(source, options);
  }

  /** Copy a map or record; every value is converted as by {@link Document.put}. */
  static fromMap(
    map: ReadonlyMap<unknown, unknown> | Readonly<Record<string, unknown>>,
    options: ContainerOptions = {},
  ): Document {
    if (map === null || map === undefined) {
      throw new ArgumentError("provided map is null");
    }
    const entries = map instanceof Map ? map : new Map(Object.entries(map));
    const document = mapToDocument(entries, options.registry, new Set<object>([map]));
    if (options.formatter) document.useFormatter(options.formatter);
    return document;
  }

  /** Describe an object's fields as a document. */
  static fromObject(source: object, options: MapperOptions & ContainerOptions = {}): Document {
    if (source === null || source === undefined) {
      throw new ArgumentError("provided object is null");
    }
    const document = mapObject(source, options, new Set([source])).value;
    if (options.formatter) document.useFormatter(options.formatter);
    return document;
  }

  /**
   * Swap the backing store. The given store is cleared, then receives the
   * current entries.
   */
  useStore(store: EntryStore): this {
    if (!store) {
      throw new ArgumentError("provided store is null");
    }
    if (store === this.store) return this;
    const entries = [...this.store.entries()];
    store.clear();
    for (const [key, value] of entries) {
      store.set(key, value);
    }
    this.store = store;
    return this;
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

  /** Store `value` under `key`, converting it to its canonical form. */
  put(key: string, value: unknown): this {
    return this.putValue(key, coerce(value, this.registry, new Set()));
  }

  /** Store an already canonical value. */
  putValue(key: string, value: Value): this {
    checkKey(key);
    assertAcyclic(this, value);
    this.store.set(key, value);
    return this;
  }

  remove(key: string): this {
    checkKey(key);
    this.store.delete(key);
    return this;
  }

  has(key: string): boolean {
    checkKey(key);
    return this.store.has(key);
  }

  /** The stored value with its tag, or undefined when absent. */
  typed(key: string): Value | undefined {
    checkKey(key);
    return this.store.get(key);
  }

  /** Variant of the value under `key`, or null when absent. */
  typeOf(key: string): ValueType | null {
    return this.typed(key)?.type ?? null;
  }

  /** The value under `key`, or null when absent. */
  get(key: string): RawValue {
    const value = this.typed(key);
    return value ? unwrap(value) : null;
  }

  getString(key: string): string | null {
    const value = this.expect(key, "string");
    return value ? value.value : null;
  }

  getInteger(key: string): number | null {
    const value = this.expect(key, "int32");
    return value ? value.value : null;
  }

  getLong(key: string): bigint | null {
    const value = this.expect(key, "int64");
    return value ? value.value : null;
  }

  getDouble(key: string): number | null {
    const value = this.expect(key, "float64");
    return value ? value.value : null;
  }

  getBoolean(key: string): boolean | null {
    const value = this.expect(key, "bool");
    return value ? value.value : null;
  }

  getDocument(key: string): Document | null {
    const value = this.expect(key, "document");
    return value ? value.value : null;
  }

  getSequence(key: string): Sequence | null {
    const value = this.expect(key, "sequence");
    return value ? value.value : null;
  }

  private expect<T extends ValueType>(key: string, type: T): Extract<Value, { type: T }> | null {
    const value = this.typed(key);
    if (!value || value.type === "null") return null;
    if (!isType(value, type)) {
      throw new TypeMismatchError(key, type, value.type);
    }
    return value;
  }

  get length(): number {
    return this.store.size;
  }

  keys(): string[] {
    return [...this.store.entries()].map(([key]) => key);
  }

  entries(): [string, RawValue][] {
    return [...this.store.entries()].map(([key, value]) => [key, unwrap(value)]);
  }

  typedEntries(): [string, Value][] {
    return [...this.store.entries()];
  }

  typedValues(): Value[] {
    return [...this.store.entries()].map(([, value]) => value);
  }

  /** Read-only snapshot of the entries. */
  raw(): ReadonlyMap<string, RawValue> {
    return new Map(this.entries());
  }

  /** Plain object copy, nested containers included. */
  toObject(): Record<string, unknown> {
    const result: Record<string, unknown> = {};
    for (const [key, value] of this.store.entries()) {
      Object.defineProperty(result, key, { value: plain(value), enumerable: true, writable: true, configurable: true });
    }
    return result;
  }

  /** Render as text with this document's formatter. */
  marshal(): string;
  /** Build an instance of `type` from this document. */
  marshal<T extends object>(type: Constructor<T>, options?: MarshalOptions): T;
  marshal<T extends object>(type?: Constructor<T>, options: MarshalOptions = {}): string | T {
    if (type === undefined) {
      const formatter = this.formatter();
      writeDocument(formatter, this);
      return formatter.result();
    }
    return documentToObject(this, type, {
      ignore: options.ignore,
      registry: options.registry ?? this.registry,
    }).value;
  }

  toString(): string {
    return this.marshal();
  }
}

function checkKey(key: string): void {
  if (key === null || key === undefined) {
    throw new ArgumentError("provided key is null");
  }
  if (typeof key !== "string") {
    throw new ArgumentError("provided key is not a string");
  }
}

export function isType<T extends ValueType>(value: Value, type: T): value is Extract<Value, { type: T }> {
  return value.type === type;
}

/** @internal Untagged deep copy of a value. */
export function plain(value: Value): unknown {
  switch (value.type) {
    case "document":
      return value.value.toObject();
    case "sequence":
      return value.value.typedValues().map(plain);
    default:
      return unwrap(value);
  }
}
