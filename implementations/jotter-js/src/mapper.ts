import { coerce } from "./coerce.js";
import { Document, plain } from "./document.js";
import { MappingError } from "./errors.js";
import { accessorKey, type Constructor, type ElementType, type FieldBinding, type MappingRegistry } from "./registry.js";
import type { Sequence } from "./sequence.js";
import { unwrap, type Value } from "./types.js";

export interface MapperOptions {
  /** Declared keys and nested types; without one every own field maps by name */
  registry?: MappingRegistry;
  /** Property names or document keys left out */
  ignore?: readonly string[];
}

/**
 * What happened to one member during a mapping. `absent` means the document had
 * no entry for it; `skipped` carries the reason the member could not be read or
 * written.
 */
export type FieldStatus = "mapped" | "ignored" | "absent" | "skipped";

export interface FieldOutcome {
  property: string;
  key: string;
  status: FieldStatus;
  reason?: string;
}

export interface MappingResult<T> {
  value: T;
  fields: FieldOutcome[];
}

/** Element type of `marshal(type)` on a sequence */
export type ElementOf<E extends ElementType> = E extends "string"
  ? string
  : E extends "number"
    ? number
    : E extends "bigint"
      ? bigint
      : E extends "boolean"
        ? boolean
        : E extends new () => infer T
          ? T
          : never;

const GETTER_PREFIX = /^(get|is)/;

/**
 * Describe `source` as a document. A member that cannot be read or converted
 * is left out and reported as `skipped`.
 */
export function mapObject(
  source: object,
  options: MapperOptions = {},
  ancestors: Set<object> = new Set([source]),
): MappingResult<Document> {
  const { registry, ignore = [] } = options;
  const document = new Document({ registry });
  const fields: FieldOutcome[] = [];

  for (const binding of bindingsOf(source, registry)) {
    const { property, key } = binding;
    if (isIgnored(binding, ignore)) {
      fields.push({ property, key, status: "ignored" });
      continue;
    }
    try {
      document.putValue(key, coerce(read(source, binding), registry, ancestors));
      fields.push({ property, key, status: "mapped" });
    } catch (error) {
      if (error instanceof MappingError) throw error;
      fields.push({ property, key, status: "skipped", reason: describeError(error) });
    }
  }
  return { value: document, fields };
}

/**
 * Build a `type` instance from `document`. Only keys the document holds are
 * assigned; members it lacks keep the values the constructor gave them.
 */
export function documentToObject<T extends object>(
  document: Document,
  type: Constructor<T>,
  options: MapperOptions = {},
): MappingResult<T> {
  const { registry, ignore = [] } = options;
  if (typeof type !== "function" || type.length > 0) {
    throw new MappingError(`${typeName(type)} has no usable constructor`);
  }
  let instance: T;
  try {
    instance = new type();
  } catch (error) {
    throw new MappingError(`could not construct ${typeName(type)}`, { cause: error });
  }

  const fields: FieldOutcome[] = [];
  for (const binding of bindingsOf(instance, registry)) {
    const { property, key } = binding;
    if (isIgnored(binding, ignore)) {
      fields.push({ property, key, status: "ignored" });
      continue;
    }
    const value = document.typed(key);
    if (value === undefined) {
      fields.push({ property, key, status: "absent" });
      continue;
    }
    try {
      const failure = assign(instance, binding, fromValue(instance, binding, value, registry));
      fields.push(failure ? { property, key, status: "skipped", reason: failure } : { property, key, status: "mapped" });
    } catch (error) {
      if (error instanceof MappingError) throw error;
      fields.push({ property, key, status: "skipped", reason: describeError(error) });
    }
  }
  return { value: instance, fields };
}

/**
 * Keep the elements of `elementType`. Documents become instances when it is a
 * class; elements of any other kind, nulls and nested sequences included, are
 * dropped. Without an element type every element is copied as plain data.
 */
export function sequenceToArray<E extends ElementType>(
  sequence: Sequence,
  elementType: E,
  registry?: MappingRegistry,
): ElementOf<E>[];
export function sequenceToArray(sequence: Sequence, elementType?: ElementType, registry?: MappingRegistry): unknown[];
export function sequenceToArray(sequence: Sequence, elementType?: ElementType, registry?: MappingRegistry): unknown[] {
  const result: unknown[] = [];
  for (const value of sequence.typedValues()) {
    if (elementType === undefined) {
      result.push(plain(value));
      continue;
    }
    const element = convertElement(value, elementType, registry);
    if (element) result.push(element.value);
  }
  return result;
}

function convertElement(
  value: Value,
  elementType: ElementType,
  registry: MappingRegistry | undefined,
): { value: unknown } | undefined {
  switch (elementType) {
    case "string":
      return value.type === "string" ? { value: value.value } : undefined;
    case "number":
      return value.type === "int32" || value.type === "float64" ? { value: value.value } : undefined;
    case "bigint":
      if (value.type === "int64") return { value: value.value };
      return value.type === "int32" ? { value: BigInt(value.value) } : undefined;
    case "boolean":
      return value.type === "bool" ? { value: value.value } : undefined;
    default:
      return value.type === "document"
        ? { value: documentToObject(value.value, elementType, { registry }).value }
        : undefined;
  }
}

function fromValue(target: object, binding: FieldBinding, value: Value, registry: MappingRegistry | undefined): unknown {
  switch (value.type) {
    case "document": {
      const type = binding.type ?? inferType(target, binding);
      return type ? documentToObject(value.value, type, { registry }).value : value.value.toObject();
    }
    case "sequence":
      return sequenceToArray(value.value, binding.elementType, registry);
    default:
      return unwrap(value);
  }
}

/** Class of the member's current value, when it is a buildable class instance. */
function inferType(target: object, binding: FieldBinding): Constructor | undefined {
  if (binding.access !== "field") return undefined;
  const current: unknown = Reflect.get(target, binding.property);
  if (typeof current !== "object" || current === null || Array.isArray(current)) return undefined;
  const prototype: unknown = Object.getPrototypeOf(current);
  if (typeof prototype !== "object" || prototype === null || prototype === Object.prototype) return undefined;
  const type: unknown = Reflect.get(prototype, "constructor");
  return isConstructor(type) ? type : undefined;
}

function isConstructor(value: unknown): value is Constructor {
  return typeof value === "function" && value.length === 0 && typeof value.prototype === "object";
}

function bindingsOf(target: object, registry: MappingRegistry | undefined): readonly FieldBinding[] {
  const prototype: unknown = Object.getPrototypeOf(target);
  const type: unknown = typeof prototype === "object" && prototype !== null ? Reflect.get(prototype, "constructor") : undefined;
  const mapping = registry?.lookup(type);
  if (!mapping) return ownFields(target);
  if (!mapping.forged) return mapping.bindings;

  const declared = new Set(mapping.bindings.map((binding) => binding.property));
  const inferred = mapping.members === "accessors" ? accessors(target) : ownFields(target);
  return [...mapping.bindings, ...inferred.filter((binding) => !declared.has(binding.property))];
}

function ownFields(target: object): FieldBinding[] {
  return Object.keys(target).map((property): FieldBinding => ({ property, key: property, access: "field" }));
}

/** Prototype getters by name, and `getX()`/`isX()` methods keyed `x`. */
function accessors(target: object): FieldBinding[] {
  const bindings: FieldBinding[] = [];
  const seen = new Set<string>(["constructor"]);
  for (
    let current: object | null = Object.getPrototypeOf(target);
    current && current !== Object.prototype;
    current = Object.getPrototypeOf(current)
  ) {
    for (const name of Object.getOwnPropertyNames(current)) {
      if (seen.has(name)) continue;
      seen.add(name);
      const descriptor = Object.getOwnPropertyDescriptor(current, name);
      if (descriptor?.get) {
        bindings.push({ property: name, key: name, access: "field" });
        continue;
      }
      const key = accessorKey(name);
      if (key && typeof descriptor?.value === "function" && descriptor.value.length === 0) {
        bindings.push({ property: name, key, access: "method" });
      }
    }
  }
  return bindings;
}

function isIgnored(binding: FieldBinding, ignore: readonly string[]): boolean {
  return ignore.includes(binding.property) || ignore.includes(binding.key);
}

function read(source: object, binding: FieldBinding): unknown {
  const member: unknown = Reflect.get(source, binding.property);
  if (binding.access === "field") return member;
  if (typeof member !== "function") {
    throw new TypeError(`${binding.property} is not a method`);
  }
  return Reflect.apply(member, source, []);
}

/** Write one member; returns why it could not be written, if it could not. */
function assign(target: object, binding: FieldBinding, value: unknown): string | undefined {
  if (binding.access === "method") {
    const name = `set${binding.property.replace(GETTER_PREFIX, "")}`;
    const setter: unknown = Reflect.get(target, name);
    if (typeof setter !== "function") return `no ${name}() method`;
    Reflect.apply(setter, target, [value]);
    return undefined;
  }
  return Reflect.set(target, binding.property, value) ? undefined : `${binding.property} cannot be assigned`;
}

function typeName(type: unknown): string {
  return typeof type === "function" && type.name ? type.name : String(type);
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
