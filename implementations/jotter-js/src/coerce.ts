import { Document } from "./document.js";
import { ArgumentError } from "./errors.js";
import { mapObject } from "./mapper.js";
import type { MappingRegistry } from "./registry.js";
import { Sequence } from "./sequence.js";
import { INT32_MAX, INT32_MIN, NULL, integer, type Value } from "./types.js";

export function isContainer(input: unknown): input is Document | Sequence {
  return input instanceof Document || input instanceof Sequence;
}

/**
 * Canonical stored form of an arbitrary input. Containers pass through
 * unchanged; arrays, sets and typed arrays become sequences; maps and other
 * objects become documents.
 */
export function toValue(input: unknown, registry?: MappingRegistry): Value {
  return coerce(input, registry, new Set());
}

/** @internal `ancestors` holds the objects being converted above this one. */
export function coerce(input: unknown, registry: MappingRegistry | undefined, ancestors: Set<object>): Value {
  if (input === null || input === undefined) return NULL;

  switch (typeof input) {
    case "boolean":
      return { type: "bool", value: input };
    case "string":
      return { type: "string", value: input };
    case "number":
      return numberValue(input);
    case "bigint":
      return integer(input);
    case "function":
    case "symbol":
      throw new ArgumentError(`cannot store a ${typeof input}`);
  }
  if (typeof input !== "object") {
    throw new ArgumentError(`cannot store a ${typeof input}`);
  }

  if (input instanceof Document) return { type: "document", value: input };
  if (input instanceof Sequence) return { type: "sequence", value: input };

  if (ancestors.has(input)) {
    throw new ArgumentError("cannot store a circular structure");
  }
  ancestors.add(input);
  try {
    if (Array.isArray(input) || input instanceof Set || isTypedArray(input)) {
      const sequence = new Sequence({ registry });
      for (const element of input) {
        sequence.appendValue(coerce(element, registry, ancestors));
      }
      return { type: "sequence", value: sequence };
    }
    if (input instanceof Map) {
      return { type: "document", value: mapToDocument(input, registry, ancestors) };
    }
    return { type: "document", value: mapObject(input, { registry }, ancestors).value };
  } finally {
    ancestors.delete(input);
  }
}

function isTypedArray(input: object): input is Iterable<number | bigint> {
  return ArrayBuffer.isView(input) && !(input instanceof DataView);
}

function numberValue(input: number): Value {
  if (!Number.isFinite(input)) {
    throw new ArgumentError(`${input} cannot be represented`);
  }
  if (Number.isInteger(input)) {
    if (input >= INT32_MIN && input <= INT32_MAX) {
      return { type: "int32", value: input === 0 ? 0 : input };
    }
    if (Number.isSafeInteger(input)) {
      return { type: "int64", value: BigInt(input) };
    }
  }
  return { type: "float64", value: input };
}

/** @internal */
export function mapToDocument(
  map: ReadonlyMap<unknown, unknown>,
  registry: MappingRegistry | undefined,
  ancestors: Set<object>,
): Document {
  const document = new Document({ registry });
  for (const [key, value] of map) {
    if (key === null || key === undefined) {
      throw new ArgumentError("one of the map keys is null");
    }
    if (typeof key !== "string") {
      throw new ArgumentError(`one of the map keys is not a string: ${String(key)}`);
    }
    document.putValue(key, coerce(value, registry, ancestors));
  }
  return document;
}

/** Throw if storing `value` inside `owner` would make the tree cyclic. */
export function assertAcyclic(owner: Document | Sequence, value: Value): void {
  if (value.type !== "document" && value.type !== "sequence") return;
  if (value.value === owner) {
    throw new ArgumentError("cannot store a container inside itself");
  }
  const children = value.type === "document" ? value.value.typedValues() : value.value.typedValues();
  for (const child of children) {
    assertAcyclic(owner, child);
  }
}
