import type { Document } from "./document.js";
import type { Sequence } from "./sequence.js";

/** Character offset span in source */
export interface Span {
  start: number;
  end: number;
}

/** Variant names of a stored value */
export type ValueType =
  | "null"
  | "bool"
  | "int32"
  | "int64"
  | "float64"
  | "string"
  | "document"
  | "sequence";

export interface NullValue {
  type: "null";
}

export interface BoolValue {
  type: "bool";
  value: boolean;
}

/** An integer that fits in 32 signed bits */
export interface Int32Value {
  type: "int32";
  value: number;
}

export interface Int64Value {
  type: "int64";
  value: bigint;
}

export interface Float64Value {
  type: "float64";
  value: number;
}

export interface StringValue {
  type: "string";
  value: string;
}

export interface DocumentValue {
  type: "document";
  value: Document;
}

export interface SequenceValue {
  type: "sequence";
  value: Sequence;
}

/** A leaf value */
export type Scalar = NullValue | BoolValue | Int32Value | Int64Value | Float64Value | StringValue;

/** A value as stored in a document or sequence */
export type Value = Scalar | DocumentValue | SequenceValue;

/** A stored value with its variant tag removed */
export type RawValue = null | boolean | number | bigint | string | Document | Sequence;

export const INT32_MIN = -2147483648;
export const INT32_MAX = 2147483647;
export const INT64_MIN = -9223372036854775808n;
export const INT64_MAX = 9223372036854775807n;

export const NULL: NullValue = Object.freeze({ type: "null" });

/** Drop the variant tag. */
export function unwrap(value: Value): RawValue {
  return value.type === "null" ? null : value.value;
}

/** Build an integer value, demoting to 32 bits when it fits. */
export function integer(value: bigint): Int32Value | Int64Value {
  if (value >= BigInt(INT32_MIN) && value <= BigInt(INT32_MAX)) {
    return { type: "int32", value: Number(value) };
  }
  return { type: "int64", value: saturate(value) };
}

/** Clamp to the int64 range. */
export function saturate(value: bigint): bigint {
  if (value > INT64_MAX) return INT64_MAX;
  if (value < INT64_MIN) return INT64_MIN;
  return value;
}
