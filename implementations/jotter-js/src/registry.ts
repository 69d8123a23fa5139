import { ArgumentError, NestedArrayError } from "./errors.js";

/** A class that can be built with no arguments */
export type Constructor<T extends object = object> = new () => T;

/** Any class, whatever its constructor takes */
export type AnyConstructor<T extends object = object> = abstract new (...args: never[]) => T;

/** What the elements of an array field hold */
export type ElementType = "string" | "number" | "bigint" | "boolean" | Constructor;

/** How one member is read from and written to an object */
export type MemberAccess = "field" | "method";

/** Ties an object member to the document key it is stored under. */
export interface FieldBinding {
  property: string;
  key: string;
  access: MemberAccess;
  /** Class a nested document is built into */
  type?: Constructor;
  elementType?: ElementType;
}

export interface FieldDeclaration {
  /** Document key (default the member's own name, `getX`/`isX` methods as `x`) */
  key?: string;
  /** Class a nested document is built into */
  type?: Constructor;
  /** Element type of an array member */
  elementType?: ElementType;
}

export type MemberStyle = "fields" | "accessors";

export interface TypeDeclaration<T extends object> {
  fields?: { [P in keyof T & string]?: FieldDeclaration };
  /**
   * `"fields"` (default) reads own properties. `"accessors"` reads prototype
   * getters and zero-argument `getX()`/`isX()` methods.
   */
  members?: MemberStyle;
}

/** Everything the mapper knows about one class. */
export interface TypeMapping {
  readonly bindings: readonly FieldBinding[];
  readonly members: MemberStyle;
  /** Members nobody declared are mapped too, by name */
  readonly forged: boolean;
}

const ACCESSOR_PREFIX = /^(get|is)(.+)$/;

/**
 * Per-class field declarations, computed once and cached. Pass one to the
 * mapper, or attach it to a document, wherever declared keys matter; without
 * one every own field maps by name.
 */
export class MappingRegistry {
  private readonly declared = new Map<unknown, TypeMapping>();
  private readonly defined = new Set<unknown>();

  /** Declare how instances of `type` map. Each class can be declared once. */
  define<T extends object>(type: AnyConstructor<T>, declaration: TypeDeclaration<T> = {}): this {
    checkType(type);
    if (this.defined.has(type)) {
      throw new ArgumentError(`${type.name || "class"} is already defined`);
    }
    const existing = this.declared.get(type);

    const prototype: unknown = type.prototype;
    const bindings: FieldBinding[] = [];
    const fields = declaration.fields ?? {};
    for (const property of Object.keys(fields)) {
      const field: FieldDeclaration | undefined = Reflect.get(fields, property);
      if (!field) continue;
      if (isArrayType(field.elementType)) {
        throw new NestedArrayError(property);
      }
      const access = isMethod(prototype, property) ? "method" : "field";
      bindings.push({
        property,
        key: field.key ?? (access === "method" ? accessorKey(property) : null) ?? property,
        access,
        type: field.type,
        elementType: field.elementType,
      });
    }

    this.declared.set(type, {
      bindings,
      members: declaration.members ?? existing?.members ?? "fields",
      forged: existing?.forged ?? false,
    });
    this.defined.add(type);
    return this;
  }

  /**
   * Map every member of `type` by name, declared or not; declarations still
   * decide keys and nested types.
   */
  forge(type: AnyConstructor): this {
    checkType(type);
    const existing = this.declared.get(type);
    if (existing?.forged) return this;
    this.declared.set(type, {
      bindings: existing?.bindings ?? [],
      members: existing?.members ?? "fields",
      forged: true,
    });
    return this;
  }

  isForged(type: AnyConstructor): boolean {
    return this.declared.get(type)?.forged ?? false;
  }

  lookup(type: unknown): TypeMapping | undefined {
    return this.declared.get(type);
  }
}

function checkType(type: unknown): void {
  if (typeof type !== "function") {
    throw new ArgumentError("provided type is not a class");
  }
}

function isArrayType(type: ElementType | undefined): boolean {
  return type === Array || (typeof type === "function" && type.prototype instanceof Array);
}

function isMethod(prototype: unknown, property: string): boolean {
  if (typeof prototype !== "object" || prototype === null) return false;
  const descriptor = findDescriptor(prototype, property);
  return descriptor !== undefined && typeof descriptor.value === "function";
}

/** Own or inherited property descriptor, stopping before `Object.prototype`. */
export function findDescriptor(target: object, property: string): PropertyDescriptor | undefined {
  for (let current: object | null = target; current && current !== Object.prototype; current = Object.getPrototypeOf(current)) {
    const descriptor = Object.getOwnPropertyDescriptor(current, property);
    if (descriptor) return descriptor;
  }
  return undefined;
}

/** `getFirstName` → `firstname`, `isActive` → `active`; null for other names. */
export function accessorKey(name: string): string | null {
  const match = ACCESSOR_PREFIX.exec(name);
  const rest = match?.[2];
  if (!rest || rest[0] !== rest[0]?.toUpperCase()) return null;
  return rest.toLowerCase();
}
