/**
 * Encoder: walks an object graph and produces a canonical value tree.
 *
 * Dispatch order for each value:
 *
 *   null, boolean, string, number  → themselves (sentinels for NaN/±Infinity,
 *                                    escaped text for sentinel-like strings)
 *   Array                          → sequence
 *   NdArray                        → "__array__" descriptor
 *   Set                            → "__set__" node, items sorted
 *   plain record                   → mapping with keys in compareKeys() order
 *                                    ("__record__" if it has a "type" key)
 *   registered class instance      → {"type": tag, ...fields}
 *   anything else                  → UnregisteredTypeError
 *
 * Registered composites keep the field order of their encode function.
 * A field named "__proto__" is refused wherever it appears.
 *
 * The encoder reads the registry and never mutates its input.
 */

import {
  type CanonicalMapping,
  type CanonicalValue,
  FORBIDDEN_KEY,
  RESERVED_TAGS,
  TYPE_KEY,
  compareCanonical,
  compareKeys,
  encodeFloat,
  isSentinel,
  toCompactText,
} from "./canonical.js";
import { MalformedNodeError, UnregisteredTypeError } from "./errors.js";
import { NdArray, encodeArray } from "./ndarray.js";
import type { AnyTypeDefinition, TypeRegistry } from "./registry.js";

/**
 * Whether a value is a plain record (object literal or null-prototype object).
 */
export function isPlainRecord(value: unknown): value is Record<string, unknown> {
  if (typeof value !== "object" || value === null) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Human-readable name of a value's type, for error messages.
 */
export function describeType(value: unknown): string {
  if (value === undefined) return "undefined";
  if (typeof value === "object" && value !== null) {
    const ctor: unknown = value.constructor;
    return typeof ctor === "function" && ctor.name ? ctor.name : "Object";
  }
  return typeof value;
}

export class Encoder {
  constructor(private readonly registry: TypeRegistry) {}

  /**
   * Encode a value into a canonical value tree.
   *
   * @throws UnregisteredTypeError for values with no encoding
   */
  encode(value: unknown): CanonicalValue {
    return this.encodeAt(value, "$");
  }

  private encodeAt(value: unknown, path: string): CanonicalValue {
    switch (typeof value) {
      case "boolean":
        return value;
      case "number":
        return encodeFloat(value);
      case "string":
        return isSentinel(value) ? { [TYPE_KEY]: RESERVED_TAGS.text, value } : value;
      case "object":
        return value === null ? null : this.encodeObject(value, path);
      default:
        throw new UnregisteredTypeError(describeType(value), path);
    }
  }

  private encodeObject(value: object, path: string): CanonicalValue {
    if (Array.isArray(value)) {
      return value.map((item: unknown, i) => this.encodeAt(item, `${path}[${i}]`));
    }
    if (value instanceof NdArray) {
      return encodeArray(value);
    }
    if (value instanceof Set) {
      return this.encodeSet(value, path);
    }
    if (isPlainRecord(value)) {
      const fields = this.encodeFields(value, path, true);
      return TYPE_KEY in fields ? { [TYPE_KEY]: RESERVED_TAGS.record, fields } : fields;
    }

    const definition = this.registry.lookupFor(value);
    if (!definition) {
      throw new UnregisteredTypeError(describeType(value), path);
    }
    return this.encodeComposite(definition, value, path);
  }

  private encodeComposite(definition: AnyTypeDefinition, value: object, path: string): CanonicalMapping {
    const raw: unknown = definition.encode(value);
    if (!isPlainRecord(raw)) {
      throw new MalformedNodeError(
        `Encoder for "${definition.tag}" must return a plain record of fields`,
        path
      );
    }
    if (TYPE_KEY in raw) {
      throw new MalformedNodeError(
        `Encoder for "${definition.tag}" returned the reserved field "${TYPE_KEY}"`,
        path
      );
    }
    return { [TYPE_KEY]: definition.tag, ...this.encodeFields(raw, path, false) };
  }

  /**
   * Encode record entries, skipping undefined values.
   *
   * @param sorted - Write keys in compareKeys() order instead of the record's own
   */
  private encodeFields(record: Record<string, unknown>, path: string, sorted: boolean): CanonicalMapping {
    const keys = Object.keys(record);
    if (sorted) keys.sort(compareKeys);

    const entries: [string, CanonicalValue][] = [];
    for (const key of keys) {
      if (key === FORBIDDEN_KEY) {
        throw new MalformedNodeError(`Field name "${FORBIDDEN_KEY}" cannot be written`, path);
      }
      const field = record[key];
      if (field === undefined) continue;
      entries.push([key, this.encodeAt(field, `${path}.${key}`)]);
    }
    return Object.fromEntries(entries);
  }

  /**
   * Encode set items, drop duplicates by encoded text, sort canonically.
   */
  private encodeSet(set: ReadonlySet<unknown>, path: string): CanonicalMapping {
    const unique = new Map<string, CanonicalValue>();
    let i = 0;
    for (const item of set) {
      const encoded = this.encodeAt(item, `${path}{${i++}}`);
      unique.set(toCompactText(encoded), encoded);
    }
    const items = [...unique.values()].sort(compareCanonical);
    return { [TYPE_KEY]: RESERVED_TAGS.set, items };
  }
}
