/**
 * Decoder: rebuilds typed objects from a canonical value tree.
 *
 * Mappings with a "type" key dispatch on the tag: codec-reserved tags are
 * handled here, every other tag must be in the registry. A composite's
 * fields are decoded first, validated against the definition's schema, and
 * only then handed to its decode function, so a failure anywhere throws
 * instead of producing a partial object. Keys a composite's schema does not
 * name are dropped by a plain z.object(); definitions that must refuse them
 * declare their fields with .strict().
 */

import {
  type CanonicalMapping,
  type CanonicalValue,
  RESERVED_TAGS,
  TYPE_KEY,
  decodeSentinel,
  isCanonicalMapping,
  isCanonicalSequence,
  toCompactText,
} from "./canonical.js";
import {
  InvalidFieldsError,
  MalformedNodeError,
  UnknownTypeError,
  toFieldIssues,
} from "./errors.js";
import { decodeArray } from "./ndarray.js";
import type { TypeRegistry } from "./registry.js";

export class Decoder {
  constructor(private readonly registry: TypeRegistry) {}

  /**
   * Decode a canonical value tree.
   *
   * @throws UnknownTypeError, MalformedNodeError, MalformedArrayError,
   *   InvalidFieldsError
   */
  decode(value: CanonicalValue): unknown {
    return this.decodeAt(value, "$");
  }

  private decodeAt(value: CanonicalValue, path: string): unknown {
    if (typeof value === "string") {
      return decodeSentinel(value) ?? value;
    }
    if (value === null || typeof value !== "object") {
      return value;
    }
    if (isCanonicalSequence(value)) {
      return value.map((item, i) => this.decodeAt(item, `${path}[${i}]`));
    }
    if (!(TYPE_KEY in value)) {
      return this.decodeFields(value, path);
    }

    const tag = value[TYPE_KEY];
    if (typeof tag !== "string") {
      throw new MalformedNodeError(`"${TYPE_KEY}" must be a string tag`, path);
    }

    switch (tag) {
      case RESERVED_TAGS.array:
        return decodeArray(value, path);
      case RESERVED_TAGS.set:
        return this.decodeSet(value, path);
      case RESERVED_TAGS.record:
        return this.decodeRecord(value, path);
      case RESERVED_TAGS.text:
        return this.decodeText(value, path);
      default:
        return this.decodeComposite(tag, value, path);
    }
  }

  private decodeComposite(tag: string, node: CanonicalMapping, path: string): unknown {
    const definition = this.registry.lookupByTag(tag);
    if (!definition) {
      throw new UnknownTypeError(tag, path);
    }

    const fields = this.decodeFields(node, path, TYPE_KEY);

    const result = definition.fields.safeParse(fields);
    if (!result.success) {
      throw new InvalidFieldsError(tag, path, toFieldIssues(result.error.issues));
    }
    return definition.decode(result.data);
  }

  private decodeFields(node: CanonicalMapping, path: string, omit?: string): Record<string, unknown> {
    return Object.fromEntries(
      Object.entries(node)
        .filter(([key]) => key !== omit)
        .map(([key, field]): [string, unknown] => [key, this.decodeAt(field, `${path}.${key}`)])
    );
  }

  /**
   * Items whose encoded text repeats collapse into one element.
   */
  private decodeSet(node: CanonicalMapping, path: string): Set<unknown> {
    const items = node.items;
    if (items === undefined || !isCanonicalSequence(items)) {
      throw new MalformedNodeError(`Set node needs an "items" sequence`, path);
    }
    const seen = new Set<string>();
    const result = new Set<unknown>();
    items.forEach((item, i) => {
      const key = toCompactText(item);
      if (seen.has(key)) return;
      seen.add(key);
      result.add(this.decodeAt(item, `${path}{${i}}`));
    });
    return result;
  }

  private decodeRecord(node: CanonicalMapping, path: string): Record<string, unknown> {
    const fields = node.fields;
    if (fields === undefined || !isCanonicalMapping(fields)) {
      throw new MalformedNodeError(`Record node needs a "fields" mapping`, path);
    }
    return this.decodeFields(fields, `${path}.fields`);
  }

  private decodeText(node: CanonicalMapping, path: string): string {
    const text = node.value;
    if (typeof text !== "string") {
      throw new MalformedNodeError(`Text node needs a string "value"`, path);
    }
    return text;
  }
}
