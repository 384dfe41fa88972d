/**
 * Canonical values: the closed set of shapes the JSON wire format expresses.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * WIRE CONVENTIONS
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * 1. NUMBERS: JSON numbers are finite. NaN and the infinities travel as the
 *    sentinel strings "NaN", "Infinity" and "-Infinity".
 *
 * 2. RESERVED KEYS: a mapping carrying a "type" key is a composite node.
 *    Tags starting with "__" belong to the codec itself (arrays, sets,
 *    escaped records and strings, wrapped roots).
 *
 * 3. ORDER: sequences keep their order. Unordered collections are sorted by
 *    compareCanonical() before they are written, and plain record keys by
 *    compareKeys(), so the same elements always produce the same text.
 *
 * 4. NEGATIVE ZERO: written as the literal -0 and read back with its sign.
 */

import { z } from "zod";
import { ParseError } from "./errors.js";

export type CanonicalPrimitive = null | boolean | number | string;

export type CanonicalValue = CanonicalPrimitive | CanonicalSequence | CanonicalMapping;

export type CanonicalSequence = readonly CanonicalValue[];

export interface CanonicalMapping {
  readonly [key: string]: CanonicalValue;
}

/** Key naming the type tag of a composite node */
export const TYPE_KEY = "type";

/** Key holding the version stamp at the document root */
export const VERSION_KEY = "version";

/** Field name a rebuilt JavaScript object cannot keep as an own property */
export const FORBIDDEN_KEY = "__proto__";

/** Tags the codec reserves for its built-in nodes */
export const RESERVED_TAGS = {
  array: "__array__",
  set: "__set__",
  record: "__record__",
  text: "__text__",
  value: "__value__",
} as const;

export type ReservedTag = (typeof RESERVED_TAGS)[keyof typeof RESERVED_TAGS];

/**
 * Whether a tag lies in the reserved namespace.
 */
export function isReservedTag(tag: string): boolean {
  return tag.startsWith("__");
}

/**
 * Zod schema accepting exactly the canonical value shapes.
 */
export const CanonicalValueSchema: z.ZodType<CanonicalValue> = z.lazy(() =>
  z.union([
    z.null(),
    z.boolean(),
    z.number().finite(),
    z.string(),
    z.array(CanonicalValueSchema),
    z.record(CanonicalValueSchema),
  ])
);

// ═══════════════════════════════════════════════════════════════════════════
// FLOAT SENTINELS
// ═══════════════════════════════════════════════════════════════════════════

export const FLOAT_SENTINELS = {
  nan: "NaN",
  positiveInfinity: "Infinity",
  negativeInfinity: "-Infinity",
} as const;

/**
 * Encode a number, substituting sentinels for values JSON cannot hold.
 */
export function encodeFloat(value: number): number | string {
  if (Number.isNaN(value)) return FLOAT_SENTINELS.nan;
  if (value === Infinity) return FLOAT_SENTINELS.positiveInfinity;
  if (value === -Infinity) return FLOAT_SENTINELS.negativeInfinity;
  return value;
}

/**
 * Restore the float a sentinel stands for, or undefined for any other text.
 */
export function decodeSentinel(text: string): number | undefined {
  switch (text) {
    case FLOAT_SENTINELS.nan:
      return NaN;
    case FLOAT_SENTINELS.positiveInfinity:
      return Infinity;
    case FLOAT_SENTINELS.negativeInfinity:
      return -Infinity;
    default:
      return undefined;
  }
}

export function isSentinel(text: string): boolean {
  return decodeSentinel(text) !== undefined;
}

// ═══════════════════════════════════════════════════════════════════════════
// GUARDS
// ═══════════════════════════════════════════════════════════════════════════

export function isCanonicalMapping(value: CanonicalValue): value is CanonicalMapping {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function isCanonicalSequence(value: CanonicalValue): value is CanonicalSequence {
  return Array.isArray(value);
}

// ═══════════════════════════════════════════════════════════════════════════
// CANONICAL ORDER
// ═══════════════════════════════════════════════════════════════════════════

function kindRank(value: CanonicalValue): number {
  if (value === null) return 0;
  switch (typeof value) {
    case "boolean":
      return 1;
    case "number":
      return 2;
    case "string":
      return 3;
    default:
      return isCanonicalSequence(value) ? 4 : 5;
  }
}

function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Total order over canonical values.
 *
 * Values are ranked by kind (null, boolean, number, string, sequence,
 * mapping). Primitives of one kind compare naturally; sequences and
 * mappings compare by their compact JSON text.
 */
export function compareCanonical(a: CanonicalValue, b: CanonicalValue): number {
  const rankA = kindRank(a);
  const rankB = kindRank(b);
  if (rankA !== rankB) return rankA - rankB;

  if (typeof a === "boolean" && typeof b === "boolean") {
    return Number(a) - Number(b);
  }
  if (typeof a === "number" && typeof b === "number") {
    return a < b ? -1 : a > b ? 1 : 0;
  }
  if (typeof a === "string" && typeof b === "string") {
    return compareText(a, b);
  }
  return compareText(toCompactText(a), toCompactText(b));
}

const INDEX_KEY = /^(0|[1-9][0-9]*)$/;

/**
 * Whether JavaScript enumerates a key ahead of all others (an array index).
 */
export function isIndexKey(key: string): boolean {
  return INDEX_KEY.test(key) && Number(key) < 2 ** 32 - 1;
}

/**
 * Order of plain record keys on the wire.
 *
 * Array-index keys come first in numeric order, then every other key by code
 * unit. This is the order JavaScript enumerates object keys in, so a mapping
 * built from sorted entries keeps it.
 */
export function compareKeys(a: string, b: string): number {
  const indexA = isIndexKey(a);
  const indexB = isIndexKey(b);
  if (indexA && indexB) return Number(a) - Number(b);
  if (indexA !== indexB) return indexA ? -1 : 1;
  return compareText(a, b);
}

// ═══════════════════════════════════════════════════════════════════════════
// TEXT
// ═══════════════════════════════════════════════════════════════════════════

function writeValue(value: CanonicalValue, indent: string, depth: string): string {
  if (typeof value === "number") {
    return Object.is(value, -0) ? "-0" : JSON.stringify(value);
  }
  if (value === null || typeof value !== "object") {
    return JSON.stringify(value);
  }

  const inner = depth + indent;
  const open = indent ? `\n${inner}` : "";
  const close = indent ? `\n${depth}` : "";
  const separator = indent ? `,\n${inner}` : ",";

  if (isCanonicalSequence(value)) {
    if (value.length === 0) return "[]";
    const items = value.map((item) => writeValue(item, indent, inner));
    return `[${open}${items.join(separator)}${close}]`;
  }

  const entries = Object.entries(value);
  if (entries.length === 0) return "{}";
  const colon = indent ? ": " : ":";
  const fields = entries.map(
    ([key, field]) => `${JSON.stringify(key)}${colon}${writeValue(field, indent, inner)}`
  );
  return `{${open}${fields.join(separator)}${close}}`;
}

/**
 * Compact single-line JSON text, used for ordering and deduplication.
 */
export function toCompactText(value: CanonicalValue): string {
  return writeValue(value, "", "");
}

/**
 * Format a canonical value as document text.
 * Layout matches JSON.stringify with the same indent, except that negative
 * zero keeps its sign.
 *
 * @param indent - Spaces per indentation level; 0 yields a single line
 */
export function formatCanonical(value: CanonicalValue, indent: number): string {
  return writeValue(value, " ".repeat(Math.min(10, Math.max(0, indent))), "") + "\n";
}

/**
 * Path of the first mapping key named FORBIDDEN_KEY, if any.
 */
function findForbiddenKey(value: unknown, path: string): string | undefined {
  if (Array.isArray(value)) {
    for (const [i, item] of value.entries()) {
      const found = findForbiddenKey(item, `${path}[${i}]`);
      if (found !== undefined) return found;
    }
    return undefined;
  }
  if (typeof value !== "object" || value === null) return undefined;
  for (const [key, field] of Object.entries(value)) {
    if (key === FORBIDDEN_KEY) return path;
    const found = findForbiddenKey(field, `${path}.${key}`);
    if (found !== undefined) return found;
  }
  return undefined;
}

/**
 * Parse text into a validated canonical value.
 *
 * @throws ParseError if the text is not JSON, or holds a "__proto__" key
 */
export function parseCanonical(text: string): CanonicalValue {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    throw new ParseError(
      `Failed to parse JSON: ${err instanceof Error ? err.message : String(err)}`,
      { cause: err }
    );
  }

  const forbidden = findForbiddenKey(parsed, "$");
  if (forbidden !== undefined) {
    throw new ParseError(`Field name "${FORBIDDEN_KEY}" is not allowed at ${forbidden}`);
  }

  const result = CanonicalValueSchema.safeParse(parsed);
  if (!result.success) {
    const detail = result.error.issues
      .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
      .join("; ");
    throw new ParseError(`Text is not a canonical value: ${detail}`);
  }
  return result.data;
}
