/**
 * Rectangular numeric arrays and their wire descriptor.
 *
 * An NdArray is stored flat in row-major order. On the wire it becomes:
 *
 *   {"type": "__array__", "shape": [2, 3], "dtype": "float64", "data": [...]}
 *
 * float64 data may hold NaN, the infinities and negative zero; they are
 * written with the float sentinels (or as -0) and restored bit-exact.
 * A descriptor with any other key is malformed.
 */

import { z } from "zod";
import {
  type CanonicalMapping,
  type CanonicalValue,
  RESERVED_TAGS,
  TYPE_KEY,
  decodeSentinel,
  encodeFloat,
} from "./canonical.js";
import { MalformedArrayError } from "./errors.js";

export const DTYPES = ["float64", "int64", "bool"] as const;

export type DType = (typeof DTYPES)[number];

/** Element type stored for each dtype */
export interface DTypeElements {
  float64: number;
  int64: number;
  bool: boolean;
}

export type Element<D extends DType> = DTypeElements[D];

/**
 * Whether a value is a valid element of the given dtype.
 */
export function isElementOf<D extends DType>(dtype: D, value: unknown): value is Element<D> {
  switch (dtype) {
    case "float64":
      return typeof value === "number";
    case "int64":
      return typeof value === "number" && Number.isSafeInteger(value);
    case "bool":
      return typeof value === "boolean";
    default:
      return false;
  }
}

/**
 * Number of elements implied by a shape. The empty shape is a scalar.
 */
export function shapeSize(shape: readonly number[]): number {
  return shape.reduce((acc, dim) => acc * dim, 1);
}

function validateShape(shape: readonly number[], path: string): void {
  for (const dim of shape) {
    if (!Number.isSafeInteger(dim) || dim < 1) {
      throw new MalformedArrayError(
        `Shape [${shape.join(", ")}] must contain positive integers`,
        path
      );
    }
  }
}

/**
 * Immutable n-dimensional array.
 *
 * @example
 *   const tpm = NdArray.fromRows("float64", [
 *     [0, 0.5, 1],
 *     [1, NaN, Infinity],
 *   ]);
 *   tpm.shape; // [2, 3]
 *   tpm.at(1, 2); // Infinity
 */
export class NdArray<D extends DType = DType> {
  readonly dtype: D;
  readonly shape: readonly number[];
  readonly data: readonly Element<D>[];

  /**
   * @throws MalformedArrayError if shape, dtype and data disagree
   */
  constructor(dtype: D, shape: readonly number[], data: readonly Element<D>[], path = "$") {
    validateShape(shape, path);
    const expected = shapeSize(shape);
    if (expected !== data.length) {
      throw new MalformedArrayError(
        `Shape [${shape.join(", ")}] implies ${expected} elements but data has ${data.length}`,
        path
      );
    }
    data.forEach((value, i) => {
      if (!isElementOf(dtype, value)) {
        throw new MalformedArrayError(
          `Element ${i} (${String(value)}) is not a valid ${dtype}`,
          path
        );
      }
    });

    this.dtype = dtype;
    this.shape = Object.freeze([...shape]);
    this.data = Object.freeze([...data]);
  }

  static float64(shape: readonly number[], data: ArrayLike<number>): NdArray<"float64"> {
    return new NdArray("float64", shape, Array.from(data));
  }

  static int64(shape: readonly number[], data: ArrayLike<number>): NdArray<"int64"> {
    return new NdArray("int64", shape, Array.from(data));
  }

  static bool(shape: readonly number[], data: ArrayLike<boolean>): NdArray<"bool"> {
    return new NdArray("bool", shape, Array.from(data));
  }

  /**
   * Build a 2-D array from equal-length rows.
   */
  static fromRows<D extends DType>(dtype: D, rows: readonly (readonly Element<D>[])[]): NdArray<D> {
    const width = rows.length > 0 ? rows[0].length : 0;
    if (rows.some((row) => row.length !== width)) {
      throw new MalformedArrayError("Rows must all have the same length", "$");
    }
    const data: Element<D>[] = [];
    for (const row of rows) data.push(...row);
    return new NdArray(dtype, [rows.length, width], data);
  }

  get ndim(): number {
    return this.shape.length;
  }

  get size(): number {
    return this.data.length;
  }

  /**
   * Element at a multi-dimensional index.
   */
  at(...index: number[]): Element<D> {
    if (index.length !== this.shape.length) {
      throw new RangeError(`Expected ${this.shape.length} indices, got ${index.length}`);
    }
    let offset = 0;
    index.forEach((i, axis) => {
      const dim = this.shape[axis];
      if (!Number.isInteger(i) || i < 0 || i >= dim) {
        throw new RangeError(`Index ${i} out of bounds for axis ${axis} with size ${dim}`);
      }
      offset = offset * dim + i;
    });
    return this.data[offset];
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// DESCRIPTOR CODEC
// ═══════════════════════════════════════════════════════════════════════════

const ArrayDescriptorSchema = z.object({
  [TYPE_KEY]: z.literal(RESERVED_TAGS.array),
  shape: z.array(z.number().int()),
  dtype: z.enum(DTYPES),
  data: z.array(z.union([z.number(), z.string(), z.boolean()])),
}).strict();

/**
 * Encode an array as its wire descriptor.
 */
export function encodeArray(array: NdArray): CanonicalMapping {
  const data: CanonicalValue[] = array.data.map((value) =>
    typeof value === "number" && array.dtype === "float64" ? encodeFloat(value) : value
  );
  return {
    [TYPE_KEY]: RESERVED_TAGS.array,
    shape: [...array.shape],
    dtype: array.dtype,
    data,
  };
}

/**
 * Decode a wire descriptor into an array.
 *
 * @throws MalformedArrayError if the descriptor is incomplete or inconsistent
 */
export function decodeArray(node: CanonicalMapping, path: string): NdArray {
  const result = ArrayDescriptorSchema.safeParse(node);
  if (!result.success) {
    const detail = result.error.issues
      .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
      .join("; ");
    throw new MalformedArrayError(`Invalid array descriptor: ${detail}`, path);
  }

  const { shape, dtype, data } = result.data;
  const elements = data.map((value, i) => {
    if (typeof value !== "string") return value;
    const restored = dtype === "float64" ? decodeSentinel(value) : undefined;
    if (restored === undefined) {
      throw new MalformedArrayError(`Element ${i} ("${value}") is not a valid ${dtype}`, path);
    }
    return restored;
  });

  return new NdArray<DType>(dtype, shape, elements, path);
}
