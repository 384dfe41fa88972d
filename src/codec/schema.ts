/**
 * Zod building blocks for type definition field schemas.
 *
 * Field schemas run on already-decoded values, so arrays arrive as NdArray
 * instances, sets as Set instances and floats possibly as NaN.
 */

import { z } from "zod";
import { NdArray, type DType } from "./ndarray.js";

/** Any number, including NaN and the infinities */
export const float = z.union([z.number(), z.nan()]);

/** Non-negative integer (node index, state value) */
export const index = z.number().int().nonnegative();

/** Ordered tuple of node indices */
export const indices = z.array(index).readonly();

/**
 * Schema for an NdArray of one dtype.
 */
export function ndarrayOf<D extends DType>(dtype: D): z.ZodType<NdArray<D>> {
  return z.custom<NdArray<D>>((value) => value instanceof NdArray && value.dtype === dtype, {
    message: `Expected a ${dtype} array`,
  });
}
