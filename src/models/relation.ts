/**
 * Relations between distinctions.
 */

import { z } from "zod";
import { defineType, float, index } from "../codec/index.js";
import { Distinction } from "./distinction.js";

/**
 * Overlap between the purviews of two or more distinctions.
 * The shared purview is an unordered set of node indices.
 */
export class Relation {
  constructor(
    readonly relata: readonly Distinction[],
    readonly purview: ReadonlySet<number>,
    readonly phi: number
  ) {}

  /** Number of distinctions related */
  get degree(): number {
    return this.relata.length;
  }
}

export const RelationType = defineType({
  tag: "relation",
  type: Relation,
  fields: z.object({
    relata: z.array(z.instanceof(Distinction)).min(2).readonly(),
    purview: z.set(index).readonly(),
    phi: float,
  }),
  encode: (relation) => ({
    relata: relation.relata,
    purview: relation.purview,
    phi: relation.phi,
  }),
  decode: (f) => new Relation(f.relata, f.purview, f.phi),
});
