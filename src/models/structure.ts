/**
 * Cause-effect structures: every distinction and relation of a subsystem.
 */

import { z } from "zod";
import { defineType } from "../codec/index.js";
import { Distinction } from "./distinction.js";
import { Subsystem } from "./network.js";
import { Relation } from "./relation.js";

/**
 * Sums are derived from the persisted distinctions and relations each time
 * they are read.
 */
export class CauseEffectStructure {
  constructor(
    readonly subsystem: Subsystem,
    readonly distinctions: readonly Distinction[],
    readonly relations: readonly Relation[]
  ) {}

  get sumPhiDistinctions(): number {
    return this.distinctions.reduce((acc, d) => acc + d.phi, 0);
  }

  get sumPhiRelations(): number {
    return this.relations.reduce((acc, r) => acc + r.phi, 0);
  }

  get bigPhi(): number {
    return this.sumPhiDistinctions + this.sumPhiRelations;
  }

  get isEmpty(): boolean {
    return this.distinctions.length === 0;
  }
}

export const CauseEffectStructureType = defineType({
  tag: "phi_structure",
  type: CauseEffectStructure,
  fields: z.object({
    subsystem: z.instanceof(Subsystem),
    distinctions: z.array(z.instanceof(Distinction)).readonly(),
    relations: z.array(z.instanceof(Relation)).readonly(),
  }),
  encode: (structure) => ({
    subsystem: structure.subsystem,
    distinctions: structure.distinctions,
    relations: structure.relations,
  }),
  decode: (f) => new CauseEffectStructure(f.subsystem, f.distinctions, f.relations),
});
