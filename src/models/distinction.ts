/**
 * Repertoire irreducibility analyses and the distinctions built from them.
 */

import { z } from "zod";
import { NdArray, defineType, float, indices, ndarrayOf } from "../codec/index.js";
import { DIRECTIONS, KPartition, type Direction } from "./partition.js";

/**
 * Irreducibility of one mechanism over one purview in one direction.
 *
 * `partitionedRepertoire` is null when no partition was evaluated (e.g. an
 * empty purview, where φ is zero by definition).
 */
export class RepertoireIrreducibilityAnalysis {
  constructor(
    readonly phi: number,
    readonly direction: Direction,
    readonly mechanism: readonly number[],
    readonly purview: readonly number[],
    readonly partition: KPartition,
    readonly repertoire: NdArray<"float64">,
    readonly partitionedRepertoire: NdArray<"float64"> | null,
    readonly specifiedState: NdArray<"int64">
  ) {}

  /** Whether the mechanism is irreducible over this purview */
  get isIrreducible(): boolean {
    return this.phi > 0;
  }
}

export const RepertoireIrreducibilityAnalysisType = defineType({
  tag: "repertoire_irreducibility_analysis",
  type: RepertoireIrreducibilityAnalysis,
  fields: z.object({
    phi: float,
    direction: z.enum(DIRECTIONS),
    mechanism: indices,
    purview: indices,
    partition: z.instanceof(KPartition),
    repertoire: ndarrayOf("float64"),
    partitioned_repertoire: ndarrayOf("float64").nullable(),
    specified_state: ndarrayOf("int64"),
  }),
  encode: (ria) => ({
    phi: ria.phi,
    direction: ria.direction,
    mechanism: ria.mechanism,
    purview: ria.purview,
    partition: ria.partition,
    repertoire: ria.repertoire,
    partitioned_repertoire: ria.partitionedRepertoire,
    specified_state: ria.specifiedState,
  }),
  decode: (f) =>
    new RepertoireIrreducibilityAnalysis(
      f.phi,
      f.direction,
      f.mechanism,
      f.purview,
      f.partition,
      f.repertoire,
      f.partitioned_repertoire,
      f.specified_state
    ),
});

/**
 * A mechanism together with its maximally irreducible cause and effect.
 *
 * φ is derived from the two analyses and recomputed on access; it is not
 * part of the persisted fields.
 */
export class Distinction {
  constructor(
    readonly mechanism: readonly number[],
    readonly cause: RepertoireIrreducibilityAnalysis,
    readonly effect: RepertoireIrreducibilityAnalysis
  ) {}

  get phi(): number {
    return Math.min(this.cause.phi, this.effect.phi);
  }

  get causePurview(): readonly number[] {
    return this.cause.purview;
  }

  get effectPurview(): readonly number[] {
    return this.effect.purview;
  }
}

export const DistinctionType = defineType({
  tag: "distinction",
  type: Distinction,
  fields: z.object({
    mechanism: indices,
    cause: z.instanceof(RepertoireIrreducibilityAnalysis),
    effect: z.instanceof(RepertoireIrreducibilityAnalysis),
  }),
  encode: (distinction) => ({
    mechanism: distinction.mechanism,
    cause: distinction.cause,
    effect: distinction.effect,
  }),
  decode: (f) => new Distinction(f.mechanism, f.cause, f.effect),
});
