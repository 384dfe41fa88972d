/**
 * System irreducibility analyses.
 */

import { z } from "zod";
import { defineType, float, index, indices } from "../codec/index.js";
import { SystemPartition } from "./partition.js";

/**
 * Result of analysing a whole subsystem for irreducibility.
 *
 * `normalizedPhi` arrived with format 1.1; documents written by 1.0 lack it
 * and decode with null.
 */
export class SystemIrreducibilityAnalysis {
  constructor(
    readonly phi: number,
    readonly nodeIndices: readonly number[],
    readonly currentState: readonly number[],
    readonly partition: SystemPartition,
    readonly normalizedPhi: number | null = null
  ) {}

  get isReducible(): boolean {
    return this.phi <= 0;
  }
}

export const SystemIrreducibilityAnalysisType = defineType({
  tag: "system_irreducibility_analysis",
  type: SystemIrreducibilityAnalysis,
  fields: z.object({
    phi: float,
    node_indices: indices,
    current_state: z.array(index).readonly(),
    partition: z.instanceof(SystemPartition),
    normalized_phi: float.nullable().default(null),
  }),
  encode: (sia) => ({
    phi: sia.phi,
    node_indices: sia.nodeIndices,
    current_state: sia.currentState,
    partition: sia.partition,
    normalized_phi: sia.normalizedPhi,
  }),
  decode: (f) =>
    new SystemIrreducibilityAnalysis(
      f.phi,
      f.node_indices,
      f.current_state,
      f.partition,
      f.normalized_phi
    ),
});

/**
 * Stand-in for subsystems that cannot be analysed (empty, disconnected,
 * ...). φ is always zero; `reasons` records why.
 */
export class NullSystemIrreducibilityAnalysis {
  constructor(
    readonly nodeIndices: readonly number[],
    readonly reasons: ReadonlySet<string> = new Set<string>()
  ) {}

  get phi(): number {
    return 0;
  }
}

export const NullSystemIrreducibilityAnalysisType = defineType({
  tag: "null_system_irreducibility_analysis",
  type: NullSystemIrreducibilityAnalysis,
  fields: z.object({
    node_indices: indices,
    reasons: z.set(z.string()).readonly(),
  }),
  encode: (sia) => ({ node_indices: sia.nodeIndices, reasons: sia.reasons }),
  decode: (f) => new NullSystemIrreducibilityAnalysis(f.node_indices, f.reasons),
});
