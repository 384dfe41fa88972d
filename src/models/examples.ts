/**
 * Example systems and results used to produce reference fixtures.
 *
 * The basic network has three binary nodes A = OR(B, C), B = AND(A, C),
 * C = XOR(A, B). Result values below are illustrative fixture contents,
 * not the output of an actual Φ computation.
 */

import { NdArray } from "../codec/index.js";
import { Distinction, RepertoireIrreducibilityAnalysis } from "./distinction.js";
import { Network, Subsystem } from "./network.js";
import { KPartition, Part, SystemPartition, type Direction } from "./partition.js";
import { Relation } from "./relation.js";
import { NullSystemIrreducibilityAnalysis, SystemIrreducibilityAnalysis } from "./sia.js";
import { CauseEffectStructure } from "./structure.js";

export function basicNetwork(): Network {
  // State-by-node TPM, rows ordered by (A, B, C) with A most significant
  const tpm = NdArray.float64(
    [2, 2, 2, 3],
    [
      0, 0, 0,
      1, 0, 0,
      1, 0, 1,
      1, 0, 1,
      0, 0, 1,
      1, 1, 1,
      1, 0, 0,
      1, 1, 0,
    ]
  );
  const cm = NdArray.fromRows("int64", [
    [0, 1, 1],
    [1, 0, 1],
    [1, 1, 0],
  ]);
  return new Network(tpm, cm, ["A", "B", "C"]);
}

export function basicSubsystem(): Subsystem {
  return new Subsystem(basicNetwork(), [1, 0, 0], [0, 1, 2]);
}

function analysis(
  direction: Direction,
  mechanism: number[],
  purview: number[],
  phi: number,
  repertoire: number[],
  partitioned: number[] | null
): RepertoireIrreducibilityAnalysis {
  const shape = [repertoire.length];
  const partition = new KPartition([
    new Part(mechanism, []),
    new Part([], purview),
  ]);
  return new RepertoireIrreducibilityAnalysis(
    phi,
    direction,
    mechanism,
    purview,
    partition,
    NdArray.float64(shape, repertoire),
    partitioned ? NdArray.float64(shape, partitioned) : null,
    NdArray.int64([1, purview.length], purview.map(() => 1))
  );
}

export function exampleDistinction(): Distinction {
  return new Distinction(
    [1],
    analysis("CAUSE", [1], [2], 0.5, [0, 1], [0.5, 0.5]),
    analysis("EFFECT", [1], [0], 0.25, [0.25, 0.75], [0.5, 0.5])
  );
}

export function exampleStructure(): CauseEffectStructure {
  const first = exampleDistinction();
  const second = new Distinction(
    [0, 2],
    analysis("CAUSE", [0, 2], [1, 2], 0.125, [0.5, 0, 0.25, 0.25], [0.25, 0.25, 0.25, 0.25]),
    analysis("EFFECT", [0, 2], [1], 0.375, [0, 1], [0.5, 0.5])
  );
  const relation = new Relation([first, second], new Set([2, 1]), 0.125);
  return new CauseEffectStructure(basicSubsystem(), [first, second], [relation]);
}

export function exampleSia(): SystemIrreducibilityAnalysis {
  return new SystemIrreducibilityAnalysis(
    2.3125,
    [0, 1, 2],
    [1, 0, 0],
    new SystemPartition("BIDIRECTIONAL", [0], [1, 2]),
    0.75
  );
}

export function exampleNullSia(): NullSystemIrreducibilityAnalysis {
  return new NullSystemIrreducibilityAnalysis([], new Set(["empty subsystem"]));
}

/** Fixture name → builder, as written by the fixture generator */
export const EXAMPLE_FIXTURES: Readonly<Record<string, () => unknown>> = {
  "basic-network": basicNetwork,
  "basic-subsystem": basicSubsystem,
  "basic-distinction": exampleDistinction,
  "basic-phi-structure": exampleStructure,
  "basic-sia": exampleSia,
  "empty-sia": exampleNullSia,
};
