/**
 * Networks and subsystems: the systems a Φ computation runs on.
 */

import { z } from "zod";
import { NdArray, defineType, index, indices, ndarrayOf } from "../codec/index.js";

/**
 * A network of binary nodes.
 *
 * The TPM is in multidimensional state-by-node form: shape [2, ..., 2, n],
 * where entry (s_0, ..., s_{n-1}, i) is the probability that node i is ON
 * in the next step given current state s.
 */
export class Network {
  constructor(
    readonly tpm: NdArray<"float64">,
    readonly cm: NdArray<"int64">,
    readonly nodeLabels: readonly string[]
  ) {}

  get size(): number {
    return this.nodeLabels.length;
  }
}

export const NetworkType = defineType({
  tag: "network",
  type: Network,
  fields: z.object({
    tpm: ndarrayOf("float64"),
    cm: ndarrayOf("int64"),
    node_labels: z.array(z.string()).readonly(),
  }),
  encode: (network) => ({
    tpm: network.tpm,
    cm: network.cm,
    node_labels: network.nodeLabels,
  }),
  decode: (f) => new Network(f.tpm, f.cm, f.node_labels),
});

/**
 * A subset of a network's nodes, fixed in a given network state.
 */
export class Subsystem {
  constructor(
    readonly network: Network,
    readonly state: readonly number[],
    readonly nodeIndices: readonly number[]
  ) {}

  get size(): number {
    return this.nodeIndices.length;
  }

  /** Labels of the subsystem's nodes, derived from the network */
  get nodeLabels(): string[] {
    return this.nodeIndices.map((i) => this.network.nodeLabels[i] ?? `n${i}`);
  }
}

export const SubsystemType = defineType({
  tag: "subsystem",
  type: Subsystem,
  fields: z.object({
    network: z.instanceof(Network),
    state: z.array(index).readonly(),
    node_indices: indices,
  }),
  encode: (subsystem) => ({
    network: subsystem.network,
    state: subsystem.state,
    node_indices: subsystem.nodeIndices,
  }),
  decode: (f) => new Subsystem(f.network, f.state, f.node_indices),
});
