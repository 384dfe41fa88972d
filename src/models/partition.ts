/**
 * Partitions: the cuts a Φ computation searches over.
 */

import { z } from "zod";
import { defineType, indices } from "../codec/index.js";

export const DIRECTIONS = ["CAUSE", "EFFECT"] as const;

/** Temporal direction of a repertoire */
export type Direction = (typeof DIRECTIONS)[number];

export const SYSTEM_PARTITION_DIRECTIONS = ["CAUSE", "EFFECT", "BIDIRECTIONAL"] as const;

export type SystemPartitionDirection = (typeof SYSTEM_PARTITION_DIRECTIONS)[number];

/**
 * One part of a mechanism-purview partition.
 */
export class Part {
  constructor(
    readonly mechanism: readonly number[],
    readonly purview: readonly number[]
  ) {}
}

export const PartType = defineType({
  tag: "part",
  type: Part,
  fields: z.object({ mechanism: indices, purview: indices }),
  encode: (part) => ({ mechanism: part.mechanism, purview: part.purview }),
  decode: (f) => new Part(f.mechanism, f.purview),
});

/**
 * Partition of a mechanism and purview into k parts.
 */
export class KPartition {
  constructor(readonly parts: readonly Part[]) {}

  get k(): number {
    return this.parts.length;
  }

  /** Union of all parts' mechanisms, sorted */
  get mechanism(): number[] {
    return [...new Set(this.parts.flatMap((p) => p.mechanism))].sort((a, b) => a - b);
  }

  /** Union of all parts' purviews, sorted */
  get purview(): number[] {
    return [...new Set(this.parts.flatMap((p) => p.purview))].sort((a, b) => a - b);
  }
}

export const KPartitionType = defineType({
  tag: "k_partition",
  type: KPartition,
  fields: z.object({ parts: z.array(z.instanceof(Part)).min(1).readonly() }),
  encode: (partition) => ({ parts: partition.parts }),
  decode: (f) => new KPartition(f.parts),
});

/**
 * System-level cut: connections from `fromNodes` to `toNodes` are severed.
 */
export class SystemPartition {
  constructor(
    readonly direction: SystemPartitionDirection,
    readonly fromNodes: readonly number[],
    readonly toNodes: readonly number[]
  ) {}

  /** Whether severing this cut removes the connection from node a to node b */
  cuts(a: number, b: number): boolean {
    return this.fromNodes.includes(a) && this.toNodes.includes(b);
  }
}

export const SystemPartitionType = defineType({
  tag: "system_partition",
  type: SystemPartition,
  fields: z.object({
    direction: z.enum(SYSTEM_PARTITION_DIRECTIONS),
    from_nodes: indices,
    to_nodes: indices,
  }),
  encode: (partition) => ({
    direction: partition.direction,
    from_nodes: partition.fromNodes,
    to_nodes: partition.toNodes,
  }),
  decode: (f) => new SystemPartition(f.direction, f.from_nodes, f.to_nodes),
});
