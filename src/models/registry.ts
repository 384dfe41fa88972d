/**
 * Registration of every Φ result type with the codec.
 */

import { TypeRegistry, createCodec, type AnyTypeDefinition, type CodecOptions, type JsonCodec } from "../codec/index.js";
import { DistinctionType, RepertoireIrreducibilityAnalysisType } from "./distinction.js";
import { NetworkType, SubsystemType } from "./network.js";
import { KPartitionType, PartType, SystemPartitionType } from "./partition.js";
import { RelationType } from "./relation.js";
import { NullSystemIrreducibilityAnalysisType, SystemIrreducibilityAnalysisType } from "./sia.js";
import { CauseEffectStructureType } from "./structure.js";

/** Definitions of all result types, leaves first */
export const MODEL_TYPES: readonly AnyTypeDefinition[] = [
  NetworkType,
  SubsystemType,
  PartType,
  KPartitionType,
  SystemPartitionType,
  RepertoireIrreducibilityAnalysisType,
  DistinctionType,
  RelationType,
  CauseEffectStructureType,
  SystemIrreducibilityAnalysisType,
  NullSystemIrreducibilityAnalysisType,
];

/**
 * Registry holding every result type.
 */
export function createModelRegistry(): TypeRegistry {
  return TypeRegistry.builder().registerAll(MODEL_TYPES).build();
}

/**
 * Codec over the result types.
 */
export function createModelCodec(options: Omit<CodecOptions, "registry"> = {}): JsonCodec {
  return createCodec({ ...options, registry: createModelRegistry() });
}
