/**
 * Φ result models and their codec registrations.
 */

export { Network, NetworkType, Subsystem, SubsystemType } from "./network.js";
export {
  DIRECTIONS,
  SYSTEM_PARTITION_DIRECTIONS,
  type Direction,
  type SystemPartitionDirection,
  Part,
  PartType,
  KPartition,
  KPartitionType,
  SystemPartition,
  SystemPartitionType,
} from "./partition.js";
export {
  RepertoireIrreducibilityAnalysis,
  RepertoireIrreducibilityAnalysisType,
  Distinction,
  DistinctionType,
} from "./distinction.js";
export { Relation, RelationType } from "./relation.js";
export { CauseEffectStructure, CauseEffectStructureType } from "./structure.js";
export {
  SystemIrreducibilityAnalysis,
  SystemIrreducibilityAnalysisType,
  NullSystemIrreducibilityAnalysis,
  NullSystemIrreducibilityAnalysisType,
} from "./sia.js";
export { MODEL_TYPES, createModelRegistry, createModelCodec } from "./registry.js";
export {
  EXAMPLE_FIXTURES,
  basicNetwork,
  basicSubsystem,
  exampleDistinction,
  exampleStructure,
  exampleSia,
  exampleNullSia,
} from "./examples.js";
