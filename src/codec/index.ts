/**
 * Type-tagged JSON codec.
 *
 * Usage:
 *   import { createCodec, TypeRegistry } from "./codec/index.js";
 *
 *   const registry = TypeRegistry.create([PartType, KPartitionType]);
 *   const codec = createCodec({ registry });
 *
 *   const text = codec.dumps(partition);
 *   const restored = codec.loads(text);
 */

// Canonical values
export {
  type CanonicalValue,
  type CanonicalMapping,
  type CanonicalSequence,
  type CanonicalPrimitive,
  CanonicalValueSchema,
  FLOAT_SENTINELS,
  FORBIDDEN_KEY,
  RESERVED_TAGS,
  TYPE_KEY,
  VERSION_KEY,
  compareCanonical,
  compareKeys,
  formatCanonical,
  isCanonicalMapping,
  isCanonicalSequence,
  isIndexKey,
  parseCanonical,
} from "./canonical.js";

// Arrays
export { NdArray, DTYPES, type DType, type Element, encodeArray, decodeArray } from "./ndarray.js";

// Registry
export {
  TypeRegistry,
  TypeRegistryBuilder,
  defineType,
  type TypeDefinition,
  type AnyTypeDefinition,
  type Constructor,
} from "./registry.js";

// Field schemas
export { float, index, indices, ndarrayOf } from "./schema.js";

// Encoding and decoding
export { Encoder, describeType, isPlainRecord } from "./encoder.js";
export { Decoder } from "./decoder.js";
export { JsonCodec, createCodec, type CodecOptions, type TextSink, type TextSource } from "./codec.js";

// Versioning
export {
  FORMAT_VERSION,
  checkVersion,
  enforceVersion,
  parseVersion,
  type SemVer,
  type VersionDecision,
} from "./version.js";

// Errors
export {
  CodecError,
  UnregisteredTypeError,
  UnknownTypeError,
  DuplicateTypeTagError,
  RegistrySealedError,
  MalformedNodeError,
  MalformedArrayError,
  InvalidFieldsError,
  IncompatibleVersionError,
  UnexpectedRootError,
  ParseError,
  type FieldIssue,
} from "./errors.js";
