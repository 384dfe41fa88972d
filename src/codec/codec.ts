/**
 * Document-level JSON codec.
 *
 * A document is the encoded root value plus the format version:
 *
 *   {"version": "1.1.0", "type": "distinction", "mechanism": [0, 1], ...}
 *
 * Roots that do not encode to a mapping (numbers, sequences, ...) or whose
 * mapping already has a "version" key or an array-index key are wrapped:
 *
 *   {"version": "1.1.0", "type": "__value__", "value": [1, 2, 3]}
 *
 * Text output is deterministic: the same logical value always produces the
 * same bytes, before and after a round trip.
 */

import { config } from "../config/index.js";
import { createLogger, type Logger } from "../logging/index.js";
import {
  type CanonicalMapping,
  type CanonicalValue,
  RESERVED_TAGS,
  TYPE_KEY,
  VERSION_KEY,
  formatCanonical,
  isCanonicalMapping,
  isIndexKey,
  parseCanonical,
} from "./canonical.js";
import { Decoder } from "./decoder.js";
import { Encoder, describeType } from "./encoder.js";
import { CodecError, MalformedNodeError, ParseError, UnexpectedRootError } from "./errors.js";
import type { Constructor, TypeRegistry } from "./registry.js";
import { FORMAT_VERSION, enforceVersion, parseVersion } from "./version.js";

export interface CodecOptions {
  /** Composite types this codec can encode and decode */
  registry: TypeRegistry;
  /** Format version written to and expected from documents */
  version?: string;
  /** JSON indentation; 0 writes a single line */
  indent?: number;
  /** Receives version warnings and debug output */
  logger?: Logger;
}

/**
 * Anything chunks of text can be read from: a Readable, or any async
 * iterable of strings or buffers.
 */
export type TextSource = AsyncIterable<string | Uint8Array>;

/**
 * Minimal writable surface dump() needs.
 */
export interface TextSink {
  write(chunk: string, callback: (error?: Error | null) => void): boolean;
}

export class JsonCodec {
  readonly version: string;
  readonly indent: number;
  readonly registry: TypeRegistry;
  private readonly encoder: Encoder;
  private readonly decoder: Decoder;
  private readonly logger: Logger;

  constructor(options: CodecOptions) {
    this.version = options.version ?? FORMAT_VERSION;
    if (!parseVersion(this.version)) {
      throw new CodecError(`Codec version "${this.version}" is not a semantic version`);
    }
    this.indent = options.indent ?? config.indent;
    this.registry = options.registry;
    this.encoder = new Encoder(options.registry);
    this.decoder = new Decoder(options.registry);
    this.logger =
      options.logger ??
      createLogger({
        level: config.logLevel,
        file: config.logToFile,
        logDir: config.logDir,
        scope: "codec",
      });
  }

  /**
   * Encode a value into a canonical value tree (no version stamp).
   */
  encode(value: unknown): CanonicalValue {
    return this.encoder.encode(value);
  }

  /**
   * Decode a canonical value tree (no version check).
   */
  decode(value: CanonicalValue): unknown {
    return this.decoder.decode(value);
  }

  /**
   * Encode a value as a versioned document.
   * Roots that are not mappings, that carry their own version key, or whose
   * keys would be enumerated ahead of the version stamp are wrapped.
   */
  toDocument(value: unknown): CanonicalMapping {
    const root = this.encoder.encode(value);
    if (isCanonicalMapping(root) && !(VERSION_KEY in root) && !Object.keys(root).some(isIndexKey)) {
      return { [VERSION_KEY]: this.version, ...root };
    }
    return { [VERSION_KEY]: this.version, [TYPE_KEY]: RESERVED_TAGS.value, value: root };
  }

  /**
   * Check a document's version, then decode its root value.
   *
   * @throws ParseError if the document is not a mapping
   * @throws IncompatibleVersionError if the version gate rejects it
   */
  fromDocument(document: CanonicalValue): unknown {
    if (!isCanonicalMapping(document)) {
      throw new ParseError("Document root must be a JSON object");
    }

    enforceVersion(document[VERSION_KEY], this.version, this.logger);

    const root: Record<string, CanonicalValue> = Object.fromEntries(
      Object.entries(document).filter(([key]) => key !== VERSION_KEY)
    );
    if (root[TYPE_KEY] !== RESERVED_TAGS.value) {
      return this.decoder.decode(root);
    }

    const wrapped = root.value;
    if (wrapped === undefined) {
      throw new MalformedNodeError(`Wrapped root needs a "value"`, "$");
    }
    return this.decoder.decode(wrapped);
  }

  /**
   * Serialize a value to document text.
   */
  dumps(value: unknown): string {
    const text = formatCanonical(this.toDocument(value), this.indent);
    this.logger.debug("Encoded document", { bytes: Buffer.byteLength(text, "utf8") });
    return text;
  }

  /**
   * Parse document text back into a value.
   *
   * @throws ParseError, IncompatibleVersionError, or any decode error
   */
  loads(text: string): unknown {
    return this.fromDocument(parseCanonical(text));
  }

  /**
   * Parse document text and require the root to be an instance of `type`.
   *
   * @throws UnexpectedRootError if the decoded root has another type
   */
  loadsAs<T>(text: string, type: Constructor<T>): T {
    const value = this.loads(text);
    if (!(value instanceof type)) {
      throw new UnexpectedRootError(type.name, describeType(value));
    }
    return value;
  }

  /**
   * Serialize a value and write it to a stream.
   * The whole document is encoded before anything is written, so an
   * encoding failure leaves the stream untouched.
   */
  async dump(value: unknown, sink: TextSink): Promise<void> {
    const text = this.dumps(value);
    await new Promise<void>((resolve, reject) => {
      sink.write(text, (error) => (error ? reject(error) : resolve()));
    });
  }

  /**
   * Read a whole document from a stream and decode it.
   */
  async load(source: TextSource): Promise<unknown> {
    const decoder = new TextDecoder("utf-8");
    let text = "";
    for await (const chunk of source) {
      text += typeof chunk === "string" ? chunk : decoder.decode(chunk, { stream: true });
    }
    text += decoder.decode();
    return this.loads(text);
  }
}

/**
 * Create a codec over a registry.
 *
 * @example
 *   const codec = createCodec({ registry: createModelRegistry() });
 *   const text = codec.dumps(sia);
 *   const restored = codec.loads(text);
 */
export function createCodec(options: CodecOptions): JsonCodec {
  return new JsonCodec(options);
}
