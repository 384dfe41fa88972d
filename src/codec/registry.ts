/**
 * Type registry: the table of composite types the codec understands.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * LIFECYCLE
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * 1. STARTUP: type definitions are registered on a TypeRegistryBuilder
 *    (or passed to TypeRegistry.create). Conflicts fail immediately.
 *
 * 2. BUILD: build() seals the builder and returns a frozen TypeRegistry.
 *    Later registrations on the builder fail with RegistrySealedError.
 *
 * 3. USE: encoders and decoders hold the registry and only read it, so a
 *    registry may be shared freely once built.
 */

import type { z } from "zod";
import { isReservedTag } from "./canonical.js";
import { DuplicateTypeTagError, RegistrySealedError } from "./errors.js";

/**
 * Class whose instances a definition encodes.
 */
export type Constructor<T> = abstract new (...args: never[]) => T;

/**
 * Paired encode/decode functions for one composite type.
 *
 * encode() returns the persisted fields as domain values, in the order
 * they should appear on the wire; the encoder recurses into each of them.
 * decode() receives those fields after recursive decoding and validation
 * against `fields`. Derived attributes are not persisted.
 */
export interface TypeDefinition<T, S extends z.ZodTypeAny = z.ZodTypeAny> {
  /** Stable identifier written under the "type" key */
  readonly tag: string;
  /** Class whose instances this definition encodes (exact match) */
  readonly type: Constructor<T>;
  /** Schema validating the decoded field record */
  readonly fields: S;
  encode(value: T): z.input<S>;
  decode(fields: z.output<S>): T;
}

export type AnyTypeDefinition = TypeDefinition<unknown>;

/**
 * Identity helper that infers a definition's type parameters.
 *
 * @example
 *   const PartType = defineType({
 *     tag: "part",
 *     type: Part,
 *     fields: z.object({ mechanism: indices, purview: indices }),
 *     encode: (part) => ({ mechanism: part.mechanism, purview: part.purview }),
 *     decode: (f) => new Part(f.mechanism, f.purview),
 *   });
 */
export function defineType<T, S extends z.ZodTypeAny>(
  definition: TypeDefinition<T, S>
): TypeDefinition<T, S> {
  return definition;
}

/**
 * Immutable registry of type definitions, indexed by tag and by class.
 */
export class TypeRegistry {
  private readonly _byTag: ReadonlyMap<string, AnyTypeDefinition>;
  private readonly _byType: ReadonlyMap<unknown, AnyTypeDefinition>;

  private constructor(byTag: Map<string, AnyTypeDefinition>, byType: Map<unknown, AnyTypeDefinition>) {
    this._byTag = byTag;
    this._byType = byType;
    Object.freeze(this);
  }

  /**
   * Build a registry from a list of definitions.
   *
   * @throws DuplicateTypeTagError on conflicting definitions
   */
  static create(definitions: Iterable<AnyTypeDefinition>): TypeRegistry {
    const byTag = new Map<string, AnyTypeDefinition>();
    const byType = new Map<unknown, AnyTypeDefinition>();
    for (const definition of definitions) {
      addDefinition(byTag, byType, definition);
    }
    return new TypeRegistry(byTag, byType);
  }

  /**
   * Start a builder for step-by-step registration.
   */
  static builder(): TypeRegistryBuilder {
    return new TypeRegistryBuilder();
  }

  lookupByTag(tag: string): AnyTypeDefinition | undefined {
    return this._byTag.get(tag);
  }

  lookupByType(type: Constructor<unknown>): AnyTypeDefinition | undefined {
    return this._byType.get(type);
  }

  /**
   * Definition for a value's exact class, if registered.
   */
  lookupFor(value: object): AnyTypeDefinition | undefined {
    return this._byType.get(value.constructor);
  }

  has(tag: string): boolean {
    return this._byTag.has(tag);
  }

  /** Registered tags, sorted */
  get tags(): string[] {
    return [...this._byTag.keys()].sort();
  }

  get size(): number {
    return this._byTag.size;
  }
}

/**
 * Check a definition against the entries so far and add it.
 * Re-adding the very same definition is a no-op.
 */
function addDefinition(
  byTag: Map<string, AnyTypeDefinition>,
  byType: Map<unknown, AnyTypeDefinition>,
  definition: AnyTypeDefinition
): void {
  const { tag } = definition;
  if (tag.length === 0 || isReservedTag(tag)) {
    throw new DuplicateTypeTagError(tag, "tag is empty or in the reserved \"__\" namespace");
  }

  const existing = byTag.get(tag);
  if (existing === definition) return;
  if (existing) {
    throw new DuplicateTypeTagError(tag, "a different definition is already registered");
  }

  const other = byType.get(definition.type);
  if (other) {
    throw new DuplicateTypeTagError(
      tag,
      `class ${definition.type.name} is already registered as "${other.tag}"`
    );
  }

  byTag.set(tag, definition);
  byType.set(definition.type, definition);
}

/**
 * Collects definitions at startup, then seals into a TypeRegistry.
 */
export class TypeRegistryBuilder {
  private readonly byTag = new Map<string, AnyTypeDefinition>();
  private readonly byType = new Map<unknown, AnyTypeDefinition>();
  private sealed = false;

  /**
   * @throws DuplicateTypeTagError on conflict
   * @throws RegistrySealedError after build()
   */
  register(definition: AnyTypeDefinition): this {
    if (this.sealed) {
      throw new RegistrySealedError(definition.tag);
    }
    addDefinition(this.byTag, this.byType, definition);
    return this;
  }

  registerAll(definitions: Iterable<AnyTypeDefinition>): this {
    for (const definition of definitions) {
      this.register(definition);
    }
    return this;
  }

  build(): TypeRegistry {
    this.sealed = true;
    return TypeRegistry.create(this.byTag.values());
  }
}
