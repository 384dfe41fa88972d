/**
 * Codec error taxonomy.
 *
 * Every failure the codec reports is a distinct, named subclass of
 * CodecError. None of them are retried: they signal programming or data
 * errors, never transient faults.
 */

import type { ZodIssue } from "zod";

/**
 * Base class for every codec failure.
 */
export class CodecError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "CodecError";
  }
}

/**
 * Encode met a composite value whose type has no registry entry.
 */
export class UnregisteredTypeError extends CodecError {
  constructor(
    public readonly typeName: string,
    public readonly path: string
  ) {
    super(`Cannot encode unregistered type "${typeName}" at ${path}`);
    this.name = "UnregisteredTypeError";
  }
}

/**
 * Decode met a type tag absent from the registry.
 */
export class UnknownTypeError extends CodecError {
  constructor(
    public readonly tag: string,
    public readonly path: string
  ) {
    super(`Unknown type tag "${tag}" at ${path}`);
    this.name = "UnknownTypeError";
  }
}

/**
 * Registration conflict: the tag (or the class) is already taken.
 */
export class DuplicateTypeTagError extends CodecError {
  constructor(
    public readonly tag: string,
    detail: string
  ) {
    super(`Cannot register type tag "${tag}": ${detail}`);
    this.name = "DuplicateTypeTagError";
  }
}

/**
 * Registration attempted after the registry was built.
 */
export class RegistrySealedError extends CodecError {
  constructor(public readonly tag: string) {
    super(`Cannot register type tag "${tag}": registry is already built`);
    this.name = "RegistrySealedError";
  }
}

/**
 * A reserved node (array, set, record, text) does not have the expected shape.
 */
export class MalformedNodeError extends CodecError {
  constructor(
    message: string,
    public readonly path: string
  ) {
    super(`${message} at ${path}`);
    this.name = "MalformedNodeError";
  }
}

/**
 * Array descriptor whose shape, dtype or data disagree.
 */
export class MalformedArrayError extends MalformedNodeError {
  constructor(message: string, path: string) {
    super(message, path);
    this.name = "MalformedArrayError";
  }
}

/**
 * Individual field validation issue.
 */
export interface FieldIssue {
  /** Path to the invalid field, relative to the composite node */
  path: (string | number)[];
  /** Human-readable error message */
  message: string;
  /** Zod error code */
  code: string;
}

/**
 * Convert Zod issues to our structured format.
 */
export function toFieldIssues(zodIssues: ZodIssue[]): FieldIssue[] {
  return zodIssues.map((issue) => ({
    path: issue.path.filter(
      (p): p is string | number => typeof p === "string" || typeof p === "number"
    ),
    message: issue.message,
    code: issue.code,
  }));
}

/**
 * Decoded fields of a composite node failed its type's schema.
 */
export class InvalidFieldsError extends CodecError {
  constructor(
    public readonly tag: string,
    public readonly path: string,
    public readonly issues: FieldIssue[]
  ) {
    super(
      `Invalid fields for type "${tag}" at ${path}: ` +
        issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ")
    );
    this.name = "InvalidFieldsError";
  }

  /**
   * Format errors for display.
   */
  format(): string {
    const lines = [`Field validation failed for "${this.tag}" at ${this.path}:`];
    for (const issue of this.issues) {
      const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      lines.push(`  - ${path}: ${issue.message}`);
    }
    return lines.join("\n");
  }
}

/**
 * The document's version stamp was rejected by the version gate.
 */
export class IncompatibleVersionError extends CodecError {
  constructor(
    public readonly found: string | undefined,
    public readonly expected: string,
    reason: string
  ) {
    super(
      `Incompatible format version: ${found ?? "(missing)"} ` +
        `(current: ${expected}). ${reason}`
    );
    this.name = "IncompatibleVersionError";
  }
}

/**
 * The decoded document root is not of the type the caller asked for.
 */
export class UnexpectedRootError extends CodecError {
  constructor(
    public readonly expected: string,
    public readonly actual: string
  ) {
    super(`Expected document root of type ${expected}, got ${actual}`);
    this.name = "UnexpectedRootError";
  }
}

/**
 * Text is not well-formed JSON, or not a valid document.
 */
export class ParseError extends CodecError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ParseError";
  }
}
