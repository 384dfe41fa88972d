/**
 * Version gate for serialized documents.
 *
 * Every document carries the format version it was written with. Before
 * decoding, the stamp is compared with the running codec's version:
 *
 *   same major, same minor   → proceed (patch level is ignored)
 *   same major, older minor  → proceed with a warning; fields added since
 *                              then are absent and take their defaults
 *   same major, newer minor  → reject; the document may hold fields this
 *                              codec would silently drop
 *   other major, no stamp    → reject
 */

import type { Logger } from "../logging/index.js";
import { IncompatibleVersionError } from "./errors.js";

/** Format version written by this codec */
export const FORMAT_VERSION = "1.1.0";

export interface SemVer {
  major: number;
  minor: number;
  patch: number;
}

export type VersionDecision =
  | { action: "proceed" }
  | { action: "warn"; message: string }
  | { action: "reject"; message: string };

const SEMVER_PATTERN = /^(0|[1-9]\d*)\.(0|[1-9]\d*)\.(0|[1-9]\d*)(?:[-+][0-9A-Za-z.+-]*)?$/;

/**
 * Parse a MAJOR.MINOR.PATCH string. Pre-release and build suffixes are
 * accepted and ignored.
 *
 * @returns The parsed version, or undefined if the text is not a version
 */
export function parseVersion(text: string): SemVer | undefined {
  const match = SEMVER_PATTERN.exec(text);
  if (!match) return undefined;
  return {
    major: Number(match[1]),
    minor: Number(match[2]),
    patch: Number(match[3]),
  };
}

/**
 * Decide whether a document stamped with `stamp` can be decoded.
 *
 * @param stamp - Version found in the document (undefined if absent)
 * @param current - Version of the running codec
 */
export function checkVersion(stamp: string | undefined, current: string): VersionDecision {
  if (stamp === undefined) {
    return { action: "reject", message: "Document has no version stamp." };
  }

  const found = parseVersion(stamp);
  if (!found) {
    return { action: "reject", message: `"${stamp}" is not a semantic version.` };
  }
  const running = parseVersion(current);
  if (!running) {
    return { action: "reject", message: `Codec version "${current}" is not a semantic version.` };
  }

  if (found.major !== running.major) {
    return {
      action: "reject",
      message: `Major version ${found.major} cannot be read by major version ${running.major}.`,
    };
  }
  if (found.minor > running.minor) {
    return {
      action: "reject",
      message: `Document was written by a newer minor version; upgrade the codec.`,
    };
  }
  if (found.minor < running.minor) {
    return {
      action: "warn",
      message: `Document was written by format ${stamp}; fields added since then take their defaults.`,
    };
  }
  return { action: "proceed" };
}

/**
 * Apply the version gate: log warnings, throw on rejection.
 *
 * @throws IncompatibleVersionError if the stamp is rejected
 */
export function enforceVersion(stamp: unknown, current: string, logger?: Logger): void {
  const text = typeof stamp === "string" ? stamp : undefined;
  const decision =
    stamp !== undefined && text === undefined
      ? { action: "reject" as const, message: "Version stamp must be a string." }
      : checkVersion(text, current);

  switch (decision.action) {
    case "proceed":
      return;
    case "warn":
      logger?.warn(decision.message, { found: text, current });
      return;
    case "reject":
      throw new IncompatibleVersionError(
        text ?? (stamp === undefined ? undefined : JSON.stringify(stamp)),
        current,
        decision.message
      );
  }
}
