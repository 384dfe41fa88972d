/**
 * Fixture files: atomic save, load, and round-trip verification.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * WRITE PROTOCOL
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * 1. ENCODE: the whole document is encoded in memory first. An encoding
 *    failure throws before any file is touched.
 *
 * 2. STAGE: the text goes to a temporary sibling file, which is synced and
 *    closed whatever happens.
 *
 * 3. COMMIT: the temporary file is renamed over the target. A reader sees
 *    either the previous fixture or the new one, never a partial write.
 *
 * FILE NAMING CONVENTION:
 * Fixtures are saved as {name}.json inside the fixture directory.
 */

import { randomBytes } from "node:crypto";
import { mkdir, open, readdir, rename, rm } from "node:fs/promises";
import { basename, dirname, join } from "node:path";
import { CodecError, type JsonCodec } from "../codec/index.js";

export const FIXTURE_EXTENSION = ".json";

/**
 * File-system failure while reading or writing a fixture.
 */
export class FixtureError extends CodecError {
  constructor(
    message: string,
    public readonly path: string,
    options?: { cause?: unknown }
  ) {
    super(`${message}: ${path}`, options);
    this.name = "FixtureError";
  }
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Generate the standard path for a named fixture.
 */
export function getFixturePath(directory: string, name: string): string {
  return join(directory, `${name}${FIXTURE_EXTENSION}`);
}

/**
 * Encode a value and write it atomically.
 *
 * @returns The number of bytes written
 * @throws Any encode error (nothing is written), or FixtureError
 */
export async function saveFixture(codec: JsonCodec, filePath: string, value: unknown): Promise<number> {
  const text = codec.dumps(value);
  const directory = dirname(filePath);
  const tempPath = join(
    directory,
    `.${basename(filePath)}.${process.pid}.${randomBytes(4).toString("hex")}.tmp`
  );

  try {
    await mkdir(directory, { recursive: true });
    const handle = await open(tempPath, "w");
    try {
      await handle.writeFile(text, "utf-8");
      await handle.sync();
    } finally {
      await handle.close();
    }
    await rename(tempPath, filePath);
  } catch (err) {
    await rm(tempPath, { force: true });
    throw new FixtureError(`Failed to write fixture (${errorMessage(err)})`, filePath, { cause: err });
  }

  return Buffer.byteLength(text, "utf-8");
}

/**
 * Read the raw text of a fixture.
 *
 * @throws FixtureError if the file cannot be read
 */
export async function readFixtureText(filePath: string): Promise<string> {
  try {
    const handle = await open(filePath, "r");
    try {
      return await handle.readFile("utf-8");
    } finally {
      await handle.close();
    }
  } catch (err) {
    throw new FixtureError(`Failed to read fixture (${errorMessage(err)})`, filePath, { cause: err });
  }
}

/**
 * Load and decode a fixture.
 *
 * @throws FixtureError, or any ParseError / decode error from the codec
 */
export async function loadFixture(codec: JsonCodec, filePath: string): Promise<unknown> {
  return codec.loads(await readFixtureText(filePath));
}

/**
 * Outcome of verifying one fixture.
 */
export type VerifyResult =
  | { path: string; ok: true; bytes: number }
  | { path: string; ok: false; reason: string };

/**
 * Load a fixture, re-encode it, and compare with the bytes on disk.
 * Never throws for a bad fixture; the reason is reported instead.
 */
export async function verifyFixture(codec: JsonCodec, filePath: string): Promise<VerifyResult> {
  let text: string;
  let redumped: string;
  try {
    text = await readFixtureText(filePath);
    redumped = codec.dumps(codec.loads(text));
  } catch (err) {
    const name = err instanceof Error ? err.name : "Error";
    return { path: filePath, ok: false, reason: `${name}: ${errorMessage(err)}` };
  }

  if (redumped !== text) {
    return {
      path: filePath,
      ok: false,
      reason: `Re-encoded text differs from file (${firstDifference(text, redumped)})`,
    };
  }
  return { path: filePath, ok: true, bytes: Buffer.byteLength(text, "utf-8") };
}

/**
 * Locate the first differing line between two texts.
 */
export function firstDifference(expected: string, actual: string): string {
  const a = expected.split("\n");
  const b = actual.split("\n");
  const length = Math.max(a.length, b.length);
  for (let i = 0; i < length; i++) {
    if (a[i] !== b[i]) {
      return `line ${i + 1}: expected ${JSON.stringify(a[i] ?? "")}, got ${JSON.stringify(b[i] ?? "")}`;
    }
  }
  return "no line differs";
}

/**
 * Fixture files in a directory, sorted by name.
 *
 * @returns Full paths; an absent directory yields an empty list
 */
export async function listFixtures(directory: string): Promise<string[]> {
  let names: string[];
  try {
    names = await readdir(directory);
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") return [];
    throw new FixtureError(`Failed to list fixtures (${errorMessage(err)})`, directory, { cause: err });
  }
  return names
    .filter((name) => name.endsWith(FIXTURE_EXTENSION) && !name.startsWith("."))
    .sort()
    .map((name) => join(directory, name));
}
