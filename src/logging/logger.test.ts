/**
 * Logger tests.
 *
 * Run: node --import tsx src/logging/logger.test.ts
 */

import { strict as assert } from "node:assert";
import { readFileSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { createLogger, isLogLevel, type LogEntry } from "./logger.js";
import { getRunId, initRunId } from "./run-id.js";

// ═══════════════════════════════════════════════════════════════════════════
// TEST HELPERS
// ═══════════════════════════════════════════════════════════════════════════

let passed = 0;
let failed = 0;

function test(name: string, fn: () => void): void {
  try {
    fn();
    passed++;
    console.log(`  ✓ ${name}`);
  } catch (err) {
    failed++;
    console.error(`  ✗ ${name}`);
    console.error(`    ${err instanceof Error ? err.message : String(err)}`);
  }
}

const TEST_DIR = join(tmpdir(), `logger-test-${Date.now()}`);

console.log("\n── Logger ──");

test("entries below the level are dropped", () => {
  const entries: LogEntry[] = [];
  const logger = createLogger({ level: "warn", console: false, sink: (e) => entries.push(e) });
  logger.debug("hidden");
  logger.info("hidden");
  logger.warn("shown", { count: 1 });
  logger.error("also shown");
  assert.deepEqual(entries, [
    { level: "warn", message: "shown", scope: undefined, context: { count: 1 } },
    { level: "error", message: "also shown", scope: undefined, context: undefined },
  ]);
});

test("child loggers carry their own scope", () => {
  const entries: LogEntry[] = [];
  const logger = createLogger({ console: false, scope: "generate", sink: (e) => entries.push(e) });
  logger.child("codec").info("hello");
  assert.equal(entries[0].scope, "codec");
});

test("file output appends formatted lines with the run ID", () => {
  initRunId("test-run");
  const logger = createLogger({ console: false, file: true, logDir: TEST_DIR, logFile: "test.log", scope: "codec" });
  logger.warn("Version warning", { found: "1.0.0" });
  const text = readFileSync(join(TEST_DIR, "test.log"), "utf-8");
  assert.match(text, /^\[[^\]]+\] \[WARN \] \[test-run\] \[codec\] Version warning \{"found":"1\.0\.0"\}\n$/);
  assert.equal(getRunId(), "test-run");
});

test("level names are recognised", () => {
  assert.equal(isLogLevel("debug"), true);
  assert.equal(isLogLevel("trace"), false);
});

rmSync(TEST_DIR, { recursive: true, force: true });

console.log(`\n${"═".repeat(60)}`);
console.log(`  ${passed} passed, ${failed} failed, ${passed + failed} total`);
console.log(`${"═".repeat(60)}\n`);

if (failed > 0) {
  process.exit(1);
}
