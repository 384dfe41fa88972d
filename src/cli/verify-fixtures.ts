#!/usr/bin/env node
/**
 * CLI command to verify that every fixture survives a round trip.
 *
 * Each fixture is loaded, re-encoded, and compared byte for byte with the
 * file on disk.
 *
 * Usage:
 *   npx tsx src/cli/verify-fixtures.ts [options]
 *   npm run verify-fixtures
 *
 * Options:
 *   --dir <path>    Fixture directory (default: FIXTURE_DIR, "fixtures")
 *   --json          Output the report as JSON (for CI parsing)
 *   -h, --help      Show help
 *
 * Exit codes:
 *   0 - Every fixture verified
 *   1 - One or more fixtures failed, or none were found
 */

import { resolve } from "node:path";
import { parseArgs } from "node:util";

import { config, validateConfig } from "../config/index.js";
import { listFixtures, verifyFixture, type VerifyResult } from "../fixtures/index.js";
import { createLogger, initRunId } from "../logging/index.js";
import { createModelCodec } from "../models/index.js";

/**
 * Format verification results for the terminal.
 */
export function formatReport(results: VerifyResult[]): string {
  const lines: string[] = [];
  for (const result of results) {
    if (result.ok) {
      lines.push(`\x1b[32m✓\x1b[0m ${result.path} (${result.bytes} bytes)`);
    } else {
      lines.push(`\x1b[31m✗\x1b[0m ${result.path}`);
      lines.push(`  └─ ${result.reason}`);
    }
  }
  const passed = results.filter((r) => r.ok).length;
  lines.push("");
  lines.push(`Results: ${passed} passed, ${results.length - passed} failed`);
  return lines.join("\n");
}

async function main(): Promise<void> {
  const { values } = parseArgs({
    options: {
      dir: { type: "string", default: config.fixtureDir },
      json: { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
  });

  if (values.help) {
    console.log(`
Usage: verify-fixtures [options]

Options:
  --dir <path>    Fixture directory (default: ${config.fixtureDir})
  --json          Output the report as JSON (for CI parsing)
  -h, --help      Show this help message
`);
    return;
  }

  validateConfig();
  initRunId(process.env.RUN_ID);
  const logger = createLogger({
    level: config.logLevel,
    file: config.logToFile,
    logDir: config.logDir,
    scope: "verify",
  });

  const directory = resolve(values.dir ?? config.fixtureDir);
  const paths = await listFixtures(directory);
  if (paths.length === 0) {
    logger.error("No fixtures found", { directory });
    process.exitCode = 1;
    return;
  }

  const codec = createModelCodec({ logger: logger.child("codec") });
  const results: VerifyResult[] = [];
  for (const path of paths) {
    results.push(await verifyFixture(codec, path));
  }

  if (values.json) {
    console.log(JSON.stringify(results, null, 2));
  } else {
    console.log(formatReport(results));
  }

  if (results.some((r) => !r.ok)) {
    process.exitCode = 1;
  }
}

// Only run when executed directly (not imported by tests)
const isDirectExecution = process.argv[1] &&
  (process.argv[1].endsWith("verify-fixtures.ts") ||
   process.argv[1].endsWith("verify-fixtures.js"));

if (isDirectExecution) {
  main().catch((err: unknown) => {
    console.error("Unexpected error:", err);
    process.exit(1);
  });
}
