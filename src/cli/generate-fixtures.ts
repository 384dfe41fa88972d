#!/usr/bin/env node
/**
 * CLI command to write the example fixtures.
 *
 * Usage:
 *   npx tsx src/cli/generate-fixtures.ts [options]
 *   npm run generate-fixtures
 *
 * Options:
 *   --dir <path>    Output directory (default: FIXTURE_DIR, "fixtures")
 *   --only <name>   Write a single named fixture
 *   -h, --help      Show help
 *
 * Exit codes:
 *   0 - All fixtures written
 *   1 - A fixture failed to encode or write
 */

import { resolve } from "node:path";
import { parseArgs } from "node:util";

import { config, validateConfig, ConfigError } from "../config/index.js";
import { getFixturePath, saveFixture } from "../fixtures/index.js";
import { createLogger, initRunId } from "../logging/index.js";
import { EXAMPLE_FIXTURES, createModelCodec } from "../models/index.js";

function printHelp(): void {
  console.log(`
Usage: generate-fixtures [options]

Options:
  --dir <path>    Output directory (default: ${config.fixtureDir})
  --only <name>   Write a single named fixture (${Object.keys(EXAMPLE_FIXTURES).join(", ")})
  -h, --help      Show this help message
`);
}

async function main(): Promise<void> {
  const { values } = parseArgs({
    options: {
      dir: { type: "string", default: config.fixtureDir },
      only: { type: "string" },
      help: { type: "boolean", short: "h", default: false },
    },
  });

  if (values.help) {
    printHelp();
    return;
  }

  const runId = initRunId(process.env.RUN_ID);
  const logger = createLogger({
    level: config.logLevel,
    file: config.logToFile,
    logDir: config.logDir,
    scope: "generate",
  });

  try {
    validateConfig();
  } catch (err) {
    if (err instanceof ConfigError) {
      logger.error("Configuration error", { message: err.message });
      process.exitCode = 1;
      return;
    }
    throw err;
  }

  const names = values.only ? [values.only] : Object.keys(EXAMPLE_FIXTURES);
  const directory = resolve(values.dir ?? config.fixtureDir);
  const codec = createModelCodec({ logger: logger.child("codec") });
  logger.info("Generating fixtures", { runId, directory, count: names.length });

  let failures = 0;
  for (const name of names) {
    const build = EXAMPLE_FIXTURES[name];
    if (!build) {
      logger.error("Unknown fixture name", { name });
      failures++;
      continue;
    }
    const filePath = getFixturePath(directory, name);
    try {
      const bytes = await saveFixture(codec, filePath, build());
      logger.info("Wrote fixture", { name, bytes });
    } catch (err) {
      logger.error("Failed to write fixture", {
        name,
        error: err instanceof Error ? err.message : String(err),
      });
      failures++;
    }
  }

  if (failures > 0) {
    process.exitCode = 1;
  }
}

const isDirectExecution = process.argv[1] &&
  (process.argv[1].endsWith("generate-fixtures.ts") ||
   process.argv[1].endsWith("generate-fixtures.js"));

if (isDirectExecution) {
  main().catch((err: unknown) => {
    console.error("Unexpected error:", err);
    process.exit(1);
  });
}
