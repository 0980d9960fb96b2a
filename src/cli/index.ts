#!/usr/bin/env node

/**
 * colsynth CLI - learn column patterns and synthesize values from them
 */

import { Command } from "commander";
import { createLearnCommand } from "./commands/learn.js";
import { createSynthesizeCommand } from "./commands/synthesize.js";
import { logger } from "../utils/logger.js";

const pkg = {
  name: "colsynth",
  version: "0.1.0",
  description:
    "Per-column pattern learning and synthetic value generation for privacy-preserving data publishing",
};

function createProgram(): Command {
  const program = new Command();

  program
    .name(pkg.name)
    .description(pkg.description)
    .version(pkg.version)
    .option("--log-level <level>", "Logging verbosity: error, warn, info, debug");

  program.addCommand(createLearnCommand());
  program.addCommand(createSynthesizeCommand());

  return program;
}

async function main(): Promise<void> {
  await createProgram().parseAsync(process.argv);
}

main().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  logger.error("Unexpected error", { message });
  console.error(
    JSON.stringify(
      {
        status: "error",
        error: {
          code: "UNEXPECTED_ERROR",
          message,
        },
      },
      null,
      2,
    ),
  );
  process.exit(1);
});
