/**
 * Learn command - compute an attribute pattern from one column of a data file
 */

import { Command } from "commander";
import type { AttributePattern } from "../../types/attribute.js";
import { Attribute } from "../../lib/attribute/index.js";
import { readColumn } from "../../lib/loader/index.js";
import { savePattern, serializePattern } from "../../lib/pattern/index.js";
import { DEFAULT_BIN_SIZE } from "../../lib/profiler/index.js";
import { ColSynthConfig, LearnCommandOptions, LearnConfig } from "../config/types.js";
import { applyLogLevel, mergeSection, parseConfigFile } from "../config/parser.js";
import { reportError } from "../report.js";
import { ConfigError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";

/**
 * Merge CLI options with config file (CLI options take precedence)
 */
export function mergeLearnConfig(
  options: LearnCommandOptions,
  configFile?: ColSynthConfig["learn"],
): LearnConfig {
  const merged = mergeSection<LearnConfig>(configFile, {
    input: options.input,
    column: options.column,
    categorical: options.categorical,
    binSize: options.binSize,
    output: options.output,
  });

  if (!merged.input || !merged.column) {
    throw new ConfigError("Missing required learn configuration: --input, --column", {
      input: merged.input,
      column: merged.column,
    });
  }

  return {
    input: merged.input,
    column: merged.column,
    categorical: merged.categorical ?? false,
    binSize: merged.binSize ?? DEFAULT_BIN_SIZE,
    output: merged.output ?? "stdout",
  };
}

/**
 * Read the column, compute its pattern and write it out
 */
export async function runLearn(config: LearnConfig): Promise<AttributePattern> {
  logger.info("Learning attribute pattern", {
    input: config.input,
    column: config.column,
  });

  const values = await readColumn(config.input, config.column);
  const attribute = new Attribute(config.column, values, {
    categorical: config.categorical,
    binSize: config.binSize,
  });
  const pattern = attribute.toPattern();

  if (config.output === "stdout") {
    process.stdout.write(serializePattern(pattern) + "\n");
  } else {
    await savePattern(config.output, pattern);
  }

  return pattern;
}

export function createLearnCommand(): Command {
  return new Command("learn")
    .description("Compute a column's type, domain and distribution pattern")
    .option("--input <path>", "Data file (.csv, .json, .ndjson)")
    .option("--column <name>", "Column to learn")
    .option("--categorical", "Treat the column as categorical")
    .option("--bin-size <number>", "Histogram bins for non-categorical columns", (val) =>
      parseInt(val, 10),
    )
    .option("--output <path>", 'Pattern file path (or "stdout")')
    .option("--config <path>", "Path to configuration file (JSON/YAML)")
    .action(async (opts: LearnCommandOptions, command: Command) => {
      try {
        const file = opts.config ? parseConfigFile(opts.config) : undefined;
        const globals: { logLevel?: unknown } = command.optsWithGlobals();
        applyLogLevel(globals.logLevel, file?.logLevel);
        const configFile = file?.learn;
        const config = mergeLearnConfig(opts, configFile);
        const pattern = await runLearn(config);

        if (config.output !== "stdout") {
          console.log(
            JSON.stringify(
              {
                status: "success",
                phase: "learn",
                output: {
                  path: config.output,
                  name: pattern.name,
                  type: pattern.type,
                  categorical: pattern.categorical,
                  bins: pattern.bins.length,
                },
              },
              null,
              2,
            ),
          );
        }
      } catch (error) {
        reportError("learn", error);
        process.exit(1);
      }
    });
}
