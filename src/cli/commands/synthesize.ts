/**
 * Synthesize command - generate a column from a pattern, or pseudonymize one
 */

import { Command } from "commander";
import type { Scalar, SynthesisMode } from "../../types/attribute.js";
import { Attribute } from "../../lib/attribute/index.js";
import { readColumn } from "../../lib/loader/index.js";
import { loadPattern } from "../../lib/pattern/index.js";
import { emitValues, type EmitterResult, type OutputFormat } from "../../lib/emitter/index.js";
import {
  ColSynthConfig,
  SynthesizeCommandOptions,
  SynthesizeConfig,
} from "../config/types.js";
import { applyLogLevel, mergeSection, parseConfigFile } from "../config/parser.js";
import { reportError } from "../report.js";
import { seedRandom } from "../../utils/seed-manager.js";
import { ConfigError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";

/** Values generated from a pattern when no size is given */
export const DEFAULT_SYNTHESIS_SIZE = 100;

const MODES: readonly SynthesisMode[] = ["choice", "random", "pseudonymize"];
const FORMATS: readonly OutputFormat[] = ["ndjson", "json"];

function isMode(value: unknown): value is SynthesisMode {
  return MODES.some((mode) => mode === value);
}

function isOutputFormat(value: unknown): value is OutputFormat {
  return FORMATS.some((format) => format === value);
}

/**
 * Merge CLI options with config file (CLI options take precedence)
 */
export function mergeSynthesizeConfig(
  options: SynthesizeCommandOptions,
  configFile?: ColSynthConfig["synthesize"],
): SynthesizeConfig {
  if (options.mode !== undefined && !isMode(options.mode)) {
    throw new ConfigError(`Unknown synthesis mode: ${options.mode}`, { modes: MODES });
  }
  if (options.outputFormat !== undefined && !isOutputFormat(options.outputFormat)) {
    throw new ConfigError(`Unknown output format: ${options.outputFormat}`, {
      formats: FORMATS,
    });
  }

  const merged = mergeSection<Omit<SynthesizeConfig, "output">>(configFile, {
    mode: options.mode,
    pattern: options.pattern,
    input: options.input,
    column: options.column,
    categorical: options.categorical,
    size: options.size,
    seed: options.seed,
  });

  const config: SynthesizeConfig = {
    mode: merged.mode ?? "choice",
    pattern: merged.pattern,
    input: merged.input,
    column: merged.column,
    categorical: merged.categorical ?? false,
    size: merged.size,
    seed: merged.seed,
    output: {
      format: options.outputFormat ?? configFile?.output?.format ?? "ndjson",
      path: options.outputPath ?? configFile?.output?.path ?? "stdout",
    },
  };

  if (config.mode === "pseudonymize" && (!config.input || !config.column)) {
    throw new ConfigError("Pseudonymize mode requires --input and --column", {
      mode: config.mode,
    });
  }
  if (config.mode !== "pseudonymize" && !config.pattern) {
    throw new ConfigError(`${config.mode} mode requires --pattern`, { mode: config.mode });
  }

  return config;
}

/**
 * Build the attribute the mode needs and draw its values
 */
export async function synthesizeColumn(
  config: SynthesizeConfig,
): Promise<{ name: string; values: Scalar[] }> {
  if (config.seed !== undefined) {
    seedRandom(config.seed);
  }

  if (config.mode === "pseudonymize") {
    const input = config.input ?? "";
    const column = config.column ?? "";
    const attribute = new Attribute(column, await readColumn(input, column), {
      categorical: config.categorical,
    });
    return { name: attribute.name, values: attribute.pseudonymize(config.size) };
  }

  const attribute = Attribute.fromPattern(await loadPattern(config.pattern ?? ""));
  const size = config.size ?? DEFAULT_SYNTHESIS_SIZE;
  const values = config.mode === "random" ? attribute.random(size) : attribute.choice(size);
  return { name: attribute.name, values };
}

export async function runSynthesize(config: SynthesizeConfig): Promise<EmitterResult> {
  logger.info("Synthesizing column", { mode: config.mode, size: config.size });
  const { name, values } = await synthesizeColumn(config);
  return emitValues(values, {
    format: config.output.format,
    destination: config.output.path,
    column: name,
  });
}

export function createSynthesizeCommand(): Command {
  return new Command("synthesize")
    .description("Generate synthetic values for a column from its pattern")
    .option("--mode <mode>", "choice, random or pseudonymize")
    .option("--pattern <path>", "Pattern file written by learn")
    .option("--input <path>", "Data file (pseudonymize mode)")
    .option("--column <name>", "Column to pseudonymize")
    .option("--categorical", "Treat the input column as categorical")
    .option("--size <number>", "Number of values to generate", (val) => parseInt(val, 10))
    .option("--seed <seed>", "Seed for repeatable output")
    .option("--output-format <format>", "Output format: ndjson, json")
    .option("--output-path <path>", 'Output path (or "stdout")')
    .option("--config <path>", "Path to configuration file (JSON/YAML)")
    .action(async (opts: SynthesizeCommandOptions, command: Command) => {
      try {
        const file = opts.config ? parseConfigFile(opts.config) : undefined;
        const globals: { logLevel?: unknown } = command.optsWithGlobals();
        applyLogLevel(globals.logLevel, file?.logLevel);
        const configFile = file?.synthesize;
        const config = mergeSynthesizeConfig(opts, configFile);
        const result = await runSynthesize(config);

        if (config.output.path !== "stdout") {
          console.log(
            JSON.stringify(
              {
                status: "success",
                phase: "synthesize",
                output: {
                  mode: config.mode,
                  format: config.output.format,
                  path: result.destination,
                  written: result.written,
                },
              },
              null,
              2,
            ),
          );
        }
      } catch (error) {
        reportError("synthesize", error);
        process.exit(1);
      }
    });
}
