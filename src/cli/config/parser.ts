/**
 * Configuration file parser - supports JSON and YAML
 */

import { readFileSync } from "fs";
import { parse as parseYaml } from "yaml";
import { Ajv, type ValidateFunction } from "ajv";
import { ColSynthConfig } from "./types.js";
import { CONFIG_SCHEMA } from "./schema.js";
import { ConfigError } from "../../utils/errors.js";
import { isLogLevel, logger, type LogLevel } from "../../utils/logger.js";

const ajv = new Ajv({ strict: false, allErrors: true });
let validateConfigFn: ValidateFunction<ColSynthConfig> | undefined;

/**
 * Parse configuration file (JSON or YAML)
 */
export function parseConfigFile(filePath: string): ColSynthConfig {
  logger.info("Parsing configuration file", { filePath });

  let content: string;
  try {
    content = readFileSync(filePath, "utf-8");
  } catch (error) {
    throw new ConfigError(`Failed to read config file: ${filePath}`, { filePath }, {
      cause: error,
    });
  }

  // Determine format from file extension
  const isYaml = filePath.endsWith(".yaml") || filePath.endsWith(".yml");
  const isJson = filePath.endsWith(".json");

  if (!isYaml && !isJson) {
    throw new ConfigError(
      `Unsupported config file format: ${filePath}. Must be .json, .yaml, or .yml`,
      { filePath },
    );
  }

  let parsed: unknown;
  try {
    parsed = isYaml ? parseYaml(content) : JSON.parse(content);
  } catch (error) {
    throw new ConfigError(`Failed to parse config file: ${filePath}`, { filePath }, {
      cause: error,
    });
  }

  const config = validateConfig(parsed ?? {}, filePath);

  logger.info("Configuration file parsed successfully", {
    hasLearnConfig: !!config.learn,
    hasSynthesizeConfig: !!config.synthesize,
  });

  return config;
}

/**
 * Check a parsed document against the configuration schema
 */
export function validateConfig(document: unknown, source = "config"): ColSynthConfig {
  validateConfigFn ??= ajv.compile<ColSynthConfig>(CONFIG_SCHEMA);
  const validate = validateConfigFn;
  if (!validate(document)) {
    throw new ConfigError(`Invalid configuration in ${source}`, {
      errors: (validate.errors ?? []).map(
        (error) => `${error.instancePath || "/"} ${error.message ?? error.keyword}`,
      ),
    });
  }
  return document;
}

/**
 * Overlay CLI values on a config file section, skipping undefined ones
 */
export function mergeSection<T extends object>(
  fileSection: Partial<T> | undefined,
  cliSection: Partial<T>,
): Partial<T> {
  const defined = Object.fromEntries(
    Object.entries(cliSection).filter(([, value]) => value !== undefined),
  );
  return { ...fileSection, ...defined };
}

/**
 * Set the log level from --log-level, else from the config file
 */
export function applyLogLevel(cliLevel: unknown, fileLevel?: LogLevel): void {
  if (isLogLevel(cliLevel)) {
    logger.setLevel(cliLevel);
  } else if (fileLevel) {
    logger.setLevel(fileLevel);
  }
}
