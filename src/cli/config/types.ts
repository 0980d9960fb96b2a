/**
 * CLI configuration types
 */

import type { SynthesisMode } from "../../types/attribute.js";
import type { OutputFormat } from "../../lib/emitter/types.js";
import type { LogLevel } from "../../utils/logger.js";

/**
 * Learn command configuration
 */
export interface LearnConfig {
  input: string; // CSV, JSON or NDJSON file
  column: string;
  categorical: boolean;
  binSize: number;
  output: string; // Pattern file path or 'stdout'
}

/**
 * Synthesized column output configuration
 */
export interface SynthesisOutputConfig {
  format: OutputFormat;
  path: string; // File path or 'stdout'
}

/**
 * Synthesize command configuration
 */
export interface SynthesizeConfig {
  mode: SynthesisMode;
  pattern?: string; // Required for choice and random
  input?: string; // Required for pseudonymize
  column?: string; // Required for pseudonymize
  categorical: boolean;
  size?: number;
  seed?: string | number;
  output: SynthesisOutputConfig;
}

/**
 * Complete configuration file structure
 */
export interface ColSynthConfig {
  learn?: Partial<LearnConfig>;
  synthesize?: Partial<Omit<SynthesizeConfig, "output">> & {
    output?: Partial<SynthesisOutputConfig>;
  };
  logLevel?: LogLevel;
}

/**
 * CLI command options (from commander)
 */
export interface LearnCommandOptions {
  input?: string;
  column?: string;
  categorical?: boolean;
  binSize?: number;
  output?: string;
  config?: string;
}

export interface SynthesizeCommandOptions {
  mode?: string;
  pattern?: string;
  input?: string;
  column?: string;
  categorical?: boolean;
  size?: number;
  seed?: string;
  outputFormat?: string;
  outputPath?: string;
  config?: string;
}
