/**
 * Emitter module types
 */

export type OutputFormat = "ndjson" | "json";

export interface EmitterOptions {
  format: OutputFormat;
  /** File path, or "stdout" */
  destination: string;
  /** Key each value is written under */
  column: string;
}

export interface EmitterResult {
  written: number;
  destination: string;
}
