/**
 * Core data model for a single learned column
 */

/**
 * Closed set of attribute kinds; every decision point switches over it
 */
export type AttributeType = "integer" | "float" | "string" | "datetime";

export const ATTRIBUTE_TYPES: readonly AttributeType[] = [
  "integer",
  "float",
  "string",
  "datetime",
];

/**
 * A present cell value
 */
export type Scalar = number | string;

/**
 * A cell as read from input; null, undefined and NaN count as missing
 */
export type RawValue = Scalar | null | undefined;

/**
 * Serializable summary sufficient to encode and sample without raw data
 */
export interface AttributePattern {
  name: string;
  type: AttributeType;
  categorical: boolean;
  min: number;
  max: number;
  decimals: number | null; // float only
  bins: Scalar[];
  prs: number[];
}

/**
 * One-shot latch guarding pattern computation
 */
export enum PatternState {
  Unset = "unset",
  Computed = "computed",
}

/**
 * Discretized distribution: bins, raw counts and probabilities stay aligned
 */
export interface Distribution {
  bins: Scalar[];
  counts: number[];
  prs: number[];
}

/**
 * Column after type inference and imputation.
 * `values` is the display form (datetime as M/D/YYYY, string columns as
 * strings); `keys` is the form statistics run on (datetime as epoch seconds).
 */
export interface NormalizedColumn {
  type: AttributeType;
  categorical: boolean;
  values: Scalar[];
  keys: Scalar[];
}

/**
 * One-hot expansion of a categorical attribute: one column per category
 */
export interface OneHotTable {
  columns: Scalar[];
  rows: number[][];
}

export type SynthesisMode = "choice" | "random" | "pseudonymize";

export function assertNever(value: never): never {
  throw new Error(`Unhandled attribute type: ${String(value)}`);
}
