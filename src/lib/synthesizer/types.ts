/**
 * Synthesizer module types
 */

import type { AttributePattern } from "../../types/attribute.js";

/**
 * Pattern fields that sampling reads
 */
export type SamplingPattern = Pick<
  AttributePattern,
  "type" | "categorical" | "min" | "max" | "decimals" | "bins" | "prs"
>;

export interface ChoiceOptions {
  size?: number;
  /** Pre-drawn bin positions, e.g. shared with a correlated attribute */
  indexes?: readonly number[];
}
