/**
 * Profiler module types
 */

import type { AttributeType, Distribution, Scalar } from "../../types/attribute.js";

export interface Range {
  min: number;
  max: number;
}

export interface DistributionInput {
  type: AttributeType;
  categorical: boolean;
  /** Computation keys: numbers, strings, or epoch seconds for datetime */
  keys: readonly Scalar[];
  range: Range;
  binSize: number;
  /** Categories that must appear in the result even when unobserved */
  declaredBins?: readonly Scalar[];
}

export interface DomainOverride {
  categorical: boolean;
  range: Range;
  declaredBins?: Scalar[];
}

export interface ColumnProfile {
  range: Range;
  distribution: Distribution;
  decimals: number | null;
}
