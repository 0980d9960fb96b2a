/**
 * Encoder module - maps values onto an attribute's bins
 */

import {
  AttributePattern,
  OneHotTable,
  RawValue,
  Scalar,
  assertNever,
} from "../../types/attribute.js";
import { bisectRight, histogramByEdges } from "../profiler/histogram.js";
import { domainKey, measureOf } from "../profiler/index.js";
import { isMissing } from "../inferencer/index.js";
import { calculateFrequencies, toPercentages } from "../../utils/frequency-map.js";
import { formatDate, parseDatetime, toDaySeconds } from "../../utils/datetime.js";
import { InvalidOperationError } from "../../utils/errors.js";

/** Keeps values sitting exactly on a bin edge from spilling into the next bin */
export const ENCODE_EPSILON = 1e-8;

type PatternShape = Pick<
  AttributePattern,
  "type" | "categorical" | "min" | "max" | "bins"
>;

/**
 * Bring a caller-supplied value into key space, or undefined when it is
 * missing or cannot be read as the attribute's type
 */
export function toKey(
  pattern: Pick<AttributePattern, "type">,
  value: RawValue,
): Scalar | undefined {
  if (isMissing(value)) return undefined;

  switch (pattern.type) {
    case "integer":
    case "float": {
      const number = typeof value === "number" ? value : Number(value);
      return value === "" || Number.isNaN(number) ? undefined : number;
    }
    case "string":
      return String(value);
    case "datetime": {
      const seconds = typeof value === "number" ? value : parseDatetime(value);
      return seconds === undefined ? undefined : toDaySeconds(seconds);
    }
    default:
      return assertNever(pattern.type);
  }
}

/**
 * Form a key takes in a categorical attribute's bins
 */
function categoryLabel(pattern: Pick<AttributePattern, "type">, key: Scalar): Scalar {
  return pattern.type === "datetime" ? formatDate(Number(key)) : key;
}

/**
 * Bin position of each key. Missing, unknown and out-of-range keys map to the
 * sentinel bins.length.
 */
export function binIndexes(
  pattern: PatternShape,
  keys: readonly (Scalar | undefined)[],
): number[] {
  const sentinel = pattern.bins.length;

  if (pattern.categorical) {
    const positions = new Map<Scalar, number>();
    pattern.bins.forEach((bin, index) => positions.set(bin, index));
    return keys.map((key) =>
      key === undefined ? sentinel : positions.get(categoryLabel(pattern, key)) ?? sentinel,
    );
  }

  const edges = pattern.bins.map(Number);
  return keys.map((key) => {
    if (key === undefined) return sentinel;
    const measure = measureOf(pattern.type, key);
    if (measure < pattern.min || measure > pattern.max) return sentinel;
    const index = bisectRight(edges, measure) - 1;
    return index < 0 ? sentinel : index;
  });
}

/**
 * Indicator table, one column per category
 */
export function oneHot(
  pattern: PatternShape,
  keys: readonly (Scalar | undefined)[],
): OneHotTable {
  const columns = [...pattern.bins];
  const rows = keys.map((key) => {
    const label = key === undefined ? undefined : categoryLabel(pattern, key);
    return columns.map((column) => (column === label ? 1 : 0));
  });
  return { columns, rows };
}

/**
 * Bin-quantized position within [min, max], scaled to [0, 1].
 * Missing keys encode as NaN.
 */
export function normalizedCodes(
  pattern: PatternShape,
  keys: readonly (Scalar | undefined)[],
): number[] {
  const binSize = pattern.bins.length;
  const step = (pattern.max - pattern.min) / binSize;
  return keys.map((key) => {
    if (key === undefined) return Number.NaN;
    const value = Number(key);
    return Math.trunc((value - pattern.min) / (step + ENCODE_EPSILON)) / binSize;
  });
}

/**
 * One-hot table for categorical attributes, normalized codes for numeric and
 * datetime ones
 */
export function encode(
  pattern: PatternShape,
  keys: readonly (Scalar | undefined)[],
): OneHotTable | number[] {
  if (pattern.categorical) {
    return oneHot(pattern, keys);
  }
  if (pattern.type === "string") {
    throw new InvalidOperationError(
      "Non-categorical string attributes cannot be encoded",
      { type: pattern.type },
    );
  }
  return normalizedCodes(pattern, keys);
}

/**
 * Re-tabulate keys against caller-supplied bins: categories for categorical
 * attributes, histogram edges otherwise. With normalize, counts become
 * percentages rounded to two decimals.
 */
export function recount(
  pattern: Pick<AttributePattern, "type" | "categorical">,
  keys: readonly Scalar[],
  bins: readonly Scalar[],
  normalize = true,
): number[] {
  if (pattern.categorical) {
    const frequencies = calculateFrequencies(keys);
    const counts = bins.map(
      (bin) => frequencies.get(domainKey(pattern.type, bin)) ?? 0,
    );
    return normalize ? toPercentages(counts, keys.length) : counts;
  }

  if (bins.length === 1) {
    return [keys.length];
  }

  const counts = histogramByEdges(
    keys.map((key) => measureOf(pattern.type, key)),
    bins.map(Number),
  );
  if (!normalize) return counts;
  return toPercentages(counts, counts.reduce((sum, count) => sum + count, 0));
}
