/**
 * Profiler module - domain and discretized distribution of a column
 */

import {
  AttributeType,
  Distribution,
  NormalizedColumn,
  Scalar,
  assertNever,
} from "../../types/attribute.js";
import {
  ColumnProfile,
  DistributionInput,
  DomainOverride,
  Range,
} from "./types.js";
import { uniformHistogram } from "./histogram.js";
import { countDecimals } from "./decimals.js";
import {
  calculateFrequencies,
  compareScalars,
  normalizeDistribution,
} from "../../utils/frequency-map.js";
import { formatDate, toDaySeconds, toSeconds } from "../../utils/datetime.js";
import { InferenceError, ValidationError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";

export * from "./types.js";
export * from "./histogram.js";
export * from "./decimals.js";

export const DEFAULT_BIN_SIZE = 20;

/**
 * Numeric magnitude a key is binned by: string length for strings
 */
export function measureOf(type: AttributeType, key: Scalar): number {
  switch (type) {
    case "string":
      return String(key).length;
    case "integer":
    case "float":
    case "datetime":
      return Number(key);
    default:
      return assertNever(type);
  }
}

/**
 * Min and max measure over the keys
 */
export function computeRange(type: AttributeType, keys: readonly Scalar[]): Range {
  if (keys.length === 0) {
    throw new InferenceError("Cannot compute a domain without values");
  }

  let min = Number.POSITIVE_INFINITY;
  let max = Number.NEGATIVE_INFINITY;
  for (const key of keys) {
    const measure = measureOf(type, key);
    if (measure < min) min = measure;
    if (measure > max) max = measure;
  }

  return { min, max };
}

/**
 * Count every distinct key, plus a zero entry for each declared bin that was
 * never observed. Bins come back sorted ascending.
 */
export function categoricalDistribution(
  keys: readonly Scalar[],
  declaredBins: readonly Scalar[] = [],
): Distribution {
  const frequencies = calculateFrequencies(keys);
  for (const bin of declaredBins) {
    if (!frequencies.has(bin)) frequencies.set(bin, 0);
  }

  const bins = [...frequencies.keys()].sort(compareScalars);
  const counts = bins.map((bin) => frequencies.get(bin) ?? 0);

  return { bins, counts, prs: normalizeDistribution(counts) };
}

/**
 * Equal-width histogram; bins hold left edges. A zero-width range collapses to
 * a single bin so nothing divides by zero.
 */
export function histogramDistribution(
  measures: readonly number[],
  binSize: number,
  range: Range,
): Distribution {
  if (range.min === range.max) {
    const count = measures.filter((m) => m === range.min).length;
    return { bins: [range.min], counts: [count], prs: normalizeDistribution([count]) };
  }

  const { edges, counts } = uniformHistogram(measures, binSize, [range.min, range.max]);
  return {
    bins: edges.slice(0, -1),
    counts,
    prs: normalizeDistribution(counts),
  };
}

export function buildDistribution(input: DistributionInput): Distribution {
  const { type, categorical, keys, range, binSize, declaredBins } = input;

  if (categorical) {
    const distribution = categoricalDistribution(keys, declaredBins);
    if (type === "datetime") {
      // Ordered by epoch seconds, labelled by date
      distribution.bins = distribution.bins.map((bin) => formatDate(Number(bin)));
    }
    return distribution;
  }

  return histogramDistribution(
    keys.map((key) => measureOf(type, key)),
    binSize,
    range,
  );
}

/**
 * Domain, distribution and (float only) decimal places of a normalized column
 */
export function profileColumn(
  column: NormalizedColumn,
  binSize: number = DEFAULT_BIN_SIZE,
): ColumnProfile {
  const range = computeRange(column.type, column.keys);
  const distribution = buildDistribution({
    type: column.type,
    categorical: column.categorical,
    keys: column.keys,
    range,
    binSize,
  });
  const decimals =
    column.type === "float" ? countDecimals(column.keys.map(Number)) : null;

  logger.debug("Column profiled", {
    type: column.type,
    categorical: column.categorical,
    min: range.min,
    max: range.max,
    bins: distribution.bins.length,
  });

  return { range, distribution, decimals };
}

function toNumber(value: Scalar): number {
  const number = typeof value === "number" ? value : Number(value);
  if (value === "" || Number.isNaN(number)) {
    throw new ValidationError(`Domain entry is not a number: "${value}"`, { value });
  }
  return number;
}

/**
 * Convert a domain entry to the key space of the attribute type
 */
export function domainKey(type: AttributeType, value: Scalar): Scalar {
  switch (type) {
    case "integer":
    case "float":
      return toNumber(value);
    case "string":
      return String(value);
    case "datetime":
      return toDaySeconds(typeof value === "number" ? value : toSeconds(value));
    default:
      return assertNever(type);
  }
}

/**
 * Interpret a caller-supplied domain.
 *
 * A categorical attribute takes any non-empty list as its categories. A
 * numeric attribute given more than two entries treats them as coded category
 * labels. Anything else must be exactly [min, max] with min <= max; for string
 * attributes the entries are lengths (numbers) or example strings.
 */
export function resolveDomain(
  type: AttributeType,
  categorical: boolean,
  domain: readonly Scalar[],
): DomainOverride {
  if (domain.length === 0) {
    throw new ValidationError("Domain must not be empty");
  }

  const numeric = type === "integer" || type === "float";

  if (categorical || (numeric && domain.length > 2)) {
    const declaredBins = domain.map((value) => domainKey(type, value));
    if (!categorical) {
      logger.info("Numeric domain with more than two entries read as categories", {
        entries: domain.length,
      });
    }
    return {
      categorical: true,
      range: computeRange(type, declaredBins),
      declaredBins,
    };
  }

  if (domain.length !== 2) {
    throw new ValidationError(
      `Non-categorical ${type} domain must be [min, max], got ${domain.length} entries`,
      { domain: [...domain] },
    );
  }

  const [low, high] = domain.map((value) =>
    type === "string"
      ? typeof value === "number"
        ? value
        : value.length
      : Number(domainKey(type, value)),
  );
  if (low === undefined || high === undefined || low > high) {
    throw new ValidationError("Domain minimum exceeds its maximum", {
      domain: [...domain],
    });
  }

  return {
    categorical: false,
    range:
      type === "integer"
        ? { min: Math.trunc(low), max: Math.trunc(high) }
        : { min: low, max: high },
  };
}
