/**
 * Synthesizer module - new values from a learned pattern
 */

import { Scalar, assertNever } from "../../types/attribute.js";
import { ChoiceOptions, SamplingPattern } from "./types.js";
import { sampleIndex } from "../../utils/frequency-map.js";
import { pick, randomInt, shuffle, uniform } from "../../utils/random.js";
import { maskString, randomString } from "../../utils/strings.js";
import { formatDate } from "../../utils/datetime.js";
import { ValidationError } from "../../utils/errors.js";

export * from "./types.js";

function roundTo(value: number, decimals: number): number {
  return Number(value.toFixed(decimals));
}

/**
 * Bin positions drawn with probability prs
 */
export function drawIndexes(prs: readonly number[], size: number): number[] {
  const indexes: number[] = [];
  for (let i = 0; i < size; i++) {
    indexes.push(sampleIndex(prs));
  }
  return indexes;
}

/**
 * Domain-uniform values that ignore the learned probabilities.
 * Numeric kinds get evenly spaced points across [min, max) in shuffled order;
 * categorical attributes get uniform picks from their categories.
 */
export function randomValues(pattern: SamplingPattern, size: number): Scalar[] {
  if (size <= 0) return [];

  if (pattern.categorical) {
    if (pattern.bins.length === 0) {
      throw new ValidationError("Categorical attribute has no categories to draw from");
    }
    return Array.from({ length: size }, () => pick(pattern.bins));
  }

  const { min, max } = pattern;
  const step = (max - min) / size;
  const points = shuffle(
    Array.from({ length: size }, (_, i) => (min === max ? min : min + i * step)),
  );

  switch (pattern.type) {
    case "string": {
      const length = min === max ? min : randomInt(min, max);
      return points.map(() => randomString(length));
    }
    case "integer":
      return points.map((point) => Math.trunc(point));
    case "float":
      return points;
    case "datetime":
      return points.map((point) => formatDate(point));
    default:
      return assertNever(pattern.type);
  }
}

function binAt(pattern: SamplingPattern, index: number): Scalar {
  const bin = Number.isInteger(index) ? pattern.bins[index] : undefined;
  if (bin === undefined) {
    throw new ValidationError(
      `Bin index ${index} is outside [0, ${pattern.bins.length})`,
      { index, bins: pattern.bins.length },
    );
  }
  return bin;
}

/**
 * Draw one raw value from the bin at index: the category itself, or a uniform
 * point between the bin's edge and the next edge (max for the last bin)
 */
export function sampleAt(pattern: SamplingPattern, index: number): Scalar {
  const bin = binAt(pattern, index);
  if (pattern.categorical) return bin;

  const next = pattern.bins[index + 1];
  return uniform(Number(bin), next === undefined ? pattern.max : Number(next));
}

/**
 * Distribution-weighted values, shaped back into the attribute's type
 */
export function choiceValues(
  pattern: SamplingPattern,
  options: ChoiceOptions = {},
): Scalar[] {
  const indexes = options.indexes ?? drawIndexes(pattern.prs, options.size ?? 0);
  const sampled = indexes.map((index) => sampleAt(pattern, index));

  switch (pattern.type) {
    case "datetime":
      return pattern.categorical
        ? sampled
        : sampled.map((value) => formatDate(Number(value)));
    case "float": {
      const { decimals, min, max } = pattern;
      if (pattern.categorical || decimals === null) return sampled;
      return sampled.map((value) =>
        Math.min(Math.max(roundTo(Number(value), decimals), min), max),
      );
    }
    case "integer":
      return sampled.map((value) => Math.round(Number(value)));
    case "string":
      return pattern.categorical
        ? sampled
        : sampled.map((value) => randomString(Math.trunc(Number(value))));
    default:
      return assertNever(pattern.type);
  }
}

/**
 * Mask each value one-way. Categorical values go through a dictionary built
 * once from the bins. When size differs from the number of values, size values
 * are first redrawn from the bins by prs.
 */
export function pseudonymizeValues(
  pattern: SamplingPattern,
  values: readonly Scalar[],
  size: number = values.length,
): string[] {
  const source: Scalar[] =
    size !== values.length
      ? drawIndexes(pattern.prs, size).map((index) => binAt(pattern, index))
      : [...values];

  if (pattern.categorical) {
    const mapping = new Map<Scalar, string>(
      pattern.bins.map((bin) => [bin, maskString(String(bin))]),
    );
    return source.map((value) => mapping.get(value) ?? maskString(String(value)));
  }

  return source.map((value) =>
    maskString(
      pattern.type === "datetime" && typeof value === "number"
        ? formatDate(value)
        : String(value),
    ),
  );
}
