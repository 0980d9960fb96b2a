/**
 * Frequency and weighted-sampling utilities shared by inference, profiling
 * and synthesis
 */

import type { Scalar } from "../types/attribute.js";
import { unit } from "./random.js";

/**
 * Total order over scalars: numbers ascending, then strings lexicographically
 */
export function compareScalars(a: Scalar, b: Scalar): number {
  if (typeof a === "number" && typeof b === "number") return a - b;
  if (typeof a === "number") return -1;
  if (typeof b === "number") return 1;
  if (a < b) return -1;
  return a > b ? 1 : 0;
}

/**
 * Calculate frequency distribution from an array of values.
 * Keys keep their first-seen order; 1 and "1" are distinct.
 *
 * @example
 * calculateFrequencies([1, 2, 2, 3, 3, 3])
 * // Map { 1 => 1, 2 => 2, 3 => 3 }
 */
export function calculateFrequencies(
  values: readonly Scalar[],
): Map<Scalar, number> {
  const distribution = new Map<Scalar, number>();

  for (const value of values) {
    distribution.set(value, (distribution.get(value) ?? 0) + 1);
  }

  return distribution;
}

/**
 * Most frequent value; ties go to the smallest value by compareScalars
 */
export function mostFrequent(values: readonly Scalar[]): Scalar | undefined {
  let best: Scalar | undefined;
  let bestCount = 0;

  for (const [value, count] of calculateFrequencies(values)) {
    if (
      best === undefined ||
      count > bestCount ||
      (count === bestCount && compareScalars(value, best) < 0)
    ) {
      best = value;
      bestCount = count;
    }
  }

  return best;
}

export function hasDuplicates(values: readonly Scalar[]): boolean {
  return new Set(values).size < values.length;
}

/**
 * Scale counts to probabilities; an all-zero input stays all-zero
 */
export function normalizeDistribution(counts: readonly number[]): number[] {
  const total = counts.reduce((sum, count) => sum + count, 0);
  if (total === 0) return counts.map(() => 0);
  return counts.map((count) => count / total);
}

/**
 * Percentages rounded to two decimals
 */
export function toPercentages(counts: readonly number[], total: number): number[] {
  if (total === 0) return counts.map(() => 0);
  return counts.map((count) => Math.round((count / total) * 100 * 100) / 100);
}

/**
 * Sample an index with probability proportional to its weight
 *
 * @param weights - Non-negative weights (need not sum to 1)
 * @param randomValue - Optional random value in [0, 1)
 */
export function sampleIndex(
  weights: readonly number[],
  randomValue: number = unit(),
): number {
  if (weights.length === 0) {
    throw new Error("Cannot sample from empty distribution");
  }

  const total = weights.reduce((sum, weight) => sum + weight, 0);
  const target = randomValue * total;

  let cumulative = 0;
  let lastPositive = 0;
  for (let i = 0; i < weights.length; i++) {
    const weight = weights[i] ?? 0;
    if (weight <= 0) continue;
    cumulative += weight;
    lastPositive = i;
    if (target < cumulative) {
      return i;
    }
  }

  // Floating point shortfall lands on the last bin with mass
  return lastPositive;
}
