/**
 * Random draws backed by the seedable faker generator
 */

import { faker } from "@faker-js/faker";

/**
 * Uniform float in [0, 1)
 */
export function unit(): number {
  return faker.number.float({ min: 0, max: 1 });
}

/**
 * Uniform float between lo and hi
 */
export function uniform(lo: number, hi: number): number {
  if (lo === hi) return lo;
  return lo + (hi - lo) * unit();
}

/**
 * Uniform integer in [min, maxExclusive)
 */
export function randomInt(min: number, maxExclusive: number): number {
  if (maxExclusive <= min + 1) return min;
  return faker.number.int({ min, max: maxExclusive - 1 });
}

export function shuffle<T>(values: readonly T[]): T[] {
  return faker.helpers.shuffle([...values]);
}

export function pick<T>(values: readonly T[]): T {
  return faker.helpers.arrayElement(values);
}
