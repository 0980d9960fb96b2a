/**
 * String primitives for masking and random text
 */

import crypto from "crypto";
import { faker } from "@faker-js/faker";

const MASK_LENGTH = 16;

/**
 * One-way deterministic masking: equal inputs always yield equal masks
 *
 * @example
 * maskString("alice") === maskString("alice") // true
 */
export function maskString(value: string): string {
  return crypto
    .createHash("sha256")
    .update(value)
    .digest("hex")
    .slice(0, MASK_LENGTH);
}

/**
 * Random alphanumeric string of the given length
 */
export function randomString(length: number): string {
  const size = Math.max(0, Math.trunc(length));
  if (size === 0) return "";
  return faker.string.alphanumeric(size);
}

/**
 * Number of digits after the decimal point in the shortest string form
 *
 * @example
 * decimalsOf(3.125) // 3
 * decimalsOf(4) // 0
 * decimalsOf(1.5e-7) // 8
 */
export function decimalsOf(value: number): number {
  if (!Number.isFinite(value)) return 0;
  const text = String(value).toLowerCase();
  const [mantissa = "", exponentPart] = text.split("e");
  const dot = mantissa.indexOf(".");
  const fraction = dot === -1 ? 0 : mantissa.length - dot - 1;
  const exponent = exponentPart === undefined ? 0 : Number(exponentPart);
  return Math.max(0, fraction - exponent);
}
