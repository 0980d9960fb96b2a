import crypto from "crypto";
import { faker } from "@faker-js/faker";
import { logger } from "./logger.js";

export function hashStringToSeed(seed: string): number {
  // Convert seed string to SHA-256 hash
  const hash = crypto.createHash("sha256").update(seed).digest("hex");

  // First 8 hex characters become the numeric seed
  return parseInt(hash.slice(0, 8), 16);
}

/**
 * Seed the shared random source used by every synthesis operation
 */
export function seedRandom(seed: string | number): number {
  const numericSeed = typeof seed === "string" ? hashStringToSeed(seed) : seed;
  faker.seed(numericSeed);
  logger.debug("Random source seeded", { seed, numericSeed });
  return numericSeed;
}
