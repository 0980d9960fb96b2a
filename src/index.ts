/**
 * colsynth: per-column pattern learning and synthetic value generation
 *
 * @packageDocumentation
 */

// Core types
export * from "./types/index.js";

// Modules
export * from "./lib/inferencer/index.js";
export * from "./lib/profiler/index.js";
export * from "./lib/encoder/index.js";
export * from "./lib/synthesizer/index.js";
export * from "./lib/pattern/index.js";
export * from "./lib/attribute/index.js";
export * from "./lib/loader/index.js";
export * from "./lib/emitter/index.js";

// Utilities
export * from "./utils/logger.js";
export * from "./utils/errors.js";
export * from "./utils/seed-manager.js";
export * from "./utils/random.js";
export * from "./utils/strings.js";
export * from "./utils/datetime.js";
export * from "./utils/frequency-map.js";
