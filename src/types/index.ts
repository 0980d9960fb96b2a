// Core re-exports for the colsynth type system
// Module-local types are re-exported by each module's index

export * from "./attribute.js";
export * from "../cli/config/types.js";
