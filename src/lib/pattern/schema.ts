import { ATTRIBUTE_TYPES } from "../../types/attribute.js";

/**
 * JSON Schema (draft-07) for serialized attribute patterns
 */

export const PATTERN_SCHEMA = {
  $schema: "http://json-schema.org/draft-07/schema#",
  title: "AttributePattern",
  type: "object",
  required: ["name", "type", "categorical", "min", "max", "bins", "prs"],
  properties: {
    name: { type: "string" },
    type: { enum: [...ATTRIBUTE_TYPES] },
    categorical: { type: "boolean" },
    min: { type: "number" },
    max: { type: "number" },
    decimals: { type: ["integer", "null"], minimum: 0 },
    bins: {
      type: "array",
      items: { type: ["number", "string"] },
    },
    prs: {
      type: "array",
      items: { type: "number", minimum: 0 },
    },
  },
};
