/**
 * JSON Schema for configuration files
 */

export const CONFIG_SCHEMA = {
  $schema: "http://json-schema.org/draft-07/schema#",
  type: "object",
  additionalProperties: false,
  properties: {
    logLevel: { enum: ["error", "warn", "info", "debug"] },
    learn: {
      type: "object",
      additionalProperties: false,
      properties: {
        input: { type: "string" },
        column: { type: "string" },
        categorical: { type: "boolean" },
        binSize: { type: "integer", minimum: 1 },
        output: { type: "string" },
      },
    },
    synthesize: {
      type: "object",
      additionalProperties: false,
      properties: {
        mode: { enum: ["choice", "random", "pseudonymize"] },
        pattern: { type: "string" },
        input: { type: "string" },
        column: { type: "string" },
        categorical: { type: "boolean" },
        size: { type: "integer", minimum: 0 },
        seed: { type: ["string", "integer"] },
        output: {
          type: "object",
          additionalProperties: false,
          properties: {
            format: { enum: ["ndjson", "json"] },
            path: { type: "string" },
          },
        },
      },
    },
  },
};
