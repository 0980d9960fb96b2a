/**
 * Pattern module - validation and file I/O for serialized attribute patterns
 */

import fs from "fs/promises";
import { Ajv, type ErrorObject, type ValidateFunction } from "ajv";
import type { AttributePattern } from "../../types/attribute.js";
import { PATTERN_SCHEMA } from "./schema.js";
import { FileIOError, ValidationError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";

export { PATTERN_SCHEMA } from "./schema.js";

export interface PatternViolation {
  path: string;
  message: string;
}

const ajv = new Ajv({
  strict: false,
  allErrors: true,
});

let validatePatternFn: ValidateFunction<AttributePattern> | undefined;

function patternValidator(): ValidateFunction<AttributePattern> {
  validatePatternFn ??= ajv.compile<AttributePattern>(PATTERN_SCHEMA);
  return validatePatternFn;
}

function toViolations(errors: ErrorObject[] | null | undefined): PatternViolation[] {
  return (errors ?? []).map((error) => ({
    path:
      error.keyword === "required" && "missingProperty" in error.params
        ? `/${String(error.params.missingProperty)}`
        : error.instancePath || "/",
    message: error.message ?? error.keyword,
  }));
}

/**
 * Check an untrusted record and return it typed as a pattern
 *
 * @throws ValidationError listing every violation
 */
export function parsePattern(record: unknown): AttributePattern {
  const validate = patternValidator();
  if (!validate(record)) {
    const violations = toViolations(validate.errors);
    throw new ValidationError("Invalid attribute pattern", { violations });
  }

  if (record.bins.length !== record.prs.length) {
    throw new ValidationError("Pattern bins and prs differ in length", {
      violations: [
        {
          path: "/prs",
          message: `expected ${record.bins.length} entries, got ${record.prs.length}`,
        },
      ],
    });
  }

  if (record.min > record.max) {
    throw new ValidationError("Pattern min exceeds max", {
      violations: [{ path: "/min", message: `${record.min} > ${record.max}` }],
    });
  }

  return {
    ...record,
    decimals: record.decimals ?? null,
    bins: [...record.bins],
    prs: [...record.prs],
  };
}

export function serializePattern(pattern: AttributePattern, pretty = true): string {
  return JSON.stringify(pattern, null, pretty ? 2 : undefined);
}

/**
 * Load and validate a pattern from a JSON file
 */
export async function loadPattern(filePath: string): Promise<AttributePattern> {
  let content: string;
  try {
    content = await fs.readFile(filePath, "utf-8");
  } catch (error) {
    throw new FileIOError(`Failed to read pattern file: ${filePath}`, { filePath }, {
      cause: error,
    });
  }

  let record: unknown;
  try {
    record = JSON.parse(content);
  } catch (error) {
    throw new ValidationError(`Pattern file is not valid JSON: ${filePath}`, { filePath }, {
      cause: error,
    });
  }

  const pattern = parsePattern(record);
  logger.info("Loaded attribute pattern", {
    filePath,
    name: pattern.name,
    type: pattern.type,
    bins: pattern.bins.length,
  });
  return pattern;
}

export async function savePattern(
  filePath: string,
  pattern: AttributePattern,
): Promise<void> {
  try {
    await fs.writeFile(filePath, serializePattern(pattern) + "\n", "utf-8");
  } catch (error) {
    throw new FileIOError(`Failed to write pattern file: ${filePath}`, { filePath }, {
      cause: error,
    });
  }
  logger.info("Saved attribute pattern", { filePath, name: pattern.name });
}
