/**
 * Inferencer module - type and categorical inference for a raw column
 */

import {
  AttributeType,
  NormalizedColumn,
  RawValue,
  Scalar,
  assertNever,
} from "../../types/attribute.js";
import { InferencerOptions } from "./types.js";
import { isDatetime, formatDate, toDaySeconds, toSeconds } from "../../utils/datetime.js";
import { hasDuplicates, mostFrequent } from "../../utils/frequency-map.js";
import { InferenceError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";

export * from "./types.js";

export function isMissing(value: RawValue): value is null | undefined {
  return (
    value === null ||
    value === undefined ||
    (typeof value === "number" && Number.isNaN(value))
  );
}

function presentValues(values: readonly RawValue[]): Scalar[] {
  const present: Scalar[] = [];
  for (const value of values) {
    if (!isMissing(value)) present.push(value);
  }
  return present;
}

/**
 * Classify a column as integer, float, string or datetime.
 * Missing entries are skipped; a mix of integers and floats is float; a column
 * whose every present value is a parseable date string is datetime.
 */
export function inferType(values: readonly RawValue[]): AttributeType {
  const present = presentValues(values);
  if (present.length === 0) {
    throw new InferenceError("Cannot infer a type from a column with no values", {
      size: values.length,
    });
  }

  const numeric = present.every((value) => typeof value === "number");
  if (numeric) {
    return present.every((value) => Number.isInteger(value)) ? "integer" : "float";
  }

  return present.every((value) => isDatetime(value)) ? "datetime" : "string";
}

/**
 * Replace missing entries with the column's most frequent value
 */
export function imputeMissing(values: readonly RawValue[]): Scalar[] {
  const present = presentValues(values);
  const mode = mostFrequent(present);
  if (mode === undefined) {
    throw new InferenceError("Cannot impute a column with no values", {
      size: values.length,
    });
  }
  return values.map((value) => (isMissing(value) ? mode : value));
}

/**
 * Auto-detection only flags string columns that repeat values; a caller-forced
 * flag always wins
 */
export function detectCategorical(
  type: AttributeType,
  values: readonly Scalar[],
  forced = false,
): boolean {
  return forced || (type === "string" && hasDuplicates(values));
}

/**
 * Map an imputed value to its display form and its computation key
 */
export function normalizeValue(
  type: AttributeType,
  value: Scalar,
): { display: Scalar; key: Scalar } {
  switch (type) {
    case "integer":
    case "float": {
      const number = Number(value);
      return { display: number, key: number };
    }
    case "string": {
      const text = String(value);
      return { display: text, key: text };
    }
    case "datetime": {
      const seconds =
        typeof value === "number" ? value : toDaySeconds(toSeconds(value));
      return { display: formatDate(seconds), key: toDaySeconds(seconds) };
    }
    default:
      return assertNever(type);
  }
}

/**
 * Infer, impute and normalize a raw column in one pass.
 * The input array is left untouched.
 */
export function normalizeColumn(
  values: readonly RawValue[],
  options: InferencerOptions = {},
): NormalizedColumn {
  const type = inferType(values);
  const imputed = imputeMissing(values);

  const display: Scalar[] = [];
  const keys: Scalar[] = [];
  for (const value of imputed) {
    const normalized = normalizeValue(type, value);
    display.push(normalized.display);
    keys.push(normalized.key);
  }

  const categorical = detectCategorical(type, display, options.categorical);

  logger.debug("Column classified", {
    type,
    categorical,
    size: values.length,
    missing: values.length - presentValues(values).length,
  });

  return { type, categorical, values: display, keys };
}
