/**
 * Loader module - reads one named column from a CSV, JSON or NDJSON file
 */

import fs from "fs/promises";
import path from "path";
import Papa from "papaparse";
import type { RawValue } from "../../types/attribute.js";
import { FileIOError, ValidationError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";

export type ColumnFormat = "csv" | "json" | "ndjson";

type DataRecord = Record<string, unknown>;

const NUMERIC = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

function isRecord(value: unknown): value is DataRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function detectFormat(filePath: string): ColumnFormat {
  const extension = path.extname(filePath).toLowerCase();
  switch (extension) {
    case ".csv":
      return "csv";
    case ".json":
      return "json";
    case ".ndjson":
    case ".jsonl":
      return "ndjson";
    default:
      throw new FileIOError(
        `Unsupported input format: ${filePath}. Must be .csv, .json, .ndjson or .jsonl`,
        { filePath },
      );
  }
}

/**
 * A CSV cell: blank is missing, numeric text becomes a number
 */
export function coerceCell(text: string): RawValue {
  const trimmed = text.trim();
  if (trimmed === "") return null;
  return NUMERIC.test(trimmed) ? Number(trimmed) : text;
}

/**
 * A JSON field as a raw value; booleans and nested values are stringified
 */
export function toRawValue(value: unknown): RawValue {
  if (value === null || value === undefined) return null;
  if (typeof value === "number") return value;
  if (typeof value === "string") return value.trim() === "" ? null : value;
  if (typeof value === "boolean" || typeof value === "bigint") return String(value);
  return JSON.stringify(value);
}

export function parseRecords(content: string, format: ColumnFormat): DataRecord[] {
  switch (format) {
    case "csv": {
      const parsed = Papa.parse<Record<string, string>>(content, {
        header: true,
        skipEmptyLines: true,
        dynamicTyping: false,
      });
      const [firstError] = parsed.errors;
      if (firstError) {
        throw new ValidationError(`CSV parse error: ${firstError.message}`, {
          row: firstError.row,
        });
      }
      return parsed.data.map((row) => {
        const record: DataRecord = {};
        for (const [key, cell] of Object.entries(row)) {
          record[key] = coerceCell(cell);
        }
        return record;
      });
    }
    case "json": {
      const parsed: unknown = JSON.parse(content);
      if (!Array.isArray(parsed) || !parsed.every(isRecord)) {
        throw new ValidationError("JSON input must be an array of records");
      }
      return parsed;
    }
    case "ndjson":
      return content
        .split(/\r?\n/)
        .filter((line) => line.trim() !== "")
        .map((line, index) => {
          const parsed: unknown = JSON.parse(line);
          if (!isRecord(parsed)) {
            throw new ValidationError(`NDJSON line ${index + 1} is not a record`);
          }
          return parsed;
        });
  }
}

export function extractColumn(records: readonly DataRecord[], column: string): RawValue[] {
  if (records.length > 0 && !records.some((record) => column in record)) {
    throw new ValidationError(`Column not found: ${column}`, {
      column,
      available: Object.keys(records[0] ?? {}),
    });
  }
  return records.map((record) => toRawValue(record[column]));
}

/**
 * Read one column from a data file
 */
export async function readColumn(filePath: string, column: string): Promise<RawValue[]> {
  const format = detectFormat(filePath);

  let content: string;
  try {
    content = await fs.readFile(filePath, "utf-8");
  } catch (error) {
    throw new FileIOError(`Failed to read input file: ${filePath}`, { filePath }, {
      cause: error,
    });
  }

  let records: DataRecord[];
  try {
    records = parseRecords(content, format);
  } catch (error) {
    if (error instanceof ValidationError) throw error;
    throw new ValidationError(`Failed to parse ${format} input: ${filePath}`, { filePath }, {
      cause: error,
    });
  }

  const values = extractColumn(records, column);
  logger.info("Column loaded", { filePath, format, column, rows: values.length });
  return values;
}
