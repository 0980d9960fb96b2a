/**
 * Emitter module - writes synthesized columns as NDJSON or a JSON array
 */

import { Readable, Transform, Writable } from "stream";
import { pipeline } from "stream/promises";
import { createWriteStream } from "fs";
import type { Scalar } from "../../types/attribute.js";
import type { EmitterOptions, EmitterResult, OutputFormat } from "./types.js";
import { createNDJSONWriter } from "./ndjson-writer.js";
import { createJSONWriter } from "./json-writer.js";
import { FileIOError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";

export * from "./types.js";
export * from "./ndjson-writer.js";
export * from "./json-writer.js";

export function createWriter(format: OutputFormat, column: string): Transform {
  return format === "json" ? createJSONWriter(column) : createNDJSONWriter(column);
}

/**
 * Stream values through the chosen writer to a file or stdout
 */
export async function emitValues(
  values: readonly Scalar[],
  options: EmitterOptions,
): Promise<EmitterResult> {
  const target: Writable =
    options.destination === "stdout"
      ? process.stdout
      : createWriteStream(options.destination, { encoding: "utf-8" });

  try {
    if (options.destination === "stdout") {
      // Leave stdout open for the rest of the process
      const writer = createWriter(options.format, options.column);
      Readable.from(values).pipe(writer);
      for await (const chunk of writer) {
        target.write(chunk);
      }
    } else {
      await pipeline(
        Readable.from(values),
        createWriter(options.format, options.column),
        target,
      );
    }
  } catch (error) {
    throw new FileIOError(`Failed to write output: ${options.destination}`, {
      destination: options.destination,
    }, { cause: error });
  }

  logger.info("Synthesized values written", {
    destination: options.destination,
    format: options.format,
    written: values.length,
  });

  return { written: values.length, destination: options.destination };
}
