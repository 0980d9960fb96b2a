/**
 * NDJSON Writer - Transform stream that turns synthesized values into
 * one `{ "<column>": value }` line each
 */

import { Transform, TransformCallback } from "stream";

export class NDJSONWriter extends Transform {
  constructor(private readonly column: string) {
    super({
      writableObjectMode: true, // Input is scalar values
      readableObjectMode: false, // Output is strings
    });
  }

  override _transform(
    chunk: unknown,
    _encoding: BufferEncoding,
    callback: TransformCallback,
  ): void {
    try {
      this.push(JSON.stringify({ [this.column]: chunk }) + "\n");
      callback();
    } catch (error) {
      callback(error instanceof Error ? error : new Error(String(error)));
    }
  }
}

export function createNDJSONWriter(column: string): Transform {
  return new NDJSONWriter(column);
}
