/**
 * JSON array writer - Transform stream that turns synthesized values into a
 * JSON array of `{ "<column>": value }` records
 */

import { Transform, TransformCallback } from "stream";

export class JSONWriter extends Transform {
  private isFirstItem = true;

  constructor(private readonly column: string) {
    super({
      writableObjectMode: true,
      readableObjectMode: false,
    });
  }

  override _construct(callback: (error?: Error | null) => void): void {
    this.push("[\n");
    callback();
  }

  override _transform(
    chunk: unknown,
    _encoding: BufferEncoding,
    callback: TransformCallback,
  ): void {
    try {
      const record = JSON.stringify({ [this.column]: chunk });
      this.push(this.isFirstItem ? "  " + record : ",\n  " + record);
      this.isFirstItem = false;
      callback();
    } catch (error) {
      callback(error instanceof Error ? error : new Error(String(error)));
    }
  }

  override _flush(callback: TransformCallback): void {
    this.push("\n]\n");
    callback();
  }
}

export function createJSONWriter(column: string): Transform {
  return new JSONWriter(column);
}
