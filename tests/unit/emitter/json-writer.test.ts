/**
 * JSON Array Writer Tests
 * Verifies JSON array format output
 */

import { describe, it, expect } from 'vitest';
import { Readable } from 'stream';
import { createJSONWriter } from '../../../src/lib/emitter/json-writer.js';

async function collect(values: unknown[], column: string): Promise<string> {
  const chunks: string[] = [];
  for await (const chunk of Readable.from(values).pipe(createJSONWriter(column))) {
    chunks.push(String(chunk));
  }
  return chunks.join('');
}

describe('JSON Array Writer', () => {
  it('should wrap each value in a record keyed by the column', async () => {
    const output = await collect([1, 2.5, 'x'], 'score');

    expect(JSON.parse(output)).toEqual([{ score: 1 }, { score: 2.5 }, { score: 'x' }]);
    expect(output).toBe('[\n  {"score":1},\n  {"score":2.5},\n  {"score":"x"}\n]\n');
  });

  it('should handle empty stream', async () => {
    const output = await collect([], 'score');

    expect(JSON.parse(output)).toEqual([]);
    expect(output).toBe('[\n\n]\n');
  });

  it('should handle single value', async () => {
    const output = await collect(['1/15/2020'], 'date');

    expect(output).toBe('[\n  {"date":"1/15/2020"}\n]\n');
  });
});
