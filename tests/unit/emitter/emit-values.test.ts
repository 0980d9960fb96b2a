import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, readFileSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { createWriter, emitValues } from '../../../src/lib/emitter/index.js';
import { JSONWriter } from '../../../src/lib/emitter/json-writer.js';
import { NDJSONWriter } from '../../../src/lib/emitter/ndjson-writer.js';
import { FileIOError } from '../../../src/utils/errors.js';

describe('emitValues', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'colsynth-emit-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should pick the writer by format', () => {
    expect(createWriter('json', 'c')).toBeInstanceOf(JSONWriter);
    expect(createWriter('ndjson', 'c')).toBeInstanceOf(NDJSONWriter);
  });

  it('should write NDJSON to a file', async () => {
    const destination = join(dir, 'out.ndjson');
    const result = await emitValues([1, 2], { format: 'ndjson', destination, column: 'n' });

    expect(result).toEqual({ written: 2, destination });
    expect(readFileSync(destination, 'utf-8')).toBe('{"n":1}\n{"n":2}\n');
  });

  it('should write a JSON array to a file', async () => {
    const destination = join(dir, 'out.json');
    await emitValues(['a'], { format: 'json', destination, column: 's' });

    expect(JSON.parse(readFileSync(destination, 'utf-8'))).toEqual([{ s: 'a' }]);
  });

  it('should raise FileIOError when the destination cannot be opened', async () => {
    const destination = join(dir, 'missing', 'out.json');

    await expect(
      emitValues([1], { format: 'json', destination, column: 'n' }),
    ).rejects.toBeInstanceOf(FileIOError);
  });
});
