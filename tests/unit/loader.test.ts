/**
 * Unit tests for reading a column from CSV, JSON and NDJSON files
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import {
  coerceCell,
  detectFormat,
  extractColumn,
  parseRecords,
  readColumn,
  toRawValue,
} from '../../src/lib/loader/index.js';
import { FileIOError, ValidationError } from '../../src/utils/errors.js';

describe('Loader', () => {
  describe('detectFormat', () => {
    it('should map extensions to formats', () => {
      expect(detectFormat('data.CSV')).toBe('csv');
      expect(detectFormat('data.json')).toBe('json');
      expect(detectFormat('data.jsonl')).toBe('ndjson');
      expect(detectFormat('data.ndjson')).toBe('ndjson');
    });

    it('should reject unknown extensions', () => {
      expect(() => detectFormat('data.xlsx')).toThrow(FileIOError);
    });
  });

  describe('coerceCell', () => {
    it('should turn blanks into missing values and numeric text into numbers', () => {
      expect(coerceCell('  ')).toBeNull();
      expect(coerceCell('42')).toBe(42);
      expect(coerceCell('-1.5e2')).toBe(-150);
      expect(coerceCell('.5')).toBe(0.5);
    });

    it('should keep dates and words as text', () => {
      expect(coerceCell('2020-01-15')).toBe('2020-01-15');
      expect(coerceCell('M')).toBe('M');
    });
  });

  describe('toRawValue', () => {
    it('should normalize JSON fields', () => {
      expect(toRawValue(undefined)).toBeNull();
      expect(toRawValue('')).toBeNull();
      expect(toRawValue(true)).toBe('true');
      expect(toRawValue({ a: 1 })).toBe('{"a":1}');
      expect(toRawValue(3)).toBe(3);
    });
  });

  describe('parseRecords', () => {
    it('should parse CSV with a header row', () => {
      expect(parseRecords('age,sex\n31,M\n,F\n', 'csv')).toEqual([
        { age: 31, sex: 'M' },
        { age: null, sex: 'F' },
      ]);
    });

    it('should parse NDJSON and skip blank lines', () => {
      expect(parseRecords('{"a":1}\n\n{"a":2}\n', 'ndjson')).toEqual([{ a: 1 }, { a: 2 }]);
    });

    it('should require a JSON array of records', () => {
      expect(() => parseRecords('{"a":1}', 'json')).toThrow(ValidationError);
      expect(() => parseRecords('[1, 2]', 'json')).toThrow(ValidationError);
    });
  });

  describe('extractColumn', () => {
    it('should fill absent fields with missing values', () => {
      expect(extractColumn([{ a: 1 }, { b: 2 }], 'a')).toEqual([1, null]);
    });

    it('should reject a column no record has', () => {
      expect(() => extractColumn([{ a: 1 }], 'b')).toThrow('Column not found: b');
    });
  });

  describe('readColumn', () => {
    let dir: string;

    beforeEach(() => {
      dir = mkdtempSync(join(tmpdir(), 'colsynth-loader-'));
    });

    afterEach(() => {
      rmSync(dir, { recursive: true, force: true });
    });

    it('should read a CSV column', async () => {
      const file = join(dir, 'people.csv');
      writeFileSync(file, 'name,joined\nann,2020-01-15\nbob,2020-02-01\n');

      expect(await readColumn(file, 'joined')).toEqual(['2020-01-15', '2020-02-01']);
    });

    it('should read a JSON column', async () => {
      const file = join(dir, 'people.json');
      writeFileSync(file, JSON.stringify([{ score: 1.5 }, { score: null }]));

      expect(await readColumn(file, 'score')).toEqual([1.5, null]);
    });

    it('should raise FileIOError for a missing file', async () => {
      await expect(readColumn(join(dir, 'absent.csv'), 'x')).rejects.toBeInstanceOf(FileIOError);
    });

    it('should raise ValidationError for malformed NDJSON', async () => {
      const file = join(dir, 'bad.ndjson');
      writeFileSync(file, '{"a":1}\nnot json\n');

      await expect(readColumn(file, 'a')).rejects.toBeInstanceOf(ValidationError);
    });
  });
});
