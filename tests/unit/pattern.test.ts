/**
 * Unit tests for pattern validation and persistence
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import {
  loadPattern,
  parsePattern,
  savePattern,
  serializePattern,
} from '../../src/lib/pattern/index.js';
import { ATTRIBUTE_TYPES, type AttributePattern } from '../../src/types/attribute.js';
import { FileIOError, ValidationError } from '../../src/utils/errors.js';

const pattern: AttributePattern = {
  name: 'score',
  type: 'float',
  categorical: false,
  min: 0,
  max: 1,
  decimals: 2,
  bins: [0, 0.5],
  prs: [0.25, 0.75],
};

function violationsOf(record: unknown): unknown {
  try {
    parsePattern(record);
  } catch (error) {
    if (error instanceof ValidationError) return error.details;
    throw error;
  }
  return undefined;
}

describe('Pattern', () => {
  describe('parsePattern', () => {
    it('should accept a well-formed record', () => {
      expect(parsePattern({ ...pattern })).toEqual(pattern);
    });

    it('should default a missing decimals field to null', () => {
      const { decimals: _decimals, ...rest } = pattern;

      expect(parsePattern(rest).decimals).toBeNull();
    });

    it('should list missing and mistyped fields', () => {
      expect(violationsOf({ ...pattern, type: 'boolean', name: undefined })).toEqual({
        violations: expect.arrayContaining([
          expect.objectContaining({ path: '/name' }),
          expect.objectContaining({ path: '/type' }),
        ]),
      });
    });

    it('should accept every attribute type', () => {
      for (const type of ATTRIBUTE_TYPES) {
        expect(parsePattern({ ...pattern, type }).type).toBe(type);
      }
    });

    it('should reject misaligned bins and prs', () => {
      expect(violationsOf({ ...pattern, prs: [1] })).toEqual({
        violations: [{ path: '/prs', message: 'expected 2 entries, got 1' }],
      });
    });

    it('should reject min greater than max', () => {
      expect(violationsOf({ ...pattern, min: 2 })).toEqual({
        violations: [{ path: '/min', message: '2 > 1' }],
      });
    });

    it('should reject negative probabilities', () => {
      expect(() => parsePattern({ ...pattern, prs: [-0.5, 1.5] })).toThrow(ValidationError);
    });

    it('should reject non-objects', () => {
      expect(() => parsePattern('pattern')).toThrow(ValidationError);
      expect(() => parsePattern(null)).toThrow(ValidationError);
    });
  });

  describe('serializePattern', () => {
    it('should write compact JSON on request', () => {
      expect(serializePattern(pattern, false)).toBe(
        '{"name":"score","type":"float","categorical":false,"min":0,"max":1,"decimals":2,"bins":[0,0.5],"prs":[0.25,0.75]}',
      );
    });
  });

  describe('file I/O', () => {
    let dir: string;

    beforeEach(() => {
      dir = mkdtempSync(join(tmpdir(), 'colsynth-pattern-'));
    });

    afterEach(() => {
      rmSync(dir, { recursive: true, force: true });
    });

    it('should save and load a pattern', async () => {
      const file = join(dir, 'score.json');
      await savePattern(file, pattern);

      expect(await loadPattern(file)).toEqual(pattern);
    });

    it('should raise FileIOError for a missing file', async () => {
      await expect(loadPattern(join(dir, 'absent.json'))).rejects.toBeInstanceOf(FileIOError);
    });

    it('should raise ValidationError for malformed JSON', async () => {
      const file = join(dir, 'broken.json');
      writeFileSync(file, '{"name":');

      await expect(loadPattern(file)).rejects.toBeInstanceOf(ValidationError);
    });

    it('should raise FileIOError when the target directory is missing', async () => {
      await expect(savePattern(join(dir, 'nope', 'p.json'), pattern)).rejects.toBeInstanceOf(
        FileIOError,
      );
    });
  });
});
