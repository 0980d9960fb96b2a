/**
 * Unit tests for type and categorical inference
 */

import { describe, it, expect } from 'vitest';
import {
  detectCategorical,
  imputeMissing,
  inferType,
  isMissing,
  normalizeColumn,
  normalizeValue,
} from '../../src/lib/inferencer/index.js';
import { InferenceError } from '../../src/utils/errors.js';

describe('Inferencer', () => {
  describe('isMissing', () => {
    it('should treat null, undefined and NaN as missing', () => {
      expect(isMissing(null)).toBe(true);
      expect(isMissing(undefined)).toBe(true);
      expect(isMissing(Number.NaN)).toBe(true);
      expect(isMissing(0)).toBe(false);
      expect(isMissing('')).toBe(false);
    });
  });

  describe('inferType', () => {
    it('should detect integer columns', () => {
      expect(inferType([1, 2, null, 3])).toBe('integer');
    });

    it('should widen mixed integers and floats to float', () => {
      expect(inferType([1, 2.5, 3])).toBe('float');
    });

    it('should detect datetime columns', () => {
      expect(inferType(['2020-01-15', '1/16/2020', null])).toBe('datetime');
    });

    it('should fall back to string', () => {
      expect(inferType(['M', 'F'])).toBe('string');
      expect(inferType(['2020-01-15', 'soon'])).toBe('string');
      expect(inferType([1, 'a'])).toBe('string');
    });

    it('should throw InferenceError for a column with no values', () => {
      expect(() => inferType([])).toThrow(InferenceError);
      expect(() => inferType([null, undefined])).toThrow(InferenceError);
    });
  });

  describe('imputeMissing', () => {
    it('should fill gaps with the most frequent value', () => {
      expect(imputeMissing([1, null, 2, 2, Number.NaN])).toEqual([1, 2, 2, 2, 2]);
    });

    it('should break ties toward the smallest value', () => {
      expect(imputeMissing(['b', 'a', null])).toEqual(['b', 'a', 'a']);
    });

    it('should throw when nothing is present', () => {
      expect(() => imputeMissing([null])).toThrow(InferenceError);
    });
  });

  describe('detectCategorical', () => {
    it('should flag string columns with repeats', () => {
      expect(detectCategorical('string', ['M', 'F', 'M'])).toBe(true);
      expect(detectCategorical('string', ['a', 'b'])).toBe(false);
    });

    it('should leave numeric columns continuous unless forced', () => {
      expect(detectCategorical('integer', [1, 1, 2])).toBe(false);
      expect(detectCategorical('integer', [1, 2], true)).toBe(true);
    });
  });

  describe('normalizeValue', () => {
    it('should key datetimes by UTC day and display them as M/D/YYYY', () => {
      expect(normalizeValue('datetime', '2020-01-15T10:30:00Z')).toEqual({
        display: '1/15/2020',
        key: 1579046400,
      });
    });

    it('should stringify values of a string column', () => {
      expect(normalizeValue('string', 42)).toEqual({ display: '42', key: '42' });
    });
  });

  describe('normalizeColumn', () => {
    it('should infer, impute and normalize together', () => {
      const column = normalizeColumn(['M', null, 'F', 'M']);

      expect(column).toEqual({
        type: 'string',
        categorical: true,
        values: ['M', 'M', 'F', 'M'],
        keys: ['M', 'M', 'F', 'M'],
      });
    });

    it('should honor a forced categorical flag', () => {
      const column = normalizeColumn([3, 1, 2], { categorical: true });

      expect(column.type).toBe('integer');
      expect(column.categorical).toBe(true);
    });

    it('should not modify the input array', () => {
      const input = [1, null, 1];
      normalizeColumn(input);

      expect(input).toEqual([1, null, 1]);
    });
  });
});
