import { describe, it, expect } from 'vitest';
import { countDecimals } from '../../../src/lib/profiler/decimals.js';

describe('countDecimals', () => {
  it('should keep enough digits to cover more than 80% of values', () => {
    expect(countDecimals([1.5, 2.25, 3.125, 4.0])).toBe(3);
  });

  it('should stop at the most common digit count when it dominates', () => {
    expect(countDecimals([0.1, 0.2, 0.3, 0.4, 0.5, 0.25])).toBe(1);
  });

  it('should require strictly more than 80%', () => {
    // 1 digit covers exactly 80%, so the 2-digit group is pulled in
    expect(countDecimals([0.1, 0.2, 0.3, 0.4, 0.25])).toBe(2);
  });

  it('should count whole numbers as one decimal place', () => {
    expect(countDecimals([1, 2, 3])).toBe(1);
    expect(countDecimals([1, 1, 1, 1, 1, 1, 1, 1, 1, 2.5])).toBe(1);
  });

  it('should return 0 for empty input', () => {
    expect(countDecimals([])).toBe(0);
  });
});
