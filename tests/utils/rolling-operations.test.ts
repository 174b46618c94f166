/**
 * Tests for rolling window operations
 */

import { describe, it, expect } from 'vitest';
import { applyRolling, median, rolling1D } from '../../src/utils/rolling-operations.js';

describe('rolling1D', () => {
  it('should take a centered median over available samples', () => {
    expect(rolling1D([1, NaN, 3], 3, { center: true, minPeriods: 1 }, 'median')).toEqual([1, 2, 3]);
  });

  it('should give NaN where fewer than minPeriods samples exist', () => {
    expect(rolling1D([1, NaN, 3, 4, 5], 3, { center: true, minPeriods: 2 }, 'median'))
      .toEqual([NaN, 2, 3.5, 4, 4.5]);
  });

  it('should default minPeriods to the window size', () => {
    expect(rolling1D([1, 2, 3], 3, { center: true }, 'mean')).toEqual([NaN, 2, NaN]);
  });

  it('should compute trailing sums', () => {
    expect(rolling1D([1, 2, 3, 4], 3, { minPeriods: 1 }, 'sum')).toEqual([1, 3, 6, 9]);
  });
});

describe('applyRolling', () => {
  it('should roll along the last axis of a 2D array', () => {
    // [[1, 2, 3], [10, 20, 30]] along axis 1
    const result = applyRolling([1, 2, 3, 10, 20, 30], [2, 3], 1, 3, { center: true, minPeriods: 1 }, 'median');
    expect(result).toEqual([1.5, 2, 2.5, 15, 20, 25]);
  });
});

describe('median', () => {
  it('should average the middle pair for even lengths', () => {
    expect(median([4, 1, 3, 2])).toBe(2.5);
    expect(median([5, 1, 3])).toBe(3);
  });
});
