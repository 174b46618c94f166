import { describe, test, expect } from 'vitest';
import { DataArray } from '../../src/DataArray.js';
import {
  clearFraction,
  locateExtremes,
  rollingMedian,
  spatialReduce,
  temporalCount,
  thresholdCount
} from '../../src/aggregation/temporal.js';
import { cubeArray, days, spatialMask } from '../helpers/cube.js';

function timeSeries(values: number[]): DataArray {
  return new DataArray(values, { dims: ['time'], coords: { time: days(values.length) }, name: 'ndwi_mean' });
}

describe('rollingMedian', () => {
  test('should use the available samples at the edges', () => {
    expect(rollingMedian(timeSeries([1, NaN, 3]), { window: 3, minPeriods: 1 }).values).toEqual([1, 2, 3]);
  });

  test('should smooth a spike', () => {
    expect(rollingMedian(timeSeries([1, 1, 9, 1, 1]), { window: 3 }).values).toEqual([1, 1, 1, 1, 1]);
  });

  test('should leave NaN where fewer than minPeriods samples exist', () => {
    expect(rollingMedian(timeSeries([1, NaN, NaN, 4]), { window: 3, minPeriods: 2 }).values)
      .toEqual([NaN, NaN, NaN, NaN]);
  });

  test('should reject even or non-positive windows', () => {
    expect(() => rollingMedian(timeSeries([1, 2]), { window: 2 })).toThrow(RangeError);
    expect(() => rollingMedian(timeSeries([1, 2]), { window: 0 })).toThrow(RangeError);
    expect(() => rollingMedian(timeSeries([1, 2]), { window: 3, minPeriods: 4 })).toThrow(
      'minPeriods must be an integer within [1, 3], got 4'
    );
  });
});

describe('spatialReduce', () => {
  const index = cubeArray([
    [[0.2, 0.4], [NaN, 0.6]],
    [[NaN, NaN], [NaN, NaN]]
  ], 'ndwi');

  test('should count and average non-missing pixels per step', async () => {
    const { count, mean } = await spatialReduce(index);

    expect(count.dims).toEqual(['time']);
    expect(count.values).toEqual([3, 0]);
    expect(mean.values[0]).toBeCloseTo(0.4, 12);
    expect(mean.values[1]).toBeNaN();
    expect(mean.name).toBe('ndwi_mean');
  });

  test('should restrict to a spatial mask', async () => {
    const { count, mean } = await spatialReduce(index, { mask: spatialMask([[true, false], [true, true]]) });

    expect(count.values).toEqual([2, 0]);
    expect(mean.values[0]).toBeCloseTo(0.4, 12);
  });

  test('should evaluate lazy inputs', async () => {
    const { count } = await spatialReduce(index.chunk({ time: 1 }));
    expect(count.values).toEqual([3, 0]);
  });
});

describe('thresholdCount', () => {
  test('should count pixels strictly above the threshold', async () => {
    const index = cubeArray([[[0.1, 0.3], [0.2, NaN]], [[0.5, 0.5], [0.5, 0.5]]], 'ndwi');
    const above = await thresholdCount(index, 0.2);

    expect(above.values).toEqual([1, 4]);
    expect(above.name).toBe('ndwi_above');
  });

  test('should honour a spatial mask', async () => {
    const index = cubeArray([[[0.5, 0.5], [0.5, 0.5]]], 'ndwi');
    const above = await thresholdCount(index, 0, { mask: spatialMask([[true, false], [false, false]]) });
    expect(above.values).toEqual([1]);
  });
});

describe('temporalCount and clearFraction', () => {
  test('should count true values per pixel across time', async () => {
    const mask = new DataArray([[[true, false]], [[true, true]], [[false, false]]], { dims: ['time', 'y', 'x'] });
    const counts = await temporalCount(mask);

    expect(counts.dims).toEqual(['y', 'x']);
    expect(counts.data).toEqual([[2, 1]]);
  });

  test('should divide clear by valid counts and give NaN without valid observations', () => {
    const clear = new DataArray([[1, 0, 0]], { dims: ['y', 'x'] });
    const valid = new DataArray([[4, 2, 0]], { dims: ['y', 'x'] });
    const fraction = clearFraction(clear, valid);

    expect(fraction.data).toEqual([[0.25, 0, NaN]]);
    expect(fraction.name).toBe('clear_fraction');
  });
});

describe('locateExtremes', () => {
  test('should find the minimum and maximum with their times', () => {
    const extremes = locateExtremes(timeSeries([0.3, NaN, -0.1, 0.8]));

    expect(extremes?.min).toEqual({ index: 2, coordinate: days(4)[2], value: -0.1 });
    expect(extremes?.max).toEqual({ index: 3, coordinate: days(4)[3], value: 0.8 });
  });

  test('should return undefined for an all-missing series', () => {
    expect(locateExtremes(timeSeries([NaN, NaN]))).toBeUndefined();
  });

  test('should require a 1-D series', () => {
    expect(() => locateExtremes(spatialMask([[true, false], [false, true]]))).toThrow(RangeError);
  });
});
