/**
 * Data operation utilities for flat row-major arrays
 * Handles selection along an axis and NaN-skipping reductions
 */

import { DataValue } from '../types.js';
import { computeStrides, isMissing, sizeOf, toNumber, unravelIndex } from '../utils.js';

export type Reducer = 'sum' | 'count' | 'mean';

/**
 * Sum all non-missing values (booleans count as 1/0)
 */
export function sumAll(values: readonly DataValue[]): number {
  let sum = 0;
  for (const value of values) {
    if (!isMissing(value)) {
      sum += toNumber(value);
    }
  }
  return sum;
}

/**
 * Count all non-missing values
 */
export function countAll(values: readonly DataValue[]): number {
  let count = 0;
  for (const value of values) {
    if (!isMissing(value)) {
      count++;
    }
  }
  return count;
}

/**
 * NaN-skipping mean; NaN when every value is missing
 */
export function meanAll(values: readonly DataValue[]): number {
  const count = countAll(values);
  return count === 0 ? NaN : sumAll(values) / count;
}

/**
 * Reduce the given axes with a NaN-skipping reducer.
 * Sums of all-missing groups are 0, counts are 0 and means are NaN.
 */
export function reduceAxes(
  values: readonly DataValue[],
  shape: readonly number[],
  axes: readonly number[],
  reducer: Reducer
): { values: number[]; shape: number[] } {
  const keptAxes = shape.map((_, i) => i).filter(i => !axes.includes(i));
  const outShape = keptAxes.map(i => shape[i]);
  const outSize = sizeOf(outShape);
  const outStrides = computeStrides(outShape);

  const sums = new Array<number>(outSize).fill(0);
  const counts = new Array<number>(outSize).fill(0);

  for (let flat = 0; flat < values.length; flat++) {
    const value = values[flat];
    if (isMissing(value)) continue;

    const indices = unravelIndex(flat, shape);
    let target = 0;
    for (let k = 0; k < keptAxes.length; k++) {
      target += indices[keptAxes[k]] * outStrides[k];
    }
    sums[target] += toNumber(value);
    counts[target]++;
  }

  const result = sums.map((sum, i) => {
    switch (reducer) {
      case 'sum':
        return sum;
      case 'count':
        return counts[i];
      case 'mean':
        return counts[i] === 0 ? NaN : sum / counts[i];
    }
  });

  return { values: result, shape: outShape };
}

/**
 * Select indices along one axis. The axis is kept.
 */
export function selectAlongAxis(
  values: readonly DataValue[],
  shape: readonly number[],
  axis: number,
  indices: readonly number[]
): DataValue[] {
  const outShape = [...shape];
  outShape[axis] = indices.length;
  const strides = computeStrides(shape);
  const total = sizeOf(outShape);
  const result = new Array<DataValue>(total);

  for (let flat = 0; flat < total; flat++) {
    const position = unravelIndex(flat, outShape);
    let source = 0;
    for (let i = 0; i < position.length; i++) {
      const index = i === axis ? indices[position[i]] : position[i];
      source += index * strides[i];
    }
    result[flat] = values[source];
  }

  return result;
}

/**
 * Position of the smallest or largest non-missing value; -1 if there is none
 */
export function nanArgExtreme(values: readonly DataValue[], kind: 'min' | 'max'): number {
  let best = -1;
  let bestValue = 0;

  values.forEach((value, i) => {
    if (isMissing(value)) return;
    const numeric = toNumber(value);
    if (best === -1 || (kind === 'min' ? numeric < bestValue : numeric > bestValue)) {
      best = i;
      bestValue = numeric;
    }
  });

  return best;
}
