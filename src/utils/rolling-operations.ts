/**
 * Rolling window operations for time series analysis
 * Handles moving window calculations like rolling mean, sum and median
 */

import { DataValue, RollingOptions, RollingReducer } from '../types.js';
import { computeStrides, isMissing, sizeOf, toNumber } from '../utils.js';

/**
 * Apply rolling window operation along one axis of a flat row-major array
 */
export function applyRolling(
  values: readonly DataValue[],
  shape: readonly number[],
  axis: number,
  window: number,
  options: RollingOptions,
  reducer: RollingReducer
): number[] {
  const length = shape[axis];
  const stride = computeStrides(shape)[axis];
  const result = new Array<number>(sizeOf(shape));
  const lines = length === 0 ? 0 : values.length / length;

  for (let line = 0; line < lines; line++) {
    // Offset of the first element of this line: split the line number into
    // the part above the axis and the part below it.
    const outer = Math.floor(line / stride);
    const inner = line % stride;
    const base = outer * stride * length + inner;

    const series = new Array<DataValue>(length);
    for (let i = 0; i < length; i++) {
      series[i] = values[base + i * stride];
    }

    const rolled = rolling1D(series, window, options, reducer);
    for (let i = 0; i < length; i++) {
      result[base + i * stride] = rolled[i];
    }
  }

  return result;
}

/**
 * Apply rolling window operation to a 1D array.
 *
 * Missing values are skipped inside each window. Windows truncated at the
 * series edges use whatever samples they hold; a position is NaN when fewer
 * than `minPeriods` (default: the window size) samples are available.
 */
export function rolling1D(
  values: readonly DataValue[],
  window: number,
  options: RollingOptions,
  reducer: RollingReducer
): number[] {
  const len = values.length;
  const result = new Array<number>(len).fill(NaN);
  const center = options.center ?? false;
  const normalizedWindow = window <= 0 ? 1 : window;
  const minPeriods = Math.max(options.minPeriods ?? normalizedWindow, 1);

  if (!center && reducer !== 'median') {
    // Sliding window for trailing mean/sum - O(n) instead of O(n*w)
    let sum = 0;
    let count = 0;

    for (let i = 0; i < len; i++) {
      const value = values[i];
      if (!isMissing(value)) {
        sum += toNumber(value);
        count++;
      }

      const oldIdx = i - normalizedWindow;
      if (oldIdx >= 0) {
        const oldValue = values[oldIdx];
        if (!isMissing(oldValue)) {
          sum -= toNumber(oldValue);
          count--;
        }
      }

      if (count >= minPeriods) {
        result[i] = reducer === 'sum' ? sum : sum / count;
      }
    }

    return result;
  }

  const half = center ? Math.floor((normalizedWindow - 1) / 2) : normalizedWindow - 1;

  for (let i = 0; i < len; i++) {
    const start = Math.max(i - half, 0);
    const end = Math.min(i - half + normalizedWindow - 1, len - 1);

    const samples: number[] = [];
    for (let j = start; j <= end; j++) {
      const value = values[j];
      if (!isMissing(value)) {
        samples.push(toNumber(value));
      }
    }

    if (samples.length < minPeriods) {
      continue;
    }

    switch (reducer) {
      case 'median':
        result[i] = median(samples);
        break;
      case 'sum':
        result[i] = samples.reduce((a, b) => a + b, 0);
        break;
      case 'mean':
        result[i] = samples.reduce((a, b) => a + b, 0) / samples.length;
        break;
    }
  }

  return result;
}

/**
 * Median of a non-empty list of numbers (mean of the middle pair for even lengths)
 */
export function median(samples: readonly number[]): number {
  const sorted = [...samples].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 0 ? (sorted[mid - 1] + sorted[mid]) / 2 : sorted[mid];
}
