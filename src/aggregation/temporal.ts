/**
 * Temporal and spatial aggregation of cleaned cubes
 */

import { DataArray } from '../DataArray.js';
import { CoordinateValue, DimensionName } from '../types.js';
import { toNumber } from '../utils.js';
import { nanArgExtreme } from '../utils/data-operations.js';

export interface RollingMedianOptions {
  window: number;
  /** Minimum number of non-missing samples per window (default 1) */
  minPeriods?: number;
  dim?: DimensionName;
}

export interface SpatialReduceOptions {
  /** Spatial mask over `['y', 'x']`; pixels outside it are ignored */
  mask?: DataArray;
  dim?: DimensionName;
}

export interface SpatialSummary {
  /** Non-missing pixels per step */
  count: DataArray;
  /** NaN-skipping mean per step; NaN when a step has no values */
  mean: DataArray;
}

export interface Extreme {
  index: number;
  coordinate: CoordinateValue;
  value: number;
}

export function validateRollingWindow(window: number, minPeriods: number): void {
  if (!Number.isInteger(window) || window <= 0 || window % 2 === 0) {
    throw new RangeError(`Rolling median window must be a positive odd integer, got ${window}`);
  }
  if (!Number.isInteger(minPeriods) || minPeriods <= 0 || minPeriods > window) {
    throw new RangeError(`minPeriods must be an integer within [1, ${window}], got ${minPeriods}`);
  }
}

/**
 * Centered rolling median along `dim`. Edge windows are truncated and use the
 * non-missing samples they hold; a position is NaN when fewer than
 * `minPeriods` samples are available. The series must be computed.
 */
export function rollingMedian(series: DataArray, options: RollingMedianOptions): DataArray {
  const minPeriods = options.minPeriods ?? 1;
  validateRollingWindow(options.window, minPeriods);
  return series.rolling(options.dim ?? 'time', options.window, { center: true, minPeriods }).median();
}

function spatialDims(array: DataArray, dim: DimensionName): DimensionName[] {
  return array.dims.filter(d => d !== dim);
}

/**
 * Per-step pixel count and mean over the spatial extent (optionally
 * restricted by `mask`). Forces evaluation.
 */
export async function spatialReduce(array: DataArray, options: SpatialReduceOptions = {}): Promise<SpatialSummary> {
  const dim = options.dim ?? 'time';
  const restricted = options.mask ? array.where(options.mask, NaN) : array;
  const computed = await restricted.compute();
  const dims = spatialDims(computed, dim);
  const name = array.name ?? 'value';

  return {
    count: computed.count(dims).rename(`${name}_count`),
    mean: computed.mean(dims).rename(`${name}_mean`)
  };
}

/**
 * Per-step number of pixels with value strictly above `threshold`
 * (e.g. water pixels for an index). Missing values never count.
 * Multiply by the pixel area to get an area series.
 */
export async function thresholdCount(
  index: DataArray,
  threshold: number,
  options: SpatialReduceOptions = {}
): Promise<DataArray> {
  const dim = options.dim ?? 'time';
  let above = index.greaterThan(threshold);
  if (options.mask) above = above.and(options.mask);
  const computed = await above.compute();
  return computed.sum(spatialDims(computed, dim)).rename(`${index.name ?? 'value'}_above`);
}

/**
 * Per-pixel number of true values of a mask across `dim`. Forces evaluation.
 */
export async function temporalCount(mask: DataArray, dim: DimensionName = 'time'): Promise<DataArray> {
  const computed = await mask.compute();
  return computed.sum(dim);
}

/**
 * clearCount / validCount, NaN where no observation was valid
 */
export function clearFraction(clearCount: DataArray, validCount: DataArray): DataArray {
  return clearCount
    .divide(validCount)
    .where(validCount.greaterThan(0), NaN)
    .rename('clear_fraction');
}

/**
 * Position, coordinate and value of the minimum and maximum of a 1-D
 * series, skipping missing values. `undefined` when the series holds no value.
 */
export function locateExtremes(series: DataArray): { min: Extreme; max: Extreme } | undefined {
  if (series.ndim !== 1) {
    throw new RangeError(`locateExtremes expects a 1-D series, got ${series.ndim} dims`);
  }
  const values = series.values;
  const minIndex = nanArgExtreme(values, 'min');
  const maxIndex = nanArgExtreme(values, 'max');
  if (minIndex === -1 || maxIndex === -1) {
    return undefined;
  }

  const coords = series.coords[series.dims[0]];
  const at = (index: number): Extreme => ({
    index,
    coordinate: coords[index],
    value: toNumber(values[index])
  });
  return { min: at(minIndex), max: at(maxIndex) };
}
