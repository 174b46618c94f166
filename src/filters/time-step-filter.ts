/**
 * Good-data threshold over time steps
 *
 * good_fraction(t) = count_true(mask[t]) / (height × width), and a step is
 * retained iff good_fraction(t) ≥ threshold. With `relativeTo`, the
 * denominator becomes the number of valid pixels of that step instead.
 */

import { DataArray } from '../DataArray.js';
import { Dataset } from '../Dataset.js';
import { RasterCube } from '../cube/raster-cube.js';
import { CoordinateValue } from '../types.js';
import { arraysEqual, toNumber } from '../utils.js';
import { AllTimeStepsDroppedError, ShapeMismatchError, describeCoordinateMismatch } from '../errors.js';
import { logger as defaultLogger, type Logger } from '../logger.js';

export interface TimeStepFilterOptions {
  /** Validity mask whose per-step true count replaces the total pixel count */
  relativeTo?: DataArray;
  logger?: Logger;
}

export interface TimeStepFilterResult {
  /** Retained positions along `time`, ascending */
  indices: number[];
  keep: boolean[];
  /** Time coordinates of the retained steps */
  times: CoordinateValue[];
  goodFraction: number[];
  retained: number;
  total: number;
  threshold: number;
  /** Time coordinate of the mask the result was computed from */
  sourceTimes: CoordinateValue[];
}

function timeCoordinate(array: DataArray, role: string): CoordinateValue[] {
  if (!array.dims.includes('time')) {
    throw new ShapeMismatchError(`${role} has no 'time' dimension (dims: [${array.dims.join(', ')}])`);
  }
  return array.coords.time;
}

async function perStepCounts(mask: DataArray): Promise<number[]> {
  const computed = await mask.compute();
  const spatial = computed.dims.filter(dim => dim !== 'time');
  if (spatial.length === 0) {
    return computed.values.map(toNumber);
  }
  return [...computed.sum(spatial).values].map(toNumber);
}

/**
 * Evaluate the good-data fraction of every time step of `mask` and decide
 * which steps to keep. Forces evaluation of the mask.
 *
 * @throws AllTimeStepsDroppedError when a non-empty mask loses every step
 */
export async function filterTimeSteps(
  mask: DataArray,
  threshold: number,
  options: TimeStepFilterOptions = {}
): Promise<TimeStepFilterResult> {
  if (!(threshold >= 0 && threshold <= 1)) {
    throw new RangeError(`Good-data threshold must be within [0, 1], got ${threshold}`);
  }

  const log = options.logger ?? defaultLogger;
  const sourceTimes = [...timeCoordinate(mask, 'Mask')];
  const total = sourceTimes.length;

  if (options.relativeTo) {
    const relativeTimes = timeCoordinate(options.relativeTo, 'relativeTo mask');
    if (!arraysEqual(sourceTimes, relativeTimes)) {
      throw new ShapeMismatchError(describeCoordinateMismatch('time', sourceTimes, relativeTimes));
    }
  }

  const pixels = mask.dims
    .filter(dim => dim !== 'time')
    .reduce((size, dim) => size * mask.shape[mask.dims.indexOf(dim)], 1);

  const [good, denominators] = await Promise.all([
    perStepCounts(mask),
    options.relativeTo ? perStepCounts(options.relativeTo) : Promise.resolve(sourceTimes.map(() => pixels))
  ]);

  const goodFraction = good.map((count, t) => (denominators[t] === 0 ? NaN : count / denominators[t]));
  const keep = goodFraction.map(fraction => !Number.isNaN(fraction) && fraction >= threshold);
  const indices = keep.flatMap((kept, t) => (kept ? [t] : []));

  log.info(`Time-step filter retained ${indices.length}/${total} acquisitions (threshold ${threshold})`);

  if (total > 0 && indices.length === 0) {
    const best = goodFraction.reduce((max, f) => (Number.isNaN(f) ? max : Number.isNaN(max) ? f : Math.max(max, f)), NaN);
    throw new AllTimeStepsDroppedError(total, threshold, best);
  }

  return {
    indices,
    keep,
    times: indices.map(t => sourceTimes[t]),
    goodFraction,
    retained: indices.length,
    total,
    threshold,
    sourceTimes
  };
}

function checkSourceTimes(times: readonly CoordinateValue[], result: TimeStepFilterResult): void {
  if (!arraysEqual(times, result.sourceTimes)) {
    throw new ShapeMismatchError(
      `Time-step filter result does not belong to this target: ${describeCoordinateMismatch('time', result.sourceTimes, times)}`
    );
  }
}

/**
 * Restrict a target to the steps a filter result retained. The target's
 * time coordinate must be the one the result was computed from.
 */
export function applyTimeStepFilter(target: DataArray, result: TimeStepFilterResult): DataArray;
export function applyTimeStepFilter(target: Dataset, result: TimeStepFilterResult): Dataset;
export function applyTimeStepFilter(target: RasterCube, result: TimeStepFilterResult): RasterCube;
export function applyTimeStepFilter(
  target: DataArray | Dataset | RasterCube,
  result: TimeStepFilterResult
): DataArray | Dataset | RasterCube {
  if (target instanceof RasterCube) {
    checkSourceTimes(target.time, result);
    return target.iselTime(result.indices);
  }
  if (target instanceof Dataset) {
    const times = target.coords.time;
    if (!times) {
      throw new ShapeMismatchError(`Dataset has no 'time' dimension`);
    }
    checkSourceTimes(times, result);
    return target.isel({ time: result.indices });
  }
  checkSourceTimes(timeCoordinate(target, 'Target'), result);
  return target.isel({ time: result.indices });
}
