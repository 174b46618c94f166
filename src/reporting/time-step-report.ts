import { DataArray } from '../DataArray.js';
import { CoordinateValue } from '../types.js';
import { arraysEqual, formatCoordinate, toNumber } from '../utils.js';
import { ShapeMismatchError, describeCoordinateMismatch } from '../errors.js';

export interface TimeStepReportRow {
  time: CoordinateValue;
  validCount: number;
  /** Percentage of all pixels of the step */
  validPercent: number;
  clearCount: number;
  clearPercent: number;
}

async function countPerStep(mask: DataArray): Promise<{ counts: number[]; pixels: number }> {
  const computed = await mask.compute();
  const spatial = computed.dims.filter(dim => dim !== 'time');
  const pixels = spatial.reduce((size, dim) => size * computed.shape[computed.dims.indexOf(dim)], 1);
  const counts = spatial.length === 0
    ? computed.values.map(toNumber)
    : computed.sum(spatial).values.map(toNumber);
  return { counts, pixels };
}

/**
 * Per-step valid and clear pixel counts, with percentages of the total
 * pixel count of a step
 */
export async function buildTimeStepReport(valid: DataArray, clear: DataArray): Promise<TimeStepReportRow[]> {
  const times = valid.coords.time;
  if (!valid.dims.includes('time') || !clear.dims.includes('time')) {
    throw new ShapeMismatchError(`Report masks need a 'time' dimension`);
  }
  if (!arraysEqual(times, clear.coords.time)) {
    throw new ShapeMismatchError(describeCoordinateMismatch('time', times, clear.coords.time));
  }

  const [validCounts, clearCounts] = await Promise.all([countPerStep(valid), countPerStep(clear)]);
  const percent = (count: number, pixels: number): number => (pixels === 0 ? NaN : (count / pixels) * 100);

  return times.map((time, t) => ({
    time,
    validCount: validCounts.counts[t],
    validPercent: percent(validCounts.counts[t], validCounts.pixels),
    clearCount: clearCounts.counts[t],
    clearPercent: percent(clearCounts.counts[t], clearCounts.pixels)
  }));
}

const CSV_HEADER = 'time,valid_count,valid_percent,clear_count,clear_percent';

/**
 * Render report rows as CSV (percentages with two decimals)
 */
export function formatReportCsv(rows: readonly TimeStepReportRow[]): string {
  const lines = rows.map(row =>
    [
      formatCoordinate(row.time),
      row.validCount,
      row.validPercent.toFixed(2),
      row.clearCount,
      row.clearPercent.toFixed(2)
    ].join(',')
  );
  return [CSV_HEADER, ...lines].join('\n') + '\n';
}
