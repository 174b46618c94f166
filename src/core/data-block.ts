import {
  DataValue,
  DimensionName,
  IndexRange,
  IndexRanges,
  LazyLoader
} from '../types.js';
import { computeStrides, sizeOf, unravelIndex } from '../utils.js';
import { ShapeMismatchError } from '../errors.js';

export type DataBlockKind = 'eager' | 'lazy';

interface BaseDataBlock {
  readonly kind: DataBlockKind;
  readonly dims: readonly DimensionName[];
  readonly shape: readonly number[];
  /**
   * Read a region as flat row-major values. Dimensions missing from
   * `ranges` are read in full.
   */
  fetch(ranges: IndexRanges): Promise<DataValue[]>;
}

export interface EagerDataBlock extends BaseDataBlock {
  kind: 'eager';
  materialize(): readonly DataValue[];
  getValue(indices: readonly number[]): DataValue;
}

export interface LazyDataBlock extends BaseDataBlock {
  kind: 'lazy';
}

export type DataBlock = EagerDataBlock | LazyDataBlock;

export function createEagerBlock(
  values: readonly DataValue[],
  dims: readonly DimensionName[],
  shape: readonly number[]
): EagerDataBlock {
  const payload = values;
  const normalizedShape = [...shape];
  const strides = computeStrides(normalizedShape);

  if (payload.length !== sizeOf(normalizedShape)) {
    throw new ShapeMismatchError(
      `Data length ${payload.length} does not match shape [${normalizedShape.join(', ')}]`
    );
  }

  return {
    kind: 'eager',
    dims: [...dims],
    shape: normalizedShape,
    materialize(): readonly DataValue[] {
      return payload;
    },
    getValue(indices: readonly number[]): DataValue {
      if (indices.length !== normalizedShape.length) {
        throw new Error(`Expected ${normalizedShape.length} indices, received ${indices.length}`);
      }
      let flat = 0;
      for (let i = 0; i < indices.length; i++) {
        const index = indices[i];
        if (index < 0 || index >= normalizedShape[i]) {
          throw new Error('Index out of bounds');
        }
        flat += index * strides[i];
      }
      return payload[flat];
    },
    fetch(ranges: IndexRanges): Promise<DataValue[]> {
      const region = resolveRegion(dims, normalizedShape, ranges);
      return Promise.resolve(readRegion(payload, normalizedShape, region));
    }
  };
}

export function createLazyBlock(
  dims: readonly DimensionName[],
  shape: readonly number[],
  loader: LazyLoader
): LazyDataBlock {
  const normalizedShape = [...shape];

  const fetch = async (ranges: IndexRanges): Promise<DataValue[]> => {
    const region = resolveRegion(dims, normalizedShape, ranges);
    const fullRanges: IndexRanges = {};
    dims.forEach((dim, i) => {
      fullRanges[dim] = region[i];
    });

    const values = await loader(fullRanges);
    const expected = sizeOf(region.map(r => r.stop - r.start));
    if (values.length !== expected) {
      throw new ShapeMismatchError(
        `Lazy loader returned ${values.length} values for a region of ${expected}`
      );
    }
    return values;
  };

  return {
    kind: 'lazy',
    dims: [...dims],
    shape: normalizedShape,
    fetch
  };
}

export function isLazyBlock(block: DataBlock): block is LazyDataBlock {
  return block.kind === 'lazy';
}

/**
 * Resolve per-dimension ranges into a positional region, checking bounds
 */
export function resolveRegion(
  dims: readonly DimensionName[],
  shape: readonly number[],
  ranges: IndexRanges
): IndexRange[] {
  return dims.map((dim, i) => {
    const range = ranges[dim];
    if (!range) {
      return { start: 0, stop: shape[i] };
    }
    if (range.start < 0 || range.stop > shape[i] || range.start > range.stop) {
      throw new Error(
        `Range [${range.start}, ${range.stop}) out of bounds for dimension '${dim}' of size ${shape[i]}`
      );
    }
    return { start: range.start, stop: range.stop };
  });
}

/**
 * Copy a rectangular region out of flat row-major values
 */
export function readRegion(
  values: readonly DataValue[],
  shape: readonly number[],
  region: readonly IndexRange[]
): DataValue[] {
  const regionShape = region.map(r => r.stop - r.start);
  const total = sizeOf(regionShape);
  const strides = computeStrides(shape);
  const result = new Array<DataValue>(total);

  for (let flat = 0; flat < total; flat++) {
    const local = unravelIndex(flat, regionShape);
    let source = 0;
    for (let i = 0; i < local.length; i++) {
      source += (local[i] + region[i].start) * strides[i];
    }
    result[flat] = values[source];
  }

  return result;
}

/**
 * Write a region's flat values into a larger flat row-major buffer
 */
export function writeRegion(
  target: DataValue[],
  shape: readonly number[],
  region: readonly IndexRange[],
  values: readonly DataValue[]
): void {
  const regionShape = region.map(r => r.stop - r.start);
  const strides = computeStrides(shape);

  for (let flat = 0; flat < values.length; flat++) {
    const local = unravelIndex(flat, regionShape);
    let destination = 0;
    for (let i = 0; i < local.length; i++) {
      destination += (local[i] + region[i].start) * strides[i];
    }
    target[destination] = values[flat];
  }
}
