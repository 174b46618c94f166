/**
 * Chunk planning and chunked evaluation for lazy blocks.
 *
 * Each chunk is an independent region; `computeChunked` fetches them all
 * concurrently and stitches the results into one flat buffer.
 */

import { ChunkSpec, DataValue, DimensionName, IndexRange, IndexRanges } from '../types.js';
import { sizeOf } from '../utils.js';
import { DataBlock, resolveRegion, writeRegion } from './data-block.js';

/**
 * Validate a chunk spec against an array's dims, dropping dimensions the
 * array does not have
 */
export function normalizeChunks(
  dims: readonly DimensionName[],
  chunks: ChunkSpec
): ChunkSpec {
  const normalized: ChunkSpec = {};
  for (const [dim, size] of Object.entries(chunks)) {
    if (!dims.includes(dim)) continue;
    if (!Number.isInteger(size) || size <= 0) {
      throw new RangeError(`Chunk size for '${dim}' must be a positive integer, received ${size}`);
    }
    normalized[dim] = size;
  }
  return normalized;
}

/**
 * Split an array's index space into chunk regions (row-major chunk order)
 */
export function planChunks(
  dims: readonly DimensionName[],
  shape: readonly number[],
  chunks: ChunkSpec
): IndexRanges[] {
  if (shape.some(size => size === 0)) {
    return [];
  }

  const perDim: IndexRange[][] = dims.map((dim, i) => {
    const size = shape[i];
    const step = chunks[dim] ?? size;
    const ranges: IndexRange[] = [];
    for (let start = 0; start < size; start += step) {
      ranges.push({ start, stop: Math.min(start + step, size) });
    }
    return ranges;
  });

  let plan: IndexRanges[] = [{}];
  dims.forEach((dim, i) => {
    const next: IndexRanges[] = [];
    for (const partial of plan) {
      for (const range of perDim[i]) {
        next.push({ ...partial, [dim]: range });
      }
    }
    plan = next;
  });

  return plan;
}

/**
 * Evaluate a block chunk by chunk and assemble the flat result
 */
export async function computeChunked(block: DataBlock, chunks: ChunkSpec): Promise<DataValue[]> {
  const plan = planChunks(block.dims, block.shape, chunks);
  const result = new Array<DataValue>(sizeOf(block.shape));

  const pieces = await Promise.all(plan.map(ranges => block.fetch(ranges)));

  plan.forEach((ranges, i) => {
    const region = resolveRegion(block.dims, block.shape, ranges);
    writeRegion(result, block.shape, region, pieces[i]);
  });

  return result;
}
