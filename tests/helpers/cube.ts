/**
 * Small in-memory cubes for tests
 */

import { DataArray } from '../../src/DataArray.js';
import { RasterCube } from '../../src/cube/raster-cube.js';
import { CoordinateValue } from '../../src/types.js';

export const X = [0.5, 1.5];
export const Y = [1.5, 0.5];

export function days(count: number): Date[] {
  return Array.from({ length: count }, (_, i) => new Date(Date.UTC(2024, 0, 1 + i)));
}

export function cubeArray(
  values: number[][][],
  name: string,
  time: CoordinateValue[] = days(values.length),
  attrs: Record<string, unknown> = {}
): DataArray {
  const height = values[0]?.length ?? 0;
  const width = values[0]?.[0]?.length ?? 0;
  return new DataArray(values, {
    dims: ['time', 'y', 'x'],
    coords: {
      time,
      y: Y.slice(0, height),
      x: X.slice(0, width)
    },
    attrs,
    name
  });
}

export function spatialMask(values: boolean[][]): DataArray {
  return new DataArray(values, { dims: ['y', 'x'], coords: { y: Y, x: X } });
}

/**
 * Three daily 2×2 acquisitions with a red and a green band (NaN no-data)
 * and a scene-classification layer.
 */
export function sampleCube(): RasterCube {
  return new RasterCube({
    bands: {
      red: cubeArray([
        [[100, 200], [300, NaN]],
        [[110, 210], [310, 410]],
        [[NaN, NaN], [NaN, 420]]
      ], 'red'),
      green: cubeArray([
        [[300, 200], [100, NaN]],
        [[330, 210], [290, 400]],
        [[NaN, NaN], [NaN, 380]]
      ], 'green')
    },
    quality: cubeArray([
      [[4, 6], [8, 0]],
      [[4, 6], [6, 4]],
      [[9, 9], [9, 6]]
    ], 'scl')
  });
}
