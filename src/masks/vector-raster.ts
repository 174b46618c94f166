/**
 * Rasterization of vector boundaries onto a cube's grid
 */

import { booleanPointInPolygon } from '@turf/boolean-point-in-polygon';
import { bbox } from '@turf/bbox';
import type { Feature, MultiPolygon, Polygon } from 'geojson';
import { DataArray } from '../DataArray.js';
import { EmptyGeometryError, ShapeMismatchError } from '../errors.js';
import { apply, gridCoords, invert, isNorthUp, pixelCenter, type GridGeometry } from '../grid/affine.js';
import { CoordinateValue } from '../types.js';

export type PolygonGeometry = Polygon | MultiPolygon;
export type PolygonInput = PolygonGeometry | Feature<PolygonGeometry>;

export interface RasterizeOptions {
  /**
   * Coordinates to label the mask with, normally the cube's own `x` and `y`.
   * Defaults to the grid's pixel centres.
   */
  coords?: { x: readonly CoordinateValue[]; y: readonly CoordinateValue[] };
}

/**
 * Pixel window (inclusive) whose centres may fall inside a world-space box
 */
function pixelWindow(
  grid: GridGeometry,
  [minX, minY, maxX, maxY]: [number, number, number, number]
): { col0: number; col1: number; row0: number; row1: number } {
  const inverse = invert(grid.transform);
  const corners = [
    apply(inverse, minX, minY),
    apply(inverse, minX, maxY),
    apply(inverse, maxX, minY),
    apply(inverse, maxX, maxY)
  ];
  const cols = corners.map(([c]) => c);
  const rows = corners.map(([, r]) => r);

  // One pixel of slack on each side; the containment test decides exactly
  return {
    col0: Math.max(Math.floor(Math.min(...cols) - 0.5) - 1, 0),
    col1: Math.min(Math.ceil(Math.max(...cols) - 0.5) + 1, grid.width - 1),
    row0: Math.max(Math.floor(Math.min(...rows) - 0.5) - 1, 0),
    row1: Math.min(Math.ceil(Math.max(...rows) - 0.5) + 1, grid.height - 1)
  };
}

/**
 * Boolean mask over `['y', 'x']`: true where the pixel centre lies inside
 * any of the polygons. Centres exactly on an edge count as inside.
 *
 * Only north-up grids are supported. Pass the cube's own coordinates in
 * `options.coords` so the mask broadcasts against it exactly; centres
 * recomputed from the transform can drift in the last bits.
 *
 * @throws EmptyGeometryError when `polygons` is empty
 * @throws RangeError for a rotated or sheared grid
 * @throws ShapeMismatchError when `options.coords` does not fit the grid
 */
export function rasterizePolygons(
  polygons: readonly PolygonInput[],
  grid: GridGeometry,
  options: RasterizeOptions = {}
): DataArray {
  if (polygons.length === 0) {
    throw new EmptyGeometryError('Cannot rasterize an empty polygon selection');
  }
  if (!isNorthUp(grid.transform)) {
    throw new RangeError(`Cannot rasterize onto a rotated grid (transform [${grid.transform.join(', ')}])`);
  }
  const coords = options.coords ?? gridCoords(grid);
  if (coords.x.length !== grid.width || coords.y.length !== grid.height) {
    throw new ShapeMismatchError(
      `Mask coordinates are ${coords.y.length}x${coords.x.length} but the grid is ${grid.height}x${grid.width}`
    );
  }

  const { width, height } = grid;
  const values = new Array<boolean>(width * height).fill(false);

  for (const polygon of polygons) {
    const [minX, minY, maxX, maxY] = bbox(polygon);
    const { col0, col1, row0, row1 } = pixelWindow(grid, [minX, minY, maxX, maxY]);

    for (let row = row0; row <= row1; row++) {
      for (let col = col0; col <= col1; col++) {
        const index = row * width + col;
        if (values[index]) continue;
        if (booleanPointInPolygon(pixelCenter(grid, col, row), polygon)) {
          values[index] = true;
        }
      }
    }
  }

  const rows = Array.from({ length: height }, (_, row) => values.slice(row * width, (row + 1) * width));

  return new DataArray(rows, {
    dims: ['y', 'x'],
    coords: { y: [...coords.y], x: [...coords.x] },
    name: 'region'
  });
}

/**
 * Features whose `property` equals one of `values`
 *
 * @throws EmptyGeometryError when nothing matches
 */
export function selectPolygons<F extends Feature<PolygonGeometry>>(
  features: readonly F[],
  property: string,
  values: ReadonlyArray<string | number>
): F[] {
  const wanted = new Set<unknown>(values);
  const selected = features.filter(feature => {
    const properties = feature.properties;
    return properties !== null && wanted.has(properties[property]);
  });

  if (selected.length === 0) {
    throw new EmptyGeometryError(
      `No polygon has '${property}' in [${values.join(', ')}] (searched ${features.length} features)`
    );
  }
  return selected;
}
