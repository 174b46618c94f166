import { describe, test, expect } from 'vitest';
import {
  apply,
  compose,
  gridCoords,
  gridFromCoords,
  identity,
  invert,
  isNorthUp,
  pixelCenter,
  type Affine,
  type GridGeometry
} from '../../src/grid/affine.js';

describe('affine transforms', () => {
  const transform: Affine = [10, 0, 500, 0, -10, 2000];

  test('should map pixel corners to world coordinates', () => {
    expect(apply(transform, 0, 0)).toEqual([500, 2000]);
    expect(apply(transform, 2, 3)).toEqual([520, 1970]);
  });

  test('should invert a transform', () => {
    const [col, row] = apply(invert(transform), 520, 1970);
    expect(col).toBeCloseTo(2);
    expect(row).toBeCloseTo(3);
  });

  test('should compose transforms right to left', () => {
    expect(compose([2, 0, 1, 0, 2, 1], [1, 0, 3, 0, 1, 4])).toEqual([2, 0, 7, 0, 2, 9]);
    expect(compose(identity(), transform)).toEqual(transform);
  });

  test('should refuse degenerate transforms', () => {
    expect(() => invert([0, 0, 1, 0, 0, 1])).toThrow('Cannot invert degenerate transform');
  });
});

describe('grid geometry', () => {
  const grid: GridGeometry = { width: 3, height: 2, transform: [10, 0, 500, 0, -10, 2000] };

  test('should locate pixel centres', () => {
    expect(pixelCenter(grid, 0, 0)).toEqual([505, 1995]);
    expect(pixelCenter(grid, 2, 1)).toEqual([525, 1985]);
  });

  test('should list centre coordinates per axis', () => {
    expect(gridCoords(grid)).toEqual({ x: [505, 515, 525], y: [1995, 1985] });
  });

  test('should only list centre coordinates for north-up grids', () => {
    const rotated: GridGeometry = { width: 2, height: 2, transform: [10, 2, 500, 0, -10, 2000] };

    expect(isNorthUp(grid.transform)).toBe(true);
    expect(isNorthUp(rotated.transform)).toBe(false);
    expect(() => gridCoords(rotated)).toThrow(RangeError);
  });

  test('should rebuild a grid from centre coordinates', () => {
    expect(gridFromCoords([505, 515, 525], [1995, 1985], 'EPSG:32633')).toEqual({
      ...grid,
      crs: 'EPSG:32633'
    });
  });

  test('should require uniformly spaced coordinates', () => {
    expect(() => gridFromCoords([0, 1, 3], [0, 1])).toThrow("'x' coordinates are not uniformly spaced");
    expect(() => gridFromCoords([0, 1], [5])).toThrow("Cannot derive a grid from fewer than 2 'y' coordinates");
  });
});
