/**
 * Affine geotransform: [a, b, c, d, e, f].
 *
 * Maps pixel (col, row) to world (x, y):
 *   x = a * col + b * row + c
 *   y = d * col + e * row + f
 *
 * (col, row) = (0, 0) is the top-left corner of the top-left pixel, so the
 * centre of that pixel is (0.5, 0.5).
 */
export type Affine = [
  a: number,
  b: number,
  c: number,
  d: number,
  e: number,
  f: number
];

/**
 * Shape and placement of a raster grid
 */
export interface GridGeometry {
  width: number;
  height: number;
  transform: Affine;
  crs?: string;
}

/** The identity transform. */
export function identity(): Affine {
  return [1, 0, 0, 0, 1, 0];
}

/**
 * Apply a geotransform to a coordinate.
 */
export function apply([a, b, c, d, e, f]: Affine, x: number, y: number): [number, number] {
  return [a * x + b * y + c, d * x + e * y + f];
}

/**
 * Compose two affine transforms: A×B (apply B first, then A).
 */
export function compose(
  [a1, b1, c1, d1, e1, f1]: Affine,
  [a2, b2, c2, d2, e2, f2]: Affine
): Affine {
  return [
    a1 * a2 + b1 * d2,
    a1 * b2 + b1 * e2,
    a1 * c2 + b1 * f2 + c1,
    d1 * a2 + e1 * d2,
    d1 * b2 + e1 * e2,
    d1 * c2 + e1 * f2 + f1
  ];
}

/**
 * Compute the inverse of an Affine.
 */
export function invert([sa, sb, sc, sd, se, sf]: Affine): Affine {
  const det = sa * se - sb * sd;

  if (det === 0) {
    throw new Error('Cannot invert degenerate transform');
  }

  const idet = 1.0 / det;
  const ra = se * idet;
  const rb = -sb * idet;
  const rd = -sd * idet;
  const re = sa * idet;

  return [ra, rb, -sc * ra - sf * rb, rd, re, -sc * rd - sf * re];
}

/**
 * World coordinate of the centre of pixel (col, row)
 */
export function pixelCenter(grid: GridGeometry, col: number, row: number): [number, number] {
  return apply(grid.transform, col + 0.5, row + 0.5);
}

/**
 * Whether the transform has no rotation or shear terms
 */
export function isNorthUp(transform: Affine): boolean {
  return transform[1] === 0 && transform[3] === 0;
}

/**
 * Centre coordinates of every column (x) and row (y) of a north-up grid
 *
 * @throws RangeError for a rotated or sheared grid
 */
export function gridCoords(grid: GridGeometry): { x: number[]; y: number[] } {
  if (!isNorthUp(grid.transform)) {
    throw new RangeError('Pixel-centre coordinates are only defined for north-up grids');
  }
  const [a, , c, , e, f] = grid.transform;
  return {
    x: Array.from({ length: grid.width }, (_, col) => a * (col + 0.5) + c),
    y: Array.from({ length: grid.height }, (_, row) => e * (row + 0.5) + f)
  };
}

function uniformStep(values: readonly number[], axis: string): number {
  if (values.length < 2) {
    throw new RangeError(`Cannot derive a grid from fewer than 2 '${axis}' coordinates`);
  }
  const step = values[1] - values[0];
  if (step === 0 || !Number.isFinite(step)) {
    throw new RangeError(`'${axis}' coordinates must be distinct and finite`);
  }
  const tolerance = Math.abs(step) * 1e-6;
  for (let i = 2; i < values.length; i++) {
    if (Math.abs(values[i] - values[i - 1] - step) > tolerance) {
      throw new RangeError(`'${axis}' coordinates are not uniformly spaced`);
    }
  }
  return step;
}

/**
 * Build a north-up grid from pixel-centre coordinates
 */
export function gridFromCoords(x: readonly number[], y: readonly number[], crs?: string): GridGeometry {
  const dx = uniformStep(x, 'x');
  const dy = uniformStep(y, 'y');
  return {
    width: x.length,
    height: y.length,
    transform: [dx, 0, x[0] - dx / 2, 0, dy, y[0] - dy / 2],
    crs
  };
}
