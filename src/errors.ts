/**
 * Error taxonomy for clearcube.
 *
 * Numeric edge cases (zero denominators, all-missing reductions) are not
 * errors: they surface as NaN values.
 */

import { formatCoordinate } from './utils.js';

export class ClearcubeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * An acceptable-category label is not part of the quality scheme
 */
export class UnknownCategoryError extends ClearcubeError {
  constructor(
    readonly label: string,
    readonly known: readonly string[],
    readonly scheme?: string
  ) {
    super(
      `Unknown quality category '${label}'${scheme ? ` for scheme '${scheme}'` : ''}; ` +
      `expected one of: ${known.join(', ')}`
    );
  }
}

/**
 * A polygon selection resolved to zero polygons
 */
export class EmptyGeometryError extends ClearcubeError {}

/**
 * Arrays expected to share dimensions or coordinates do not
 */
export class ShapeMismatchError extends ClearcubeError {}

/**
 * The good-data threshold removed every time step
 */
export class AllTimeStepsDroppedError extends ClearcubeError {
  constructor(
    readonly total: number,
    readonly threshold: number,
    readonly bestFraction: number
  ) {
    super(
      `Good-data threshold ${threshold} dropped all ${total} time steps ` +
      `(best good-data fraction was ${Number.isNaN(bestFraction) ? 'NaN' : bestFraction.toFixed(3)})`
    );
  }
}

/**
 * Configuration failed validation
 */
export class ConfigError extends ClearcubeError {
  constructor(readonly issues: readonly string[]) {
    super(`Invalid pipeline configuration:\n  - ${issues.join('\n  - ')}`);
  }
}

export function describeCoordinateMismatch(
  dim: string,
  expected: readonly unknown[],
  actual: readonly unknown[]
): string {
  if (expected.length !== actual.length) {
    return `Coordinate mismatch for dimension '${dim}': length ${expected.length} vs ${actual.length}`;
  }
  const index = expected.findIndex((value, i) => {
    const other = actual[i];
    if (value instanceof Date && other instanceof Date) return value.getTime() !== other.getTime();
    return value !== other;
  });
  const show = (value: unknown): string =>
    value instanceof Date || typeof value === 'number' || typeof value === 'string'
      ? formatCoordinate(value)
      : String(value);
  return `Coordinate mismatch for dimension '${dim}' at position ${index}: ` +
    `${show(expected[index])} vs ${show(actual[index])}`;
}
