/**
 * Utility functions for clearcube
 */

import { NDArray, DataValue, Coordinates, CoordinateValue } from './types.js';

/**
 * Get the shape of a multi-dimensional array
 */
export function getShape(data: NDArray): number[] {
  const shape: number[] = [];
  let current: NDArray = data;

  while (Array.isArray(current)) {
    shape.push(current.length);
    if (current.length === 0) break;
    current = current[0];
  }

  return shape;
}

/**
 * Flatten a multi-dimensional array in row-major order
 */
export function flatten(data: NDArray): DataValue[] {
  if (!Array.isArray(data)) {
    return [data];
  }

  const result: DataValue[] = [];

  function recurse(arr: NDArray): void {
    if (!Array.isArray(arr)) {
      result.push(arr);
      return;
    }

    for (const item of arr) {
      recurse(item);
    }
  }

  recurse(data);
  return result;
}

/**
 * Reshape a flat array into a multi-dimensional array
 */
export function reshape(data: readonly DataValue[], shape: readonly number[]): NDArray {
  if (shape.length === 0) {
    return data[0];
  }

  if (shape.length === 1) {
    return data.slice(0, shape[0]);
  }

  const [first, ...rest] = shape;
  const size = sizeOf(rest);
  const result: NDArray[] = [];

  for (let i = 0; i < first; i++) {
    result.push(reshape(data.slice(i * size, (i + 1) * size), rest));
  }

  return result;
}

/**
 * Number of elements for a shape
 */
export function sizeOf(shape: readonly number[]): number {
  return shape.reduce((a, b) => a * b, 1);
}

/**
 * Row-major strides for a shape
 */
export function computeStrides(shape: readonly number[]): number[] {
  const strides = new Array<number>(shape.length);
  let stride = 1;
  for (let i = shape.length - 1; i >= 0; i--) {
    strides[i] = stride;
    stride *= shape[i];
  }
  return strides;
}

/**
 * Convert a flat index into per-dimension indices
 */
export function unravelIndex(flatIndex: number, shape: readonly number[]): number[] {
  const indices = new Array<number>(shape.length).fill(0);
  let remainder = flatIndex;

  for (let dim = shape.length - 1; dim >= 0; dim--) {
    const size = shape[dim];
    indices[dim] = remainder % size;
    remainder = Math.floor(remainder / size);
  }

  return indices;
}

/**
 * Copy coordinates, cloning Date values
 */
export function copyCoords(coords: Coordinates): Coordinates {
  const copy: Coordinates = {};
  for (const [dim, values] of Object.entries(coords)) {
    copy[dim] = values.map(v => (v instanceof Date ? new Date(v.getTime()) : v));
  }
  return copy;
}

export function coordinateValuesEqual(a: CoordinateValue, b: CoordinateValue): boolean {
  if (a instanceof Date && b instanceof Date) {
    return a.getTime() === b.getTime();
  }
  return a === b;
}

/**
 * Check if two coordinate lists are equal
 */
export function arraysEqual(a: readonly CoordinateValue[], b: readonly CoordinateValue[]): boolean {
  if (a.length !== b.length) {
    return false;
  }

  for (let i = 0; i < a.length; i++) {
    if (!coordinateValuesEqual(a[i], b[i])) {
      return false;
    }
  }

  return true;
}

/**
 * Numeric view of a data value: booleans count as 1/0
 */
export function toNumber(value: DataValue): number {
  return typeof value === 'boolean' ? (value ? 1 : 0) : value;
}

/**
 * Whether a value is a missing numeric value
 */
export function isMissing(value: DataValue): boolean {
  return typeof value === 'number' && Number.isNaN(value);
}

/**
 * Format a coordinate for messages and records
 */
export function formatCoordinate(value: CoordinateValue): string {
  return value instanceof Date ? value.toISOString() : String(value);
}
