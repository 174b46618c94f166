/**
 * Type definitions for clearcube
 */

/**
 * Dimension names are strings
 */
export type DimensionName = string;

/**
 * Coordinate values can be numbers, strings, or dates
 */
export type CoordinateValue = number | string | Date;

/**
 * Data values are numbers (NaN marks a missing value) or booleans (masks)
 */
export type DataValue = number | boolean;

/**
 * Nested multi-dimensional data, as accepted by the DataArray constructor
 */
export type NDArray = DataValue | NDArray[];

/**
 * Coordinates mapping dimension names to coordinate values
 */
export interface Coordinates {
  [dimension: string]: CoordinateValue[];
}

/**
 * Attributes for metadata
 */
export interface Attributes {
  [key: string]: unknown;
}

/**
 * Half-open index range [start, stop) along one dimension
 */
export interface IndexRange {
  start: number;
  stop: number;
}

/**
 * Region of an array, keyed by dimension. Dimensions left out are read in full.
 */
export type IndexRanges = { [dimension: string]: IndexRange };

/**
 * Loader for lazy DataArrays.
 *
 * Returns the values of the requested region as a flat, row-major list whose
 * layout follows the array's dims.
 */
export type LazyLoader = (ranges: IndexRanges) => Promise<DataValue[]> | DataValue[];

/**
 * Chunk sizes per dimension. Dimensions left out form a single chunk.
 */
export type ChunkSpec = { [dimension: string]: number };

/**
 * Options for creating a DataArray
 */
export interface DataArrayOptions {
  dims?: DimensionName[];
  coords?: Coordinates;
  attrs?: Attributes;
  name?: string;
  lazy?: boolean;
  virtualShape?: number[];
  lazyLoader?: LazyLoader;
  chunks?: ChunkSpec;
}

/**
 * Options for creating a Dataset
 */
export interface DatasetOptions {
  coords?: Coordinates;
  attrs?: Attributes;
}

/**
 * Integer-position selection: a single index drops the dimension,
 * a list of indices keeps it.
 */
export type IndexSelection = { [dimension: string]: number | number[] };

export interface RollingOptions {
  center?: boolean;
  minPeriods?: number;
}

export type RollingReducer = 'mean' | 'sum' | 'median';
