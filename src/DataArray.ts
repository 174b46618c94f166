/**
 * DataArray - A labeled, multi-dimensional array
 */

import {
  NDArray,
  DataValue,
  DimensionName,
  Coordinates,
  Attributes,
  DataArrayOptions,
  CoordinateValue,
  ChunkSpec,
  IndexRanges,
  IndexSelection,
  RollingOptions,
  RollingReducer
} from './types.js';
import {
  getShape,
  flatten,
  reshape,
  copyCoords,
  sizeOf,
  toNumber,
  isMissing,
  unravelIndex
} from './utils.js';
import {
  createEagerBlock,
  createLazyBlock,
  isLazyBlock,
  type DataBlock
} from './core/data-block.js';
import { computeChunked, normalizeChunks } from './core/chunks.js';
import {
  computeWhere,
  computeBinaryOp,
  computeUnaryOp,
  isTruthy,
  type ElementwiseResult,
  type Operand,
  type ArrayOperand,
  type WhereOptions,
  type BinaryOpOptions
} from './ops/where.js';
import {
  reduceAxes,
  selectAlongAxis,
  sumAll,
  countAll,
  meanAll,
  type Reducer
} from './utils/data-operations.js';
import { applyRolling } from './utils/rolling-operations.js';

function isDataBlock(value: NDArray | DataBlock | null): value is DataBlock {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class DataArray {
  private _block: DataBlock;
  private _dims: DimensionName[];
  private _coords: Coordinates;
  private _attrs: Attributes;
  private _name?: string;
  private _shape: number[];
  private _chunks?: ChunkSpec;

  // Performance optimization caches
  private _dimIndexMap: Map<string, number> = new Map();

  /**
   * Create from nested data, from a lazy loader (`lazy: true` with
   * `virtualShape` and `lazyLoader`), or from an existing data block.
   */
  constructor(data: NDArray | DataBlock | null, options: DataArrayOptions = {}) {
    this._attrs = options.attrs ? { ...options.attrs } : {};
    this._name = options.name;

    if (isDataBlock(data)) {
      this._block = data;
      this._shape = [...data.shape];
      this._dims = options.dims ? [...options.dims] : [...data.dims];
    } else if (options.lazy) {
      if (!options.virtualShape) throw new Error('lazy DataArray requires virtualShape');
      if (!options.lazyLoader) throw new Error('lazy DataArray requires lazyLoader');
      this._shape = [...options.virtualShape];
      this._dims = options.dims ? [...options.dims] : this._shape.map((_, i) => `dim_${i}`);
      if (this._dims.length !== this._shape.length) {
        throw new Error(
          `Number of dimensions (${this._dims.length}) does not match data shape (${this._shape.length})`
        );
      }
      this._block = createLazyBlock(this._dims, this._shape, options.lazyLoader);
    } else {
      if (data === null) throw new Error('DataArray requires data unless lazy is set');
      this._shape = getShape(data);
      if (options.dims) {
        if (options.dims.length !== this._shape.length) {
          throw new Error(
            `Number of dimensions (${options.dims.length}) does not match data shape (${this._shape.length})`
          );
        }
        this._dims = [...options.dims];
      } else {
        // Auto-generate dimension names
        this._dims = this._shape.map((_, i) => `dim_${i}`);
      }
      this._block = createEagerBlock(flatten(data), this._dims, this._shape);
    }

    if (new Set(this._dims).size !== this._dims.length) {
      throw new Error(`Duplicate dimension names: ${this._dims.join(', ')}`);
    }

    // Build dimension index map for O(1) lookups (must be done before coordinate processing)
    this._dims.forEach((dim, idx) => this._dimIndexMap.set(dim, idx));

    // Handle coordinates
    this._coords = {};
    if (options.coords) {
      for (const [dim, coords] of Object.entries(options.coords)) {
        const dimIndex = this._getDimIndex(dim);
        if (dimIndex === -1) {
          throw new Error(`Coordinate dimension '${dim}' not found in dims`);
        }
        if (coords.length !== this._shape[dimIndex]) {
          throw new Error(
            `Coordinate '${dim}' length (${coords.length}) does not match dimension size (${this._shape[dimIndex]})`
          );
        }
        // Shallow copy to prevent array mutations
        this._coords[dim] = [...coords];
      }
    }

    // Generate default coordinates for dimensions without coordinates
    for (let i = 0; i < this._dims.length; i++) {
      const dim = this._dims[i];
      if (!this._coords[dim]) {
        this._coords[dim] = Array.from({ length: this._shape[i] }, (_, j) => j);
      }
    }

    if (options.chunks) {
      this._chunks = normalizeChunks(this._dims, options.chunks);
    }
  }

  /**
   * Get the data as a nested JavaScript array (eager arrays only)
   */
  get data(): NDArray {
    return reshape(this._eagerValues('data'), this._shape);
  }

  /**
   * Get the flat row-major values (eager arrays only)
   * NOTE: Returns direct reference for performance. Do not mutate the returned array.
   */
  get values(): readonly DataValue[] {
    return this._eagerValues('values');
  }

  /**
   * Get the dimensions
   */
  get dims(): DimensionName[] {
    return [...this._dims];
  }

  /**
   * Get the shape
   */
  get shape(): number[] {
    return [...this._shape];
  }

  /**
   * Get the coordinates
   * NOTE: Returns direct reference for performance. Do not mutate the returned object.
   */
  get coords(): Coordinates {
    return this._coords;
  }

  /**
   * Get the attributes
   * NOTE: Returns direct reference for performance. Do not mutate the returned object.
   */
  get attrs(): Attributes {
    return this._attrs;
  }

  get name(): string | undefined {
    return this._name;
  }

  get ndim(): number {
    return this._dims.length;
  }

  /**
   * Get the total size (number of elements)
   */
  get size(): number {
    return sizeOf(this._shape);
  }

  get isLazy(): boolean {
    return isLazyBlock(this._block);
  }

  get chunks(): ChunkSpec | undefined {
    return this._chunks ? { ...this._chunks } : undefined;
  }

  /**
   * Materialize the DataArray if it is lazy, evaluating its chunks
   * concurrently. Returns the original instance for eager arrays.
   */
  async compute(): Promise<DataArray> {
    if (!isLazyBlock(this._block)) {
      return this;
    }

    const values = await computeChunked(this._block, this._chunks ?? {});

    return new DataArray(createEagerBlock(values, this._dims, this._shape), {
      coords: this._coords,
      attrs: this._attrs,
      name: this._name
    });
  }

  /**
   * Split the array into chunks for deferred, chunk-wise evaluation.
   * An eager array becomes lazy; nothing is evaluated until compute().
   */
  chunk(chunks: ChunkSpec): DataArray {
    const source = this._block;
    const block = isLazyBlock(source)
      ? source
      : createLazyBlock(this._dims, this._shape, (ranges: IndexRanges) => source.fetch(ranges));

    return new DataArray(block, {
      coords: this._coords,
      attrs: this._attrs,
      name: this._name,
      chunks: chunks
    });
  }

  /**
   * Get a single element by integer position (eager arrays only)
   */
  getValue(indices: number[]): DataValue {
    if (isLazyBlock(this._block)) {
      throw new Error('Random access on a lazy DataArray requires compute() first');
    }
    return this._block.getValue(indices);
  }

  /**
   * Return the only element of a single-element array
   */
  item(): DataValue {
    const values = this._eagerValues('item');
    if (values.length !== 1) {
      throw new Error(`item() requires a single-element array, found ${values.length} elements`);
    }
    return values[0];
  }

  /**
   * Select data by integer position
   * Negative indices count from the end: -1 = last, -2 = second-to-last, etc.
   * A single index drops the dimension; a list of indices keeps it.
   * Lazy arrays stay lazy.
   */
  isel(selection: IndexSelection): DataArray {
    const picks: { [dim: string]: number[] } = {};
    const dropped = new Set<DimensionName>();

    for (const [dim, sel] of Object.entries(selection)) {
      const dimIndex = this._getDimIndex(dim);
      if (dimIndex === -1) {
        throw new Error(`Dimension '${dim}' not found`);
      }
      const size = this._shape[dimIndex];
      const normalize = (i: number): number => {
        const index = i < 0 ? size + i : i;
        if (!Number.isInteger(index) || index < 0 || index >= size) {
          throw new Error(`Index ${i} out of bounds for dimension '${dim}' of size ${size}`);
        }
        return index;
      };

      if (typeof sel === 'number') {
        picks[dim] = [normalize(sel)];
        dropped.add(dim);
      } else {
        picks[dim] = sel.map(normalize);
      }
    }

    const newDims = this._dims.filter(dim => !dropped.has(dim));
    const newShape = this._dims
      .map((dim, i) => picks[dim]?.length ?? this._shape[i])
      .filter((_, i) => !dropped.has(this._dims[i]));
    const newCoords: Coordinates = {};
    for (const dim of newDims) {
      const coords = this._coords[dim];
      const pick = picks[dim];
      newCoords[dim] = pick ? pick.map(i => coords[i]) : coords;
    }

    const source = this._block;
    let block: DataBlock;

    if (!isLazyBlock(source)) {
      let values: readonly DataValue[] = source.materialize();
      let shape = [...this._shape];
      this._dims.forEach((dim, axis) => {
        const pick = picks[dim];
        if (!pick) return;
        values = selectAlongAxis(values, shape, axis, pick);
        shape = [...shape];
        shape[axis] = pick.length;
      });
      block = createEagerBlock([...values], newDims, newShape);
    } else {
      const sourceDims = this._dims;
      const sourceShape = this._shape;
      block = createLazyBlock(newDims, newShape, async (ranges: IndexRanges) => {
        const sourceRanges: IndexRanges = {};
        const localPicks: { [dim: string]: number[] } = {};
        let empty = false;

        for (let axis = 0; axis < sourceDims.length; axis++) {
          const dim = sourceDims[axis];
          const pick = picks[dim];
          if (dropped.has(dim) && pick) {
            sourceRanges[dim] = { start: pick[0], stop: pick[0] + 1 };
            continue;
          }
          const range = ranges[dim] ?? { start: 0, stop: sourceShape[axis] };
          if (!pick) {
            sourceRanges[dim] = range;
            continue;
          }
          const wanted = pick.slice(range.start, range.stop);
          if (wanted.length === 0) {
            empty = true;
            continue;
          }
          const lo = Math.min(...wanted);
          const hi = Math.max(...wanted);
          sourceRanges[dim] = { start: lo, stop: hi + 1 };
          localPicks[dim] = wanted.map(i => i - lo);
        }

        if (empty) return [];

        let values: readonly DataValue[] = await source.fetch(sourceRanges);
        let shape = sourceDims.map(dim => sourceRanges[dim].stop - sourceRanges[dim].start);
        sourceDims.forEach((dim, axis) => {
          const local = localPicks[dim];
          if (!local) return;
          values = selectAlongAxis(values, shape, axis, local);
          shape = [...shape];
          shape[axis] = local.length;
        });
        return [...values];
      });
    }

    return new DataArray(block, {
      coords: newCoords,
      attrs: this._attrs,
      name: this._name,
      chunks: this._chunks
    });
  }

  /**
   * Sum along one or more dimensions, skipping missing values.
   * Booleans count as 1/0. Without a dimension, returns the total.
   */
  sum(): number;
  sum(dim: DimensionName | DimensionName[]): DataArray;
  sum(dim?: DimensionName | DimensionName[]): DataArray | number {
    return dim === undefined ? sumAll(this._eagerValues('sum')) : this._reduce(dim, 'sum');
  }

  /**
   * Count non-missing values along one or more dimensions
   */
  count(): number;
  count(dim: DimensionName | DimensionName[]): DataArray;
  count(dim?: DimensionName | DimensionName[]): DataArray | number {
    return dim === undefined ? countAll(this._eagerValues('count')) : this._reduce(dim, 'count');
  }

  /**
   * Mean along one or more dimensions, skipping missing values.
   * A group with no values gives NaN.
   */
  mean(): number;
  mean(dim: DimensionName | DimensionName[]): DataArray;
  mean(dim?: DimensionName | DimensionName[]): DataArray | number {
    return dim === undefined ? meanAll(this._eagerValues('mean')) : this._reduce(dim, 'mean');
  }

  /**
   * Apply a condition and choose values between this array and `other`
   * (NaN by default). Broadcasts across shared dimensions.
   */
  where(cond: DataArray | DataValue, other: DataArray | DataValue = NaN, options?: WhereOptions): DataArray {
    const result = computeWhere(
      DataArray._normalizeOperand(cond),
      this._toOperand(),
      DataArray._normalizeOperand(other),
      options
    );
    return DataArray._fromResult(result);
  }

  private _cloneWith(options?: { coords?: Coordinates; attrs?: Attributes; name?: string }): DataArray {
    return new DataArray(this._block, {
      dims: this._dims,
      coords: options?.coords ? copyCoords(options.coords) : this._coords,
      attrs: options?.attrs ?? this._attrs,
      name: options?.name ?? this._name,
      chunks: this._chunks
    });
  }

  rename(name: string): DataArray {
    return this._cloneWith({ name });
  }

  assignCoords(mapping: { [dimension: string]: CoordinateValue[] }): DataArray {
    const updatedCoords = copyCoords(this._coords);

    for (const [dim, value] of Object.entries(mapping)) {
      const dimIndex = this._getDimIndex(dim);
      if (dimIndex === -1) {
        throw new Error(`Cannot assign coordinates for non-existent dimension '${dim}'`);
      }
      if (value.length !== this._shape[dimIndex]) {
        throw new Error(
          `Coordinate length for '${dim}' (${value.length}) does not match dimension size (${this._shape[dimIndex]})`
        );
      }
      updatedCoords[dim] = value.map(v => (v instanceof Date ? new Date(v.getTime()) : v));
    }

    return this._cloneWith({ coords: updatedCoords });
  }

  rolling(dim: DimensionName, window: number, options?: RollingOptions): DataArrayRolling {
    return new DataArrayRolling(this, dim, window, options ?? {});
  }

  add(other: DataArray | DataValue, options?: BinaryOpOptions): DataArray {
    return this._binaryOperation(other, (a, b) => toNumber(a) + toNumber(b), options, true);
  }

  subtract(other: DataArray | DataValue, options?: BinaryOpOptions): DataArray {
    return this._binaryOperation(other, (a, b) => toNumber(a) - toNumber(b), options, true);
  }

  multiply(other: DataArray | DataValue, options?: BinaryOpOptions): DataArray {
    return this._binaryOperation(other, (a, b) => toNumber(a) * toNumber(b), options, true);
  }

  divide(other: DataArray | DataValue, options?: BinaryOpOptions): DataArray {
    return this._binaryOperation(other, (a, b) => toNumber(a) / toNumber(b), options, true);
  }

  greaterThan(other: DataArray | DataValue, options?: BinaryOpOptions): DataArray {
    return this._binaryOperation(other, (a, b) => toNumber(a) > toNumber(b), options);
  }

  gt(other: DataArray | DataValue, options?: BinaryOpOptions): DataArray {
    return this.greaterThan(other, options);
  }

  lessThan(other: DataArray | DataValue, options?: BinaryOpOptions): DataArray {
    return this._binaryOperation(other, (a, b) => toNumber(a) < toNumber(b), options);
  }

  lt(other: DataArray | DataValue, options?: BinaryOpOptions): DataArray {
    return this.lessThan(other, options);
  }

  /**
   * Literal inequality; NaN differs from everything, NaN included
   */
  notEqual(other: DataArray | DataValue, options?: BinaryOpOptions): DataArray {
    return this._binaryOperation(other, (a, b) => a !== b, options);
  }

  and(other: DataArray | DataValue, options?: BinaryOpOptions): DataArray {
    return this._binaryOperation(other, (a, b) => isTruthy(a) && isTruthy(b), options);
  }

  /**
   * True where the value is missing (NaN)
   */
  isNull(): DataArray {
    return DataArray._fromResult(computeUnaryOp(this._toOperand(), value => isMissing(value)));
  }

  notNull(): DataArray {
    return DataArray._fromResult(computeUnaryOp(this._toOperand(), value => !isMissing(value)));
  }

  /**
   * True where the value is one of `candidates`. Missing values are never members.
   */
  isin(candidates: readonly DataValue[]): DataArray {
    const members = new Set<DataValue>(candidates.filter(value => !isMissing(value)));
    return DataArray._fromResult(
      computeUnaryOp(this._toOperand(), value => !isMissing(value) && members.has(value))
    );
  }

  /**
   * Convert to an array of records with coordinates and values
   * Each record contains coordinate values and the data value
   * Date coordinates are converted to ISO strings and numeric coordinates
   * are rounded to avoid floating-point precision noise
   *
   * @example
   * ```typescript
   * // For a 2D array with dims ['time', 'y']
   * dataArray.toRecords()
   * // [
   * //   { time: '2024-01-01T00:00:00.000Z', y: 45.5, value: 0.23 },
   * //   { time: '2024-01-01T00:00:00.000Z', y: 46.0, value: 0.41 },
   * //   ...
   * // ]
   * ```
   */
  toRecords(options?: { precision?: number }): Array<Record<string, CoordinateValue | DataValue>> {
    const precision = options?.precision ?? 6;
    const factor = Math.pow(10, precision);
    const values = this._eagerValues('toRecords');

    return values.map((value, flat) => {
      const record: Record<string, CoordinateValue | DataValue> = {};
      const indices = unravelIndex(flat, this._shape);

      this._dims.forEach((dim, d) => {
        const coordValue = this._coords[dim][indices[d]];
        if (coordValue instanceof Date) {
          record[dim] = coordValue.toISOString();
        } else if (typeof coordValue === 'number') {
          record[dim] = Math.round(coordValue * factor) / factor;
        } else {
          record[dim] = coordValue;
        }
      });

      record.value = value;
      return record;
    });
  }

  /**
   * Get dimension index with O(1) lookup using cached map
   */
  private _getDimIndex(dim: DimensionName): number {
    const index = this._dimIndexMap.get(dim);
    if (index === undefined) {
      return -1;
    }
    return index;
  }

  private _eagerValues(operation: string): readonly DataValue[] {
    if (isLazyBlock(this._block)) {
      throw new Error(`${operation} on a lazy DataArray requires compute() first`);
    }
    return this._block.materialize();
  }

  private _reduce(dim: DimensionName | DimensionName[], reducer: Reducer): DataArray {
    const dims = Array.isArray(dim) ? dim : [dim];
    const axes = dims.map(d => {
      const index = this._getDimIndex(d);
      if (index === -1) {
        throw new Error(`Dimension '${d}' not found`);
      }
      return index;
    });

    const result = reduceAxes(this._eagerValues(reducer), this._shape, axes, reducer);
    const newDims = this._dims.filter((_, i) => !axes.includes(i));
    const newCoords: Coordinates = {};
    for (const d of newDims) {
      newCoords[d] = this._coords[d];
    }

    return new DataArray(createEagerBlock(result.values, newDims, result.shape), {
      coords: newCoords,
      attrs: this._attrs,
      name: this._name
    });
  }

  private _toOperand(): ArrayOperand {
    return {
      kind: 'array',
      block: this._block,
      dims: this.dims,
      coords: this._coords,
      attrs: this._attrs,
      name: this._name,
      chunks: this._chunks
    };
  }

  private static _normalizeOperand(value: DataArray | DataValue): Operand {
    if (value instanceof DataArray) {
      return value._toOperand();
    }
    return { kind: 'scalar', value };
  }

  private static _fromResult(result: ElementwiseResult): DataArray {
    return new DataArray(result.block, {
      coords: result.coords,
      attrs: result.attrs,
      name: result.name,
      chunks: result.chunks
    });
  }

  private _binaryOperation(
    other: DataArray | DataValue,
    operator: (left: DataValue, right: DataValue) => DataValue,
    options?: BinaryOpOptions,
    keepLeftAttrs = false
  ): DataArray {
    const result = computeBinaryOp(
      this._toOperand(),
      DataArray._normalizeOperand(other),
      operator,
      { keepAttrs: options?.keepAttrs ?? (keepLeftAttrs ? 'left' : undefined), name: options?.name }
    );
    return DataArray._fromResult(result);
  }
}

class DataArrayRolling {
  private readonly _dimIndex: number;
  private readonly _options: RollingOptions;
  private readonly _window: number;

  constructor(
    private readonly _source: DataArray,
    private readonly _dim: DimensionName,
    window: number,
    options: RollingOptions
  ) {
    if (window <= 0 || !Number.isFinite(window)) {
      throw new RangeError('rolling window must be a positive integer');
    }
    const dimIndex = _source.dims.indexOf(_dim);
    if (dimIndex === -1) {
      throw new Error(`Dimension '${_dim}' not found in DataArray`);
    }

    this._dimIndex = dimIndex;
    this._window = Math.floor(window);
    this._options = options;
  }

  mean(): DataArray {
    return this._apply('mean');
  }

  sum(): DataArray {
    return this._apply('sum');
  }

  median(): DataArray {
    return this._apply('median');
  }

  private _apply(reducer: RollingReducer): DataArray {
    if (this._source.isLazy) {
      throw new Error('rolling on a lazy DataArray requires compute() first');
    }
    const values = applyRolling(
      this._source.values,
      this._source.shape,
      this._dimIndex,
      this._window,
      this._options,
      reducer
    );

    return new DataArray(createEagerBlock(values, this._source.dims, this._source.shape), {
      coords: this._source.coords,
      attrs: this._source.attrs,
      name: this._source.name
    });
  }
}

export type { DataArrayRolling };
