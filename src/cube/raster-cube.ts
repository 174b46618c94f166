/**
 * RasterCube - a time series of co-registered multi-band imagery
 *
 * Every band (and the optional quality variable) is a DataArray over
 * `['time', 'y', 'x']` sharing identical coordinates. Time is strictly
 * increasing.
 */

import { DataArray } from '../DataArray.js';
import { Dataset } from '../Dataset.js';
import { Attributes, CoordinateValue } from '../types.js';
import { arraysEqual } from '../utils.js';
import { ClearcubeError, ShapeMismatchError, describeCoordinateMismatch } from '../errors.js';
import { gridFromCoords, type GridGeometry } from '../grid/affine.js';

export const CUBE_DIMS = ['time', 'y', 'x'] as const;

export interface RasterCubeOptions {
  bands: { [name: string]: DataArray };
  quality?: DataArray;
  /** No-data sentinel per band; defaults to the band's `_FillValue`, else NaN */
  nodata?: { [band: string]: number };
  grid?: GridGeometry;
  attrs?: Attributes;
}

export interface FromDatasetOptions {
  /** Band variables; defaults to every variable over time/y/x except the quality one */
  bands?: string[];
  /** Name of the quality variable, if the dataset carries one */
  quality?: string;
  nodata?: { [band: string]: number };
  grid?: GridGeometry;
  crs?: string;
}

function timeKey(value: CoordinateValue): number | string {
  return value instanceof Date ? value.getTime() : value;
}

function checkCubeDims(name: string, array: DataArray): void {
  const dims = array.dims;
  if (dims.length !== CUBE_DIMS.length || dims.some((d, i) => d !== CUBE_DIMS[i])) {
    throw new ShapeMismatchError(
      `Variable '${name}' must have dims [${CUBE_DIMS.join(', ')}], found [${dims.join(', ')}]`
    );
  }
}

export class RasterCube {
  private readonly _bands: Map<string, DataArray>;
  private readonly _quality?: DataArray;
  private readonly _nodata: { [band: string]: number };
  private readonly _grid?: GridGeometry;
  private readonly _attrs: Attributes;

  constructor(options: RasterCubeOptions) {
    const entries = Object.entries(options.bands);
    if (entries.length === 0) {
      throw new ClearcubeError('RasterCube requires at least one band');
    }

    const [firstName, first] = entries[0];
    checkCubeDims(firstName, first);

    const variables: Array<[string, DataArray]> = options.quality
      ? [...entries, ['quality', options.quality]]
      : entries;

    for (const [name, array] of variables) {
      checkCubeDims(name, array);
      for (const dim of CUBE_DIMS) {
        if (!arraysEqual(first.coords[dim], array.coords[dim])) {
          throw new ShapeMismatchError(
            `Variable '${name}' vs '${firstName}': ${describeCoordinateMismatch(dim, first.coords[dim], array.coords[dim])}`
          );
        }
      }
    }

    const time = first.coords.time;
    for (let i = 1; i < time.length; i++) {
      const previous = timeKey(time[i - 1]);
      const current = timeKey(time[i]);
      const increasing = typeof previous === 'number' && typeof current === 'number'
        ? current > previous
        : typeof previous === 'string' && typeof current === 'string' && current > previous;
      if (!increasing) {
        throw new RangeError(
          `Time coordinates must be strictly increasing; position ${i} does not follow position ${i - 1}`
        );
      }
    }

    this._bands = new Map(entries);
    this._quality = options.quality;
    this._attrs = options.attrs ? { ...options.attrs } : {};

    this._nodata = {};
    for (const [name, array] of entries) {
      const configured = options.nodata?.[name];
      const fill = array.attrs._FillValue;
      this._nodata[name] = configured ?? (typeof fill === 'number' ? fill : NaN);
    }

    if (options.grid) {
      if (options.grid.width !== this.width || options.grid.height !== this.height) {
        throw new ShapeMismatchError(
          `Grid geometry is ${options.grid.height}x${options.grid.width} but the cube is ${this.height}x${this.width}`
        );
      }
      this._grid = options.grid;
    } else {
      this._grid = RasterCube._deriveGrid(first.coords.x, first.coords.y, undefined);
    }
  }

  /**
   * Build a cube from the variables of a Dataset (e.g. one opened from Zarr)
   */
  static fromDataset(dataset: Dataset, options: FromDatasetOptions = {}): RasterCube {
    const qualityName = options.quality;
    const bandNames = options.bands ?? dataset.dataVars.filter(name => {
      if (name === qualityName) return false;
      const dims = dataset.getVariable(name).dims;
      return dims.length === CUBE_DIMS.length && dims.every((d, i) => d === CUBE_DIMS[i]);
    });

    const bands: { [name: string]: DataArray } = {};
    for (const name of bandNames) {
      bands[name] = dataset.getVariable(name);
    }

    let grid = options.grid;
    if (!grid && bandNames.length > 0) {
      const coords = dataset.getVariable(bandNames[0]).coords;
      grid = RasterCube._deriveGrid(coords.x, coords.y, options.crs);
    }

    return new RasterCube({
      bands,
      quality: qualityName ? dataset.getVariable(qualityName) : undefined,
      nodata: options.nodata,
      grid,
      attrs: dataset.attrs
    });
  }

  get bandNames(): string[] {
    return Array.from(this._bands.keys());
  }

  band(name: string): DataArray {
    const band = this._bands.get(name);
    if (band === undefined) {
      throw new ClearcubeError(`Band '${name}' not found; available bands: ${this.bandNames.join(', ')}`);
    }
    return band;
  }

  hasBand(name: string): boolean {
    return this._bands.has(name);
  }

  get quality(): DataArray | undefined {
    return this._quality;
  }

  /**
   * No-data sentinel of a band (NaN when the band marks missing values with NaN)
   */
  nodata(name: string): number {
    this.band(name);
    return this._nodata[name];
  }

  private get _first(): DataArray {
    return this.band(this.bandNames[0]);
  }

  get time(): CoordinateValue[] {
    return [...this._first.coords.time];
  }

  get y(): CoordinateValue[] {
    return [...this._first.coords.y];
  }

  get x(): CoordinateValue[] {
    return [...this._first.coords.x];
  }

  get timeSteps(): number {
    return this._first.shape[0];
  }

  get height(): number {
    return this._first.shape[1];
  }

  get width(): number {
    return this._first.shape[2];
  }

  get attrs(): Attributes {
    return { ...this._attrs };
  }

  get grid(): GridGeometry {
    if (!this._grid) {
      throw new ClearcubeError(
        'RasterCube has no grid geometry; pass one explicitly or use uniformly spaced numeric x/y coordinates'
      );
    }
    return this._grid;
  }

  /**
   * Keep the given time steps, in order
   */
  iselTime(indices: number[]): RasterCube {
    const bands: { [name: string]: DataArray } = {};
    for (const [name, band] of this._bands) {
      bands[name] = band.isel({ time: indices });
    }
    return new RasterCube({
      bands,
      quality: this._quality?.isel({ time: indices }),
      nodata: this._nodata,
      grid: this._grid,
      attrs: this._attrs
    });
  }

  toDataset(): Dataset {
    const vars: { [name: string]: DataArray } = Object.fromEntries(this._bands);
    if (this._quality) {
      vars[this._quality.name ?? 'quality'] = this._quality;
    }
    return new Dataset(vars, { attrs: this._attrs });
  }

  private static _deriveGrid(
    x: readonly CoordinateValue[],
    y: readonly CoordinateValue[],
    crs: string | undefined
  ): GridGeometry | undefined {
    const xs = x.filter((v): v is number => typeof v === 'number');
    const ys = y.filter((v): v is number => typeof v === 'number');
    if (xs.length !== x.length || ys.length !== y.length || xs.length < 2 || ys.length < 2) {
      return undefined;
    }
    try {
      return gridFromCoords(xs, ys, crs);
    } catch (error) {
      if (error instanceof RangeError) return undefined;
      throw error;
    }
  }
}
