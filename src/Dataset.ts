/**
 * Dataset - A collection of labeled DataArrays sharing coordinates
 */

import { DataArray } from './DataArray.js';
import {
  Coordinates,
  Attributes,
  DatasetOptions,
  DimensionName,
  DataValue,
  IndexSelection
} from './types.js';
import { arraysEqual, copyCoords } from './utils.js';
import { ShapeMismatchError, describeCoordinateMismatch } from './errors.js';
import { ZarrBackend, type OpenOptions, type ZarrStore } from './backends/zarr.js';
import type { WhereOptions } from './ops/where.js';

export class Dataset {
  private _dataVars: Map<string, DataArray>;
  private _coords: Coordinates;
  private _attrs: Attributes;

  constructor(
    dataVars: { [name: string]: DataArray } = {},
    options: DatasetOptions = {}
  ) {
    this._dataVars = new Map();
    this._attrs = options.attrs ? { ...options.attrs } : {};
    this._coords = options.coords ? copyCoords(options.coords) : {};

    // Add data variables
    for (const [name, dataArray] of Object.entries(dataVars)) {
      this._addVariable(name, dataArray);
    }
  }

  /**
   * Get all data variable names
   */
  get dataVars(): string[] {
    return Array.from(this._dataVars.keys());
  }

  /**
   * Get all dimension names
   */
  get dims(): DimensionName[] {
    const dimsSet = new Set<DimensionName>();

    for (const dataArray of this._dataVars.values()) {
      for (const dim of dataArray.dims) {
        dimsSet.add(dim);
      }
    }

    return Array.from(dimsSet);
  }

  /**
   * Get the coordinates
   */
  get coords(): Coordinates {
    return copyCoords(this._coords);
  }

  /**
   * Get the attributes
   */
  get attrs(): Attributes {
    return { ...this._attrs };
  }

  /**
   * Get dimension sizes
   */
  get sizes(): { [dim: string]: number } {
    const sizes: { [dim: string]: number } = {};

    for (const dataArray of this._dataVars.values()) {
      dataArray.dims.forEach((dim, i) => {
        sizes[dim] = dataArray.shape[i];
      });
    }

    return sizes;
  }

  /**
   * Get a data variable
   */
  getVariable(name: string): DataArray {
    const variable = this._dataVars.get(name);
    if (variable === undefined) {
      throw new Error(`Variable '${name}' not found in dataset`);
    }
    return variable;
  }

  /**
   * Check if a variable exists
   */
  hasVariable(name: string): boolean {
    return this._dataVars.has(name);
  }

  /**
   * Select by integer position across every variable carrying the dimension
   */
  isel(selection: IndexSelection): Dataset {
    return this._rebuild(dataArray => {
      const relevant: IndexSelection = {};
      for (const dim of dataArray.dims) {
        const sel = selection[dim];
        if (sel !== undefined) {
          relevant[dim] = sel;
        }
      }
      return Object.keys(relevant).length > 0 ? dataArray.isel(relevant) : dataArray;
    });
  }

  /**
   * Apply a function to every data variable
   */
  map(fn: (dataArray: DataArray, name: string) => DataArray): Dataset {
    return this._rebuild(fn);
  }

  where(cond: DataArray | DataValue, other: DataArray | DataValue = NaN, options?: WhereOptions): Dataset {
    return this._rebuild(dataArray => dataArray.where(cond, other, options));
  }

  /**
   * Keep only the named variables
   */
  select(names: string[]): Dataset {
    const selected: { [name: string]: DataArray } = {};
    for (const name of names) {
      selected[name] = this.getVariable(name);
    }
    return Dataset._withDerivedCoords(selected, this._attrs);
  }

  /**
   * Materialize every lazy variable
   */
  async compute(): Promise<Dataset> {
    const entries = await Promise.all(
      this.dataVars.map(async name => [name, await this.getVariable(name).compute()] as const)
    );
    return new Dataset(Object.fromEntries(entries), {
      coords: this._coords,
      attrs: this._attrs
    });
  }

  static async open_zarr(store: ZarrStore, options?: OpenOptions): Promise<Dataset> {
    return ZarrBackend.open(store, options);
  }

  private _addVariable(name: string, dataArray: DataArray): void {
    const dims = dataArray.dims;
    const shape = dataArray.shape;

    for (let i = 0; i < dims.length; i++) {
      const dim = dims[i];
      const size = shape[i];

      // Check against existing variables
      for (const [existingName, existingArray] of this._dataVars.entries()) {
        const existingDimIndex = existingArray.dims.indexOf(dim);
        if (existingDimIndex !== -1 && existingArray.shape[existingDimIndex] !== size) {
          throw new ShapeMismatchError(
            `Dimension '${dim}' size mismatch: '${name}' has ${size}, '${existingName}' has ${existingArray.shape[existingDimIndex]}`
          );
        }
      }

      const variableCoords = dataArray.coords[dim];
      const existingCoords = this._coords[dim];
      if (!existingCoords) {
        this._coords[dim] = [...variableCoords];
      } else if (!arraysEqual(existingCoords, variableCoords)) {
        throw new ShapeMismatchError(
          `Variable '${name}': ${describeCoordinateMismatch(dim, existingCoords, variableCoords)}`
        );
      }
    }

    this._dataVars.set(name, dataArray);
  }

  private _rebuild(fn: (dataArray: DataArray, name: string) => DataArray): Dataset {
    const resultVars: { [name: string]: DataArray } = {};
    for (const [name, dataArray] of this._dataVars.entries()) {
      resultVars[name] = fn(dataArray, name);
    }
    return Dataset._withDerivedCoords(resultVars, this._attrs);
  }

  private static _withDerivedCoords(
    dataVars: { [name: string]: DataArray },
    attrs: Attributes
  ): Dataset {
    const newCoords: Coordinates = {};
    for (const dataArray of Object.values(dataVars)) {
      for (const dim of dataArray.dims) {
        if (!newCoords[dim]) {
          newCoords[dim] = dataArray.coords[dim];
        }
      }
    }

    return new Dataset(dataVars, { coords: newCoords, attrs });
  }
}
