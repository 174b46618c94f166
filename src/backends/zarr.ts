// backends/zarr.ts
import * as zarr from 'zarrita';
import { z } from 'zod';
import { Dataset } from '../Dataset.js';
import { DataArray } from '../DataArray.js';
import { Attributes, Coordinates, CoordinateValue, DataValue, IndexRanges } from '../types.js';
import { decodeTimeCoordinate } from '../time/cf-time.js';

/**
 * Minimal read-only store. `listMetadataKeys` lets the backend discover the
 * hierarchy without a consolidated metadata document.
 */
export interface ZarrStore {
  get(key: string): Promise<Uint8Array | undefined>;
  has?(key: string): Promise<boolean>;
  listMetadataKeys?(): string[] | Promise<string[]>;
}

export type OpenOptions = {
  group?: string;
};

const fillValueSchema = z
  .union([z.number(), z.string(), z.boolean(), z.null()])
  .optional()
  .transform(value => {
    if (typeof value === 'number') return value;
    if (value === 'NaN') return NaN;
    if (value === 'Infinity') return Infinity;
    if (value === '-Infinity') return -Infinity;
    return undefined;
  });

const nodeMetadataSchema = z.object({
  node_type: z.enum(['array', 'group']),
  shape: z.array(z.number().int().nonnegative()).default([]),
  dimension_names: z.array(z.string().nullable()).nullable().optional(),
  attributes: z.record(z.unknown()).default({}),
  data_type: z.unknown().optional(),
  fill_value: fillValueSchema
});

type NodeMetadata = z.infer<typeof nodeMetadataSchema>;

interface ArrayInfo {
  path: string;
  name: string;
  dims: string[];
  shape: number[];
  attrs: Attributes;
  fillValue?: number;
}

function normalizePath(path: string): string {
  return path.replace(/^\/+/, '').replace(/\/+$/, '');
}

function lastSegment(path: string): string {
  const segs = normalizePath(path).split('/');
  return segs[segs.length - 1] || '';
}

function dirname(path: string): string {
  const p = normalizePath(path);
  const idx = p.lastIndexOf('/');
  return idx === -1 ? '' : p.slice(0, idx);
}

function readTypedArray(data: unknown): DataValue[] | undefined {
  if (
    data instanceof Float64Array || data instanceof Float32Array ||
    data instanceof Int32Array || data instanceof Uint32Array ||
    data instanceof Int16Array || data instanceof Uint16Array ||
    data instanceof Int8Array || data instanceof Uint8Array
  ) {
    const out = new Array<number>(data.length);
    for (let i = 0; i < data.length; i++) out[i] = data[i];
    return out;
  }
  if (data instanceof BigInt64Array || data instanceof BigUint64Array) {
    const out = new Array<number>(data.length);
    for (let i = 0; i < data.length; i++) out[i] = Number(data[i]);
    return out;
  }
  if (Array.isArray(data)) {
    return data.map(value => (typeof value === 'boolean' ? value : Number(value)));
  }
  return undefined;
}

/**
 * Flatten whatever zarrita returns (a chunk or a scalar) into values
 */
export function extractValues(result: unknown): DataValue[] {
  if (typeof result === 'number' || typeof result === 'boolean') return [result];
  if (typeof result === 'bigint') return [Number(result)];
  if (typeof result === 'object' && result !== null && 'data' in result) {
    const values = readTypedArray(result.data);
    if (values) return values;
  }
  throw new Error('ZarrBackend: unsupported array data type');
}

export class ZarrBackend {
  /**
   * Open a Zarr v3 hierarchy as a Dataset
   *
   * 1-D arrays named after a dimension become coordinates and are read
   * eagerly (CF-encoded time is decoded to Dates). Every other array becomes
   * a lazy variable; its `fill_value` is kept as the `_FillValue` attribute.
   *
   * @param store - A ZarrStore implementation
   * @param options - Options including group path
   */
  static async open(store: ZarrStore, options: OpenOptions = {}): Promise<Dataset> {
    const normalizedGroup = normalizePath(options.group ?? '');

    const listKeys = typeof store.listMetadataKeys === 'function'
      ? await Promise.resolve(store.listMetadataKeys())
      : [];

    if (listKeys.length === 0) {
      throw new Error(
        'ZarrBackend.open: unable to discover any metadata keys. Ensure the store implements listMetadataKeys().'
      );
    }

    // Keep only keys under the requested group (prefix match) and ending with zarr.json
    const jsonKeys = listKeys
      .filter(k => k.endsWith('zarr.json'))
      .filter(k =>
        normalizedGroup ? k === `${normalizedGroup}/zarr.json` || k.startsWith(`${normalizedGroup}/`) : true
      );

    if (jsonKeys.length === 0) {
      throw new Error(`ZarrBackend.open: no zarr.json under group "${normalizedGroup || '/'}".`);
    }

    const arrays: ArrayInfo[] = [];
    let groupAttrs: Attributes = {};

    for (const key of jsonKeys) {
      const meta = await readNodeMetadata(store, key);
      if (!meta) continue;

      const path = dirname(key);
      if (meta.node_type === 'group') {
        if (path === normalizedGroup) groupAttrs = meta.attributes;
        continue;
      }

      const names = meta.dimension_names;
      const dims = names && names.length === meta.shape.length
        ? names.map((n, i) => n ?? `dim_${i}`)
        : meta.shape.map((_, i) => `dim_${i}`);

      arrays.push({
        path,
        name: lastSegment(path),
        dims,
        shape: meta.shape,
        attrs: meta.attributes,
        fillValue: meta.fill_value
      });
    }

    if (arrays.length === 0) {
      throw new Error(
        `ZarrBackend.open: found zarr.json files, but none were arrays under "${normalizedGroup || '/'}".`
      );
    }

    const root = zarr.root(store);

    // ---- Coordinates: 1-D arrays whose name is their own dimension ----
    const coordInfos = arrays.filter(a => a.shape.length === 1 && a.dims[0] === a.name);
    const coords: Coordinates = {};

    for (const info of coordInfos) {
      const node = await zarr.open(root.resolve(info.path), { kind: 'array' });
      const result: unknown = await zarr.get(node);
      const raw: CoordinateValue[] = extractValues(result).map(Number);
      coords[info.name] = decodeTimeCoordinate(raw, info.attrs);
    }

    // ---- Data variables: lazy, nothing is read until compute() ----
    const dataVars: { [name: string]: DataArray } = {};

    for (const info of arrays) {
      if (coordInfos.includes(info)) continue;

      const perDimCoords: Coordinates = {};
      info.dims.forEach((d, i) => {
        const named = coords[d];
        perDimCoords[d] = named && named.length === info.shape[i]
          ? named
          : Array.from({ length: info.shape[i] }, (_, j) => j);
      });

      const location = root.resolve(info.path);
      const openNode = () => zarr.open(location, { kind: 'array' });
      let nodePromise: ReturnType<typeof openNode> | undefined;
      const lazyLoader = async (ranges: IndexRanges): Promise<DataValue[]> => {
        nodePromise ??= openNode();
        const node = await nodePromise;
        const selection = info.dims.map((dim, i) => {
          const range = ranges[dim] ?? { start: 0, stop: info.shape[i] };
          return zarr.slice(range.start, range.stop);
        });
        const result: unknown = await zarr.get(node, selection);
        return extractValues(result);
      };

      const attrs: Attributes = { ...info.attrs, _zarr_path: info.path };
      if (info.fillValue !== undefined) {
        attrs._FillValue = info.fillValue;
      }

      dataVars[info.name] = new DataArray(null, {
        lazy: true,
        virtualShape: info.shape,
        dims: info.dims,
        coords: perDimCoords,
        attrs,
        lazyLoader,
        name: info.name
      });
    }

    return new Dataset(dataVars, { attrs: groupAttrs });
  }
}

async function readNodeMetadata(store: ZarrStore, key: string): Promise<NodeMetadata | undefined> {
  const bytes = await store.get(key);
  if (!bytes) return undefined;

  let json: unknown;
  try {
    json = JSON.parse(new TextDecoder().decode(bytes));
  } catch {
    // Not a JSON document; skip the node like any other unreadable metadata
    return undefined;
  }

  const parsed = nodeMetadataSchema.safeParse(json);
  return parsed.success ? parsed.data : undefined;
}
