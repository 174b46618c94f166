/**
 * In-memory Zarr v3 store for testing
 */

import { ZarrStore } from '../../src/backends/zarr.js';

export interface ArrayNodeInput {
  node_type: 'array';
  shape: number[];
  data_type?: string;
  chunk_shape?: number[];
  fill_value?: number | string | null;
  dimension_names?: string[];
  attributes?: Record<string, unknown>;
}

export interface GroupNodeInput {
  node_type: 'group';
  attributes?: Record<string, unknown>;
}

export type StoreEntry = Uint8Array | string | ArrayNodeInput | GroupNodeInput;

function enrichMetadata(meta: ArrayNodeInput | GroupNodeInput): Record<string, unknown> {
  if (meta.node_type === 'group') {
    return { zarr_format: 3, node_type: 'group', attributes: meta.attributes ?? {} };
  }
  return {
    zarr_format: 3,
    node_type: 'array',
    shape: meta.shape,
    data_type: meta.data_type ?? 'float64',
    chunk_grid: {
      name: 'regular',
      configuration: { chunk_shape: meta.chunk_shape ?? meta.shape }
    },
    chunk_key_encoding: {
      name: 'default',
      configuration: { separator: '/' }
    },
    fill_value: meta.fill_value !== undefined ? meta.fill_value : 0,
    codecs: [{
      name: 'bytes',
      configuration: { endian: 'little' }
    }],
    dimension_names: meta.dimension_names,
    attributes: meta.attributes ?? {}
  };
}

/**
 * Little-endian float64 chunk bytes
 */
export function float64Chunk(values: number[]): Uint8Array {
  const bytes = new Uint8Array(values.length * 8);
  const view = new DataView(bytes.buffer);
  values.forEach((value, i) => view.setFloat64(i * 8, value, true));
  return bytes;
}

export class MemoryZarrStore implements ZarrStore {
  private data: Map<string, Uint8Array>;
  readonly requested: string[] = [];

  constructor(initialData: { [key: string]: StoreEntry } = {}) {
    this.data = new Map();
    for (const [key, value] of Object.entries(initialData)) {
      this.set(key, value);
    }
  }

  async get(key: string): Promise<Uint8Array | undefined> {
    // zarrita requests keys with a leading slash
    const normalizedKey = key.startsWith('/') ? key.slice(1) : key;
    this.requested.push(normalizedKey);
    return this.data.get(normalizedKey);
  }

  async has(key: string): Promise<boolean> {
    return this.data.has(key.startsWith('/') ? key.slice(1) : key);
  }

  listMetadataKeys(): string[] {
    return Array.from(this.data.keys()).filter(k => k.endsWith('zarr.json'));
  }

  set(key: string, value: StoreEntry): void {
    if (value instanceof Uint8Array) {
      this.data.set(key, value);
    } else if (typeof value === 'string') {
      this.data.set(key, new TextEncoder().encode(value));
    } else {
      this.data.set(key, new TextEncoder().encode(JSON.stringify(enrichMetadata(value))));
    }
  }
}
