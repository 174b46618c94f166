/**
 * Normalized-difference spectral indices
 */

import { DataArray } from '../DataArray.js';
import { Dataset } from '../Dataset.js';

export interface IndexDefinition {
  name: string;
  /** Band for the positive term */
  a: string;
  /** Band for the negative term */
  b: string;
}

export const INDEX_PRESETS = {
  /** Modified normalized difference water index */
  mndwi: { name: 'mndwi', a: 'green', b: 'swir16' },
  /** Normalized difference chlorophyll index */
  ndci: { name: 'ndci', a: 'rededge1', b: 'red' },
  ndvi: { name: 'ndvi', a: 'nir', b: 'red' },
  ndwi: { name: 'ndwi', a: 'green', b: 'nir' }
} as const satisfies Record<string, IndexDefinition>;

export type IndexPreset = keyof typeof INDEX_PRESETS;

/**
 * (a − b) / (a + b), element-wise.
 *
 * NaN where either input is NaN or where a + b is exactly zero. The result
 * is not clipped: inputs outside the physical range can leave [-1, 1].
 */
export function normalizedDifference(a: DataArray, b: DataArray, options: { name?: string } = {}): DataArray {
  const sum = a.add(b);
  const ratio = a.subtract(b).divide(sum);
  const result = ratio.where(sum.notEqual(0), NaN);
  return options.name ? result.rename(options.name) : result;
}

/**
 * Compute an index from the named bands of a Dataset
 */
export function computeIndex(bands: Dataset, definition: IndexDefinition | IndexPreset): DataArray {
  const resolved = typeof definition === 'string' ? INDEX_PRESETS[definition] : definition;
  return normalizedDifference(
    bands.getVariable(resolved.a),
    bands.getVariable(resolved.b),
    { name: resolved.name }
  );
}
