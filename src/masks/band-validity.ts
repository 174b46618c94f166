import { DataArray } from '../DataArray.js';
import type { RasterCube } from '../cube/raster-cube.js';

/**
 * True where the band holds a real observation, false at its no-data sentinel.
 *
 * A NaN sentinel is matched with `isNull()` since NaN never equals itself;
 * any other sentinel is compared literally, so values merely close to it
 * stay valid.
 */
export function bandValidityMask(band: DataArray, nodata: number): DataArray {
  const name = band.name ? `${band.name}_valid` : 'valid';
  const mask = Number.isNaN(nodata) ? band.notNull() : band.notEqual(nodata);
  return mask.rename(name);
}

/**
 * One validity mask per band of the cube, using each band's declared sentinel
 */
export function validityMasks(cube: RasterCube): { [band: string]: DataArray } {
  const masks: { [band: string]: DataArray } = {};
  for (const name of cube.bandNames) {
    masks[name] = bandValidityMask(cube.band(name).rename(name), cube.nodata(name));
  }
  return masks;
}

/**
 * AND a list of masks together (e.g. "valid in every band")
 */
export function combineMasks(masks: readonly DataArray[], name = 'valid'): DataArray {
  if (masks.length === 0) {
    throw new RangeError('combineMasks requires at least one mask');
  }
  let combined = masks[0];
  for (let i = 1; i < masks.length; i++) {
    combined = combined.and(masks[i]);
  }
  return combined.rename(name);
}
