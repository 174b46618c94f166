import { DataArray } from '../DataArray.js';
import { Dataset } from '../Dataset.js';
import type { RasterCube } from '../cube/raster-cube.js';
import { ShapeMismatchError } from '../errors.js';
import { validityMasks } from '../masks/band-validity.js';

export interface BandScaling {
  scale: number;
  offset: number;
}

export interface CleanBandsOptions {
  /** Per-band validity masks; derived from the cube's sentinels when omitted */
  validity?: { [band: string]: DataArray };
  quality?: DataArray;
  /** Bands to clean and their scaling; every band at scale 1, offset 0 when omitted */
  bands?: { [band: string]: BandScaling };
}

function checkMaskDims(band: DataArray, mask: DataArray, role: string): void {
  const extra = mask.dims.filter(dim => !band.dims.includes(dim));
  if (extra.length > 0) {
    throw new ShapeMismatchError(
      `${role} mask has dims [${extra.join(', ')}] that band '${band.name ?? ''}' lacks`
    );
  }
}

/**
 * `value × scale + offset` where the pixel is valid and passes the quality
 * mask, NaN elsewhere. Masking happens before rescaling, so a sentinel never
 * leaks into the scaled values.
 */
export function scaleMaskedBand(
  band: DataArray,
  validity: DataArray,
  quality: DataArray | undefined,
  { scale, offset }: BandScaling
): DataArray {
  checkMaskDims(band, validity, 'Validity');
  let keep = validity;
  if (quality) {
    checkMaskDims(band, quality, 'Quality');
    keep = validity.and(quality);
  }

  let result = band.where(keep, NaN);
  if (scale !== 1) result = result.multiply(scale);
  if (offset !== 0) result = result.add(offset);
  return band.name ? result.rename(band.name) : result;
}

/**
 * Clean every configured band of a cube into a Dataset of float bands
 */
export function cleanBands(cube: RasterCube, options: CleanBandsOptions = {}): Dataset {
  const validity = options.validity ?? validityMasks(cube);
  const scaling = options.bands ?? Object.fromEntries(
    cube.bandNames.map(name => [name, { scale: 1, offset: 0 }])
  );

  const cleaned: { [band: string]: DataArray } = {};
  for (const [name, bandScaling] of Object.entries(scaling)) {
    const mask = validity[name];
    if (mask === undefined) {
      throw new ShapeMismatchError(`No validity mask for band '${name}'`);
    }
    cleaned[name] = scaleMaskedBand(cube.band(name).rename(name), mask, options.quality, bandScaling);
  }
  return new Dataset(cleaned, { attrs: cube.attrs });
}
