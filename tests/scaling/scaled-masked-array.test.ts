import { describe, test, expect } from 'vitest';
import { DataArray } from '../../src/DataArray.js';
import { ShapeMismatchError } from '../../src/errors.js';
import { bandValidityMask } from '../../src/masks/band-validity.js';
import { categoricalQualityMask } from '../../src/masks/quality.js';
import { cleanBands, scaleMaskedBand } from '../../src/scaling/scaled-masked-array.js';
import { sampleCube } from '../helpers/cube.js';

const raw = new DataArray([[10000, 10000, 0, 2500]], { dims: ['y', 'x'], name: 'nir' });
const valid = bandValidityMask(raw, 0);
const quality = new DataArray([[true, false, true, true]], { dims: ['y', 'x'] });

describe('scaleMaskedBand', () => {
  test('should rescale masked-in values and blank the rest', () => {
    const cleaned = scaleMaskedBand(raw, valid, quality, { scale: 0.0001, offset: 0 });
    const [kept, masked, sentinel, quarter] = cleaned.values;

    expect(kept).toBeCloseTo(1.0, 12);
    expect(masked).toBeNaN();
    expect(sentinel).toBeNaN();
    expect(quarter).toBeCloseTo(0.25, 12);
    expect(cleaned.name).toBe('nir');
  });

  test('should mask before applying the offset', () => {
    const cleaned = scaleMaskedBand(raw, valid, undefined, { scale: 1, offset: 0.5 });
    expect(cleaned.values).toEqual([10000.5, 10000.5, NaN, 2500.5]);
  });

  test('should leave no sentinel behind', () => {
    const cleaned = scaleMaskedBand(raw, valid, quality, { scale: 0.0001, offset: 0 });
    const revalidated = bandValidityMask(cleaned, NaN);
    const kept = valid.and(quality);

    expect(revalidated.values).toEqual(kept.values);
  });

  test('should reject masks on other coordinates', () => {
    const shifted = new DataArray([[true, true, true, true]], {
      dims: ['y', 'x'],
      coords: { y: [5], x: [0, 1, 2, 3] }
    });
    expect(() => scaleMaskedBand(raw, shifted, undefined, { scale: 1, offset: 0 })).toThrow(ShapeMismatchError);
  });

  test('should reject masks with dims the band lacks', () => {
    const timed = new DataArray([[[true, true, true, true]]], { dims: ['time', 'y', 'x'] });
    expect(() => scaleMaskedBand(raw, timed, undefined, { scale: 1, offset: 0 })).toThrow(
      "Validity mask has dims [time] that band 'nir' lacks"
    );
  });
});

describe('cleanBands', () => {
  test('should clean every configured band of a cube', () => {
    const cube = sampleCube();
    const scl = cube.quality;
    if (!scl) throw new Error('sample cube has a quality layer');

    const cleaned = cleanBands(cube, {
      quality: categoricalQualityMask(scl, ['vegetation', 'water']),
      bands: { red: { scale: 0.01, offset: 0 } }
    });

    expect(cleaned.dataVars).toEqual(['red']);
    const firstStep = cleaned.getVariable('red').isel({ time: 0 }).values;
    expect(firstStep[0]).toBeCloseTo(1, 12);
    expect(firstStep[1]).toBeCloseTo(2, 12);
    expect(firstStep[2]).toBeNaN();
    expect(firstStep[3]).toBeNaN();
  });

  test('should default to every band unscaled', () => {
    const cleaned = cleanBands(sampleCube());
    expect(cleaned.dataVars).toEqual(['red', 'green']);
    expect(cleaned.getVariable('green').isel({ time: 1 }).values).toEqual([330, 210, 290, 400]);
  });
});
