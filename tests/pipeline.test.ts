import { describe, test, expect } from 'vitest';
import type { Polygon } from 'geojson';
import { DataArray } from '../src/DataArray.js';
import { RasterCube } from '../src/cube/raster-cube.js';
import { ClearcubeError } from '../src/errors.js';
import { parsePipelineConfig, type PipelineConfigInput } from '../src/config.js';
import { createLogger } from '../src/logger.js';
import { runPipeline } from '../src/pipeline.js';
import { X, Y, cubeArray, days, sampleCube } from './helpers/cube.js';

const quiet = createLogger({ silent: true });

function config(overrides: Partial<PipelineConfigInput> = {}) {
  return parsePipelineConfig({
    bands: { red: { nodata: 'nan' }, green: { nodata: 'nan' } },
    quality: { acceptable: ['vegetation', 'water'] },
    goodDataThreshold: 0.5,
    indices: [{ name: 'ndwi', a: 'green', b: 'red', areaThreshold: 0 }],
    rolling: { window: 3 },
    pixelArea: 100,
    ...overrides
  });
}

const leftColumn: Polygon = {
  type: 'Polygon',
  coordinates: [[[0, 0], [1, 0], [1, 2], [0, 2], [0, 0]]]
};

describe('runPipeline', () => {
  test('should drop acquisitions below the good-data threshold', async () => {
    const { filter } = await runPipeline(sampleCube(), config(), { logger: quiet });

    expect(filter.goodFraction).toEqual([0.5, 1, 0.25]);
    expect(filter.indices).toEqual([0, 1]);
    expect(filter.times).toEqual(days(2));
  });

  test('should mask invalid and unacceptable pixels in the cleaned bands', async () => {
    const { cleaned } = await runPipeline(sampleCube(), config(), { logger: quiet });

    expect(cleaned.getVariable('red').data).toEqual([
      [[100, 200], [NaN, NaN]],
      [[110, 210], [310, 410]]
    ]);
    expect(cleaned.getVariable('green').data).toEqual([
      [[300, 200], [NaN, NaN]],
      [[330, 210], [290, 400]]
    ]);
  });

  test('should summarise each index per retained acquisition', async () => {
    const { indices } = await runPipeline(sampleCube(), config(), { logger: quiet });
    const ndwi = indices.ndwi;

    expect(ndwi.image.values.slice(0, 4)).toEqual([0.5, 0, NaN, NaN]);
    expect(ndwi.count.values).toEqual([2, 4]);
    expect(ndwi.mean.values[0]).toBe(0.25);
    expect(ndwi.mean.values[1]).toBeCloseTo((0.5 - 1 / 30 - 1 / 81) / 4, 12);
    expect(ndwi.smoothedMean.values[0]).toBeCloseTo((0.25 + (0.5 - 1 / 30 - 1 / 81) / 4) / 2, 12);
    expect(ndwi.area?.values).toEqual([100, 100]);
    expect(ndwi.area?.name).toBe('ndwi_area');
    expect(ndwi.smoothedArea?.values).toEqual([100, 100]);
    expect(ndwi.extremes).toBeDefined();
  });

  test('should skip the area series without an area threshold', async () => {
    const { indices } = await runPipeline(
      sampleCube(),
      config({ indices: [{ name: 'ndwi', a: 'green', b: 'red' }] }),
      { logger: quiet }
    );
    expect(indices.ndwi.area).toBeUndefined();
  });

  test('should compute the clear fraction and report over all acquisitions', async () => {
    const result = await runPipeline(sampleCube(), config(), { logger: quiet });

    expect(result.clearFraction.data).toEqual([[1, 1], [0.5, 1]]);
    expect(result.report.map(row => [row.validCount, row.clearCount])).toEqual([[3, 2], [4, 4], [1, 1]]);
    expect(result.report.map(row => row.clearPercent)).toEqual([50, 100, 25]);
  });

  test('should restrict index statistics to the region', async () => {
    const { region, indices } = await runPipeline(sampleCube(), config(), {
      logger: quiet,
      polygons: [leftColumn]
    });

    expect(region?.data).toEqual([[true, false], [true, false]]);
    expect(indices.ndwi.count.values).toEqual([1, 2]);
    expect(indices.ndwi.mean.values[0]).toBe(0.5);
    expect(indices.ndwi.mean.values[1]).toBeCloseTo((0.5 - 1 / 30) / 2, 12);
    expect(indices.ndwi.area?.values).toEqual([100, 100]);
  });

  test('should measure the threshold against valid pixels when configured', async () => {
    const total = await runPipeline(sampleCube(), config({ goodDataThreshold: 0.7 }), { logger: quiet });
    const valid = await runPipeline(
      sampleCube(),
      config({ goodDataThreshold: 0.7, thresholdDenominator: 'valid' }),
      { logger: quiet }
    );

    expect(total.filter.indices).toEqual([1]);
    expect(valid.filter.indices).toEqual([1, 2]);
  });

  test('should give the same results for a chunked cube', async () => {
    const eager = sampleCube();
    const lazy = new RasterCube({
      bands: {
        red: eager.band('red').chunk({ time: 1 }),
        green: eager.band('green').chunk({ time: 1 })
      },
      quality: eager.quality?.chunk({ time: 1 })
    });

    const result = await runPipeline(lazy, config(), { logger: quiet });
    const red = await result.cleaned.getVariable('red').compute();

    expect(result.filter.indices).toEqual([0, 1]);
    expect(red.values).toEqual([100, 200, NaN, NaN, 110, 210, 310, 410]);
    expect(result.indices.ndwi.count.values).toEqual([2, 4]);
  });

  test('should fail before reading any data when a band is missing', async () => {
    let reads = 0;
    const red = new DataArray(null, {
      lazy: true,
      virtualShape: [1, 2, 2],
      dims: ['time', 'y', 'x'],
      coords: { time: days(1), y: Y, x: X },
      lazyLoader: () => {
        reads++;
        return [1, 2, 3, 4];
      }
    });
    const cube = new RasterCube({ bands: { red }, quality: red.rename('scl') });

    await expect(runPipeline(cube, config(), { logger: quiet }))
      .rejects.toThrow("Band 'green' not found; available bands: red");
    expect(reads).toBe(0);
  });

  test('should fall back to a band named like the quality variable', async () => {
    const source = sampleCube();
    const quality = source.quality;
    if (!quality) throw new Error('sample cube has a quality layer');
    const cube = new RasterCube({
      bands: { red: source.band('red'), green: source.band('green'), scl: quality }
    });

    const { filter } = await runPipeline(cube, config(), { logger: quiet });
    expect(filter.indices).toEqual([0, 1]);
  });

  test('should reject a cube without a quality layer', async () => {
    const source = sampleCube();
    const cube = new RasterCube({ bands: { red: source.band('red'), green: source.band('green') } });

    await expect(runPipeline(cube, config(), { logger: quiet })).rejects.toThrow(ClearcubeError);
    await expect(runPipeline(cube, config(), { logger: quiet }))
      .rejects.toThrow("Cube has no quality variable 'scl'");
  });

  test('should score acquisitions on the quality codes when measured against all pixels', async () => {
    const cube = new RasterCube({
      bands: {
        red: cubeArray([[[NaN, NaN], [NaN, 100]]], 'red'),
        green: cubeArray([[[300, 300], [300, 300]]], 'green')
      },
      quality: cubeArray([[[4, 4], [4, 4]]], 'scl')
    });

    const result = await runPipeline(cube, config(), { logger: quiet });

    expect(result.filter.goodFraction).toEqual([1]);
    expect(result.cleaned.getVariable('red').data).toEqual([[[NaN, NaN], [NaN, 100]]]);
    expect(result.indices.ndwi.count.values).toEqual([1]);
    expect(result.indices.ndwi.mean.values).toEqual([0.5]);
    expect(result.report.map(row => [row.validCount, row.clearCount])).toEqual([[1, 1]]);
  });

  test('should combine a region with a cube on a tenth-of-a-degree grid', async () => {
    const x = [-36.15, -36.05, -35.95, -35.85];
    const y = [-3.65, -3.75, -3.85, -3.95];
    const layer = (value: number, name: string) =>
      new DataArray([Array.from({ length: 4 }, () => new Array<number>(4).fill(value))], {
        dims: ['time', 'y', 'x'],
        coords: { time: days(1), y, x },
        name
      });
    const cube = new RasterCube({
      bands: { red: layer(100, 'red'), green: layer(300, 'green') },
      quality: layer(4, 'scl')
    });
    const westHalf: Polygon = {
      type: 'Polygon',
      coordinates: [[[-36.2, -4], [-36, -4], [-36, -3.6], [-36.2, -3.6], [-36.2, -4]]]
    };

    const { region, indices } = await runPipeline(cube, config(), { logger: quiet, polygons: [westHalf] });

    expect(region?.coords.x).toEqual(x);
    expect(region?.coords.y).toEqual(y);
    expect(indices.ndwi.count.values).toEqual([8]);
    expect(indices.ndwi.mean.values).toEqual([0.5]);
  });
});
