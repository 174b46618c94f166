import { describe, test, expect } from 'vitest';
import { fileURLToPath } from 'node:url';
import { loadPipelineConfig, parsePipelineConfig } from '../src/config.js';
import { ConfigError } from '../src/errors.js';

const fixture = (name: string): string => fileURLToPath(new URL(`./fixtures/${name}`, import.meta.url));

const minimal = {
  bands: { red: { nodata: 0 } },
  quality: { acceptable: ['vegetation'] },
  goodDataThreshold: 0.5,
  rolling: { window: 3 }
};

function issuesOf(input: unknown): readonly string[] {
  try {
    parsePipelineConfig(input);
  } catch (error) {
    if (error instanceof ConfigError) return error.issues;
    throw error;
  }
  return [];
}

describe('parsePipelineConfig', () => {
  test('should fill in defaults', () => {
    const config = parsePipelineConfig(minimal);

    expect(config.bands.red).toEqual({ nodata: 0, scale: 1, offset: 0 });
    expect(config.quality.variable).toBe('scl');
    expect(config.thresholdDenominator).toBe('total');
    expect(config.indices).toEqual([]);
    expect(config.rolling).toEqual({ window: 3, minPeriods: 1 });
    expect(config.pixelArea).toBe(1);
    expect(config.logLevel).toBe('info');
  });

  test('should read "nan" and null no-data as NaN', () => {
    const config = parsePipelineConfig({
      ...minimal,
      bands: { red: { nodata: 'nan' }, nir: { nodata: null } }
    });

    expect(config.bands.red.nodata).toBeNaN();
    expect(config.bands.nir.nodata).toBeNaN();
  });

  test('should reject an even rolling window', () => {
    expect(issuesOf({ ...minimal, rolling: { window: 4 } })).toEqual(['rolling.window: window must be odd']);
  });

  test('should reject minPeriods above the window', () => {
    expect(issuesOf({ ...minimal, rolling: { window: 3, minPeriods: 5 } }))
      .toEqual(['rolling.minPeriods: minPeriods must not exceed window']);
  });

  test('should reject indices over unconfigured bands', () => {
    const issues = issuesOf({ ...minimal, indices: [{ name: 'ndvi', a: 'nir', b: 'red' }] });
    expect(issues).toEqual(["indices.0.a: band 'nir' is not configured"]);
  });

  test('should reject an empty band set', () => {
    expect(issuesOf({ ...minimal, bands: {} })).toEqual(['bands: at least one band is required']);
  });

  test('should reject thresholds outside [0, 1]', () => {
    const issues = issuesOf({ ...minimal, goodDataThreshold: 1.5 });
    expect(issues).toHaveLength(1);
    expect(issues[0]).toMatch(/^goodDataThreshold: /);
  });

  test('should throw a ConfigError naming every problem', () => {
    expect(() => parsePipelineConfig({ ...minimal, pixelArea: -1, logLevel: 'loud' })).toThrow(ConfigError);
    const issues = issuesOf({ ...minimal, pixelArea: -1, logLevel: 'loud' });
    expect(issues.map(issue => issue.split(':')[0])).toEqual(['pixelArea', 'logLevel']);
  });

  test('should report a non-object input at the root', () => {
    expect(issuesOf(42)).toEqual(['(root): Expected object, received number']);
  });
});

describe('loadPipelineConfig', () => {
  test('should read and validate a JSON file', async () => {
    const config = await loadPipelineConfig(fixture('pipeline.json'));

    expect(Object.keys(config.bands)).toEqual(['green', 'swir16']);
    expect(config.bands.green).toEqual({ nodata: 0, scale: 0.0001, offset: 0 });
    expect(config.bands.swir16.offset).toBe(-0.1);
    expect(config.indices).toEqual([{ name: 'mndwi', a: 'green', b: 'swir16', areaThreshold: 0 }]);
    expect(config.rolling).toEqual({ window: 5, minPeriods: 2 });
    expect(config.pixelArea).toBe(100);
  });

  test('should reject a file that is not JSON', async () => {
    const path = fixture('broken.json');
    await expect(loadPipelineConfig(path)).rejects.toThrow(`(file) ${path} is not valid JSON`);
  });
});
