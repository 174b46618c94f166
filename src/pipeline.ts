/**
 * End-to-end composition: masks → time-step filter → cleaned bands →
 * indices → series, plus the clear-fraction image and the per-step report.
 */

import { DataArray } from './DataArray.js';
import { Dataset } from './Dataset.js';
import { RasterCube } from './cube/raster-cube.js';
import { ClearcubeError } from './errors.js';
import { type PipelineConfig } from './config.js';
import { createLogger, type Logger } from './logger.js';
import { bandValidityMask, combineMasks } from './masks/band-validity.js';
import { categoricalQualityMask, SENTINEL2_SCENE_CLASSIFICATION, type QualityScheme } from './masks/quality.js';
import { rasterizePolygons, type PolygonInput } from './masks/vector-raster.js';
import { applyTimeStepFilter, filterTimeSteps, type TimeStepFilterResult } from './filters/time-step-filter.js';
import { cleanBands } from './scaling/scaled-masked-array.js';
import { computeIndex } from './indices/normalized-difference.js';
import {
  clearFraction,
  locateExtremes,
  rollingMedian,
  spatialReduce,
  temporalCount,
  thresholdCount,
  type Extreme
} from './aggregation/temporal.js';
import { buildTimeStepReport, type TimeStepReportRow } from './reporting/time-step-report.js';

export interface PipelineOptions {
  /** Region of interest, in the cube's CRS */
  polygons?: readonly PolygonInput[];
  qualityScheme?: QualityScheme;
  logger?: Logger;
}

export interface IndexSeries {
  /** Index image over the retained steps (lazy when the cube is lazy) */
  image: DataArray;
  count: DataArray;
  mean: DataArray;
  smoothedMean: DataArray;
  /** Pixels above the area threshold × pixel area, when a threshold is configured */
  area?: DataArray;
  smoothedArea?: DataArray;
  extremes?: { min: Extreme; max: Extreme };
}

export interface PipelineResult {
  filter: TimeStepFilterResult;
  cleaned: Dataset;
  region?: DataArray;
  indices: { [name: string]: IndexSeries };
  /** Per-pixel clear / valid observation ratio over all acquisitions */
  clearFraction: DataArray;
  report: TimeStepReportRow[];
}

function resolveQuality(cube: RasterCube, variable: string): DataArray {
  if (cube.quality) return cube.quality;
  if (cube.hasBand(variable)) return cube.band(variable);
  throw new ClearcubeError(`Cube has no quality variable '${variable}'`);
}

export async function runPipeline(
  cube: RasterCube,
  config: PipelineConfig,
  options: PipelineOptions = {}
): Promise<PipelineResult> {
  const log = options.logger ?? createLogger({ level: config.logLevel });
  const bandNames = Object.keys(config.bands);

  // Fail-fast checks before anything is evaluated
  for (const name of bandNames) cube.band(name);
  const qualityMask = categoricalQualityMask(
    resolveQuality(cube, config.quality.variable),
    config.quality.acceptable,
    options.qualityScheme ?? SENTINEL2_SCENE_CLASSIFICATION
  );
  const region = options.polygons
    ? rasterizePolygons(options.polygons, cube.grid, { coords: { x: cube.x, y: cube.y } })
    : undefined;

  const validity: { [band: string]: DataArray } = {};
  for (const name of bandNames) {
    validity[name] = bandValidityMask(cube.band(name).rename(name), config.bands[name].nodata);
  }
  const valid = combineMasks(Object.values(validity));
  const clear = valid.and(qualityMask).rename('clear');
  log.debug(`Built validity masks for ${bandNames.join(', ')} and quality mask`);

  // Against all pixels the filter scores the quality codes alone; against
  // valid pixels only acceptable pixels that are also valid count
  const relativeToValid = config.thresholdDenominator === 'valid';
  const filter = await filterTimeSteps(relativeToValid ? clear : qualityMask, config.goodDataThreshold, {
    relativeTo: relativeToValid ? valid : undefined,
    logger: log
  });

  const retainedValidity: { [band: string]: DataArray } = {};
  for (const [name, mask] of Object.entries(validity)) {
    retainedValidity[name] = applyTimeStepFilter(mask, filter);
  }
  const cleaned = cleanBands(applyTimeStepFilter(cube, filter), {
    validity: retainedValidity,
    quality: applyTimeStepFilter(qualityMask, filter),
    bands: config.bands
  });
  log.debug(`Cleaned ${bandNames.length} bands over ${filter.retained} time steps`);

  const indices: { [name: string]: IndexSeries } = {};
  for (const definition of config.indices) {
    const raw = computeIndex(cleaned, definition);
    const image = region ? raw.where(region, NaN).rename(definition.name) : raw;
    const { count, mean } = await spatialReduce(image);
    const smoothedMean = rollingMedian(mean, config.rolling);

    const series: IndexSeries = { image, count, mean, smoothedMean };
    const extremes = locateExtremes(smoothedMean);
    if (extremes) series.extremes = extremes;

    if (definition.areaThreshold !== undefined) {
      const above = await thresholdCount(image, definition.areaThreshold);
      series.area = above.multiply(config.pixelArea).rename(`${definition.name}_area`);
      series.smoothedArea = rollingMedian(series.area, config.rolling);
    }

    indices[definition.name] = series;
    log.debug(`Computed index '${definition.name}' series`);
  }

  const [clearCount, validCount] = await Promise.all([temporalCount(clear), temporalCount(valid)]);
  const fraction = clearFraction(clearCount, validCount);
  const report = await buildTimeStepReport(valid, clear);
  log.debug(`Built clear-fraction image and ${report.length}-row report`);

  return { filter, cleaned, region, indices, clearFraction: fraction, report };
}
