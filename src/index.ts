/**
 * clearcube - masking, spectral indices and aggregation for satellite
 * raster cubes, on top of a small labeled-array core.
 */

export { DataArray, type DataArrayRolling } from './DataArray.js';
export { Dataset } from './Dataset.js';
export * from './types.js';
export * from './errors.js';
export { parseCFTimeUnits, cfTimeToDate, isTimeCoordinate, decodeTimeCoordinate } from './time/cf-time.js';
export type { WhereOptions, BinaryOpOptions } from './ops/where.js';
export {
  createEagerBlock,
  createLazyBlock,
  isLazyBlock
} from './core/data-block.js';
export type { DataBlock, DataBlockKind } from './core/data-block.js';

// Backends
export { ZarrBackend, type ZarrStore, type OpenOptions } from './backends/zarr.js';

// Cube and grid
export * from './grid/affine.js';
export { RasterCube, CUBE_DIMS, type RasterCubeOptions, type FromDatasetOptions } from './cube/raster-cube.js';

// Masks and filtering
export { bandValidityMask, validityMasks, combineMasks } from './masks/band-validity.js';
export {
  categoricalQualityMask,
  qualitySchemeFromFlags,
  resolveCategoryCodes,
  SENTINEL2_SCENE_CLASSIFICATION,
  type QualityScheme
} from './masks/quality.js';
export {
  rasterizePolygons,
  selectPolygons,
  type PolygonGeometry,
  type PolygonInput,
  type RasterizeOptions
} from './masks/vector-raster.js';
export {
  filterTimeSteps,
  applyTimeStepFilter,
  type TimeStepFilterOptions,
  type TimeStepFilterResult
} from './filters/time-step-filter.js';

// Cleaning, indices and aggregation
export { scaleMaskedBand, cleanBands, type BandScaling, type CleanBandsOptions } from './scaling/scaled-masked-array.js';
export {
  normalizedDifference,
  computeIndex,
  INDEX_PRESETS,
  type IndexDefinition,
  type IndexPreset
} from './indices/normalized-difference.js';
export {
  rollingMedian,
  spatialReduce,
  thresholdCount,
  temporalCount,
  clearFraction,
  locateExtremes,
  type RollingMedianOptions,
  type SpatialReduceOptions,
  type SpatialSummary,
  type Extreme
} from './aggregation/temporal.js';
export { buildTimeStepReport, formatReportCsv, type TimeStepReportRow } from './reporting/time-step-report.js';

// Configuration, logging and the pipeline
export {
  parsePipelineConfig,
  loadPipelineConfig,
  pipelineConfigSchema,
  type PipelineConfig,
  type PipelineConfigInput,
  type BandConfig,
  type IndexConfig
} from './config.js';
export { createLogger, logger, type Logger, type LoggerOptions } from './logger.js';
export { runPipeline, type PipelineOptions, type PipelineResult, type IndexSeries } from './pipeline.js';

// Version
export const VERSION = '0.1.0';
