/**
 * Pipeline configuration, validated with zod
 */

import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { ConfigError } from './errors.js';

const bandSchema = z.object({
  nodata: z
    .union([z.number(), z.literal('nan'), z.null()])
    .transform(value => (value === 'nan' || value === null ? NaN : value)),
  scale: z.number().finite().default(1),
  offset: z.number().finite().default(0)
});

const indexSchema = z.object({
  name: z.string().min(1),
  a: z.string().min(1),
  b: z.string().min(1),
  areaThreshold: z.number().finite().optional()
});

const rollingSchema = z
  .object({
    window: z.number().int().positive(),
    minPeriods: z.number().int().positive().default(1)
  })
  .refine(value => value.window % 2 === 1, { message: 'window must be odd', path: ['window'] })
  .refine(value => value.minPeriods <= value.window, {
    message: 'minPeriods must not exceed window',
    path: ['minPeriods']
  });

export const pipelineConfigSchema = z
  .object({
    bands: z.record(bandSchema).refine(value => Object.keys(value).length > 0, {
      message: 'at least one band is required'
    }),
    quality: z.object({
      variable: z.string().min(1).default('scl'),
      acceptable: z.array(z.string().min(1)).nonempty()
    }),
    goodDataThreshold: z.number().min(0).max(1),
    thresholdDenominator: z.enum(['total', 'valid']).default('total'),
    indices: z.array(indexSchema).default([]),
    rolling: rollingSchema,
    pixelArea: z.number().positive().default(1),
    logLevel: z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']).default('info')
  })
  .superRefine((config, ctx) => {
    config.indices.forEach((index, i) => {
      for (const key of ['a', 'b'] as const) {
        if (!Object.hasOwn(config.bands, index[key])) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['indices', i, key],
            message: `band '${index[key]}' is not configured`
          });
        }
      }
    });
  });

export type PipelineConfig = z.infer<typeof pipelineConfigSchema>;
export type PipelineConfigInput = z.input<typeof pipelineConfigSchema>;
export type BandConfig = PipelineConfig['bands'][string];
export type IndexConfig = PipelineConfig['indices'][number];

function formatIssue(issue: z.ZodIssue): string {
  const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
  return `${path}: ${issue.message}`;
}

/**
 * Validate a configuration object
 *
 * @throws ConfigError listing every issue
 */
export function parsePipelineConfig(input: unknown): PipelineConfig {
  const result = pipelineConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigError(result.error.issues.map(formatIssue));
  }
  return result.data;
}

/**
 * Read and validate a JSON configuration file
 */
export async function loadPipelineConfig(path: string): Promise<PipelineConfig> {
  const text = await readFile(path, 'utf8');
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError([`(file) ${path} is not valid JSON: ${reason}`]);
  }
  return parsePipelineConfig(json);
}
