/**
 * Categorical pixel-quality masks (scene classification layers)
 */

import { z } from 'zod';
import { DataArray } from '../DataArray.js';
import { Attributes } from '../types.js';
import { ClearcubeError, UnknownCategoryError } from '../errors.js';

export interface QualityScheme {
  name: string;
  /** Label → category code */
  categories: Readonly<Record<string, number>>;
}

/**
 * Sentinel-2 Level-2A scene classification (SCL)
 */
export const SENTINEL2_SCENE_CLASSIFICATION: QualityScheme = {
  name: 'sentinel2-scl',
  categories: {
    'no-data': 0,
    'saturated-or-defective': 1,
    'dark-area': 2,
    'cloud-shadow': 3,
    vegetation: 4,
    'bare-soil': 5,
    water: 6,
    unclassified: 7,
    'cloud-medium': 8,
    'cloud-high': 9,
    'thin-cirrus': 10,
    'snow-or-ice': 11
  }
};

/**
 * Resolve labels to category codes, failing on the first unknown label
 */
export function resolveCategoryCodes(acceptable: readonly string[], scheme: QualityScheme): number[] {
  const known = Object.keys(scheme.categories);
  return acceptable.map(label => {
    if (!Object.hasOwn(scheme.categories, label)) {
      throw new UnknownCategoryError(label, known, scheme.name);
    }
    return scheme.categories[label];
  });
}

/**
 * True where the pixel's quality code belongs to one of the acceptable
 * labels. Missing codes (NaN) are never acceptable.
 *
 * Labels are checked before any array work happens, so an unknown label
 * fails fast even on a lazy quality layer.
 */
export function categoricalQualityMask(
  quality: DataArray,
  acceptable: readonly string[],
  scheme: QualityScheme = SENTINEL2_SCENE_CLASSIFICATION
): DataArray {
  const codes = resolveCategoryCodes(acceptable, scheme);
  return quality.isin(codes).rename('quality_ok');
}

const flagsDefinitionSchema = z.record(
  z.object({
    values: z.record(z.string()),
    description: z.string().optional()
  }).passthrough()
);

function toLabel(text: string): string {
  return text.trim().toLowerCase().replace(/[^a-z0-9]+/g, '-').replace(/^-+|-+$/g, '');
}

/**
 * Build a scheme from a datacube-style `flags_definition` attribute:
 *
 * ```json
 * { "qa": { "values": { "0": "no data", "4": "vegetation" } } }
 * ```
 *
 * Labels are normalized to kebab case ("no data" → "no-data").
 */
export function qualitySchemeFromFlags(attrs: Attributes, flag?: string): QualityScheme {
  const parsed = flagsDefinitionSchema.safeParse(attrs.flags_definition);
  if (!parsed.success) {
    throw new ClearcubeError('Attributes carry no valid flags_definition');
  }

  const flagNames = Object.keys(parsed.data);
  const chosen = flag ?? flagNames[0];
  const definition = chosen === undefined ? undefined : parsed.data[chosen];
  if (definition === undefined) {
    throw new ClearcubeError(
      `Flag '${flag ?? ''}' not found in flags_definition; available: ${flagNames.join(', ')}`
    );
  }

  const categories: Record<string, number> = {};
  for (const [code, text] of Object.entries(definition.values)) {
    const value = Number(code);
    if (!Number.isInteger(value)) {
      throw new ClearcubeError(`flags_definition '${chosen}' has non-integer code '${code}'`);
    }
    categories[toLabel(text)] = value;
  }

  return { name: chosen, categories };
}
