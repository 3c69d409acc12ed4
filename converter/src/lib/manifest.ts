/**
 * Layer Manifest
 *
 * Optional JSON sidecar recording what each conversion produced: feature
 * count, extent, geometry types and field types per output file.
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'fs';
import { basename, dirname, extname } from 'path';
import { z } from 'zod';
import type { DataManifest, LayerManifest } from '../../../shared/types/geo';
import { DEFAULT_CRS } from '../../../shared/types/geo';
import { ConversionError, describeError } from './errors';
import type { OutputMetadata } from './metadata/builder';
import { toExtent } from './metadata/bounds';
import { VERSION } from './version';

const GEOMETRY_TYPES = [
  'Point',
  'LineString',
  'Polygon',
  'MultiPoint',
  'MultiLineString',
  'MultiPolygon',
  'GeometryCollection',
] as const;

const layerManifestSchema: z.ZodType<LayerManifest> = z.object({
  name: z.string(),
  source: z.string(),
  output: z.string(),
  geometryType: z.enum([...GEOMETRY_TYPES, 'Mixed', 'Unknown']),
  geometryTypes: z.array(z.enum(GEOMETRY_TYPES)),
  featureCount: z.number().int().nonnegative(),
  extent: z
    .object({
      minX: z.number(),
      minY: z.number(),
      maxX: z.number(),
      maxY: z.number(),
    })
    .nullable(),
  fields: z.record(z.string()),
  crs: z.literal(DEFAULT_CRS),
  generatedAt: z.string(),
  version: z.string(),
});

export const dataManifestSchema: z.ZodType<DataManifest> = z.object({
  layers: z.record(layerManifestSchema),
  generatedAt: z.string(),
  version: z.string(),
});

/**
 * Layer name of an output file (its base name without extension)
 */
export function layerNameOf(outputPath: string): string {
  return basename(outputPath, extname(outputPath));
}

/**
 * Build the manifest entry for one conversion
 */
export function buildLayerManifest(
  source: string,
  output: string,
  featureCount: number,
  metadata: OutputMetadata,
  generatedAt: string = new Date().toISOString()
): LayerManifest {
  const fields: Record<string, string> = {};
  for (const property of metadata.properties) {
    fields[property.name] = property.type;
  }

  return {
    name: layerNameOf(output),
    source,
    output,
    geometryType: metadata.geometryType,
    geometryTypes: metadata.summary.geometryTypes,
    featureCount,
    extent: metadata.summary.bound ? toExtent(metadata.summary.bound) : null,
    fields,
    crs: DEFAULT_CRS,
    generatedAt,
    version: VERSION,
  };
}

/**
 * Load or create data manifest
 *
 * @throws ConversionError (kind 'input') when an existing manifest cannot be parsed
 */
export function loadManifest(manifestPath: string): DataManifest {
  if (!existsSync(manifestPath)) {
    return {
      layers: {},
      generatedAt: new Date().toISOString(),
      version: VERSION,
    };
  }

  try {
    return dataManifestSchema.parse(JSON.parse(readFileSync(manifestPath, 'utf-8')));
  } catch (error) {
    throw new ConversionError(
      'input',
      `failed to read manifest ${manifestPath}: ${describeError(error)}`,
      error
    );
  }
}

/**
 * Save data manifest
 *
 * @throws ConversionError (kind 'write') on any file system fault
 */
export function saveManifest(manifest: DataManifest, manifestPath: string): void {
  try {
    const dir = dirname(manifestPath);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
    writeFileSync(manifestPath, JSON.stringify(manifest, null, 2) + '\n');
  } catch (error) {
    throw new ConversionError('write', `failed to write manifest ${manifestPath}`, error);
  }
}

/**
 * Add or replace one layer entry in the manifest file
 */
export function updateManifest(manifestPath: string, layer: LayerManifest): DataManifest {
  const manifest = loadManifest(manifestPath);
  manifest.layers[layer.name] = layer;
  manifest.generatedAt = layer.generatedAt;
  saveManifest(manifest, manifestPath);
  return manifest;
}
