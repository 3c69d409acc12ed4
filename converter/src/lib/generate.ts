/**
 * Generate Pipeline
 *
 * GeoJSON features → inferred columns → typed rows + `geo` metadata → GeoParquet.
 * The whole file is encoded in memory before anything touches the output path.
 */

import type { LayerManifest, SourceFeature } from '../../../shared/types/geo';
import type { ColumnDescriptor, Schema } from '../../../shared/types/schema';
import { ConversionError } from './errors';
import type { GeometryEncoder } from './geometry/encoder';
import { WkbGeometryEncoder } from './geometry/encoder';
import { analyzeProperties } from './inference/analyzer';
import { readGeoJSON } from './io/reader';
import type { WriteOptions } from './io/writer';
import { DEFAULT_WRITE_OPTIONS, encodeGeoParquet, writeGeoParquet } from './io/writer';
import { buildLayerManifest, updateManifest } from './manifest';
import type { OutputMetadata } from './metadata/builder';
import { buildMetadata } from './metadata/builder';
import { buildSchema, convertFeatures } from './schema/builder';

export interface ConvertOptions extends Partial<WriteOptions> {
  encoder?: GeometryEncoder;
}

export interface GenerateOptions extends ConvertOptions {
  /** Manifest file to add this conversion to */
  manifestPath?: string;
}

/**
 * Outcome of one conversion
 */
export interface ConversionReport {
  featureCount: number;
  descriptors: ColumnDescriptor[];
  schema: Schema;
  metadata: OutputMetadata;
  /** Values replaced by null because they did not fit their column */
  coercionMismatches: Record<string, number>;
}

export interface ConversionResult {
  bytes: Uint8Array;
  report: ConversionReport;
}

export interface GenerateResult extends ConversionReport {
  outputPath: string;
  manifest?: LayerManifest;
}

/**
 * Convert an in-memory feature collection to GeoParquet bytes
 *
 * @throws ConversionError (kind 'input') for an empty collection,
 *   (kind 'geometry') for an unencodable geometry, (kind 'write') for encoder faults
 */
export function convertCollection(
  features: readonly SourceFeature[],
  options: ConvertOptions = {}
): ConversionResult {
  if (features.length === 0) {
    throw new ConversionError('input', 'no features found in GeoJSON file');
  }

  const encoder = options.encoder ?? new WkbGeometryEncoder();
  const descriptors = analyzeProperties(features);
  const schema = buildSchema(descriptors);
  const { rows, coercionMismatches } = convertFeatures(features, schema, encoder);
  const metadata = buildMetadata(features, descriptors, encoder);

  const bytes = encodeGeoParquet(schema, rows, metadata.geo, {
    compression: options.compression ?? DEFAULT_WRITE_OPTIONS.compression,
  });

  return {
    bytes,
    report: {
      featureCount: features.length,
      descriptors,
      schema,
      metadata,
      coercionMismatches,
    },
  };
}

/**
 * Generate a GeoParquet file from a GeoJSON file with automatic type inference
 */
export function generate(
  inputPath: string,
  outputPath: string,
  options: GenerateOptions = {}
): GenerateResult {
  const features = readGeoJSON(inputPath);
  const { bytes, report } = convertCollection(features, options);
  writeGeoParquet(outputPath, bytes);

  const result: GenerateResult = { ...report, outputPath };
  if (options.manifestPath) {
    const layer = buildLayerManifest(
      inputPath,
      outputPath,
      report.featureCount,
      report.metadata
    );
    updateManifest(options.manifestPath, layer);
    result.manifest = layer;
  }
  return result;
}
