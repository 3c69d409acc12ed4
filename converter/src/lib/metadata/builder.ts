/**
 * Metadata Builder
 *
 * Aggregates geometry types and bounds over a collection and produces the
 * GeoParquet `geo` descriptor, plus per-property column metadata.
 */

import type {
  Bound,
  GeoParquetColumn,
  GeoParquetMetadata,
  GeometryType,
  GeometryTypeLabel,
  SourceFeature,
} from '../../../../shared/types/geo';
import {
  DEFAULT_GEOMETRY_COLUMN,
  DEFAULT_GEOMETRY_ENCODING,
  GEOPARQUET_VERSION,
  MIXED_GEOMETRY_LABEL,
  UNKNOWN_GEOMETRY_LABEL,
  hasGeometry,
} from '../../../../shared/types/geo';
import type {
  ColumnDescriptor,
  PropertyColumnMetadata,
} from '../../../../shared/types/schema';
import { CANONICAL_TYPE_NAMES } from '../../../../shared/types/schema';
import type { GeometryEncoder } from '../geometry/encoder';
import { compareNames } from '../inference/analyzer';
import { unionAll } from './bounds';

/**
 * Geometry types and union bound observed over a collection
 */
export interface GeometrySummary {
  /** Distinct type tags, sorted */
  geometryTypes: GeometryType[];
  bound: Bound | null;
}

export interface OutputMetadata {
  geo: GeoParquetMetadata;
  geometryType: GeometryTypeLabel;
  summary: GeometrySummary;
  properties: PropertyColumnMetadata[];
}

/**
 * Collect geometry types and the union of all geometry bounds
 */
export function summarizeGeometries(
  features: readonly SourceFeature[],
  encoder: GeometryEncoder
): GeometrySummary {
  const types = new Set<GeometryType>();
  const bounds: Array<Bound | null> = [];

  for (const feature of features.filter(hasGeometry)) {
    types.add(encoder.typeOf(feature.geometry));
    bounds.push(encoder.boundOf(feature.geometry));
  }

  return {
    geometryTypes: Array.from(types).sort(compareNames),
    bound: unionAll(bounds),
  };
}

/**
 * Single type, "Mixed" for several, "Unknown" for none
 */
export function geometryTypeLabel(
  geometryTypes: readonly GeometryType[]
): GeometryTypeLabel {
  if (geometryTypes.length === 0) {
    return UNKNOWN_GEOMETRY_LABEL;
  }
  if (geometryTypes.length === 1) {
    return geometryTypes[0];
  }
  return MIXED_GEOMETRY_LABEL;
}

/**
 * Metadata entries for property columns
 */
export function describeProperties(
  descriptors: readonly ColumnDescriptor[]
): PropertyColumnMetadata[] {
  return descriptors.map((descriptor) => ({
    name: descriptor.name,
    type: CANONICAL_TYPE_NAMES[descriptor.type],
    nullable: descriptor.nullable,
  }));
}

/**
 * Build the GeoParquet `geo` block from a geometry summary
 */
export function buildGeoMetadata(summary: GeometrySummary): GeoParquetMetadata {
  const column: GeoParquetColumn = {
    encoding: DEFAULT_GEOMETRY_ENCODING,
    geometry_types: summary.geometryTypes,
  };
  if (summary.bound) {
    column.bbox = summary.bound;
  }

  return {
    version: GEOPARQUET_VERSION,
    primary_column: DEFAULT_GEOMETRY_COLUMN,
    columns: { [DEFAULT_GEOMETRY_COLUMN]: column },
  };
}

/**
 * Build all output metadata for a collection
 */
export function buildMetadata(
  features: readonly SourceFeature[],
  descriptors: readonly ColumnDescriptor[],
  encoder: GeometryEncoder
): OutputMetadata {
  const summary = summarizeGeometries(features, encoder);

  return {
    geo: buildGeoMetadata(summary),
    geometryType: geometryTypeLabel(summary.geometryTypes),
    summary,
    properties: describeProperties(descriptors),
  };
}
