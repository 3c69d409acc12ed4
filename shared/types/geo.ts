import type { Feature, Geometry } from 'geojson';

// ============================================================================
// Core Domain Types
// ============================================================================

/**
 * Property map of a source feature. Values are untyped until inferred.
 */
export type PropertyMap = Record<string, unknown>;

/**
 * One input feature: optional geometry and optional property map
 */
export type SourceFeature = Feature<Geometry | null, PropertyMap | null>;

/**
 * GeoJSON geometry type tags
 */
export type GeometryType = Geometry['type'];

/**
 * Axis-aligned bounding rectangle: [minX, minY, maxX, maxY]
 */
export type Bound = [number, number, number, number];

/**
 * Label describing the geometry types of a whole collection
 */
export type GeometryTypeLabel = GeometryType | 'Mixed' | 'Unknown';

// ============================================================================
// GeoParquet Metadata
// ============================================================================

export const GEOPARQUET_VERSION = '1.1.0';
export const GEOPARQUET_METADATA_KEY = 'geo';
export const DEFAULT_GEOMETRY_COLUMN = 'geometry';
export const DEFAULT_GEOMETRY_ENCODING = 'WKB';

/**
 * CRS identifier of the implicit default reference system (GeoJSON longitude/latitude)
 */
export const DEFAULT_CRS = 'OGC:CRS84';

export const MIXED_GEOMETRY_LABEL = 'Mixed';
export const UNKNOWN_GEOMETRY_LABEL = 'Unknown';

/**
 * Metadata for one geometry column, keyed by column name in GeoParquetMetadata
 */
export interface GeoParquetColumn {
  encoding: typeof DEFAULT_GEOMETRY_ENCODING;
  geometry_types: GeometryType[];
  // Omitted for the default CRS
  crs?: string | null;
  bbox?: Bound;
}

/**
 * The `geo` key/value metadata block of a GeoParquet file
 */
export interface GeoParquetMetadata {
  version: typeof GEOPARQUET_VERSION;
  primary_column: string;
  columns: Record<string, GeoParquetColumn>;
}

// ============================================================================
// Layer Manifest
// ============================================================================

/**
 * Summary of one converted file, stored in the manifest sidecar
 */
export interface LayerManifest {
  name: string;
  source: string;
  output: string;
  geometryType: GeometryTypeLabel;
  geometryTypes: GeometryType[];
  featureCount: number;
  extent: {
    minX: number;
    minY: number;
    maxX: number;
    maxY: number;
  } | null;
  fields: Record<string, string>;
  crs: typeof DEFAULT_CRS;
  generatedAt: string;
  version: string;
}

export interface DataManifest {
  layers: Record<string, LayerManifest>;
  generatedAt: string;
  version: string;
}

// ============================================================================
// Type Guards
// ============================================================================

/**
 * Type guard for features that carry a geometry
 */
export function hasGeometry(
  feature: SourceFeature
): feature is Feature<Geometry, PropertyMap | null> {
  return feature.geometry !== null && feature.geometry !== undefined;
}

/**
 * Type guard for plain JSON objects (not arrays, not class instances such as Date or Map)
 */
export function isPropertyMap(value: unknown): value is PropertyMap {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false;
  }
  const prototype = Object.getPrototypeOf(value);
  return prototype === Object.prototype || prototype === null;
}
