/**
 * GeoJSON → GeoParquet conversion with automatic column type inference
 */

export type {
  Bound,
  DataManifest,
  GeoParquetColumn,
  GeoParquetMetadata,
  GeometryType,
  GeometryTypeLabel,
  LayerManifest,
  PropertyMap,
  SourceFeature,
} from '../../shared/types/geo';
export {
  DEFAULT_CRS,
  DEFAULT_GEOMETRY_COLUMN,
  DEFAULT_GEOMETRY_ENCODING,
  GEOPARQUET_METADATA_KEY,
  GEOPARQUET_VERSION,
  MIXED_GEOMETRY_LABEL,
  UNKNOWN_GEOMETRY_LABEL,
} from '../../shared/types/geo';
export type {
  CanonicalTypeName,
  ColumnDescriptor,
  ColumnSlot,
  ColumnType,
  PropertyColumnMetadata,
  PropertyValue,
  Row,
  Schema,
  SemanticType,
  SlotType,
  TypedValue,
} from '../../shared/types/schema';
export { CANONICAL_TYPE_NAMES } from '../../shared/types/schema';

export { classifyValue, inferType, semanticTypeOf } from './lib/inference/infer';
export {
  analyzeProperties,
  promoteType,
  type TypeMap,
} from './lib/inference/analyzer';
export { coerce, coerceValue } from './lib/schema/coerce';
export {
  buildSchema,
  convertFeatures,
  toRow,
  type ConvertedRows,
} from './lib/schema/builder';
export {
  buildGeoMetadata,
  buildMetadata,
  geometryTypeLabel,
  summarizeGeometries,
  type GeometrySummary,
  type OutputMetadata,
} from './lib/metadata/builder';
export { unionAll, unionBounds } from './lib/metadata/bounds';
export { WkbGeometryEncoder, type GeometryEncoder } from './lib/geometry/encoder';
export { parseFeatureCollection, readGeoJSON } from './lib/io/reader';
export {
  encodeGeoParquet,
  toColumnData,
  toParquetSchema,
  writeGeoParquet,
  type WriteOptions,
} from './lib/io/writer';
export {
  convertCollection,
  generate,
  type ConversionReport,
  type ConversionResult,
  type ConvertOptions,
  type GenerateOptions,
  type GenerateResult,
} from './lib/generate';
export { buildLayerManifest, loadManifest, saveManifest, updateManifest } from './lib/manifest';
export { loadConfig, type ConverterConfig } from './lib/config';
export { determineOutputPath, isGeoJsonFile, validateOutputPath } from './lib/paths';
export {
  ConversionError,
  isConversionError,
  type ConversionErrorKind,
} from './lib/errors';
