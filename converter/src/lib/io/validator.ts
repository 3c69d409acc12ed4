/**
 * Zod validation schemas for GeoJSON input
 *
 * Checks the structure of a FeatureCollection before conversion. Coordinate
 * validity beyond array shape is left to the geometry encoder.
 */

import { z } from 'zod';
import type {
  Geometry,
  GeometryCollection,
  LineString,
  MultiLineString,
  MultiPoint,
  MultiPolygon,
  Point,
  Polygon,
} from 'geojson';
import type { SourceFeature } from '../../../../shared/types/geo';

// ============================================================================
// Geometry Schemas
// ============================================================================

const positionSchema = z.array(z.number());
const ringSchema = z.array(positionSchema);

export const pointSchema: z.ZodType<Point> = z.object({
  type: z.literal('Point'),
  coordinates: positionSchema,
});

export const lineStringSchema: z.ZodType<LineString> = z.object({
  type: z.literal('LineString'),
  coordinates: z.array(positionSchema),
});

export const polygonSchema: z.ZodType<Polygon> = z.object({
  type: z.literal('Polygon'),
  coordinates: z.array(ringSchema),
});

export const multiPointSchema: z.ZodType<MultiPoint> = z.object({
  type: z.literal('MultiPoint'),
  coordinates: z.array(positionSchema),
});

export const multiLineStringSchema: z.ZodType<MultiLineString> = z.object({
  type: z.literal('MultiLineString'),
  coordinates: z.array(ringSchema),
});

export const multiPolygonSchema: z.ZodType<MultiPolygon> = z.object({
  type: z.literal('MultiPolygon'),
  coordinates: z.array(z.array(ringSchema)),
});

export const geometrySchema: z.ZodType<Geometry> = z.lazy(() =>
  z.union([
    pointSchema,
    lineStringSchema,
    polygonSchema,
    multiPointSchema,
    multiLineStringSchema,
    multiPolygonSchema,
    geometryCollectionSchema,
  ])
);

export const geometryCollectionSchema: z.ZodType<GeometryCollection> = z.object({
  type: z.literal('GeometryCollection'),
  geometries: z.array(geometrySchema),
});

// ============================================================================
// Feature Schemas
// ============================================================================

export const featureSchema = z.object({
  type: z.literal('Feature'),
  id: z.union([z.string(), z.number()]).optional(),
  geometry: geometrySchema.nullable(),
  // Tolerate a missing `properties` member
  properties: z.record(z.unknown()).nullish(),
});

export const featureCollectionSchema = z.object({
  type: z.literal('FeatureCollection'),
  features: z.array(featureSchema),
});

// ============================================================================
// Validation Functions
// ============================================================================

/**
 * Safely validate a parsed FeatureCollection, returning a result
 *
 * @param input - Unknown input to validate
 * @returns Validation result with the features or a readable error summary
 */
export function safeValidateFeatureCollection(
  input: unknown
):
  | { success: true; data: SourceFeature[] }
  | { success: false; error: z.ZodError; summary: string } {
  const result = featureCollectionSchema.safeParse(input);
  if (!result.success) {
    const summary = result.error.issues
      .slice(0, 5)
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join(', ');
    return { success: false, error: result.error, summary };
  }

  const data = result.data.features.map((feature): SourceFeature => {
    const source: SourceFeature = {
      type: 'Feature',
      geometry: feature.geometry,
      properties: feature.properties ?? null,
    };
    if (feature.id !== undefined) {
      source.id = feature.id;
    }
    return source;
  });
  return { success: true, data };
}
