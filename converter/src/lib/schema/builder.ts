/**
 * Schema & Row Builder
 *
 * Builds the row schema from inferred column descriptors (geometry first,
 * then one column per property) and converts features into typed rows.
 */

import type { SourceFeature } from '../../../../shared/types/geo';
import { DEFAULT_GEOMETRY_COLUMN } from '../../../../shared/types/geo';
import type {
  ColumnDescriptor,
  ColumnSlot,
  Row,
  Schema,
  TypedValue,
} from '../../../../shared/types/schema';
import type { GeometryEncoder } from '../geometry/encoder';
import { ConversionError } from '../errors';
import { classifyValue } from '../inference/infer';
import { coerce } from './coerce';

/**
 * Column name for a property whose key is already taken by another column
 */
function uniqueColumnName(key: string, taken: Set<string>): string {
  if (!taken.has(key)) {
    return key;
  }
  const base = `${key}_property`;
  let candidate = base;
  for (let suffix = 1; taken.has(candidate); suffix++) {
    candidate = `${base}_${suffix}`;
  }
  return candidate;
}

/**
 * Build the row schema: geometry slot first, then one slot per descriptor
 */
export function buildSchema(descriptors: readonly ColumnDescriptor[]): Schema {
  const geometrySlot: ColumnSlot = {
    name: DEFAULT_GEOMETRY_COLUMN,
    key: null,
    type: 'geometry',
    nullable: true,
  };

  const taken = new Set<string>([
    DEFAULT_GEOMETRY_COLUMN,
    ...descriptors.map((descriptor) => descriptor.name),
  ]);
  const columns: ColumnSlot[] = [geometrySlot];

  for (const descriptor of descriptors) {
    let name = descriptor.name;
    if (name === DEFAULT_GEOMETRY_COLUMN) {
      name = uniqueColumnName(name, taken);
      taken.add(name);
    }
    columns.push({
      name,
      key: descriptor.name,
      type: descriptor.type,
      nullable: descriptor.nullable,
    });
  }

  return { columns };
}

/**
 * Own property value of a feature (inherited names such as `constructor`
 * are treated as absent)
 */
function readProperty(feature: SourceFeature, key: string): unknown {
  const properties = feature.properties;
  return properties && Object.hasOwn(properties, key) ? properties[key] : undefined;
}

/**
 * Encode the geometry slot of a feature
 *
 * @throws ConversionError (kind 'geometry') when the geometry cannot be encoded
 */
function encodeGeometry(
  feature: SourceFeature,
  encoder: GeometryEncoder,
  index: number
): TypedValue | null {
  if (!feature.geometry) {
    return null;
  }

  try {
    return { type: 'geometry', value: encoder.encode(feature.geometry) };
  } catch (error) {
    throw new ConversionError(
      'geometry',
      `failed to encode geometry for feature ${index}`,
      error
    );
  }
}

/**
 * Convert one feature into a row conforming to the schema
 *
 * @param index - Position of the feature in its collection, used in errors
 */
export function toRow(
  feature: SourceFeature,
  schema: Schema,
  encoder: GeometryEncoder,
  index = 0
): Row {
  return schema.columns.map((slot) => {
    if (slot.type === 'geometry') {
      return encodeGeometry(feature, encoder, index);
    }
    if (slot.key === null) {
      return null;
    }
    return coerce(classifyValue(readProperty(feature, slot.key)), slot.type);
  });
}

export interface ConvertedRows {
  rows: Row[];
  /** Non-null property values that did not fit their column, per column name */
  coercionMismatches: Record<string, number>;
}

/**
 * Convert every feature, counting values that were replaced by null
 */
export function convertFeatures(
  features: readonly SourceFeature[],
  schema: Schema,
  encoder: GeometryEncoder
): ConvertedRows {
  const coercionMismatches: Record<string, number> = {};
  const rows = features.map((feature, index) => {
    const row = toRow(feature, schema, encoder, index);

    schema.columns.forEach((slot, column) => {
      if (slot.key === null || row[column] !== null) {
        return;
      }
      const raw = readProperty(feature, slot.key);
      if (raw !== null && raw !== undefined) {
        coercionMismatches[slot.name] = (coercionMismatches[slot.name] ?? 0) + 1;
      }
    });

    return row;
  });

  return { rows, coercionMismatches };
}
