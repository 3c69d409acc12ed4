/**
 * GeoParquet Writer
 *
 * Maps the inferred schema onto Parquet schema elements, transposes rows into
 * columns and writes them with the `geo` key/value metadata.
 */

import { existsSync, mkdirSync, writeFileSync } from 'fs';
import { dirname } from 'path';
import { parquetWriteBuffer } from 'hyparquet-writer';
import type { SchemaElement } from 'hyparquet';
import type { GeoParquetMetadata } from '../../../../shared/types/geo';
import { GEOPARQUET_METADATA_KEY } from '../../../../shared/types/geo';
import type {
  ColumnSlot,
  Row,
  Schema,
  TypedValue,
} from '../../../../shared/types/schema';
import type { CompressionCodec } from '../config';
import { ConversionError } from '../errors';

export interface WriteOptions {
  compression: CompressionCodec;
}

export const DEFAULT_WRITE_OPTIONS: WriteOptions = {
  compression: 'SNAPPY',
};

/**
 * Column values as handed to the Parquet writer
 */
export type ColumnValue = Uint8Array | string | bigint | number | boolean | null;

export interface ParquetColumn {
  name: string;
  data: ColumnValue[];
}

function toSchemaElement(slot: ColumnSlot): SchemaElement {
  const repetition_type = slot.nullable ? 'OPTIONAL' : 'REQUIRED';

  switch (slot.type) {
    case 'geometry':
      return { name: slot.name, type: 'BYTE_ARRAY', repetition_type };
    case 'string':
      return {
        name: slot.name,
        type: 'BYTE_ARRAY',
        converted_type: 'UTF8',
        repetition_type,
      };
    case 'integer':
      return { name: slot.name, type: 'INT64', repetition_type };
    case 'float':
      return { name: slot.name, type: 'DOUBLE', repetition_type };
    case 'boolean':
      return { name: slot.name, type: 'BOOLEAN', repetition_type };
  }
}

/**
 * Parquet schema elements for a row schema (root element first)
 */
export function toParquetSchema(schema: Schema): SchemaElement[] {
  return [
    { name: 'root', num_children: schema.columns.length },
    ...schema.columns.map(toSchemaElement),
  ];
}

function toColumnValue(value: TypedValue | null): ColumnValue {
  return value === null ? null : value.value;
}

/**
 * Transpose rows into one data array per column
 */
export function toColumnData(schema: Schema, rows: readonly Row[]): ParquetColumn[] {
  return schema.columns.map((slot, index) => ({
    name: slot.name,
    data: rows.map((row) => toColumnValue(row[index] ?? null)),
  }));
}

/**
 * Encode a complete GeoParquet file in memory
 *
 * @throws ConversionError (kind 'write') when the Parquet encoder rejects the data
 */
export function encodeGeoParquet(
  schema: Schema,
  rows: readonly Row[],
  metadata: GeoParquetMetadata,
  options: WriteOptions = DEFAULT_WRITE_OPTIONS
): Uint8Array {
  try {
    const buffer = parquetWriteBuffer({
      columnData: toColumnData(schema, rows),
      schema: toParquetSchema(schema),
      codec: options.compression,
      kvMetadata: [
        { key: GEOPARQUET_METADATA_KEY, value: JSON.stringify(metadata) },
      ],
    });
    return new Uint8Array(buffer);
  } catch (error) {
    throw new ConversionError('write', 'failed to encode GeoParquet data', error);
  }
}

/**
 * Write encoded file bytes, creating the parent directory when needed
 *
 * @throws ConversionError (kind 'write') on any file system fault
 */
export function writeGeoParquet(path: string, bytes: Uint8Array): void {
  try {
    const dir = dirname(path);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
    writeFileSync(path, bytes);
  } catch (error) {
    throw new ConversionError('write', 'failed to write GeoParquet file', error);
  }
}
