/**
 * Schema Types
 *
 * Types for inferred property columns and the rows written under them.
 * The schema is only known after the data has been scanned, so every
 * value carries its own tag instead of relying on a fixed record shape.
 */

// ============================================================================
// Semantic Types
// ============================================================================

/**
 * Semantic type assigned to one raw property value
 */
export type SemanticType = 'string' | 'integer' | 'float' | 'boolean' | 'null';

/**
 * Semantic type of a column (null-only columns default to string)
 */
export type ColumnType = Exclude<SemanticType, 'null'>;

/**
 * Canonical type names used in property metadata and manifests
 */
export type CanonicalTypeName = 'string' | 'int64' | 'double' | 'boolean';

export const CANONICAL_TYPE_NAMES: Record<ColumnType, CanonicalTypeName> = {
  string: 'string',
  integer: 'int64',
  float: 'double',
  boolean: 'boolean',
};

// ============================================================================
// Property Values
// ============================================================================

/**
 * A raw property value classified into a closed set of cases
 */
export type PropertyValue =
  | { kind: 'null' }
  | { kind: 'boolean'; value: boolean }
  | { kind: 'integer'; value: bigint }
  | { kind: 'float'; value: number }
  | { kind: 'string'; value: string }
  | { kind: 'structured'; value: unknown[] | Record<string, unknown> }
  | { kind: 'other'; value: unknown };

// ============================================================================
// Columns & Schema
// ============================================================================

/**
 * Inferred name/type/nullability for one property key
 */
export interface ColumnDescriptor {
  name: string;
  type: ColumnType;
  nullable: boolean;
}

/**
 * Slot type of a schema column: the geometry slot or a property column type
 */
export type SlotType = 'geometry' | ColumnType;

/**
 * One column of the row schema
 */
export interface ColumnSlot {
  /** Column name in the output file */
  name: string;
  /** Property key the column is read from (null for the geometry slot) */
  key: string | null;
  type: SlotType;
  nullable: boolean;
}

export interface Schema {
  columns: ColumnSlot[];
}

// ============================================================================
// Rows
// ============================================================================

/**
 * A value stored in one row slot, tagged with its slot type
 */
export type TypedValue =
  | { type: 'geometry'; value: Uint8Array }
  | { type: 'string'; value: string }
  | { type: 'integer'; value: bigint }
  | { type: 'float'; value: number }
  | { type: 'boolean'; value: boolean };

/**
 * One row per feature, one entry per schema column (null when absent)
 */
export type Row = Array<TypedValue | null>;

/**
 * Metadata for one property column
 */
export interface PropertyColumnMetadata {
  name: string;
  type: CanonicalTypeName;
  nullable: boolean;
}
