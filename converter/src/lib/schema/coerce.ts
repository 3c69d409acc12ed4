/**
 * Value Coercion
 *
 * Converts a classified property value to the type of its column. A value
 * that does not fit the column becomes null; coercion never throws.
 */

import type {
  ColumnType,
  PropertyValue,
  TypedValue,
} from '../../../../shared/types/schema';
import { classifyValue } from '../inference/infer';

function toInteger(value: PropertyValue): TypedValue | null {
  switch (value.kind) {
    case 'integer':
      return { type: 'integer', value: value.value };
    case 'float': {
      const truncated = Math.trunc(value.value);
      // Outside the safe range the truncated value is not exact
      return Number.isSafeInteger(truncated)
        ? { type: 'integer', value: BigInt(truncated) }
        : null;
    }
    case 'null':
    case 'boolean':
    case 'string':
    case 'structured':
    case 'other':
      return null;
  }
}

function toFloat(value: PropertyValue): TypedValue | null {
  switch (value.kind) {
    case 'integer':
      return { type: 'float', value: Number(value.value) };
    case 'float':
      return { type: 'float', value: value.value };
    case 'null':
    case 'boolean':
    case 'string':
    case 'structured':
    case 'other':
      return null;
  }
}

function toBoolean(value: PropertyValue): TypedValue | null {
  switch (value.kind) {
    case 'boolean':
      return { type: 'boolean', value: value.value };
    case 'null':
    case 'integer':
    case 'float':
    case 'string':
    case 'structured':
    case 'other':
      return null;
  }
}

/**
 * JSON text of a nested value; values JSON cannot represent (cycles, bigints)
 * fall back to their default string form
 */
export function toJsonText(value: unknown[] | Record<string, unknown>): string {
  try {
    return JSON.stringify(value);
  } catch {
    return String(value);
  }
}

function toText(value: PropertyValue): TypedValue | null {
  switch (value.kind) {
    case 'null':
      return null;
    case 'string':
      return { type: 'string', value: value.value };
    case 'structured':
      return { type: 'string', value: toJsonText(value.value) };
    case 'boolean':
    case 'integer':
    case 'float':
    case 'other':
      return { type: 'string', value: String(value.value) };
  }
}

/**
 * Coerce a classified value to a column type
 */
export function coerce(value: PropertyValue, type: ColumnType): TypedValue | null {
  switch (type) {
    case 'integer':
      return toInteger(value);
    case 'float':
      return toFloat(value);
    case 'boolean':
      return toBoolean(value);
    case 'string':
      return toText(value);
  }
}

/**
 * Coerce a raw property value to a column type
 */
export function coerceValue(raw: unknown, type: ColumnType): TypedValue | null {
  return coerce(classifyValue(raw), type);
}
