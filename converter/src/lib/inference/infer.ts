/**
 * Type Inference
 *
 * Classifies raw property values. Pure and total: every input maps to a
 * PropertyValue and a SemanticType, nothing throws.
 */

import type { PropertyValue, SemanticType } from '../../../../shared/types/schema';
import { isPropertyMap } from '../../../../shared/types/geo';

/**
 * Classify a raw property value
 */
export function classifyValue(value: unknown): PropertyValue {
  if (value === null || value === undefined) {
    return { kind: 'null' };
  }

  switch (typeof value) {
    case 'boolean':
      return { kind: 'boolean', value };
    case 'bigint':
      return { kind: 'integer', value };
    case 'number':
      if (Number.isSafeInteger(value)) {
        return { kind: 'integer', value: BigInt(value) };
      }
      if (Number.isFinite(value)) {
        return { kind: 'float', value };
      }
      return { kind: 'other', value };
    case 'string':
      return { kind: 'string', value };
    case 'object':
      if (Array.isArray(value) || isPropertyMap(value)) {
        return { kind: 'structured', value };
      }
      return { kind: 'other', value };
    default:
      return { kind: 'other', value };
  }
}

/**
 * Semantic type of a classified value
 */
export function semanticTypeOf(value: PropertyValue): SemanticType {
  switch (value.kind) {
    case 'null':
      return 'null';
    case 'boolean':
      return 'boolean';
    case 'integer':
      return 'integer';
    case 'float':
      return 'float';
    case 'string':
    case 'structured':
    case 'other':
      // Structured values are stored as JSON text
      return 'string';
  }
}

/**
 * Infer the semantic type of a raw property value
 */
export function inferType(value: unknown): SemanticType {
  return semanticTypeOf(classifyValue(value));
}
