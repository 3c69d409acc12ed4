/**
 * Property Analyzer
 *
 * Scans every feature's properties once and settles on one column type per
 * property key. Conflicting non-null observations promote the key to string
 * for the rest of the pass; keys only ever seen as null default to string.
 */

import type { SourceFeature } from '../../../../shared/types/geo';
import type {
  ColumnDescriptor,
  SemanticType,
} from '../../../../shared/types/schema';
import { inferType } from './infer';

/**
 * Running type per property key
 */
export type TypeMap = Map<string, SemanticType>;

/**
 * Combine a recorded type with a newly observed one
 */
export function promoteType(
  recorded: SemanticType | undefined,
  observed: SemanticType
): SemanticType {
  if (recorded === undefined) {
    return observed;
  }
  if (recorded === observed || observed === 'null') {
    return recorded;
  }
  if (recorded === 'null') {
    return observed;
  }
  return 'string';
}

/**
 * Record every property of one feature into the type map
 */
export function observeFeature(types: TypeMap, feature: SourceFeature): void {
  const properties = feature.properties;
  if (!properties) {
    return;
  }

  for (const [key, value] of Object.entries(properties)) {
    types.set(key, promoteType(types.get(key), inferType(value)));
  }
}

/**
 * Byte-wise name comparison (no locale rules)
 */
export function compareNames(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Turn a settled type map into sorted column descriptors
 */
export function toDescriptors(types: TypeMap): ColumnDescriptor[] {
  return Array.from(types.keys())
    .sort(compareNames)
    .map((name): ColumnDescriptor => {
      const type = types.get(name);
      return {
        name,
        type: type === undefined || type === 'null' ? 'string' : type,
        nullable: true,
      };
    });
}

/**
 * Infer one column descriptor per property key across all features
 *
 * @returns Descriptors sorted by name, all nullable
 */
export function analyzeProperties(
  features: readonly SourceFeature[]
): ColumnDescriptor[] {
  const types: TypeMap = new Map();
  for (const feature of features) {
    observeFeature(types, feature);
  }
  return toDescriptors(types);
}
