import { readFileSync } from 'fs';
import type { SourceFeature } from '../../../../shared/types/geo';
import { ConversionError, describeError } from '../errors';
import { safeValidateFeatureCollection } from './validator';

const READ_FAILED = 'failed to read GeoJSON file';

/**
 * Parse and validate GeoJSON FeatureCollection text
 *
 * @throws ConversionError (kind 'input') for invalid JSON or structure
 */
export function parseFeatureCollection(text: string): SourceFeature[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new ConversionError('input', `${READ_FAILED}: invalid JSON (${describeError(error)})`, error);
  }

  const validation = safeValidateFeatureCollection(parsed);
  if (!validation.success) {
    throw new ConversionError(
      'input',
      `${READ_FAILED}: ${validation.summary}`,
      validation.error
    );
  }
  return validation.data;
}

/**
 * Read a GeoJSON FeatureCollection from disk
 *
 * @throws ConversionError (kind 'input') when the file cannot be read or parsed
 */
export function readGeoJSON(path: string): SourceFeature[] {
  let text: string;
  try {
    text = readFileSync(path, 'utf-8');
  } catch (error) {
    throw new ConversionError('input', `${READ_FAILED}: ${describeError(error)}`, error);
  }
  return parseFeatureCollection(text);
}
