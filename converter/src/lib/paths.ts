import { existsSync, statSync } from 'fs';
import { basename, extname } from 'path';
import { ConversionError } from './errors';

const GEOJSON_EXTENSIONS = ['.geojson', '.json'];
const PARQUET_EXTENSIONS = ['.parquet', '.geoparquet'];

/**
 * Whether a path names a GeoJSON file (by extension)
 */
export function isGeoJsonFile(path: string): boolean {
  return GEOJSON_EXTENSIONS.includes(extname(path).toLowerCase());
}

/**
 * Whether a path exists and is a regular file
 */
export function fileExists(path: string): boolean {
  return existsSync(path) && statSync(path).isFile();
}

/**
 * Check that an output path can receive a GeoParquet file
 *
 * @throws ConversionError (kind 'input') for a wrong extension or an existing directory
 */
export function validateOutputPath(path: string): void {
  if (!PARQUET_EXTENSIONS.includes(extname(path).toLowerCase())) {
    throw new ConversionError(
      'input',
      `output path must end in ${PARQUET_EXTENSIONS.join(' or ')}: ${path}`
    );
  }
  if (existsSync(path) && statSync(path).isDirectory()) {
    throw new ConversionError('input', `output path is a directory: ${path}`);
  }
}

/**
 * Resolve the output path: explicit flag, then configured default, then
 * the input's base name with a .parquet extension
 */
export function determineOutputPath(
  provided: string | undefined,
  inputPath: string,
  configured?: string
): string {
  if (provided) {
    return provided;
  }
  if (configured) {
    return configured;
  }
  return `${basename(inputPath, extname(inputPath))}.parquet`;
}
