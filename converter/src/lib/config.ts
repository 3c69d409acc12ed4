import { z } from 'zod';
import { ConversionError } from './errors';

/**
 * Environment configuration for the converter
 */
export const envSchema = z.object({
  GEOPARQUET_OUTPUT_PATH: z.string().min(1).optional(),
  GEOPARQUET_COMPRESSION: z.enum(['SNAPPY', 'UNCOMPRESSED']).default('SNAPPY'),
  GEOPARQUET_MANIFEST_PATH: z.string().min(1).optional(),
});

export type CompressionCodec = z.infer<typeof envSchema>['GEOPARQUET_COMPRESSION'];

export interface ConverterConfig {
  outputPath?: string;
  compression: CompressionCodec;
  manifestPath?: string;
}

/**
 * Load configuration from environment variables
 *
 * @throws ConversionError (kind 'input') naming the invalid variable
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env
): ConverterConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join(', ');
    throw new ConversionError('input', `invalid configuration: ${details}`, result.error);
  }

  return {
    outputPath: result.data.GEOPARQUET_OUTPUT_PATH,
    compression: result.data.GEOPARQUET_COMPRESSION,
    manifestPath: result.data.GEOPARQUET_MANIFEST_PATH,
  };
}
