import type { ConverterConfig } from '../lib/config';
import { loadConfig } from '../lib/config';
import { describeError } from '../lib/errors';
import { generate } from '../lib/generate';
import {
  determineOutputPath,
  fileExists,
  isGeoJsonFile,
  validateOutputPath,
} from '../lib/paths';

export interface GenerateArgs {
  input: string;
  output?: string;
  manifest?: string;
}

/**
 * Print an error and its cause to stderr
 */
function reportError(error: unknown): void {
  console.error(`Error: ${describeError(error)}`);
  if (error instanceof Error && error.cause !== undefined) {
    console.error(`  Cause: ${describeError(error.cause)}`);
  }
}

/**
 * Run the generate command
 *
 * @returns Process exit code
 */
export function runGenerate(
  args: GenerateArgs,
  env: Record<string, string | undefined> = process.env
): number {
  let config: ConverterConfig;
  try {
    config = loadConfig(env);
  } catch (error) {
    reportError(error);
    return 1;
  }

  if (!fileExists(args.input)) {
    console.error(`Error: GeoJSON file '${args.input}' does not exist.`);
    return 1;
  }
  if (!isGeoJsonFile(args.input)) {
    console.error(`Error: File '${args.input}' does not appear to be a GeoJSON file.`);
    return 1;
  }

  const outputPath = determineOutputPath(args.output, args.input, config.outputPath);
  const manifestPath = args.manifest ?? config.manifestPath;

  try {
    validateOutputPath(outputPath);

    console.log(`Generating GeoParquet file for '${args.input}'...`);
    const result = generate(args.input, outputPath, {
      compression: config.compression,
      manifestPath,
    });

    console.log(`✓ Converted ${result.featureCount} features`);
    console.log(`✓ Columns: ${result.schema.columns.map((c) => c.name).join(', ')}`);
    console.log(`✓ Geometry type: ${result.metadata.geometryType}`);

    const bound = result.metadata.summary.bound;
    if (bound) {
      console.log(`✓ Extent: [${bound[0]}, ${bound[1]}] to [${bound[2]}, ${bound[3]}]`);
    }

    for (const [column, count] of Object.entries(result.coercionMismatches)) {
      console.warn(
        `Warning: ${count} value(s) in column '${column}' did not match its type and were stored as null`
      );
    }

    if (manifestPath) {
      console.log(`✓ Manifest updated: ${manifestPath}`);
    }
    console.log(`✓ GeoParquet file generated successfully and saved to: ${result.outputPath}`);
    return 0;
  } catch (error) {
    reportError(error);
    return 1;
  }
}
