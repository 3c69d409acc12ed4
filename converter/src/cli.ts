#!/usr/bin/env tsx
/**
 * GeoJSON → GeoParquet command-line tool
 *
 * Usage:
 *   tsx converter/src/cli.ts generate <input.geojson> [-o output.parquet] [--manifest manifest.json]
 *   tsx converter/src/cli.ts version
 *
 * Environment:
 *   GEOPARQUET_OUTPUT_PATH    default output path
 *   GEOPARQUET_COMPRESSION    SNAPPY (default) or UNCOMPRESSED
 *   GEOPARQUET_MANIFEST_PATH  manifest to update when --manifest is absent
 */

import { existsSync, realpathSync } from 'fs';
import { fileURLToPath } from 'url';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { runGenerate } from './commands/generate';
import { runVersion } from './commands/version';
import { APP_NAME } from './lib/version';

/**
 * Build the command-line parser
 */
export function buildCli(args: string[]) {
  return yargs(args)
    .scriptName(APP_NAME)
    .usage('$0 <command> [options]')
    .command(
      'generate <input>',
      'Generate GeoParquet from a GeoJSON file, inferring column types',
      (cmd) =>
        cmd
          .positional('input', {
            type: 'string',
            demandOption: true,
            describe: 'Path to the GeoJSON file',
          })
          .option('output', {
            alias: 'o',
            type: 'string',
            describe: 'Output path for the GeoParquet file',
          })
          .option('manifest', {
            type: 'string',
            describe: 'Manifest JSON file to record this conversion in',
          }),
      (argv) => {
        process.exitCode = runGenerate({
          input: argv.input,
          output: argv.output,
          manifest: argv.manifest,
        });
      }
    )
    .command('version', 'Print the version information', {}, () => {
      process.exitCode = runVersion();
    })
    .demandCommand(1, 'Specify a command')
    .strict()
    .version(false)
    .help();
}

/**
 * Whether the script node was started with is this module, following
 * symlinks such as the one npm links into node_modules/.bin
 */
export function isMainModule(scriptPath: string | undefined, moduleUrl: string): boolean {
  if (!scriptPath || !existsSync(scriptPath)) {
    return false;
  }
  return realpathSync(scriptPath) === realpathSync(fileURLToPath(moduleUrl));
}

// Run if called directly
if (isMainModule(process.argv[1], import.meta.url)) {
  buildCli(hideBin(process.argv)).parseSync();
}
