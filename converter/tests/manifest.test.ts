/**
 * Unit tests for the layer manifest, output paths and configuration
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import type { DataManifest } from '../../shared/types/geo';
import { loadConfig } from '../src/lib/config';
import { ConversionError } from '../src/lib/errors';
import {
  buildLayerManifest,
  layerNameOf,
  loadManifest,
  saveManifest,
  updateManifest,
} from '../src/lib/manifest';
import type { OutputMetadata } from '../src/lib/metadata/builder';
import {
  determineOutputPath,
  fileExists,
  isGeoJsonFile,
  validateOutputPath,
} from '../src/lib/paths';

const metadata: OutputMetadata = {
  geo: {
    version: '1.1.0',
    primary_column: 'geometry',
    columns: { geometry: { encoding: 'WKB', geometry_types: ['Polygon'], bbox: [0, 1, 2, 3] } },
  },
  geometryType: 'Polygon',
  summary: { geometryTypes: ['Polygon'], bound: [0, 1, 2, 3] },
  properties: [
    { name: 'area', type: 'double', nullable: true },
    { name: 'zone', type: 'string', nullable: true },
  ],
};

describe('Layer manifest', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'geoparquet-manifest-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('names layers after the output file', () => {
    expect(layerNameOf('out/parcels.parquet')).toBe('parcels');
    expect(layerNameOf('zoning.geoparquet')).toBe('zoning');
  });

  it('builds a layer entry from conversion metadata', () => {
    const layer = buildLayerManifest(
      'data/parcels.geojson',
      'out/parcels.parquet',
      12,
      metadata,
      '2026-01-01T00:00:00.000Z'
    );

    expect(layer).toEqual({
      name: 'parcels',
      source: 'data/parcels.geojson',
      output: 'out/parcels.parquet',
      geometryType: 'Polygon',
      geometryTypes: ['Polygon'],
      featureCount: 12,
      extent: { minX: 0, minY: 1, maxX: 2, maxY: 3 },
      fields: { area: 'double', zone: 'string' },
      crs: 'OGC:CRS84',
      generatedAt: '2026-01-01T00:00:00.000Z',
      version: '0.1.0',
    });
  });

  it('uses a null extent when nothing was bounded', () => {
    const layer = buildLayerManifest('a.geojson', 'a.parquet', 1, {
      ...metadata,
      geometryType: 'Unknown',
      summary: { geometryTypes: [], bound: null },
    });

    expect(layer.extent).toBeNull();
  });

  it('starts an empty manifest when none exists', () => {
    const manifest = loadManifest(join(dir, 'manifest.json'));

    expect(manifest.layers).toEqual({});
    expect(manifest.version).toBe('0.1.0');
  });

  it('saves pretty-printed JSON with a trailing newline', () => {
    const path = join(dir, 'nested', 'manifest.json');
    const manifest: DataManifest = {
      layers: {},
      generatedAt: '2026-01-01T00:00:00.000Z',
      version: '0.1.0',
    };

    saveManifest(manifest, path);

    expect(readFileSync(path, 'utf-8')).toBe(
      '{\n  "layers": {},\n  "generatedAt": "2026-01-01T00:00:00.000Z",\n  "version": "0.1.0"\n}\n'
    );
    expect(loadManifest(path)).toEqual(manifest);
  });

  it('replaces an existing layer entry on update', () => {
    const path = join(dir, 'manifest.json');
    const first = buildLayerManifest('a.geojson', 'parcels.parquet', 1, metadata, '2026-01-01T00:00:00.000Z');
    const second = buildLayerManifest('b.geojson', 'parcels.parquet', 5, metadata, '2026-02-01T00:00:00.000Z');
    const other = buildLayerManifest('c.geojson', 'zoning.parquet', 2, metadata, '2026-01-15T00:00:00.000Z');

    updateManifest(path, first);
    updateManifest(path, other);
    const manifest = updateManifest(path, second);

    expect(Object.keys(manifest.layers).sort()).toEqual(['parcels', 'zoning']);
    expect(manifest.layers.parcels.featureCount).toBe(5);
    expect(manifest.generatedAt).toBe('2026-02-01T00:00:00.000Z');
    expect(loadManifest(path)).toEqual(manifest);
  });

  it('raises an input error for a malformed manifest', () => {
    const path = join(dir, 'manifest.json');
    writeFileSync(path, '{"layers": []}');

    expect(() => loadManifest(path)).toThrow(`failed to read manifest ${path}: `);
  });
});

describe('Output paths', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'geoparquet-paths-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('recognizes GeoJSON extensions case-insensitively', () => {
    expect(isGeoJsonFile('parcels.geojson')).toBe(true);
    expect(isGeoJsonFile('PARCELS.GeoJSON')).toBe(true);
    expect(isGeoJsonFile('parcels.json')).toBe(true);
    expect(isGeoJsonFile('parcels.csv')).toBe(false);
  });

  it('only treats regular files as existing inputs', () => {
    const file = join(dir, 'a.geojson');
    writeFileSync(file, '{}');

    expect(fileExists(file)).toBe(true);
    expect(fileExists(dir)).toBe(false);
    expect(fileExists(join(dir, 'missing.geojson'))).toBe(false);
  });

  it('prefers the flag, then the configured path, then the input name', () => {
    expect(determineOutputPath('flag.parquet', 'data/in.geojson', 'env.parquet')).toBe('flag.parquet');
    expect(determineOutputPath(undefined, 'data/in.geojson', 'env.parquet')).toBe('env.parquet');
    expect(determineOutputPath(undefined, 'data/in.geojson')).toBe('in.parquet');
  });

  it('accepts parquet extensions', () => {
    expect(() => validateOutputPath(join(dir, 'out.parquet'))).not.toThrow();
    expect(() => validateOutputPath(join(dir, 'out.GeoParquet'))).not.toThrow();
  });

  it('rejects other extensions', () => {
    expect(() => validateOutputPath('out.csv')).toThrow(
      'output path must end in .parquet or .geoparquet: out.csv'
    );
  });

  it('rejects an existing directory', () => {
    const target = join(dir, 'out.parquet');
    mkdirSync(target);

    expect(() => validateOutputPath(target)).toThrow(`output path is a directory: ${target}`);
  });
});

describe('loadConfig', () => {
  it('defaults to snappy compression with no paths', () => {
    expect(loadConfig({})).toEqual({ compression: 'SNAPPY' });
  });

  it('reads paths and compression from the environment', () => {
    expect(
      loadConfig({
        GEOPARQUET_OUTPUT_PATH: 'out.parquet',
        GEOPARQUET_COMPRESSION: 'UNCOMPRESSED',
        GEOPARQUET_MANIFEST_PATH: 'manifest.json',
      })
    ).toEqual({
      outputPath: 'out.parquet',
      compression: 'UNCOMPRESSED',
      manifestPath: 'manifest.json',
    });
  });

  it('rejects an unsupported compression codec', () => {
    let caught: unknown;
    try {
      loadConfig({ GEOPARQUET_COMPRESSION: 'ZSTD' });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConversionError);
    if (caught instanceof ConversionError) {
      expect(caught.kind).toBe('input');
      expect(caught.message.startsWith('invalid configuration: GEOPARQUET_COMPRESSION: ')).toBe(true);
    }
  });
});
