/**
 * Unit tests for the schema and row builder
 */

import { describe, it, expect } from 'vitest';
import type { Geometry } from 'geojson';
import type { Bound, GeometryType, SourceFeature } from '../../shared/types/geo';
import type { ColumnDescriptor } from '../../shared/types/schema';
import type { GeometryEncoder } from '../src/lib/geometry/encoder';
import { ConversionError } from '../src/lib/errors';
import { analyzeProperties } from '../src/lib/inference/analyzer';
import { buildSchema, convertFeatures, toRow } from '../src/lib/schema/builder';

/**
 * Encoder stand-in returning a fixed byte marker per geometry type
 */
class FakeEncoder implements GeometryEncoder {
  encode(geometry: Geometry): Uint8Array {
    if (geometry.type === 'LineString') {
      throw new Error('unsupported in test');
    }
    return new Uint8Array([geometry.type.length]);
  }

  typeOf(geometry: Geometry): GeometryType {
    return geometry.type;
  }

  boundOf(): Bound | null {
    return null;
  }
}

const encoder = new FakeEncoder();

const point: Geometry = { type: 'Point', coordinates: [1, 2] };

describe('buildSchema', () => {
  it('puts the geometry slot first', () => {
    const schema = buildSchema([]);

    expect(schema.columns).toEqual([
      { name: 'geometry', key: null, type: 'geometry', nullable: true },
    ]);
  });

  it('adds one column per descriptor in order', () => {
    const descriptors: ColumnDescriptor[] = [
      { name: 'count', type: 'integer', nullable: true },
      { name: 'name', type: 'string', nullable: true },
    ];

    expect(buildSchema(descriptors).columns.map((c) => [c.name, c.type])).toEqual([
      ['geometry', 'geometry'],
      ['count', 'integer'],
      ['name', 'string'],
    ]);
  });

  it('renames a property called geometry', () => {
    const schema = buildSchema([{ name: 'geometry', type: 'string', nullable: true }]);

    expect(schema.columns[1]).toEqual({
      name: 'geometry_property',
      key: 'geometry',
      type: 'string',
      nullable: true,
    });
  });

  it('skips renamed names that are already taken', () => {
    const schema = buildSchema([
      { name: 'geometry', type: 'string', nullable: true },
      { name: 'geometry_property', type: 'integer', nullable: true },
    ]);

    expect(schema.columns.map((c) => c.name)).toEqual([
      'geometry',
      'geometry_property_1',
      'geometry_property',
    ]);
  });
});

describe('toRow', () => {
  const schema = buildSchema([
    { name: 'count', type: 'integer', nullable: true },
    { name: 'name', type: 'string', nullable: true },
  ]);

  it('produces one value per column', () => {
    const feature: SourceFeature = {
      type: 'Feature',
      geometry: point,
      properties: { name: 'A', count: 3 },
    };

    expect(toRow(feature, schema, encoder)).toEqual([
      { type: 'geometry', value: new Uint8Array([5]) },
      { type: 'integer', value: 3n },
      { type: 'string', value: 'A' },
    ]);
  });

  it('fills missing properties and geometry with null', () => {
    const feature: SourceFeature = { type: 'Feature', geometry: null, properties: null };

    expect(toRow(feature, schema, encoder)).toEqual([null, null, null]);
  });

  it('ignores inherited property names', () => {
    const inherited = buildSchema([{ name: 'constructor', type: 'string', nullable: true }]);
    const feature: SourceFeature = { type: 'Feature', geometry: null, properties: {} };

    expect(toRow(feature, inherited, encoder)).toEqual([null, null]);
  });

  it('reads the renamed geometry property from its property key', () => {
    const renamed = buildSchema([{ name: 'geometry', type: 'string', nullable: true }]);
    const feature: SourceFeature = {
      type: 'Feature',
      geometry: point,
      properties: { geometry: 'legacy' },
    };

    expect(toRow(feature, renamed, encoder)).toEqual([
      { type: 'geometry', value: new Uint8Array([5]) },
      { type: 'string', value: 'legacy' },
    ]);
  });

  it('raises a geometry error naming the feature when encoding fails', () => {
    const feature: SourceFeature = {
      type: 'Feature',
      geometry: { type: 'LineString', coordinates: [[0, 0], [1, 1]] },
      properties: null,
    };

    let caught: unknown;
    try {
      toRow(feature, schema, encoder, 4);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConversionError);
    if (caught instanceof ConversionError) {
      expect(caught.kind).toBe('geometry');
      expect(caught.message).toBe('failed to encode geometry for feature 4');
    }
  });
});

describe('convertFeatures', () => {
  it('promotes conflicting values to text (integer then string)', () => {
    const features: SourceFeature[] = [
      { type: 'Feature', geometry: point, properties: { count: 3 } },
      { type: 'Feature', geometry: point, properties: { count: 'oops' } },
    ];
    const schema = buildSchema(analyzeProperties(features));

    const { rows, coercionMismatches } = convertFeatures(features, schema, encoder);

    expect(schema.columns[1]).toMatchObject({ name: 'count', type: 'string' });
    expect(rows.map((row) => row[1])).toEqual([
      { type: 'string', value: '3' },
      { type: 'string', value: 'oops' },
    ]);
    expect(coercionMismatches).toEqual({});
  });

  it('promotes conflicting values to text (string then integer)', () => {
    const features: SourceFeature[] = [
      { type: 'Feature', geometry: point, properties: { count: 'oops' } },
      { type: 'Feature', geometry: point, properties: { count: 3 } },
    ];
    const schema = buildSchema(analyzeProperties(features));

    const { rows } = convertFeatures(features, schema, encoder);

    expect(rows.map((row) => row[1])).toEqual([
      { type: 'string', value: 'oops' },
      { type: 'string', value: '3' },
    ]);
  });

  it('keeps a null-then-integer column as integer', () => {
    const features: SourceFeature[] = [
      { type: 'Feature', geometry: point, properties: { n: null } },
      { type: 'Feature', geometry: point, properties: { n: 4 } },
    ];
    const schema = buildSchema(analyzeProperties(features));

    const { rows } = convertFeatures(features, schema, encoder);

    expect(schema.columns[1].type).toBe('integer');
    expect(rows.map((row) => row[1])).toEqual([null, { type: 'integer', value: 4n }]);
  });

  it('counts values that did not fit their column', () => {
    const schema = buildSchema([{ name: 'flag', type: 'boolean', nullable: true }]);
    const features: SourceFeature[] = [
      { type: 'Feature', geometry: null, properties: { flag: true } },
      { type: 'Feature', geometry: null, properties: { flag: 'yes' } },
      { type: 'Feature', geometry: null, properties: { flag: 1 } },
      { type: 'Feature', geometry: null, properties: { flag: null } },
    ];

    const { rows, coercionMismatches } = convertFeatures(features, schema, encoder);

    expect(rows.map((row) => row[1])).toEqual([
      { type: 'boolean', value: true },
      null,
      null,
      null,
    ]);
    expect(coercionMismatches).toEqual({ flag: 2 });
  });

  it('reports the index of the failing feature', () => {
    const schema = buildSchema([]);
    const features: SourceFeature[] = [
      { type: 'Feature', geometry: point, properties: null },
      { type: 'Feature', geometry: { type: 'LineString', coordinates: [] }, properties: null },
    ];

    expect(() => convertFeatures(features, schema, encoder)).toThrow(
      'failed to encode geometry for feature 1'
    );
  });
});
