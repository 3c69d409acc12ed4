/**
 * Geometry Encoder
 *
 * Encodes one GeoJSON geometry to WKB and reports its type tag and bound.
 */

import type { Geometry } from 'geojson';
import bbox from '@turf/bbox';
import { Geometry as WkxGeometry } from 'wkx';
import type { Bound, GeometryType } from '../../../../shared/types/geo';

export interface GeometryEncoder {
  /** WKB bytes of the geometry; throws when the geometry cannot be encoded */
  encode(geometry: Geometry): Uint8Array;
  typeOf(geometry: Geometry): GeometryType;
  /** Bound of the geometry, or null when it has no coordinates */
  boundOf(geometry: Geometry): Bound | null;
}

/**
 * Default encoder: ISO WKB via wkx, bounds via turf
 */
export class WkbGeometryEncoder implements GeometryEncoder {
  encode(geometry: Geometry): Uint8Array {
    const buffer = WkxGeometry.parseGeoJSON(geometry).toWkb();
    return new Uint8Array(buffer.buffer, buffer.byteOffset, buffer.byteLength);
  }

  typeOf(geometry: Geometry): GeometryType {
    return geometry.type;
  }

  boundOf(geometry: Geometry): Bound | null {
    const [minX, minY, maxX, maxY] = bbox(geometry, { recompute: true });
    if (![minX, minY, maxX, maxY].every(Number.isFinite)) {
      return null;
    }
    return [minX, minY, maxX, maxY];
  }
}
