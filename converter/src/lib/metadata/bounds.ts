import type { Bound } from '../../../../shared/types/geo';

/**
 * Smallest rectangle containing both bounds
 */
export function unionBounds(a: Bound, b: Bound): Bound {
  return [
    Math.min(a[0], b[0]),
    Math.min(a[1], b[1]),
    Math.max(a[2], b[2]),
    Math.max(a[3], b[3]),
  ];
}

/**
 * Union of any number of bounds (null when there are none)
 */
export function unionAll(bounds: Iterable<Bound | null>): Bound | null {
  let result: Bound | null = null;
  for (const bound of bounds) {
    if (!bound) continue;
    result = result ? unionBounds(result, bound) : bound;
  }
  return result;
}

/**
 * Bound as a manifest extent
 */
export function toExtent(bound: Bound): {
  minX: number;
  minY: number;
  maxX: number;
  maxY: number;
} {
  const [minX, minY, maxX, maxY] = bound;
  return { minX, minY, maxX, maxY };
}
