/**
 * Input validation for division generation. Everything here runs before any
 * geometry is computed.
 */

import type { Coordinate, Polygon } from './types.js';
import { InvalidGeometryError, InvalidParameterError } from './errors.js';

function samePosition(a: Coordinate, b: Coordinate): boolean {
  return a.lng === b.lng && a.lat === b.lat;
}

/**
 * Drop an explicit closing point and consecutive duplicate vertices, and
 * check that what remains can describe an area.
 */
export function normalizeRing(polygon: Polygon | null | undefined): Coordinate[] {
  if (!polygon || polygon.length === 0) {
    throw new InvalidGeometryError('Search area polygon is empty');
  }

  const ring: Coordinate[] = [];
  for (const [index, coord] of polygon.entries()) {
    if (!Number.isFinite(coord.lng) || !Number.isFinite(coord.lat)) {
      throw new InvalidGeometryError(`Vertex ${index} is not a finite coordinate`, { index });
    }
    if (coord.lng < -180 || coord.lng > 180 || coord.lat < -90 || coord.lat > 90) {
      throw new InvalidGeometryError(`Vertex ${index} is outside WGS84 bounds`, { index, lng: coord.lng, lat: coord.lat });
    }
    const previous = ring[ring.length - 1];
    if (previous && samePosition(previous, coord)) continue;
    ring.push({ lng: coord.lng, lat: coord.lat });
  }

  while (ring.length > 1 && samePosition(ring[0], ring[ring.length - 1])) {
    ring.pop();
  }

  if (ring.length < 3) {
    throw new InvalidGeometryError(
      `Search area requires at least 3 distinct vertices, got ${ring.length}`,
      { vertexCount: ring.length },
    );
  }

  return ring;
}

/**
 * Check if any edge of the ring crosses ±180° (its endpoints are more than
 * half the globe apart in longitude)
 */
export function crossesAntimeridian(ring: readonly Coordinate[]): boolean {
  return ring.some((coord, i) => {
    const next = ring[(i + 1) % ring.length];
    return Math.abs(next.lng - coord.lng) > 180;
  });
}

export function assertTargetArea(targetAreaM2: unknown): asserts targetAreaM2 is number {
  if (typeof targetAreaM2 !== 'number' || !Number.isFinite(targetAreaM2) || targetAreaM2 <= 0) {
    throw new InvalidParameterError('Target area must be a positive finite number of square metres', {
      targetAreaM2: typeof targetAreaM2 === 'number' ? targetAreaM2 : String(targetAreaM2),
    });
  }
}

export function assertMinAreaRatio(ratio: unknown): asserts ratio is number {
  if (typeof ratio !== 'number' || !Number.isFinite(ratio) || ratio < 0 || ratio >= 1) {
    throw new InvalidParameterError('Minimum area ratio must be a number in [0, 1)', {
      minAreaRatio: typeof ratio === 'number' ? ratio : String(ratio),
    });
  }
}
