/**
 * Local equirectangular projection centred on the search area.
 *
 * Adequate for kilometre-scale areas; distortion grows with the size of the
 * area and with latitude.
 */

import * as turf from '@turf/turf';
import type { Coordinate, MetricPoint, Polygon } from './types.js';
import { METERS_PER_DEGREE } from './types.js';
import { toPositionRing } from './geojson.js';

export interface LocalProjection {
  origin: Coordinate;
  metersPerDegreeLng: number;
  metersPerDegreeLat: number;
  toMetric(coord: Coordinate): MetricPoint;
  toGeographic(point: MetricPoint): Coordinate;
}

export function metersPerDegreeLngAt(lat: number): number {
  return METERS_PER_DEGREE * Math.cos((lat * Math.PI) / 180);
}

/**
 * Build a projection whose origin is the vertex centroid of the ring.
 * The ring must already be normalized (see normalizeRing).
 */
export function createLocalProjection(ring: Polygon): LocalProjection {
  const centroid = turf.centroid(turf.polygon([toPositionRing(ring)]));
  const [originLng, originLat] = centroid.geometry.coordinates;

  const metersPerDegreeLng = metersPerDegreeLngAt(originLat);
  const metersPerDegreeLat = METERS_PER_DEGREE;

  return {
    origin: { lng: originLng, lat: originLat },
    metersPerDegreeLng,
    metersPerDegreeLat,
    toMetric: ({ lng, lat }) => ({
      x: (lng - originLng) * metersPerDegreeLng,
      y: (lat - originLat) * metersPerDegreeLat,
    }),
    toGeographic: ({ x, y }) => ({
      lng: originLng + x / metersPerDegreeLng,
      lat: originLat + y / metersPerDegreeLat,
    }),
  };
}
