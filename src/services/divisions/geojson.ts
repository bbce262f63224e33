/**
 * Conversions between the core Polygon type and the [lng, lat] arrays and
 * GeoJSON objects used by API clients and the map UI.
 */

import type { Coordinate, Division, Polygon } from './types.js';
import { InvalidGeometryError } from './errors.js';

export type LngLat = readonly [number, number];

/** Structural GeoJSON Polygon; positions may carry an altitude. */
export interface PolygonGeometry {
  type: 'Polygon';
  coordinates: ReadonlyArray<ReadonlyArray<readonly number[]>>;
}

export interface DivisionFeatureProperties {
  division_id: string;
  division_name: string;
  estimated_area_m2: number;
  priority: Division['priority'];
  status: Division['status'];
  search_type: Division['searchType'];
  assigned_team: string | null;
}

export function polygonFromPositions(positions: readonly LngLat[]): Coordinate[] {
  return positions.map(([lng, lat]) => ({ lng, lat }));
}

/**
 * Take the outer ring of a GeoJSON Polygon. Search areas with holes are
 * not supported.
 */
export function polygonFromGeoJSON(geometry: PolygonGeometry): Coordinate[] {
  if (geometry.coordinates.length === 0) {
    throw new InvalidGeometryError('GeoJSON polygon has no rings');
  }
  if (geometry.coordinates.length > 1) {
    throw new InvalidGeometryError('Search areas with holes are not supported', {
      ringCount: geometry.coordinates.length,
    });
  }
  return geometry.coordinates[0].map(([lng, lat]) => ({ lng, lat }));
}

/** Closed [lng, lat] ring, as GeoJSON and the map UI expect. */
export function toPositionRing(ring: Polygon): GeoJSON.Position[] {
  const positions = ring.map(({ lng, lat }): GeoJSON.Position => [lng, lat]);
  if (ring.length > 0) {
    positions.push([ring[0].lng, ring[0].lat]);
  }
  return positions;
}

export function divisionProperties(division: Division): DivisionFeatureProperties {
  return {
    division_id: division.divisionId,
    division_name: division.divisionName,
    estimated_area_m2: division.estimatedAreaM2,
    priority: division.priority,
    status: division.status,
    search_type: division.searchType,
    assigned_team: division.assignedTeam,
  };
}

export function divisionsToFeatureCollection(
  divisions: readonly Division[],
): GeoJSON.FeatureCollection<GeoJSON.Polygon, DivisionFeatureProperties> {
  return {
    type: 'FeatureCollection',
    features: divisions.map(division => ({
      type: 'Feature',
      id: division.divisionId,
      properties: divisionProperties(division),
      geometry: { type: 'Polygon', coordinates: [toPositionRing(division.boundary)] },
    })),
  };
}
