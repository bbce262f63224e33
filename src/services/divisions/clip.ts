/**
 * Cell clipping using turf.js
 *
 * turf's boolean operations are planar, so they are run on metric
 * coordinates directly.
 */

import * as turf from '@turf/turf';
import type { MetricBounds, MetricPoint } from './types.js';

export type ClipSubject = GeoJSON.Feature<GeoJSON.Polygon>;

function toPosition({ x, y }: MetricPoint): GeoJSON.Position {
  return [x, y];
}

/** Wrap an open metric ring as a closed turf polygon feature. */
export function toClipSubject(ring: readonly MetricPoint[]): ClipSubject {
  const positions = ring.map(toPosition);
  return turf.polygon([[...positions, positions[0]]]);
}

/** True when the ring crosses itself. */
export function hasSelfIntersections(subject: ClipSubject): boolean {
  return turf.kinks(subject).features.length > 0;
}

/**
 * Intersect a grid cell with the search area. Returns the outer ring of
 * every resulting part, open (no repeated closing point). A multipart
 * intersection keeps the clipper's part order.
 */
export function clipCell(subject: ClipSubject, cell: MetricBounds): MetricPoint[][] {
  const cellPolygon = turf.bboxPolygon([cell.minX, cell.minY, cell.maxX, cell.maxY]);
  const intersection = turf.intersect(turf.featureCollection([subject, cellPolygon]));

  if (!intersection) {
    return [];
  }

  const polygons = intersection.geometry.type === 'Polygon'
    ? [intersection.geometry.coordinates]
    : intersection.geometry.coordinates;

  return polygons
    .filter(rings => rings.length > 0)
    .map(rings => rings[0].slice(0, -1).map(([x, y]) => ({ x, y })));
}
