/**
 * Search division generation
 *
 * Partitions a search area into grid cells of roughly the target area,
 * clipped to the area's boundary and labeled in row-major order.
 */

import type { Coordinate, Division, GenerateOptions, GridPlan, MetricPoint, Polygon } from './types.js';
import { DEFAULT_MIN_AREA_RATIO, DIVISION_DEFAULTS } from './types.js';
import { InvalidGeometryError } from './errors.js';
import { assertMinAreaRatio, assertTargetArea, crossesAntimeridian, normalizeRing } from './validation.js';
import { createLocalProjection, type LocalProjection } from './projection.js';
import { ringArea } from './area.js';
import { gridCells, metricBounds, planGridForBounds } from './grid.js';
import { clipCell, hasSelfIntersections, toClipSubject } from './clip.js';
import { divisionId, divisionName } from './labels.js';

// Anything smaller is a degenerate ring, not a search area
const MIN_POLYGON_AREA_M2 = 1e-3;

interface PreparedArea {
  projection: LocalProjection;
  metricRing: MetricPoint[];
  totalAreaM2: number;
}

function prepareArea(polygon: Polygon): PreparedArea {
  const ring = normalizeRing(polygon);
  if (crossesAntimeridian(ring)) {
    throw new InvalidGeometryError('Search areas crossing the antimeridian are not supported');
  }
  const projection = createLocalProjection(ring);
  const metricRing = ring.map(projection.toMetric);
  const totalAreaM2 = ringArea(metricRing);

  if (!(totalAreaM2 > MIN_POLYGON_AREA_M2)) {
    throw new InvalidGeometryError('Search area has no area (vertices are collinear or coincident)', {
      areaM2: totalAreaM2,
    });
  }

  return { projection, metricRing, totalAreaM2 };
}

/**
 * Size the grid for a search area without clipping anything.
 * Lets callers bound the work `generate` will do.
 */
export function planGrid(polygon: Polygon, targetAreaM2: number): GridPlan {
  assertTargetArea(targetAreaM2);
  const { metricRing, totalAreaM2 } = prepareArea(polygon);
  return {
    ...planGridForBounds(metricBounds(metricRing), targetAreaM2),
    totalAreaM2,
  };
}

/**
 * Partition `polygon` into divisions of roughly `targetAreaM2` square metres.
 *
 * @throws InvalidParameterError if the target area or options are out of range
 * @throws InvalidGeometryError if the polygon is degenerate or self-intersecting
 */
export function generate(
  polygon: Polygon,
  targetAreaM2: number,
  options: GenerateOptions = {},
): Division[] {
  assertTargetArea(targetAreaM2);
  const minAreaRatio = options.minAreaRatio ?? DEFAULT_MIN_AREA_RATIO;
  assertMinAreaRatio(minAreaRatio);

  const { projection, metricRing, totalAreaM2 } = prepareArea(polygon);
  const subject = toClipSubject(metricRing);

  if (hasSelfIntersections(subject)) {
    throw new InvalidGeometryError('Search area boundary crosses itself');
  }

  const bounds = metricBounds(metricRing);
  const plan = planGridForBounds(bounds, targetAreaM2);
  // Relative to the search area too, so an area smaller than one cell keeps its piece
  const minPieceAreaM2 = minAreaRatio * Math.min(targetAreaM2, totalAreaM2);

  const divisions: Division[] = [];
  for (const cell of gridCells(bounds, plan)) {
    for (const piece of clipCell(subject, cell.bounds)) {
      const areaM2 = ringArea(piece);
      if (areaM2 <= 0 || areaM2 < minPieceAreaM2) continue;

      const index = divisions.length;
      const boundary: Coordinate[] = piece.map(projection.toGeographic);
      divisions.push({
        divisionId: divisionId(index),
        divisionName: divisionName(index),
        boundary,
        estimatedAreaM2: areaM2,
        ...DIVISION_DEFAULTS,
      });
    }
  }

  return divisions;
}
