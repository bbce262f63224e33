/**
 * Division Service
 *
 * Splits an operator-drawn search area into near-equal-area search
 * divisions, one per team assignment.
 *
 * Strategy:
 * 1. Project the polygon into a local metric frame about its centroid
 * 2. Lay a grid of cells sized to the target area over its bounding box
 * 3. Clip every cell to the polygon, dropping empty and sliver pieces
 * 4. Project the pieces back to lon/lat and label them DIV-A, DIV-B, ...
 */

// Types and constants
export type {
  Coordinate,
  Polygon,
  Division,
  DivisionPriority,
  DivisionStatus,
  SearchType,
  GenerateOptions,
  GridPlan,
  MetricPoint,
  MetricBounds,
} from './types.js';
export { DEFAULT_TARGET_AREA_M2, DEFAULT_MIN_AREA_RATIO, METERS_PER_DEGREE } from './types.js';

// Errors
export { DivisionError, InvalidGeometryError, InvalidParameterError } from './errors.js';

// Public API
export { generate, planGrid } from './generator.js';

// Boundary conversions
export type { LngLat, PolygonGeometry, DivisionFeatureProperties } from './geojson.js';
export {
  polygonFromPositions,
  polygonFromGeoJSON,
  toPositionRing,
  divisionProperties,
  divisionsToFeatureCollection,
} from './geojson.js';

// Low-level utilities (for testing or advanced use)
export { createLocalProjection, metersPerDegreeLngAt } from './projection.js';
export { ringArea, signedRingArea } from './area.js';
export { metricBounds, planGridForBounds, gridCells, cellCount } from './grid.js';
export { divisionLetters, divisionId, divisionName } from './labels.js';
