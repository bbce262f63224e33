/**
 * Types and constants for search division generation
 */

/** A WGS84 position in decimal degrees. */
export interface Coordinate {
  lng: number;
  lat: number;
}

/**
 * An ordered ring of coordinates. The closing point is implicit: a ring never
 * repeats its first coordinate at the end.
 */
export type Polygon = readonly Coordinate[];

export type DivisionPriority = 'High' | 'Medium' | 'Low';
export type DivisionStatus = 'unassigned' | 'assigned' | 'in_progress' | 'completed';
export type SearchType = 'primary' | 'secondary';

export interface Division {
  divisionId: string;     // DIV-A, DIV-B, ... DIV-AA
  divisionName: string;   // Division A, Division B, ...
  boundary: Coordinate[];
  estimatedAreaM2: number;
  priority: DivisionPriority;
  status: DivisionStatus;
  searchType: SearchType;
  assignedTeam: string | null;
}

export interface GenerateOptions {
  minAreaRatio?: number; // Pieces smaller than this fraction of the target area are dropped
}

export interface GridPlan {
  rows: number;
  cols: number;
  cellWidthM: number;
  cellHeightM: number;
  totalAreaM2: number;
}

/** Point in the local metric frame, metres east/north of the polygon centroid. */
export interface MetricPoint {
  x: number;
  y: number;
}

export interface MetricBounds {
  minX: number;
  minY: number;
  maxX: number;
  maxY: number;
}

export const METERS_PER_DEGREE = 111320;

export const DEFAULT_TARGET_AREA_M2 = 40000;

export const DEFAULT_MIN_AREA_RATIO = 0.005;

// A bbox may overshoot a whole number of cells by this fraction of a cell
// before another row/column is added
export const GRID_SNAP_TOLERANCE = 0.05;

export const DIVISION_DEFAULTS = {
  priority: 'Low',
  status: 'unassigned',
  searchType: 'primary',
  assignedTeam: null,
} as const satisfies Pick<Division, 'priority' | 'status' | 'searchType' | 'assignedTeam'>;
