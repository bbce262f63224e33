/**
 * Grid planning over the search area's bounding box (metric frame)
 */

import type { GridPlan, MetricBounds, MetricPoint } from './types.js';
import { GRID_SNAP_TOLERANCE } from './types.js';

export interface GridCell {
  row: number;    // 0 = northernmost
  col: number;    // 0 = westernmost
  bounds: MetricBounds;
}

export function metricBounds(points: readonly MetricPoint[]): MetricBounds {
  let minX = Infinity;
  let minY = Infinity;
  let maxX = -Infinity;
  let maxY = -Infinity;
  for (const { x, y } of points) {
    if (x < minX) minX = x;
    if (y < minY) minY = y;
    if (x > maxX) maxX = x;
    if (y > maxY) maxY = y;
  }
  return { minX, minY, maxX, maxY };
}

/**
 * Number of cells of side `cellSide` needed to span `extent`.
 * An overshoot within GRID_SNAP_TOLERANCE of a cell does not add a cell.
 */
export function cellCount(extent: number, cellSide: number): number {
  return Math.max(1, Math.ceil(extent / cellSide - GRID_SNAP_TOLERANCE));
}

/**
 * Size the grid for a target cell area. Cells are stretched so that
 * `cols * cellWidthM` and `rows * cellHeightM` span the bounds exactly.
 */
export function planGridForBounds(
  bounds: MetricBounds,
  targetAreaM2: number,
): Omit<GridPlan, 'totalAreaM2'> {
  const side = Math.sqrt(targetAreaM2);
  const width = bounds.maxX - bounds.minX;
  const height = bounds.maxY - bounds.minY;

  const cols = cellCount(width, side);
  const rows = cellCount(height, side);

  return {
    rows,
    cols,
    cellWidthM: width / cols,
    cellHeightM: height / rows,
  };
}

/**
 * Yield cells row-major: rows north to south, columns west to east.
 * The outermost edges reuse the exact bounds so no gap opens from rounding.
 */
export function* gridCells(
  bounds: MetricBounds,
  plan: Pick<GridPlan, 'rows' | 'cols' | 'cellWidthM' | 'cellHeightM'>,
): Generator<GridCell> {
  const edgeX = (col: number) =>
    col === plan.cols ? bounds.maxX : bounds.minX + col * plan.cellWidthM;
  const edgeY = (row: number) =>
    row === plan.rows ? bounds.minY : bounds.maxY - row * plan.cellHeightM;

  for (let row = 0; row < plan.rows; row++) {
    for (let col = 0; col < plan.cols; col++) {
      yield {
        row,
        col,
        bounds: {
          minX: edgeX(col),
          maxX: edgeX(col + 1),
          minY: edgeY(row + 1),
          maxY: edgeY(row),
        },
      };
    }
  }
}
