/**
 * Division generation (preview only; the caller persists what it keeps)
 */

import { Request, Response } from 'express';
import { config } from '../../config.js';
import {
  generate,
  planGrid,
  polygonFromGeoJSON,
  polygonFromPositions,
  divisionsToFeatureCollection,
  toPositionRing,
  InvalidParameterError,
  type Coordinate,
  type Division,
} from '../../services/divisions/index.js';
import type {
  DivisionDto,
  GenerateDivisionsBody,
  GenerateDivisionsResponse,
  OutputFormat,
} from '../../types/index.js';

export function toDivisionDto(division: Division): DivisionDto {
  return {
    division_id: division.divisionId,
    division_name: division.divisionName,
    coordinates: toPositionRing(division.boundary),
    estimated_area_m2: division.estimatedAreaM2,
    priority: division.priority,
    status: division.status,
    search_type: division.searchType,
    assigned_team: division.assignedTeam,
  };
}

function searchAreaFromBody(body: GenerateDivisionsBody): Coordinate[] {
  return 'geometry' in body
    ? polygonFromGeoJSON(body.geometry)
    : polygonFromPositions(body.coordinates);
}

/**
 * Generate search divisions for a drawn search area without saving them.
 * Body is validated by generateDivisionsBodySchema, query by generateDivisionsQuerySchema.
 */
export function generateDivisionsPreview(req: Request, res: Response): void {
  const body: GenerateDivisionsBody = req.body;
  const format: OutputFormat = req.query.format === 'geojson' ? 'geojson' : 'json';

  const searchArea = searchAreaFromBody(body);
  const targetAreaM2 = body.area_size_m2 ?? config.divisions.defaultTargetAreaM2;

  // Bound the work before clipping anything
  const plan = planGrid(searchArea, targetAreaM2);
  const cellCount = plan.rows * plan.cols;
  if (cellCount > config.divisions.maxGridCells) {
    throw new InvalidParameterError(
      `Target area of ${targetAreaM2} m² is too small for this search area`,
      { gridCells: cellCount, maxGridCells: config.divisions.maxGridCells },
    );
  }

  const divisions = generate(searchArea, targetAreaM2);
  console.log(
    `[Divisions] Generated ${divisions.length} divisions from ${searchArea.length} vertices ` +
    `(${plan.rows}x${plan.cols} grid, target ${targetAreaM2} m², area ${Math.round(plan.totalAreaM2)} m²)`
  );

  if (format === 'geojson') {
    res.json(divisionsToFeatureCollection(divisions));
    return;
  }

  const response: GenerateDivisionsResponse = {
    success: true,
    divisions: divisions.map(toDivisionDto),
    count: divisions.length,
    totalAreaM2: plan.totalAreaM2,
    message: `Generated ${divisions.length} search divisions for preview`,
  };
  res.json(response);
}
