import { z } from 'zod';

/**
 * Request/response types for the Search Division API
 *
 * Terminology:
 * - Search area: operator-drawn polygon bounding the region to search
 * - Search division: one sub-region of the search area, assigned to a single team
 * - Target area: desired size of each division in square metres
 */

// =============================================================================
// GeoJSON input
// =============================================================================

// Range checks happen in the generator so they surface as geometry errors
export const lngLatSchema = z.tuple([z.number(), z.number()]);

// GeoJSON positions may carry an altitude, which is ignored
export const geoJsonPolygonSchema = z.object({
  type: z.literal('Polygon'),
  coordinates: z.array(z.array(z.tuple([z.number(), z.number()]).rest(z.number()))),
});

// =============================================================================
// Request validation schemas
// =============================================================================

// Shape only: vertex count and target area are checked by the generator
export const areaSizeSchema = z.number();

export const generateDivisionsBodySchema = z.union([
  z.object({
    coordinates: z.array(lngLatSchema),
    area_size_m2: areaSizeSchema.optional(),
  }).strict(),
  z.object({
    geometry: geoJsonPolygonSchema,
    area_size_m2: areaSizeSchema.optional(),
  }).strict(),
]);

export const outputFormatSchema = z.enum(['json', 'geojson']).default('json');

export const generateDivisionsQuerySchema = z.object({
  format: outputFormatSchema,
});

export type GenerateDivisionsBody = z.infer<typeof generateDivisionsBodySchema>;
export type OutputFormat = z.infer<typeof outputFormatSchema>;

// =============================================================================
// Responses
// =============================================================================

export interface DivisionDto {
  division_id: string;
  division_name: string;
  coordinates: number[][];
  estimated_area_m2: number;
  priority: string;
  status: string;
  search_type: string;
  assigned_team: string | null;
}

export interface GenerateDivisionsResponse {
  success: true;
  divisions: DivisionDto[];
  count: number;
  totalAreaM2: number;
  message: string;
}
