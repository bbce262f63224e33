import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { Request, Response } from 'express';
import { generateDivisionsPreview, toDivisionDto } from './divisionGenerate.js';
import {
  InvalidGeometryError,
  InvalidParameterError,
  METERS_PER_DEGREE,
  metersPerDegreeLngAt,
  type Division,
} from '../../services/divisions/index.js';
import { config } from '../../config.js';

const ORIGIN = { lng: 11.576, lat: 48.137 };

// 201 m square centred on ORIGIN as [lng, lat] pairs
function square201(): [number, number][] {
  const dLng = 100.5 / metersPerDegreeLngAt(ORIGIN.lat);
  const dLat = 100.5 / METERS_PER_DEGREE;
  return [
    [ORIGIN.lng - dLng, ORIGIN.lat - dLat],
    [ORIGIN.lng + dLng, ORIGIN.lat - dLat],
    [ORIGIN.lng + dLng, ORIGIN.lat + dLat],
    [ORIGIN.lng - dLng, ORIGIN.lat + dLat],
  ];
}

// 12 m square at ORIGIN, far smaller than the default target
function lot12(): [number, number][] {
  const dLng = 12 / metersPerDegreeLngAt(ORIGIN.lat);
  const dLat = 12 / METERS_PER_DEGREE;
  return [
    [ORIGIN.lng, ORIGIN.lat],
    [ORIGIN.lng + dLng, ORIGIN.lat],
    [ORIGIN.lng + dLng, ORIGIN.lat + dLat],
    [ORIGIN.lng, ORIGIN.lat + dLat],
  ];
}

interface MockResponse {
  body: unknown;
  json(payload: unknown): MockResponse;
}

function run(body: unknown, query: Record<string, string> = {}): unknown {
  const req = { body, query } as unknown as Request;
  const res: MockResponse = {
    body: undefined,
    json(payload) {
      this.body = payload;
      return this;
    },
  };
  generateDivisionsPreview(req, res as unknown as Response);
  return res.body;
}

describe('generateDivisionsPreview', () => {
  const originalDivisions = { ...config.divisions };

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    config.divisions = { ...originalDivisions };
    vi.restoreAllMocks();
  });

  it('returns a preview for coordinate input', () => {
    const body = run({ coordinates: square201(), area_size_m2: 10000 });

    expect(body).toMatchObject({
      success: true,
      count: 4,
      message: 'Generated 4 search divisions for preview',
    });
    expect(body).toHaveProperty('totalAreaM2');
  });

  it('returns divisions as closed rings with snake_case fields', () => {
    const body = run({ coordinates: square201(), area_size_m2: 10000 });

    expect(body).toMatchObject({
      divisions: [
        { division_id: 'DIV-A', division_name: 'Division A', priority: 'Low', status: 'unassigned', search_type: 'primary', assigned_team: null },
        { division_id: 'DIV-B' },
        { division_id: 'DIV-C' },
        { division_id: 'DIV-D' },
      ],
    });
  });

  it('accepts a GeoJSON polygon', () => {
    const ring = square201();
    const body = run({
      geometry: { type: 'Polygon', coordinates: [[...ring, ring[0]]] },
      area_size_m2: 10000,
    });
    expect(body).toMatchObject({ success: true, count: 4 });
  });

  it('falls back to the configured target area', () => {
    const body = run({ coordinates: square201() });
    expect(body).toMatchObject({ count: 1, divisions: [{ division_id: 'DIV-A' }] });
  });

  it('returns one division for a search area smaller than the target', () => {
    const body = run({ coordinates: lot12() });

    expect(body).toMatchObject({
      success: true,
      count: 1,
      divisions: [{ division_id: 'DIV-A' }],
      message: 'Generated 1 search divisions for preview',
    });
  });

  it('reports a ring crossing the antimeridian as a geometry error', () => {
    const coordinates = [[179.999, -16], [-179.999, -16], [-179.999, -15.998], [179.999, -15.998]];
    expect(() => run({ coordinates })).toThrow(InvalidGeometryError);
    expect(() => run({ coordinates })).toThrow('Search areas crossing the antimeridian are not supported');
  });

  it('uses a changed default target area', () => {
    config.divisions = { ...originalDivisions, defaultTargetAreaM2: 10000 };
    expect(run({ coordinates: square201() })).toMatchObject({ count: 4 });
  });

  it('returns a FeatureCollection when asked for geojson', () => {
    const body = run({ coordinates: square201(), area_size_m2: 10000 }, { format: 'geojson' });

    expect(body).toMatchObject({
      type: 'FeatureCollection',
      features: [
        { type: 'Feature', id: 'DIV-A', properties: { division_id: 'DIV-A' } },
        { id: 'DIV-B' },
        { id: 'DIV-C' },
        { id: 'DIV-D' },
      ],
    });
  });

  it('rejects targets that would need too many grid cells', () => {
    // 201 x 201 one-metre cells
    expect(() => run({ coordinates: square201(), area_size_m2: 1 })).toThrow(InvalidParameterError);
    expect(() => run({ coordinates: square201(), area_size_m2: 1 })).toThrow(
      expect.objectContaining({ details: { gridCells: 40401, maxGridCells: 10000 } }),
    );
  });

  it('applies the configured grid cell limit', () => {
    config.divisions = { ...originalDivisions, maxGridCells: 3 };
    expect(() => run({ coordinates: square201(), area_size_m2: 10000 })).toThrow(/too small/);

    config.divisions = { ...originalDivisions, maxGridCells: 4 };
    expect(run({ coordinates: square201(), area_size_m2: 10000 })).toMatchObject({ count: 4 });
  });

  it('rejects a non-positive target area', () => {
    expect(() => run({ coordinates: square201(), area_size_m2: 0 })).toThrow(InvalidParameterError);
  });

  it('rejects too few vertices', () => {
    expect(() => run({ coordinates: square201().slice(0, 2) })).toThrow(InvalidGeometryError);
  });

  it('rejects polygons with holes', () => {
    const ring = square201();
    const closed = [...ring, ring[0]];
    expect(() => run({ geometry: { type: 'Polygon', coordinates: [closed, closed] } })).toThrow(
      'Search areas with holes are not supported',
    );
  });
});

describe('toDivisionDto', () => {
  it('closes the boundary ring', () => {
    const division: Division = {
      divisionId: 'DIV-C',
      divisionName: 'Division C',
      boundary: [
        { lng: 1, lat: 1 },
        { lng: 2, lat: 1 },
        { lng: 2, lat: 2 },
      ],
      estimatedAreaM2: 1234.5,
      priority: 'Low',
      status: 'unassigned',
      searchType: 'primary',
      assignedTeam: null,
    };

    expect(toDivisionDto(division)).toEqual({
      division_id: 'DIV-C',
      division_name: 'Division C',
      coordinates: [[1, 1], [2, 1], [2, 2], [1, 1]],
      estimated_area_m2: 1234.5,
      priority: 'Low',
      status: 'unassigned',
      search_type: 'primary',
      assigned_team: null,
    });
  });
});
