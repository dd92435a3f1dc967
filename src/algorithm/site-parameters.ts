/**
 * Site Parameters
 *
 * Turns the inbound flat vertex array and parameter record into an immutable
 * SiteParameters value: defaults merged with whichever overrides validate.
 *
 * Input shape is strict (a bad vertex array is rejected); the parameter
 * record is advisory (a bad field is ignored and its default kept).
 */

import { z } from 'zod';
import {
  BuildingStyle,
  DesignParameters,
  PlanParameterInput,
  SiteParameters
} from './types';
import { COORDINATES_PER_VERTEX, DEFAULT_TOLERANCE, MIN_FLAT_VALUES, MIN_VERTEX_COUNT } from './constants';
import { InputShapeError } from './errors';
import { Logger } from './utils/logger';
import { degreesToRadians } from '../geometry/point';
import {
  closeRing,
  dominantOrientation,
  makeClosed,
  polylineArea,
  polylineBoundingBox,
  polylineFromFlat
} from '../geometry/polyline';

const log = Logger.scoped('site');

// ============================================================================
// SCHEMAS
// ============================================================================

const FlatVerticesSchema = z.array(z.number().finite());

const ranged = (min: number, max: number) =>
  z.number().finite().min(min).max(max).optional().catch(undefined);

const rangedInt = (min: number, max: number) =>
  z.number().int().min(min).max(max).optional().catch(undefined);

/**
 * Lenient parameter schema: each field independently falls back to
 * `undefined` (= keep default) when missing, mistyped or out of range.
 */
export const PlanParametersSchema = z
  .object({
    site_type: rangedInt(0, 4),
    far: ranged(0, 10),
    density: ranged(0, 1),
    mix_ratio: ranged(0, 1),
    building_style: rangedInt(0, 3),
    orientation: ranged(0, 180)
  })
  .catch({});

const PARAMETER_FIELDS = ['site_type', 'far', 'density', 'mix_ratio', 'building_style', 'orientation'] as const;

/**
 * Defaults applied before overrides. Orientation has no fixed default:
 * it falls back to the site's dominant-edge orientation.
 */
export const DEFAULT_DESIGN_PARAMETERS: Omit<DesignParameters, 'orientation'> = {
  siteType: 0,
  density: 0.5,
  far: 1.0,
  mixRatio: 0.0,
  buildingStyle: BuildingStyle.Residential
};

// ============================================================================
// PARSING
// ============================================================================

/**
 * Validates the flat vertex array: finite numbers, a multiple of 3, at least 9.
 * @throws InputShapeError
 */
export function parseFlatVertices(input: unknown): number[] {
  if (!Array.isArray(input)) {
    throw new InputShapeError('NOT_AN_ARRAY', 'vertices must be an array of numbers');
  }

  const parsed = FlatVerticesSchema.safeParse(input);
  if (!parsed.success) {
    const index = parsed.error.issues[0]?.path.join('.') ?? '?';
    throw new InputShapeError('NON_FINITE_VALUE', `vertex value at index ${index} is not a finite number`);
  }

  const flat = parsed.data;
  if (flat.length % COORDINATES_PER_VERTEX !== 0) {
    throw new InputShapeError(
      'NOT_TRIPLE_ALIGNED',
      `vertices must be in groups of 3 (x, y, z), got ${flat.length} values`
    );
  }
  if (flat.length < MIN_FLAT_VALUES) {
    throw new InputShapeError(
      'TOO_FEW_VALUES',
      `at least ${MIN_VERTEX_COUNT} vertices (${MIN_FLAT_VALUES} values) required, got ${flat.length} values`
    );
  }

  return flat;
}

export interface ResolvedDesignParameters {
  parameters: DesignParameters;
  /** Fields that were present but ignored */
  ignored: string[];
}

/**
 * Pure merge of defaults and the valid fields of `input`.
 * `fallbackOrientation` (radians) is used when no orientation override is given.
 */
export function resolveDesignParameters(
  input: PlanParameterInput | undefined,
  fallbackOrientation: number
): ResolvedDesignParameters {
  const parsed = PlanParametersSchema.parse(input ?? {});
  const ignored: string[] = [];

  if (input && typeof input === 'object') {
    for (const field of PARAMETER_FIELDS) {
      if (input[field] !== undefined && parsed[field] === undefined) {
        ignored.push(field);
      }
    }
  }

  const parameters: DesignParameters = {
    siteType: parsed.site_type ?? DEFAULT_DESIGN_PARAMETERS.siteType,
    density: parsed.density ?? DEFAULT_DESIGN_PARAMETERS.density,
    far: parsed.far ?? DEFAULT_DESIGN_PARAMETERS.far,
    mixRatio: parsed.mix_ratio ?? DEFAULT_DESIGN_PARAMETERS.mixRatio,
    buildingStyle: toBuildingStyle(parsed.building_style),
    orientation: parsed.orientation !== undefined
      ? degreesToRadians(parsed.orientation)
      : fallbackOrientation
  };

  return { parameters, ignored };
}

function toBuildingStyle(value: number | undefined): BuildingStyle {
  switch (value) {
    case BuildingStyle.Office:
      return BuildingStyle.Office;
    case BuildingStyle.Commercial:
      return BuildingStyle.Commercial;
    case BuildingStyle.Mixed:
      return BuildingStyle.Mixed;
    default:
      return DEFAULT_DESIGN_PARAMETERS.buildingStyle;
  }
}

export interface SiteConstruction {
  site: SiteParameters;
  warnings: string[];
}

/**
 * Builds the per-request site description from validated flat vertices.
 *
 * The vertices describe a polygon ring. A ring whose last point is within
 * `tolerance` of its first is closed normally; any larger gap is closed as an
 * implicit ring edge and reported in `warnings`.
 */
export function buildSiteParameters(
  flatVertices: readonly number[],
  input: PlanParameterInput | undefined,
  tolerance: number = DEFAULT_TOLERANCE
): SiteConstruction {
  const warnings: string[] = [];
  const raw = polylineFromFlat(flatVertices);
  const closure = makeClosed(raw, tolerance);

  let boundary = closure.polyline;
  let closedByKernel = closure.appended;

  if (!closure.closed) {
    boundary = closeRing(raw, tolerance);
    closedByKernel = true;
    warnings.push('site boundary was open; closed as an implicit polygon ring');
    log.debug('closing open site ring with an explicit closing vertex');
  }

  const dominant = dominantOrientation(boundary);
  const { parameters, ignored } = resolveDesignParameters(input, dominant);

  for (const field of ignored) {
    warnings.push(`parameter "${field}" ignored: invalid or out of range`);
    log.warn(`ignoring invalid plan parameter "${field}"`);
  }

  const site: SiteParameters = {
    ...parameters,
    boundary,
    area: polylineArea(boundary, tolerance),
    dominantOrientation: dominant,
    bounds: polylineBoundingBox(boundary),
    closedByKernel
  };

  return { site, warnings };
}
