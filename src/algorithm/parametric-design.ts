/**
 * Parametric Design Rule Engine
 *
 * A deterministic mapping from (boundary, area, design parameters) to a
 * building layout. Only scatter positions and grid jitter depend on the
 * random source; counts, dimensions and floors never do.
 *
 * Density is applied twice on purpose: once in footprint sizing and once in
 * the building count, so total floor area grows convexly with density.
 */

import { Point3, Polyline } from '../types/geometry';
import { BuildingStyle, DesignParameters, DesignResult, PlacementStrategy } from './types';
import {
  DEFAULT_FLOOR_HEIGHT,
  DENSITY_THRESHOLDS,
  FALLBACK_FLOORS,
  FLOOR_HEIGHTS,
  FOOTPRINT_SIZING,
  GRID_JITTER,
  MAX_BUILDINGS,
  MAX_FLOORS,
  MIN_FLOORS,
  ORIENTATION_EPSILON,
  SPACING_AREA_FACTOR,
  STRATEGY_SPACING
} from './constants';
import { RandomSource } from './utils/random';
import { Logger } from './utils/logger';
import { footprintInside, gridPlacements, scatterPlacements } from './placement';
import { rotateAroundPoint } from '../geometry/point';
import { polylineCentroid, vertexAverage } from '../geometry/polyline';

const log = Logger.scoped('design');

export interface FootprintSize {
  width: number;
  depth: number;
}

/**
 * Footprint grows linearly with density: width 14-26m, depth 12-22m
 */
export function footprintSize(density: number): FootprintSize {
  const s = FOOTPRINT_SIZING;
  return {
    width: s.baseSize * (s.widthBase + density * s.widthDensityFactor),
    depth: s.baseSize * (s.depthBase + density * s.depthDensityFactor)
  };
}

/**
 * Buildings the site can hold at this density, between 1 and MAX_BUILDINGS
 */
export function buildingCount(siteArea: number, footprintArea: number, density: number): number {
  if (footprintArea <= 0) return 1;
  const maxByArea = Math.floor(siteArea / (footprintArea * SPACING_AREA_FACTOR));
  const count = Math.max(1, Math.floor(maxByArea * density));
  return Math.min(count, MAX_BUILDINGS);
}

/**
 * Floors per building so that the buildings together approach site area x FAR,
 * clamped to [MIN_FLOORS, MAX_FLOORS]
 */
export function floorsPerBuilding(siteArea: number, far: number, footprintArea: number, count: number): number {
  if (footprintArea <= 0 || count <= 0) return FALLBACK_FLOORS;
  const totalFloorsNeeded = (siteArea * far) / footprintArea;
  const floors = Math.max(MIN_FLOORS, Math.floor(totalFloorsNeeded / count));
  return Math.min(floors, MAX_FLOORS);
}

/**
 * Floor-to-floor height for a style (residential height for unknown styles)
 */
export function floorHeightFor(style: BuildingStyle): number {
  return FLOOR_HEIGHTS[style] ?? DEFAULT_FLOOR_HEIGHT;
}

export function placementStrategyFor(density: number): PlacementStrategy {
  if (density < DENSITY_THRESHOLDS.scatterBelow) return 'scatter';
  if (density < DENSITY_THRESHOLDS.jitteredGridBelow) return 'jittered-grid';
  return 'tight-grid';
}

export interface DesignOptions {
  maxScatterAttempts?: number;
  tolerance?: number;
}

/**
 * Applies the design rules to a site.
 *
 * 1. footprint from density
 * 2. building count from area, footprint and density (max 8)
 * 3. floors from area x FAR, shared across buildings (2-15)
 * 4. floor height from style
 * 5. placement strategy from density
 * 6. positions rotated about the site centroid by `orientation`
 *    (footprints keep their axis-aligned dimensions)
 */
export function applySiteParameters(
  boundary: Polyline,
  siteArea: number,
  parameters: DesignParameters,
  random: RandomSource,
  options: DesignOptions = {}
): DesignResult {
  const { width, depth } = footprintSize(parameters.density);
  const footprintArea = width * depth;
  const requestedCount = buildingCount(siteArea, footprintArea, parameters.density);
  const floors = floorsPerBuilding(siteArea, parameters.far, footprintArea, requestedCount);
  const floorHeight = floorHeightFor(parameters.buildingStyle);
  const strategy = placementStrategyFor(parameters.density);
  const ring = boundary.points;

  log.debug(
    `footprint ${width.toFixed(2)}x${depth.toFixed(2)}, ${requestedCount} buildings x ${floors} floors, ${strategy}`
  );

  let positions: Point3[];

  switch (strategy) {
    case 'scatter':
      positions = scatterPlacements(ring, requestedCount, width, depth, random, {
        minSpacing: STRATEGY_SPACING.scatter,
        maxAttempts: options.maxScatterAttempts
      }).positions;
      break;

    case 'jittered-grid':
      positions = gridPlacements(ring, width, depth, STRATEGY_SPACING['jittered-grid'], options.tolerance, requestedCount)
        .map(pos => jitter(pos, ring, width, depth, random));
      break;

    case 'tight-grid':
    default:
      positions = gridPlacements(ring, width, depth, STRATEGY_SPACING['tight-grid'], options.tolerance, requestedCount);
      break;
  }

  if (positions.length < requestedCount) {
    log.warn(`placed ${positions.length} of ${requestedCount} buildings (${strategy})`);
  }

  if (Math.abs(parameters.orientation) > ORIENTATION_EPSILON) {
    const centroid = polylineCentroid(boundary, options.tolerance) ?? vertexAverage(ring);
    if (centroid) {
      positions = positions.map(pos => rotateAroundPoint(pos, centroid, parameters.orientation));
    }
  }

  return {
    positions,
    buildingWidth: width,
    buildingDepth: depth,
    floorsPerBuilding: floors,
    floorHeight,
    strategy,
    requestedCount,
    placedCount: positions.length,
    totalFloorArea: positions.length * floors * footprintArea
  };
}

/**
 * Shifts a grid position by up to GRID_JITTER on each axis. The jittered
 * footprint must still be fully inside; otherwise the grid position stands.
 */
function jitter(
  position: Point3,
  boundary: readonly Point3[],
  width: number,
  depth: number,
  random: RandomSource
): Point3 {
  const moved: Point3 = {
    x: position.x + random.uniform(-GRID_JITTER, GRID_JITTER),
    y: position.y + random.uniform(-GRID_JITTER, GRID_JITTER),
    z: position.z
  };
  return footprintInside(boundary, moved, width, depth) ? moved : position;
}
