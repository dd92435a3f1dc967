/**
 * Building Placement Engine
 *
 * Two strategies, both constrained by the site boundary and by spacing:
 * - scatter: rejection sampling inside the bounding box
 * - grid: deterministic sweep at a fixed step
 *
 * A footprint is accepted only when all four corners are inside the boundary;
 * center containment alone is never enough.
 */

import { Point3 } from '../types/geometry';
import {
  DEFAULT_GRID_SPACING,
  DEFAULT_SCATTER_SPACING,
  DEFAULT_TOLERANCE,
  MAX_GRID_CELLS,
  SCATTER_ATTEMPTS_PER_BUILDING
} from './constants';
import { GeometryKernelError } from './errors';
import { RandomSource } from './utils/random';
import { Logger } from './utils/logger';
import { distance2d } from '../geometry/point';
import { boundingBoxOf, pointInPolygon2d } from '../geometry/polyline';
import { footprintCorners } from '../geometry/rectangle';

const log = Logger.scoped('placement');

export interface ScatterOptions {
  /** Clearance added to max(width, depth) between footprint centers */
  minSpacing?: number;
  /** Attempt cap; defaults to SCATTER_ATTEMPTS_PER_BUILDING x count */
  maxAttempts?: number;
}

export interface ScatterResult {
  positions: Point3[];
  attempts: number;
}

/**
 * Whether every corner of the footprint centered at `center` is inside the ring
 */
export function footprintInside(
  boundary: readonly Point3[],
  center: Point3,
  width: number,
  depth: number
): boolean {
  return footprintCorners({ center, width, depth }).every(corner => pointInPolygon2d(corner, boundary));
}

/**
 * Rejection-sampled placement.
 *
 * Candidates are drawn uniformly from the bounding box inset by half the
 * footprint. A candidate is kept when its footprint is fully inside and it is
 * at least max(width, depth) + minSpacing from every kept placement. Stops
 * after `count` placements or `maxAttempts` draws, whichever comes first;
 * a crowded site yields fewer placements rather than an error.
 */
export function scatterPlacements(
  boundary: readonly Point3[],
  count: number,
  width: number,
  depth: number,
  random: RandomSource,
  options: ScatterOptions = {}
): ScatterResult {
  const positions: Point3[] = [];
  if (boundary.length < 3 || count <= 0) {
    return { positions, attempts: 0 };
  }

  const minSpacing = options.minSpacing ?? DEFAULT_SCATTER_SPACING;
  const maxAttempts = options.maxAttempts ?? SCATTER_ATTEMPTS_PER_BUILDING * count;
  const separation = Math.max(width, depth) + minSpacing;
  const box = boundingBoxOf(boundary);
  const z = boundary[0].z;

  let attempts = 0;
  while (positions.length < count && attempts < maxAttempts) {
    attempts++;

    const candidate: Point3 = {
      x: random.uniform(box.minX + width / 2, box.maxX - width / 2),
      y: random.uniform(box.minY + depth / 2, box.maxY - depth / 2),
      z
    };

    if (!footprintInside(boundary, candidate, width, depth)) continue;
    if (positions.some(existing => distance2d(candidate, existing) < separation)) continue;

    positions.push(candidate);
  }

  if (positions.length < count) {
    log.debug(`scatter placed ${positions.length}/${count} after ${attempts} attempts`);
  }

  return { positions, attempts };
}

/**
 * Grid placement: sweeps the bounding box at step (width + spacing,
 * depth + spacing), column by column, keeping cells whose center and
 * corners are all inside. The step already separates siblings.
 *
 * The sweep stops once `limit` positions are found, or after MAX_GRID_CELLS
 * cells, returning what it has so far.
 *
 * @throws GeometryKernelError when the boundary extent gives a non-finite cell count
 */
export function gridPlacements(
  boundary: readonly Point3[],
  width: number,
  depth: number,
  spacing: number = DEFAULT_GRID_SPACING,
  tolerance: number = DEFAULT_TOLERANCE,
  limit: number = Infinity
): Point3[] {
  const positions: Point3[] = [];
  if (boundary.length < 3 || width <= 0 || depth <= 0 || limit <= 0) {
    return positions;
  }

  const box = boundingBoxOf(boundary);
  const stepX = width + spacing;
  const stepY = depth + spacing;
  const z = boundary[0].z;

  const cells = Math.ceil((box.maxX - box.minX) / stepX) * Math.ceil((box.maxY - box.minY) / stepY);
  if (!Number.isFinite(cells)) {
    throw new GeometryKernelError(`grid of ${cells} cells cannot be swept`);
  }

  let visited = 0;
  for (let x = box.minX + width / 2; x + width / 2 <= box.maxX + tolerance; x += stepX) {
    for (let y = box.minY + depth / 2; y + depth / 2 <= box.maxY + tolerance; y += stepY) {
      if (positions.length >= limit) {
        return positions;
      }
      if (++visited > MAX_GRID_CELLS) {
        log.warn(`grid sweep stopped after ${MAX_GRID_CELLS} of ${cells} cells with ${positions.length} placements`);
        return positions;
      }
      const candidate: Point3 = { x, y, z };
      if (pointInPolygon2d(candidate, boundary) && footprintInside(boundary, candidate, width, depth)) {
        positions.push(candidate);
      }
    }
  }

  return positions;
}
