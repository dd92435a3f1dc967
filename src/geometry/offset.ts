/**
 * Offset engine
 *
 * Approximate offsets: vertices move along the ray from the centroid, they are
 * not mitered or rounded. Two tiers are tried in order:
 *
 * 1. `offset`: fixed-distance move toward (inward) or away from (outward) the
 *    centroid; vertices that would cross the centroid are dropped.
 * 2. `inset`: uniform scale about the centroid; never drops vertices.
 *
 * Positive distance = inward, negative = outward.
 */

import { Point3, Polyline } from '../types/geometry';
import { DEFAULT_TOLERANCE } from '../algorithm/constants';
import { distance, scaleFromPoint } from './point';
import { isZeroVector, normalize, offsetPoint, scaleVector, vectorBetween, vectorLength } from './vector';
import { isClosed, polylineCentroid, ringVertices } from './polyline';

export type OffsetStrategyName = 'offset' | 'inset';

/**
 * Tagged outcome of a single offset tier
 */
export type OffsetOutcome =
  | { status: 'success'; polyline: Polyline }
  | { status: 'degenerate'; reason: string }
  | { status: 'failed'; reason: string };

export interface OffsetStrategy {
  name: OffsetStrategyName;
  run: (polyline: Polyline, distance: number, tolerance: number) => OffsetOutcome;
}

function closeVertices(vertices: Point3[]): Polyline {
  return { points: [...vertices, vertices[0]] };
}

/**
 * Moves every vertex of a closed polyline by `offsetDistance` along the ray
 * from the centroid. Inward, a vertex no farther from the centroid than the
 * offset is dropped instead of overshooting. Fewer than 3 survivors fails.
 */
export function offsetTowardCentroid(
  polyline: Polyline,
  offsetDistance: number,
  tolerance: number = DEFAULT_TOLERANCE
): OffsetOutcome {
  if (!isClosed(polyline, tolerance)) {
    return { status: 'failed', reason: 'polyline is not closed' };
  }

  const centroid = polylineCentroid(polyline, tolerance);
  if (!centroid) {
    return { status: 'failed', reason: 'polyline has no centroid' };
  }

  const moved: Point3[] = [];

  for (const vertex of ringVertices(polyline, tolerance)) {
    const toVertex = vectorBetween(centroid, vertex);
    if (vectorLength(toVertex) <= offsetDistance) continue;

    const direction = normalize(toVertex, tolerance);
    if (isZeroVector(direction, tolerance)) continue;

    moved.push(offsetPoint(vertex, scaleVector(direction, -offsetDistance)));
  }

  if (moved.length < 3) {
    return {
      status: 'failed',
      reason: `only ${moved.length} vertices survived an offset of ${offsetDistance}`
    };
  }

  return { status: 'success', polyline: closeVertices(moved) };
}

/**
 * Scales a closed polyline about its centroid by
 * (meanRadius - distance) / meanRadius, keeping every vertex.
 * A non-positive factor would collapse or invert the ring: degenerate.
 */
export function insetByScale(
  polyline: Polyline,
  insetDistance: number,
  tolerance: number = DEFAULT_TOLERANCE
): OffsetOutcome {
  if (!isClosed(polyline, tolerance)) {
    return { status: 'failed', reason: 'polyline is not closed' };
  }

  const centroid = polylineCentroid(polyline, tolerance);
  if (!centroid) {
    return { status: 'failed', reason: 'polyline has no centroid' };
  }

  const vertices = ringVertices(polyline, tolerance);
  const meanRadius = vertices.reduce((sum, v) => sum + distance(centroid, v), 0) / vertices.length;

  if (meanRadius <= tolerance) {
    return { status: 'degenerate', reason: 'polyline collapses onto its centroid' };
  }

  const factor = (meanRadius - insetDistance) / meanRadius;
  if (factor <= tolerance) {
    return {
      status: 'degenerate',
      reason: `inset of ${insetDistance} exceeds mean radius ${meanRadius.toFixed(3)}`
    };
  }

  return {
    status: 'success',
    polyline: closeVertices(vertices.map(v => scaleFromPoint(v, centroid, factor)))
  };
}

/**
 * Offset tiers, tried in order
 */
export const OFFSET_STRATEGIES: readonly OffsetStrategy[] = [
  { name: 'offset', run: offsetTowardCentroid },
  { name: 'inset', run: insetByScale }
];

export interface OffsetAttempt {
  strategy: OffsetStrategyName;
  outcome: OffsetOutcome;
}

export type OffsetResult =
  | { status: 'success'; polyline: Polyline; strategy: OffsetStrategyName; fallbackUsed: boolean; attempts: OffsetAttempt[] }
  | { status: 'failed'; attempts: OffsetAttempt[] };

/**
 * Runs the offset strategies in order and returns the first success,
 * together with every attempt made.
 */
export function offsetWithFallback(
  polyline: Polyline,
  offsetDistance: number,
  tolerance: number = DEFAULT_TOLERANCE,
  strategies: readonly OffsetStrategy[] = OFFSET_STRATEGIES
): OffsetResult {
  const attempts: OffsetAttempt[] = [];

  for (const strategy of strategies) {
    const outcome = strategy.run(polyline, offsetDistance, tolerance);
    attempts.push({ strategy: strategy.name, outcome });

    if (outcome.status === 'success') {
      return {
        status: 'success',
        polyline: outcome.polyline,
        strategy: strategy.name,
        fallbackUsed: attempts.length > 1,
        attempts
      };
    }
  }

  return { status: 'failed', attempts };
}
