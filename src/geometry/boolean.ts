/**
 * Boolean operations (degraded mode)
 *
 * APPROXIMATIONS ONLY. Both operations test vertex containment; no edge is
 * ever clipped. They are unsuitable for geometrically rigorous boolean
 * composition and exist for coarse "is this inside that" queries.
 */

import { Point3 } from '../types/geometry';
import { pointInPolygon2d } from './polyline';

/**
 * Approximate A - B.
 * Returns [A] unchanged unless every vertex of B lies inside A, in which
 * case the result is empty (holes are not modelled).
 */
export function polygonDifference(polygonA: readonly Point3[], polygonB: readonly Point3[]): Point3[][] {
  const bInsideA = polygonB.every(p => pointInPolygon2d(p, polygonA));
  if (!bInsideA) {
    return [[...polygonA]];
  }
  return [];
}

/**
 * Approximate A ∩ B as a point set: the vertices of A inside B followed by
 * the vertices of B inside A. Not a polygon boundary; the points are not
 * ordered around the overlap. Empty when fewer than 3 points qualify.
 */
export function polygonIntersection(polygonA: readonly Point3[], polygonB: readonly Point3[]): Point3[][] {
  const points = [
    ...polygonA.filter(p => pointInPolygon2d(p, polygonB)),
    ...polygonB.filter(p => pointInPolygon2d(p, polygonA))
  ];

  return points.length >= 3 ? [points] : [];
}
