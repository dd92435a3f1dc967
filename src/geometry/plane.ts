/**
 * Plane utility functions
 */

import { Plane, Point3, Vector3 } from '../types/geometry';
import { dot, normalize, scaleVector, vectorBetween, isZeroVector } from './vector';

/**
 * Creates a plane from an origin and a normal.
 * The normal is normalized; a zero normal yields `undefined` (no plane).
 */
export function createPlane(origin: Point3, normal: Vector3): Plane | undefined {
  const unit = normalize(normal);
  if (isZeroVector(unit)) return undefined;
  return { origin, normal: unit };
}

/**
 * Signed distance from the plane to a point (positive on the normal's side)
 */
export function signedDistanceToPlane(plane: Plane, point: Point3): number {
  return dot(vectorBetween(plane.origin, point), plane.normal);
}

/**
 * Orthogonal projection of a point onto the plane
 */
export function projectToPlane(plane: Plane, point: Point3): Point3 {
  const d = signedDistanceToPlane(plane, point);
  const back = scaleVector(plane.normal, d);
  return {
    x: point.x - back.x,
    y: point.y - back.y,
    z: point.z - back.z
  };
}
