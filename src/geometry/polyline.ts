/**
 * Polyline utility functions
 *
 * A polyline is an ordered vertex list. Unlike the implicit ring of a polygon,
 * closure is explicit: a closed polyline repeats its first point at the end.
 * Area and centroid are only defined for closed polylines.
 */

import { BoundingBox, Line, Plane, Point3, Polyline, Projection } from '../types/geometry';
import { DEFAULT_TOLERANCE, PLANE_DETECTION_THRESHOLD } from '../algorithm/constants';
import { distance, distance2d, pointsEqual, pointsFromFlat } from './point';
import { cross, vectorBetween, vectorLength } from './vector';
import { createPlane } from './plane';

/**
 * Creates a polyline from an array of points
 */
export function createPolyline(points: readonly Point3[]): Polyline {
  return { points: [...points] };
}

/**
 * Creates a polyline from a flat coordinate array [x1,y1,z1, x2,y2,z2, ...]
 */
export function polylineFromFlat(flat: readonly number[]): Polyline {
  return { points: pointsFromFlat(flat) };
}

/**
 * Returns the consecutive segments of a polyline (no implicit wrap-around)
 */
export function getSegments(polyline: Polyline): Line[] {
  const segments: Line[] = [];
  const pts = polyline.points;
  for (let i = 0; i < pts.length - 1; i++) {
    segments.push({ start: pts[i], end: pts[i + 1] });
  }
  return segments;
}

// ============================================================================
// CLOSURE
// ============================================================================

/**
 * Distance between the first and last points (0 for fewer than 2 points)
 */
export function closureGap(polyline: Polyline): number {
  const pts = polyline.points;
  if (pts.length < 2) return 0;
  return distance(pts[0], pts[pts.length - 1]);
}

/**
 * A polyline is closed when it has at least 4 points (a triangle plus its
 * closing duplicate) and the first and last coincide within tolerance.
 */
export function isClosed(polyline: Polyline, tolerance: number = DEFAULT_TOLERANCE): boolean {
  return polyline.points.length >= 4 && closureGap(polyline) <= tolerance;
}

export interface ClosureResult {
  /** Whether the returned polyline is closed */
  closed: boolean;
  /** The input itself, or a copy with a closing duplicate appended */
  polyline: Polyline;
  /** True when a closing point was appended */
  appended: boolean;
}

/**
 * Closes a polyline whose end lies within `tolerance` of its start.
 *
 * - gap within the kernel's closure tolerance: already closed, returned unchanged
 * - gap within `tolerance`: a duplicate of the first point is appended
 * - larger gap: left open, `closed: false`
 */
export function makeClosed(polyline: Polyline, tolerance: number = DEFAULT_TOLERANCE): ClosureResult {
  const pts = polyline.points;
  if (pts.length < 3) {
    return { closed: false, polyline, appended: false };
  }

  if (isClosed(polyline, Math.min(tolerance, DEFAULT_TOLERANCE))) {
    return { closed: true, polyline, appended: false };
  }

  if (closureGap(polyline) <= tolerance) {
    return { closed: true, polyline: { points: [...pts, pts[0]] }, appended: true };
  }

  return { closed: false, polyline, appended: false };
}

/**
 * Treats the points as a polygon ring and makes the closure explicit,
 * whatever the gap. Use only where the input is known to describe a ring.
 */
export function closeRing(polyline: Polyline, tolerance: number = DEFAULT_TOLERANCE): Polyline {
  const pts = polyline.points;
  if (pts.length < 3 || isClosed(polyline, tolerance)) return polyline;
  return { points: [...pts, pts[0]] };
}

/**
 * Vertices of the ring without the closing duplicate
 */
export function ringVertices(polyline: Polyline, tolerance: number = DEFAULT_TOLERANCE): Point3[] {
  const pts = polyline.points;
  if (pts.length > 3 && pointsEqual(pts[0], pts[pts.length - 1], tolerance)) {
    return pts.slice(0, -1);
  }
  return [...pts];
}

// ============================================================================
// MEASURES
// ============================================================================

/**
 * Sum of consecutive segment lengths (the closing segment counts once the
 * polyline is closed, since it is part of the point list)
 */
export function polylineLength(polyline: Polyline): number {
  let length = 0;
  const pts = polyline.points;
  for (let i = 0; i < pts.length - 1; i++) {
    length += distance(pts[i], pts[i + 1]);
  }
  return length;
}

/**
 * First plane found through p0, p1 and a later point pi such that
 * |(p1 - p0) x (pi - p0)| exceeds the detection threshold.
 * `undefined` means "not planar" (all points collinear), not an error.
 */
export function detectPlane(polyline: Polyline): Plane | undefined {
  const pts = polyline.points;
  if (pts.length < 3) return undefined;

  const p0 = pts[0];
  const v1 = vectorBetween(p0, pts[1]);

  for (let i = 2; i < pts.length; i++) {
    const normal = cross(v1, vectorBetween(p0, pts[i]));
    if (vectorLength(normal) > PLANE_DETECTION_THRESHOLD) {
      return createPlane(p0, normal);
    }
  }

  return undefined;
}

/**
 * The coordinate plane a polyline is best projected onto: the one
 * perpendicular to the largest component of its plane normal (XY when no plane).
 */
export function dominantProjection(polyline: Polyline): Projection {
  const plane = detectPlane(polyline);
  if (!plane) return 'xy';

  const nx = Math.abs(plane.normal.x);
  const ny = Math.abs(plane.normal.y);
  const nz = Math.abs(plane.normal.z);

  if (nz >= nx && nz >= ny) return 'xy';
  if (nx >= ny) return 'yz';
  return 'xz';
}

function project(p: Point3, projection: Projection): [number, number] {
  switch (projection) {
    case 'yz':
      return [p.y, p.z];
    case 'xz':
      return [p.x, p.z];
    default:
      return [p.x, p.y];
  }
}

/**
 * Signed shoelace area of a vertex ring in the given projection
 * Positive = counter-clockwise, Negative = clockwise
 */
export function signedArea2d(points: readonly Point3[], projection: Projection = 'xy'): number {
  let area = 0;
  const n = points.length;

  for (let i = 0; i < n; i++) {
    const [xi, yi] = project(points[i], projection);
    const [xj, yj] = project(points[(i + 1) % n], projection);
    area += xi * yj - xj * yi;
  }

  return area / 2;
}

/**
 * Unsigned area of a closed polyline on its dominant projection.
 * An open polyline has no area: 0 is returned.
 */
export function polylineArea(polyline: Polyline, tolerance: number = DEFAULT_TOLERANCE): number {
  if (!isClosed(polyline, tolerance)) return 0;
  return Math.abs(signedArea2d(polyline.points, dominantProjection(polyline)));
}

/**
 * Vertex-average centroid of a closed polyline (closing duplicate excluded).
 *
 * Note: this is the arithmetic mean of the boundary vertices, NOT the
 * area-weighted centroid. It is close enough for layout purposes but drifts
 * toward densely sampled parts of the boundary.
 *
 * Returns `undefined` for an open polyline.
 */
export function polylineCentroid(polyline: Polyline, tolerance: number = DEFAULT_TOLERANCE): Point3 | undefined {
  if (!isClosed(polyline, tolerance)) return undefined;
  return vertexAverage(ringVertices(polyline, tolerance));
}

/**
 * Arithmetic mean of a set of points
 */
export function vertexAverage(points: readonly Point3[]): Point3 | undefined {
  if (points.length === 0) return undefined;

  let x = 0, y = 0, z = 0;
  for (const p of points) {
    x += p.x;
    y += p.y;
    z += p.z;
  }

  const n = points.length;
  return { x: x / n, y: y / n, z: z / n };
}

/**
 * Calculates the axis-aligned bounding box of a polyline
 */
export function polylineBoundingBox(polyline: Polyline): BoundingBox {
  return boundingBoxOf(polyline.points);
}

/**
 * Calculates the axis-aligned bounding box of a point set
 */
export function boundingBoxOf(points: readonly Point3[]): BoundingBox {
  if (points.length === 0) {
    return { minX: 0, minY: 0, minZ: 0, maxX: 0, maxY: 0, maxZ: 0 };
  }

  let minX = Infinity, minY = Infinity, minZ = Infinity;
  let maxX = -Infinity, maxY = -Infinity, maxZ = -Infinity;

  for (const p of points) {
    minX = Math.min(minX, p.x);
    minY = Math.min(minY, p.y);
    minZ = Math.min(minZ, p.z);
    maxX = Math.max(maxX, p.x);
    maxY = Math.max(maxY, p.y);
    maxZ = Math.max(maxZ, p.z);
  }

  return { minX, minY, minZ, maxX, maxY, maxZ };
}

/**
 * Valid = at least 3 distinct points and no zero-length consecutive segment
 */
export function isValidPolyline(polyline: Polyline, tolerance: number = DEFAULT_TOLERANCE): boolean {
  const pts = polyline.points;
  if (pts.length < 3) return false;

  for (let i = 0; i < pts.length - 1; i++) {
    if (pointsEqual(pts[i], pts[i + 1], tolerance)) return false;
  }

  const distinct: Point3[] = [];
  for (const p of pts) {
    if (!distinct.some(d => pointsEqual(d, p, tolerance))) {
      distinct.push(p);
      if (distinct.length >= 3) return true;
    }
  }

  return false;
}

/**
 * Angle (radians) of the edge with the greatest 2D length, wrapping edge included.
 * Ties keep the first such edge.
 */
export function dominantOrientation(polyline: Polyline): number {
  const pts = polyline.points;
  const n = pts.length;
  if (n < 2) return 0;

  let maxLength = 0;
  let angle = 0;

  for (let i = 0; i < n; i++) {
    const a = pts[i];
    const b = pts[(i + 1) % n];
    const length = distance2d(a, b);

    if (length > maxLength) {
      maxLength = length;
      angle = Math.atan2(b.y - a.y, b.x - a.x);
    }
  }

  return angle;
}

/**
 * Tests if a point is inside a vertex ring (XY projection) using ray casting.
 * Points exactly on the boundary may land on either side; use
 * `pointContainment` when the boundary matters.
 */
export function pointInPolygon2d(point: Point3, vertices: readonly Point3[]): boolean {
  const n = vertices.length;
  let inside = false;

  for (let i = 0, j = n - 1; i < n; j = i++) {
    const xi = vertices[i].x, yi = vertices[i].y;
    const xj = vertices[j].x, yj = vertices[j].y;

    if (((yi > point.y) !== (yj > point.y)) &&
        (point.x < (xj - xi) * (point.y - yi) / (yj - yi) + xi)) {
      inside = !inside;
    }
  }

  return inside;
}
