/**
 * Intersection engine
 * All predicates work on the XY projection.
 */

import { Containment, Line, Point3, Polyline } from '../types/geometry';
import { DEFAULT_TOLERANCE } from '../algorithm/constants';
import { distance } from './point';
import { closestPoint, lineLength, pointAt } from './line';
import { getSegments, isClosed, pointInPolygon2d } from './polyline';

/**
 * Result of a line-line intersection calculation
 */
export interface LineIntersection {
  /** The intersection point, evaluated on line 1 */
  point: Point3;
  /** Parameter along line 1 (0-1 if within segment) */
  t: number;
  /** Parameter along line 2 (0-1 if within segment) */
  u: number;
}

/**
 * Intersection of two lines treated as infinite lines in 2D.
 * `undefined` when the lines are parallel or collinear (determinant within
 * tolerance of zero) or when either line is degenerate.
 */
export function lineLineIntersection(
  line1: Line,
  line2: Line,
  tolerance: number = DEFAULT_TOLERANCE
): LineIntersection | undefined {
  if (lineLength(line1) <= tolerance || lineLength(line2) <= tolerance) {
    return undefined;
  }

  const x1 = line1.start.x, y1 = line1.start.y;
  const x2 = line1.end.x, y2 = line1.end.y;
  const x3 = line2.start.x, y3 = line2.start.y;
  const x4 = line2.end.x, y4 = line2.end.y;

  const denom = (x1 - x2) * (y3 - y4) - (y1 - y2) * (x3 - x4);

  if (Math.abs(denom) <= tolerance) {
    return undefined;
  }

  const t = ((x1 - x3) * (y3 - y4) - (y1 - y3) * (x3 - x4)) / denom;
  const u = -((x1 - x2) * (y1 - y3) - (y1 - y2) * (x1 - x3)) / denom;

  if (!Number.isFinite(t) || !Number.isFinite(u)) {
    return undefined;
  }

  return { point: pointAt(line1, t), t, u };
}

function withinUnit(value: number): boolean {
  return value >= 0 && value <= 1;
}

/**
 * Intersection of two line segments: only returned when both parameters are in [0, 1]
 */
export function segmentIntersection(
  line1: Line,
  line2: Line,
  tolerance: number = DEFAULT_TOLERANCE
): LineIntersection | undefined {
  const hit = lineLineIntersection(line1, line2, tolerance);
  if (hit && withinUnit(hit.t) && withinUnit(hit.u)) {
    return hit;
  }
  return undefined;
}

/**
 * All true segment-segment crossings between `line` and the polyline's edges,
 * in edge order. `u` is the parameter along the crossed edge.
 */
export function linePolylineIntersections(
  line: Line,
  polyline: Polyline,
  tolerance: number = DEFAULT_TOLERANCE
): LineIntersection[] {
  const hits: LineIntersection[] = [];

  for (const edge of getSegments(polyline)) {
    const hit = segmentIntersection(line, edge, tolerance);
    if (hit) hits.push(hit);
  }

  return hits;
}

/**
 * Whether any two non-adjacent edges of the polyline cross.
 *
 * Neighboring edges share a vertex and are never compared. For a closed
 * polyline the first and last edges also share the closing vertex, so that
 * pair is skipped too. Stops at the first crossing.
 */
export function hasSelfIntersection(polyline: Polyline, tolerance: number = DEFAULT_TOLERANCE): boolean {
  const edges = getSegments(polyline);
  const count = edges.length;
  const closed = isClosed(polyline, tolerance);

  for (let i = 0; i < count; i++) {
    for (let j = i + 2; j < count; j++) {
      if (closed && i === 0 && j === count - 1) continue;
      if (segmentIntersection(edges[i], edges[j], tolerance)) {
        return true;
      }
    }
  }

  return false;
}

/**
 * Three-valued containment of a point in a closed polyline.
 *
 * - 'coincident': within tolerance of an edge
 * - 'inside' / 'outside': ray-casting parity otherwise
 *
 * An open polyline encloses nothing: every point is 'outside'.
 */
export function pointContainment(
  polyline: Polyline,
  point: Point3,
  tolerance: number = DEFAULT_TOLERANCE
): Containment {
  if (!isClosed(polyline, tolerance)) return 'outside';

  const flat: Point3 = { x: point.x, y: point.y, z: 0 };
  for (const edge of getSegments(polyline)) {
    const edge2d: Line = {
      start: { x: edge.start.x, y: edge.start.y, z: 0 },
      end: { x: edge.end.x, y: edge.end.y, z: 0 }
    };
    if (distance(flat, closestPoint(edge2d, flat, true)) <= tolerance) {
      return 'coincident';
    }
  }

  return pointInPolygon2d(point, polyline.points) ? 'inside' : 'outside';
}
