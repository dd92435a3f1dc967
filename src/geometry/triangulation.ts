/**
 * Ear-clipping triangulation (XY projection)
 */

import { Point3, Polyline } from '../types/geometry';
import { DEFAULT_TOLERANCE } from '../algorithm/constants';
import { ringVertices, signedArea2d } from './polyline';
import { distance2d } from './point';

export type Triangle = [Point3, Point3, Point3];

export interface TriangulationResult {
  triangles: Triangle[];
  /** Iterations where no ear was found and a triangle was emitted anyway */
  forcedClips: number;
}

function turn(a: Point3, b: Point3, c: Point3): number {
  return (b.x - a.x) * (c.y - b.y) - (b.y - a.y) * (c.x - b.x);
}

/**
 * An ear turns the same way as the polygon winds and has no other
 * remaining vertex inside or on the boundary of its triangle. Vertices
 * coinciding with a corner of the triangle do not block it.
 */
function isEar(
  remaining: Point3[],
  prev: number,
  curr: number,
  next: number,
  winding: number,
  tolerance: number
): boolean {
  const a = remaining[prev];
  const b = remaining[curr];
  const c = remaining[next];

  if (turn(a, b, c) * winding <= 0) return false;

  for (let j = 0; j < remaining.length; j++) {
    if (j === prev || j === curr || j === next) continue;
    const p = remaining[j];
    if (distance2d(p, a) <= tolerance || distance2d(p, b) <= tolerance || distance2d(p, c) <= tolerance) {
      continue;
    }
    if (turn(a, b, p) * winding >= 0 && turn(b, c, p) * winding >= 0 && turn(c, a, p) * winding >= 0) {
      return false;
    }
  }

  return true;
}

/**
 * Triangulates a polygon ring by ear clipping.
 *
 * The closing duplicate, if present, is stripped first. When a full pass finds
 * no ear (degenerate or self-intersecting input) the first three remaining
 * vertices are emitted and the second removed, so the remaining count drops
 * on every iteration and the loop always terminates.
 *
 * A simple polygon with N vertices yields N - 2 triangles.
 */
export function triangulate(
  polygon: Polyline | readonly Point3[],
  tolerance: number = DEFAULT_TOLERANCE
): TriangulationResult {
  const points = 'points' in polygon ? polygon.points : polygon;
  const remaining = ringVertices({ points }, tolerance);
  const triangles: Triangle[] = [];
  let forcedClips = 0;

  if (remaining.length < 3) {
    return { triangles, forcedClips };
  }

  const winding = Math.sign(signedArea2d(remaining)) || 1;

  while (remaining.length > 3) {
    const n = remaining.length;
    let clipped = false;

    for (let i = 0; i < n; i++) {
      const prev = (i - 1 + n) % n;
      const next = (i + 1) % n;

      if (isEar(remaining, prev, i, next, winding, tolerance)) {
        triangles.push([remaining[prev], remaining[i], remaining[next]]);
        remaining.splice(i, 1);
        clipped = true;
        break;
      }
    }

    if (!clipped) {
      triangles.push([remaining[0], remaining[1], remaining[2]]);
      remaining.splice(1, 1);
      forcedClips++;
    }
  }

  triangles.push([remaining[0], remaining[1], remaining[2]]);

  return { triangles, forcedClips };
}

/**
 * Unsigned area of a triangle in the XY plane
 */
export function triangleArea(triangle: Triangle): number {
  return Math.abs(signedArea2d(triangle));
}
