/**
 * Line utility functions
 * A line is a finite, directed segment defined by two endpoints (start and end)
 */

import { Line, Point3, Vector3 } from '../types/geometry';
import { DEFAULT_TOLERANCE } from '../algorithm/constants';
import { distance, lerp } from './point';
import { dot, normalize, vectorBetween } from './vector';

/**
 * Creates a new line from two points
 */
export function createLine(start: Point3, end: Point3): Line {
  return { start, end };
}

/**
 * Calculates the length of a line segment
 */
export function lineLength(line: Line): number {
  return distance(line.start, line.end);
}

/**
 * Returns the point at parameter t (0=start, 1=end; values outside extend the line)
 */
export function pointAt(line: Line, t: number): Point3 {
  return lerp(line.start, line.end, t);
}

/**
 * Returns the direction vector of a line (not normalized)
 */
export function lineDirection(line: Line): Vector3 {
  return vectorBetween(line.start, line.end);
}

/**
 * Returns the unit direction of a line, or the zero vector for a degenerate line
 */
export function lineDirectionNormalized(line: Line): Vector3 {
  return normalize(lineDirection(line));
}

/**
 * Parameter t of the foot of the perpendicular from `point` onto the infinite line.
 * Returns 0 for a degenerate (zero-length) line.
 */
export function closestParameter(line: Line, point: Point3): number {
  const dir = lineDirection(line);
  const len2 = dot(dir, dir);
  if (len2 === 0) return 0;
  return dot(vectorBetween(line.start, point), dir) / len2;
}

/**
 * Closest point on the line to `point`.
 * With `limitToSegment`, t is clamped to [0, 1] before evaluating.
 */
export function closestPoint(line: Line, point: Point3, limitToSegment: boolean = false): Point3 {
  let t = closestParameter(line, point);
  if (limitToSegment) {
    t = Math.max(0, Math.min(1, t));
  }
  return pointAt(line, t);
}

/**
 * Calculates the distance from a point to a line segment
 */
export function distanceToSegment(line: Line, point: Point3): number {
  return distance(point, closestPoint(line, point, true));
}

/**
 * Checks if a point lies on a line segment (within tolerance)
 */
export function pointOnSegment(line: Line, point: Point3, tolerance: number = DEFAULT_TOLERANCE): boolean {
  return distanceToSegment(line, point) <= tolerance;
}

/**
 * Reverses the direction of a line
 */
export function reverseLine(line: Line): Line {
  return {
    start: line.end,
    end: line.start
  };
}
