/**
 * Point utility functions
 * All functions are pure and return new objects (no mutation)
 */

import { Point3 } from '../types/geometry';
import { DEFAULT_TOLERANCE } from '../algorithm/constants';

/**
 * Creates a new point (z defaults to 0)
 */
export function createPoint(x: number, y: number, z: number = 0): Point3 {
  return { x, y, z };
}

/**
 * Calculates the Euclidean distance between two points
 */
export function distance(p1: Point3, p2: Point3): number {
  return Math.sqrt(distanceSquared(p1, p2));
}

/**
 * Calculates the squared distance between two points
 * (Useful when comparing distances without needing the actual value)
 */
export function distanceSquared(p1: Point3, p2: Point3): number {
  const dx = p2.x - p1.x;
  const dy = p2.y - p1.y;
  const dz = p2.z - p1.z;
  return dx * dx + dy * dy + dz * dz;
}

/**
 * Distance between two points ignoring z
 */
export function distance2d(p1: Point3, p2: Point3): number {
  const dx = p2.x - p1.x;
  const dy = p2.y - p1.y;
  return Math.sqrt(dx * dx + dy * dy);
}

/**
 * Translates a point by dx, dy, dz
 */
export function translate(p: Point3, dx: number, dy: number, dz: number = 0): Point3 {
  return {
    x: p.x + dx,
    y: p.y + dy,
    z: p.z + dz
  };
}

/**
 * Rotates a point in the XY plane around a center point by angle (in radians).
 * The z coordinate is preserved.
 */
export function rotateAroundPoint(p: Point3, center: Point3, angle: number): Point3 {
  const cos = Math.cos(angle);
  const sin = Math.sin(angle);
  const x = p.x - center.x;
  const y = p.y - center.y;
  return {
    x: x * cos - y * sin + center.x,
    y: x * sin + y * cos + center.y,
    z: p.z
  };
}

/**
 * Scales a point relative to a center point
 */
export function scaleFromPoint(p: Point3, center: Point3, factor: number): Point3 {
  return {
    x: center.x + (p.x - center.x) * factor,
    y: center.y + (p.y - center.y) * factor,
    z: center.z + (p.z - center.z) * factor
  };
}

/**
 * Interpolates between two points (t=0 returns p1, t=1 returns p2)
 */
export function lerp(p1: Point3, p2: Point3, t: number): Point3 {
  return {
    x: p1.x + (p2.x - p1.x) * t,
    y: p1.y + (p2.y - p1.y) * t,
    z: p1.z + (p2.z - p1.z) * t
  };
}

/**
 * Checks if two points coincide (within tolerance).
 * Geometric comparisons never use exact equality.
 */
export function pointsEqual(p1: Point3, p2: Point3, tolerance: number = DEFAULT_TOLERANCE): boolean {
  return distance(p1, p2) <= tolerance;
}

/**
 * Converts degrees to radians
 */
export function degreesToRadians(degrees: number): number {
  return degrees * (Math.PI / 180);
}

/**
 * Converts radians to degrees
 */
export function radiansToDegrees(radians: number): number {
  return radians * (180 / Math.PI);
}

/**
 * Flattens points into [x1, y1, z1, x2, y2, z2, ...]
 */
export function flattenPoints(points: readonly Point3[], zOffset: number = 0): number[] {
  const flat: number[] = [];
  for (const p of points) {
    flat.push(p.x, p.y, p.z + zOffset);
  }
  return flat;
}

/**
 * Groups a flat coordinate array into points.
 * A trailing partial triple is ignored.
 */
export function pointsFromFlat(flat: readonly number[]): Point3[] {
  const points: Point3[] = [];
  for (let i = 0; i + 2 < flat.length; i += 3) {
    points.push({ x: flat[i], y: flat[i + 1], z: flat[i + 2] });
  }
  return points;
}
