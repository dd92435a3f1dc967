/**
 * Vector utility functions
 * Vectors are displacements; points and vectors share a shape but not a meaning.
 */

import { Point3, Vector3 } from '../types/geometry';
import { DEFAULT_TOLERANCE } from '../algorithm/constants';

/**
 * The zero vector. `normalize` returns it for inputs with no defined direction.
 */
export const ZERO_VECTOR: Vector3 = Object.freeze({ x: 0, y: 0, z: 0 });

export function createVector(x: number, y: number, z: number = 0): Vector3 {
  return { x, y, z };
}

/**
 * Vector from `from` to `to`
 */
export function vectorBetween(from: Point3, to: Point3): Vector3 {
  return {
    x: to.x - from.x,
    y: to.y - from.y,
    z: to.z - from.z
  };
}

export function add(a: Vector3, b: Vector3): Vector3 {
  return { x: a.x + b.x, y: a.y + b.y, z: a.z + b.z };
}

export function subtract(a: Vector3, b: Vector3): Vector3 {
  return { x: a.x - b.x, y: a.y - b.y, z: a.z - b.z };
}

export function scaleVector(v: Vector3, factor: number): Vector3 {
  return { x: v.x * factor, y: v.y * factor, z: v.z * factor };
}

export function dot(a: Vector3, b: Vector3): number {
  return a.x * b.x + a.y * b.y + a.z * b.z;
}

export function cross(a: Vector3, b: Vector3): Vector3 {
  return {
    x: a.y * b.z - a.z * b.y,
    y: a.z * b.x - a.x * b.z,
    z: a.x * b.y - a.y * b.x
  };
}

export function vectorLength(v: Vector3): number {
  return Math.sqrt(dot(v, v));
}

/**
 * Returns the unit vector in the direction of `v`.
 * A vector shorter than `tolerance` has no direction: ZERO_VECTOR is returned.
 */
export function normalize(v: Vector3, tolerance: number = DEFAULT_TOLERANCE): Vector3 {
  const len = vectorLength(v);
  if (len <= tolerance) return ZERO_VECTOR;
  return { x: v.x / len, y: v.y / len, z: v.z / len };
}

/**
 * True when `v` has no usable direction
 */
export function isZeroVector(v: Vector3, tolerance: number = DEFAULT_TOLERANCE): boolean {
  return vectorLength(v) <= tolerance;
}

/**
 * Moves a point along a vector
 */
export function offsetPoint(p: Point3, v: Vector3): Point3 {
  return { x: p.x + v.x, y: p.y + v.y, z: p.z + v.z };
}
