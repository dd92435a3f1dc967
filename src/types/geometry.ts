/**
 * Core geometry types for the Site Layout Kernel
 * All coordinates share one 3D Cartesian frame (meters)
 */

/**
 * A location in 3D space
 */
export interface Point3 {
  readonly x: number;
  readonly y: number;
  readonly z: number;
}

/**
 * A displacement in 3D space
 */
export interface Vector3 {
  readonly x: number;
  readonly y: number;
  readonly z: number;
}

/**
 * A finite, directed line segment.
 * Parametrized as start + t * (end - start), t in [0, 1] inside the segment.
 */
export interface Line {
  readonly start: Point3;
  readonly end: Point3;
}

/**
 * A plane through `origin` with a unit-length `normal`
 */
export interface Plane {
  readonly origin: Point3;
  readonly normal: Vector3;
}

/**
 * An ordered vertex sequence.
 * The polyline is closed when its first and last points coincide within tolerance;
 * unlike a polygon ring, closure is explicit in the point list.
 */
export interface Polyline {
  readonly points: readonly Point3[];
}

/**
 * Axis-aligned bounds across all three coordinates
 */
export interface BoundingBox {
  minX: number;
  minY: number;
  minZ: number;
  maxX: number;
  maxY: number;
  maxZ: number;
}

/**
 * Which coordinate plane a polygon is projected onto for 2D predicates
 */
export type Projection = 'xy' | 'yz' | 'xz';

/**
 * Three-valued point-in-polygon result
 */
export type Containment = 'inside' | 'outside' | 'coincident';
