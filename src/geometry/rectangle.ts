/**
 * Footprint rectangle utility functions
 * Footprints are axis-aligned and described by their center
 */

import { Point3 } from '../types/geometry';

/**
 * An axis-aligned building footprint
 */
export interface Footprint {
  center: Point3;
  /** Extent along x */
  width: number;
  /** Extent along y */
  depth: number;
}

/**
 * Creates a footprint centered at a point
 */
export function footprintCenteredAt(center: Point3, width: number, depth: number): Footprint {
  return { center, width, depth };
}

/**
 * Returns the four corners at elevation `z`
 * (bottom-left, bottom-right, top-right, top-left)
 */
export function footprintCorners(footprint: Footprint, z: number = footprint.center.z): [Point3, Point3, Point3, Point3] {
  const { center, width, depth } = footprint;
  const halfWidth = width / 2;
  const halfDepth = depth / 2;
  return [
    { x: center.x - halfWidth, y: center.y - halfDepth, z },   // bottom-left
    { x: center.x + halfWidth, y: center.y - halfDepth, z },   // bottom-right
    { x: center.x + halfWidth, y: center.y + halfDepth, z },   // top-right
    { x: center.x - halfWidth, y: center.y + halfDepth, z }    // top-left
  ];
}

/**
 * Calculates the area of a footprint
 */
export function footprintArea(footprint: Footprint): number {
  return footprint.width * footprint.depth;
}
