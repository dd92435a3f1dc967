/**
 * Test Fixtures - Site Polygons
 *
 * Flat [x, y, z, ...] vertex arrays as callers send them.
 * All dimensions are in meters.
 */

import { Polyline } from '../../src/types/geometry';
import { polylineFromFlat } from '../../src/geometry/polyline';

/** Unit square, counter-clockwise, closed with a duplicate first point */
export const UNIT_SQUARE_CLOSED = [0, 0, 0, 1, 0, 0, 1, 1, 0, 0, 1, 0, 0, 0, 0];

/** Unit square without the closing duplicate */
export const UNIT_SQUARE_OPEN = [0, 0, 0, 1, 0, 0, 1, 1, 0, 0, 1, 0];

/** L-shaped site (area 12) with a reflex corner at (2, 2) */
export const L_SHAPE = [0, 0, 0, 4, 0, 0, 4, 2, 0, 2, 2, 0, 2, 4, 0, 0, 4, 0, 0, 0, 0];

/** Two triangles crossing at (0.5, 0.5) */
export const BOWTIE = [0, 0, 0, 1, 1, 0, 1, 0, 0, 0, 1, 0, 0, 0, 0];

/** Unit square with one corner lifted off the XY plane */
export const WARPED_SQUARE = [0, 0, 0, 1, 0, 0, 1, 1, 1, 0, 1, 0, 0, 0, 0];

/** 100m x 80m rectangular site */
export const RECT_SITE = [0, 0, 0, 100, 0, 0, 100, 80, 0, 0, 80, 0, 0, 0, 0];

/** 200m x 150m rectangular site */
export const LARGE_SITE = [0, 0, 0, 200, 0, 0, 200, 150, 0, 0, 150, 0, 0, 0, 0];

/** 10m x 10m plot: too small for a single footprint */
export const TINY_SITE = [0, 0, 0, 10, 0, 0, 10, 10, 0, 0, 10, 0, 0, 0, 0];

export function polylineOf(flat: readonly number[]): Polyline {
  return polylineFromFlat(flat);
}
