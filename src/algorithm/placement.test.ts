/**
 * Placement Engine Tests
 */

import { footprintInside, gridPlacements, scatterPlacements } from './placement';
import { GeometryKernelError } from './errors';
import { MAX_GRID_CELLS } from './constants';
import { disableLogging } from './utils/logger';
import { createRandomSource } from './utils/random';
import { distance2d } from '../geometry/point';
import { ringVertices } from '../geometry/polyline';
import { L_SHAPE, LARGE_SITE, RECT_SITE, TINY_SITE, polylineOf } from '../../test/fixtures/sites';

const rect = ringVertices(polylineOf(RECT_SITE));
const large = ringVertices(polylineOf(LARGE_SITE));
const tiny = ringVertices(polylineOf(TINY_SITE));

beforeAll(() => disableLogging());

describe('footprintInside', () => {
  it('should accept a footprint fully inside', () => {
    expect(footprintInside(rect, { x: 50, y: 40, z: 0 }, 20, 17)).toBe(true);
  });

  it('should reject a footprint whose center is inside but a corner is not', () => {
    expect(footprintInside(rect, { x: 95, y: 40, z: 0 }, 20, 17)).toBe(false);
  });

  it('should reject footprints over the notch of a concave site', () => {
    const notched = ringVertices(polylineOf(L_SHAPE));
    expect(footprintInside(notched, { x: 3, y: 3, z: 0 }, 1, 1)).toBe(false);
    expect(footprintInside(notched, { x: 1, y: 3, z: 0 }, 1, 1)).toBe(true);
  });
});

describe('gridPlacements', () => {
  it('should sweep column by column', () => {
    const positions = gridPlacements(rect, 20, 17, 8);

    expect(positions).toHaveLength(9);
    expect(positions.slice(0, 4)).toEqual([
      { x: 10, y: 8.5, z: 0 },
      { x: 10, y: 33.5, z: 0 },
      { x: 10, y: 58.5, z: 0 },
      { x: 38, y: 8.5, z: 0 }
    ]);
  });

  it('should keep only cells fully inside a concave site', () => {
    const notched = ringVertices(polylineOf(L_SHAPE));
    const positions = gridPlacements(notched, 1, 1, 1);
    expect(positions).toEqual([
      { x: 0.5, y: 0.5, z: 0 },
      { x: 0.5, y: 2.5, z: 0 },
      { x: 2.5, y: 0.5, z: 0 }
    ]);
  });

  it('should return nothing when the footprint is larger than the site', () => {
    expect(gridPlacements(tiny, 20, 17, 8)).toEqual([]);
  });

  it('should stop once the requested number of cells is found', () => {
    const positions = gridPlacements(rect, 20, 17, 8, undefined, 2);
    expect(positions).toEqual([
      { x: 10, y: 8.5, z: 0 },
      { x: 10, y: 33.5, z: 0 }
    ]);
  });

  it('should stop at the cell limit on a very large site', () => {
    const huge = ringVertices(polylineOf([0, 0, 0, 1e9, 0, 0, 1e9, 1e9, 0, 0, 1e9, 0]));
    const positions = gridPlacements(huge, 20, 17, 8);
    expect(positions).toHaveLength(MAX_GRID_CELLS);
    expect(positions[0]).toEqual({ x: 10, y: 8.5, z: 0 });
  });

  it('should refuse a site whose extent is not finite', () => {
    const unbounded = ringVertices(polylineOf([0, 0, 0, 1e300, 0, 0, 1e300, 1e300, 0, 0, 1e300, 0]));
    expect(() => gridPlacements(unbounded, 20, 17, 8)).toThrow(GeometryKernelError);
  });
});

describe('scatterPlacements', () => {
  it('should keep footprints inside and apart', () => {
    const { positions } = scatterPlacements(large, 8, 16.4, 14, createRandomSource(11), { minSpacing: 15 });

    expect(positions).toHaveLength(8);
    for (const p of positions) {
      expect(footprintInside(large, p, 16.4, 14)).toBe(true);
    }
    for (let i = 0; i < positions.length; i++) {
      for (let j = i + 1; j < positions.length; j++) {
        expect(distance2d(positions[i], positions[j])).toBeGreaterThanOrEqual(16.4 + 15);
      }
    }
  });

  it('should be reproducible under a seed', () => {
    const a = scatterPlacements(large, 5, 16.4, 14, createRandomSource(5));
    const b = scatterPlacements(large, 5, 16.4, 14, createRandomSource(5));
    expect(a).toEqual(b);
  });

  it('should stop after the attempt cap on a crowded site', () => {
    const result = scatterPlacements(tiny, 1, 20, 17, createRandomSource(1));
    expect(result.positions).toEqual([]);
    expect(result.attempts).toBe(200);
  });

  it('should place fewer than requested when only one footprint fits', () => {
    const narrow = ringVertices(polylineOf([0, 0, 0, 30, 0, 0, 30, 30, 0, 0, 30, 0]));
    const { positions, attempts } = scatterPlacements(narrow, 5, 20, 17, createRandomSource(3));

    expect(positions).toHaveLength(1);
    expect(attempts).toBe(1000);
  });

  it('should honor a custom attempt cap', () => {
    expect(scatterPlacements(tiny, 2, 20, 17, createRandomSource(1), { maxAttempts: 10 }).attempts).toBe(10);
  });

  it('should place nothing for a zero count', () => {
    expect(scatterPlacements(large, 0, 10, 10, createRandomSource(1))).toEqual({ positions: [], attempts: 0 });
  });
});
