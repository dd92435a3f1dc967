/**
 * Point Utility Tests
 */

import {
  createPoint,
  distance,
  distanceSquared,
  distance2d,
  translate,
  rotateAroundPoint,
  scaleFromPoint,
  lerp,
  pointsEqual,
  degreesToRadians,
  radiansToDegrees,
  flattenPoints,
  pointsFromFlat
} from './point';

describe('Point utilities', () => {
  describe('createPoint', () => {
    it('should create a point with x, y and z', () => {
      expect(createPoint(1, 2, 3)).toEqual({ x: 1, y: 2, z: 3 });
    });

    it('should default z to 0', () => {
      expect(createPoint(5, 10).z).toBe(0);
    });
  });

  describe('distance', () => {
    it('should measure in three dimensions', () => {
      expect(distance(createPoint(0, 0, 0), createPoint(2, 3, 6))).toBe(7);
    });

    it('should return 0 for the same point', () => {
      const p = createPoint(5, 5, 5);
      expect(distance(p, p)).toBe(0);
    });

    it('should square without the root', () => {
      expect(distanceSquared(createPoint(0, 0), createPoint(3, 4))).toBe(25);
    });

    it('should ignore z in distance2d', () => {
      expect(distance2d(createPoint(0, 0, 0), createPoint(3, 4, 100))).toBe(5);
    });
  });

  describe('translate', () => {
    it('should translate by dx, dy and dz', () => {
      expect(translate(createPoint(5, 5, 1), 3, -2, 4)).toEqual({ x: 8, y: 3, z: 5 });
    });

    it('should not mutate the original point', () => {
      const p = createPoint(5, 5);
      translate(p, 3, -2);
      expect(p).toEqual({ x: 5, y: 5, z: 0 });
    });
  });

  describe('rotateAroundPoint', () => {
    it('should rotate around a center point in XY', () => {
      const rotated = rotateAroundPoint(createPoint(2, 0, 7), createPoint(1, 0), Math.PI / 2);
      expect(rotated.x).toBeCloseTo(1, 10);
      expect(rotated.y).toBeCloseTo(1, 10);
    });

    it('should keep z', () => {
      expect(rotateAroundPoint(createPoint(2, 0, 7), createPoint(1, 0), Math.PI).z).toBe(7);
    });
  });

  describe('scaleFromPoint', () => {
    it('should scale relative to a center', () => {
      expect(scaleFromPoint(createPoint(3, 3, 3), createPoint(1, 1, 1), 2)).toEqual({ x: 5, y: 5, z: 5 });
    });
  });

  describe('lerp', () => {
    const p1 = createPoint(0, 0, 0);
    const p2 = createPoint(10, 10, 4);

    it('should return start point at t=0', () => {
      expect(lerp(p1, p2, 0)).toEqual(p1);
    });

    it('should return end point at t=1', () => {
      expect(lerp(p1, p2, 1)).toEqual(p2);
    });

    it('should return midpoint at t=0.5', () => {
      expect(lerp(p1, p2, 0.5)).toEqual({ x: 5, y: 5, z: 2 });
    });
  });

  describe('pointsEqual', () => {
    it('should return true for equal points', () => {
      expect(pointsEqual(createPoint(5, 5), createPoint(5, 5))).toBe(true);
    });

    it('should return false for different points', () => {
      expect(pointsEqual(createPoint(5, 5), createPoint(5, 6))).toBe(false);
    });

    it('should use the given tolerance', () => {
      const p1 = createPoint(5, 5);
      const p2 = createPoint(5.00001, 5);
      expect(pointsEqual(p1, p2, 0.0001)).toBe(true);
      expect(pointsEqual(p1, p2, 0.000001)).toBe(false);
    });
  });

  describe('angle conversions', () => {
    it('should convert degrees to radians', () => {
      expect(degreesToRadians(180)).toBeCloseTo(Math.PI, 10);
      expect(degreesToRadians(90)).toBeCloseTo(Math.PI / 2, 10);
    });

    it('should convert radians to degrees', () => {
      expect(radiansToDegrees(Math.PI)).toBeCloseTo(180, 10);
      expect(radiansToDegrees(Math.PI / 2)).toBeCloseTo(90, 10);
    });
  });

  describe('flat arrays', () => {
    it('should flatten points in order', () => {
      expect(flattenPoints([createPoint(1, 2, 3), createPoint(4, 5, 6)])).toEqual([1, 2, 3, 4, 5, 6]);
    });

    it('should add a z offset when flattening', () => {
      expect(flattenPoints([createPoint(1, 2, 0)], 0.2)).toEqual([1, 2, 0.2]);
    });

    it('should group a flat array into points', () => {
      expect(pointsFromFlat([1, 2, 3, 4, 5, 6])).toEqual([
        { x: 1, y: 2, z: 3 },
        { x: 4, y: 5, z: 6 }
      ]);
    });

    it('should ignore a trailing partial triple', () => {
      expect(pointsFromFlat([1, 2, 3, 4, 5])).toHaveLength(1);
    });
  });
});
