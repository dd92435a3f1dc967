import {
  ZERO_VECTOR,
  createVector,
  vectorBetween,
  add,
  subtract,
  scaleVector,
  dot,
  cross,
  vectorLength,
  normalize,
  isZeroVector,
  offsetPoint
} from './vector';
import { createPoint } from './point';

describe('Vector utilities', () => {
  it('should build the vector between two points', () => {
    expect(vectorBetween(createPoint(1, 1, 1), createPoint(4, 5, 1))).toEqual({ x: 3, y: 4, z: 0 });
  });

  it('should add and subtract component-wise', () => {
    const a = createVector(1, 2, 3);
    const b = createVector(4, 5, 6);
    expect(add(a, b)).toEqual({ x: 5, y: 7, z: 9 });
    expect(subtract(b, a)).toEqual({ x: 3, y: 3, z: 3 });
  });

  it('should scale by a factor', () => {
    expect(scaleVector(createVector(1, -2, 3), 2)).toEqual({ x: 2, y: -4, z: 6 });
  });

  it('should compute dot and cross products', () => {
    const x = createVector(1, 0, 0);
    const y = createVector(0, 1, 0);
    expect(dot(x, y)).toBe(0);
    expect(dot(createVector(1, 2, 3), createVector(4, 5, 6))).toBe(32);
    expect(cross(x, y)).toEqual({ x: 0, y: 0, z: 1 });
    expect(cross(y, x)).toEqual({ x: 0, y: 0, z: -1 });
  });

  it('should measure length', () => {
    expect(vectorLength(createVector(3, 4))).toBe(5);
  });

  describe('normalize', () => {
    it('should return a unit vector', () => {
      expect(normalize(createVector(0, 5, 0))).toEqual({ x: 0, y: 1, z: 0 });
    });

    it('should return the zero vector for a tiny input', () => {
      expect(normalize(createVector(1e-9, 0, 0))).toBe(ZERO_VECTOR);
    });

    it('should honor the tolerance', () => {
      expect(normalize(createVector(0.01, 0, 0), 0.1)).toBe(ZERO_VECTOR);
      expect(normalize(createVector(0.01, 0, 0), 0.001).x).toBeCloseTo(1, 10);
    });
  });

  it('should detect zero vectors', () => {
    expect(isZeroVector(ZERO_VECTOR)).toBe(true);
    expect(isZeroVector(createVector(0, 0, 1))).toBe(false);
  });

  it('should move a point along a vector', () => {
    expect(offsetPoint(createPoint(1, 1, 1), createVector(2, 0, -1))).toEqual({ x: 3, y: 1, z: 0 });
  });
});
