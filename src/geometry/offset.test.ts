/**
 * Offset Engine Tests
 */

import { offsetTowardCentroid, insetByScale, offsetWithFallback, OffsetStrategy } from './offset';
import { isClosed, polylineArea } from './polyline';
import { UNIT_SQUARE_CLOSED, UNIT_SQUARE_OPEN, polylineOf } from '../../test/fixtures/sites';

// Vertex average at the origin, vertices 4, 1, 2 and sqrt(5) from it
const UNEVEN = polylineOf([4, 0, 0, 0, 1, 0, -2, 0, 0, -2, -1, 0, 4, 0, 0]);

describe('Offset engine', () => {
  const square = polylineOf(UNIT_SQUARE_CLOSED);

  describe('offsetTowardCentroid', () => {
    it('should move each vertex toward the centroid', () => {
      const outcome = offsetTowardCentroid(square, 0.1);
      if (outcome.status !== 'success') throw new Error(`expected success, got ${outcome.status}`);

      const [first] = outcome.polyline.points;
      expect(first.x).toBeCloseTo(0.1 / Math.SQRT2, 10);
      expect(first.y).toBeCloseTo(0.1 / Math.SQRT2, 10);
      expect(outcome.polyline.points).toHaveLength(5);
      expect(isClosed(outcome.polyline)).toBe(true);
    });

    it('should shrink the area for an inward offset', () => {
      const outcome = offsetTowardCentroid(square, 0.1);
      if (outcome.status !== 'success') throw new Error('expected success');

      // side = 2 * (sqrt(0.5) - 0.1) / sqrt(2)
      const side = Math.SQRT2 * (Math.SQRT1_2 - 0.1);
      expect(polylineArea(outcome.polyline)).toBeCloseTo(side * side, 10);
      expect(polylineArea(outcome.polyline)).toBeCloseTo(0.737, 3);
    });

    it('should move vertices away for a negative distance', () => {
      const outcome = offsetTowardCentroid(square, -0.1);
      if (outcome.status !== 'success') throw new Error('expected success');
      expect(outcome.polyline.points[0].x).toBeCloseTo(-0.1 / Math.SQRT2, 10);
      expect(polylineArea(outcome.polyline)).toBeGreaterThan(1);
    });

    it('should fail when vertices would cross the centroid', () => {
      const outcome = offsetTowardCentroid(square, 10);
      expect(outcome).toEqual({ status: 'failed', reason: 'only 0 vertices survived an offset of 10' });
    });

    it('should fail on an open polyline', () => {
      expect(offsetTowardCentroid(polylineOf(UNIT_SQUARE_OPEN), 0.1).status).toBe('failed');
    });
  });

  describe('insetByScale', () => {
    it('should scale about the centroid by the mean radius', () => {
      const outcome = insetByScale(square, 0.1);
      if (outcome.status !== 'success') throw new Error('expected success');
      expect(outcome.polyline.points[0].x).toBeCloseTo(0.1 / Math.SQRT2, 10);
      expect(outcome.polyline.points).toHaveLength(5);
    });

    it('should keep every vertex', () => {
      const outcome = insetByScale(UNEVEN, 2.1);
      if (outcome.status !== 'success') throw new Error('expected success');
      expect(outcome.polyline.points).toHaveLength(5);
    });

    it('should be degenerate past the mean radius', () => {
      expect(insetByScale(square, 10).status).toBe('degenerate');
    });
  });

  describe('offsetWithFallback', () => {
    it('should use the first tier when it succeeds', () => {
      const result = offsetWithFallback(square, 0.1);
      if (result.status !== 'success') throw new Error('expected success');
      expect(result.strategy).toBe('offset');
      expect(result.fallbackUsed).toBe(false);
      expect(result.attempts).toHaveLength(1);
    });

    it('should fall back to the inset when vertices are dropped', () => {
      const result = offsetWithFallback(UNEVEN, 2.1);
      if (result.status !== 'success') throw new Error('expected success');
      expect(result.strategy).toBe('inset');
      expect(result.fallbackUsed).toBe(true);
      expect(result.attempts.map(a => a.outcome.status)).toEqual(['failed', 'success']);
    });

    it('should fail when every tier fails', () => {
      const result = offsetWithFallback(square, 10);
      expect(result.status).toBe('failed');
      expect(result.attempts.map(a => a.strategy)).toEqual(['offset', 'inset']);
    });

    it('should run custom strategies in order', () => {
      const calls: string[] = [];
      const strategies: OffsetStrategy[] = [
        { name: 'inset', run: () => { calls.push('first'); return { status: 'degenerate', reason: 'none' }; } },
        { name: 'offset', run: (p) => { calls.push('second'); return { status: 'success', polyline: p }; } }
      ];

      const result = offsetWithFallback(square, 1, 1e-6, strategies);
      expect(calls).toEqual(['first', 'second']);
      expect(result.status).toBe('success');
    });
  });
});
