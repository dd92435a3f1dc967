import { triangulate, triangleArea } from './triangulation';
import { createPoint } from './point';
import { L_SHAPE, UNIT_SQUARE_CLOSED, polylineOf } from '../../test/fixtures/sites';

function totalArea(triangles: ReturnType<typeof triangulate>['triangles']): number {
  return triangles.reduce((sum, t) => sum + triangleArea(t), 0);
}

describe('Ear-clipping triangulation', () => {
  it('should split a square into two triangles', () => {
    const { triangles, forcedClips } = triangulate(polylineOf(UNIT_SQUARE_CLOSED));
    expect(triangles).toHaveLength(2);
    expect(forcedClips).toBe(0);
    expect(totalArea(triangles)).toBe(1);
  });

  it('should yield N - 2 triangles covering a concave polygon', () => {
    const { triangles, forcedClips } = triangulate(polylineOf(L_SHAPE));
    expect(triangles).toHaveLength(4);
    expect(forcedClips).toBe(0);
    expect(totalArea(triangles)).toBeCloseTo(12, 10);
  });

  it('should clip real ears of an H-shaped polygon from any start vertex and winding', () => {
    const outline: Array<[number, number]> = [
      [0, 0], [3, 0], [3, 1], [2, 1], [2, 2], [3, 2],
      [3, 3], [0, 3], [0, 2], [1, 2], [1, 1], [0, 1],
    ];
    for (const ordered of [outline, [...outline].reverse()]) {
      for (let start = 0; start < ordered.length; start++) {
        const rotated = [...ordered.slice(start), ...ordered.slice(0, start)].map(([x, y]) => createPoint(x, y));
        const { triangles, forcedClips } = triangulate(rotated);
        expect(forcedClips).toBe(0);
        expect(triangles).toHaveLength(10);
        expect(totalArea(triangles)).toBeCloseTo(7, 10);
      }
    }
  });

  it('should accept a bare vertex array in clockwise order', () => {
    const clockwise = [createPoint(0, 0), createPoint(0, 2), createPoint(3, 2), createPoint(3, 0)];
    const { triangles } = triangulate(clockwise);
    expect(triangles).toHaveLength(2);
    expect(totalArea(triangles)).toBe(6);
  });

  it('should still terminate on collinear input', () => {
    const line = [createPoint(0, 0), createPoint(1, 0), createPoint(2, 0), createPoint(3, 0)];
    const { triangles, forcedClips } = triangulate(line);
    expect(triangles).toHaveLength(2);
    expect(forcedClips).toBe(1);
  });

  it('should return nothing for fewer than 3 vertices', () => {
    expect(triangulate([createPoint(0, 0), createPoint(1, 0)]).triangles).toEqual([]);
  });

  it('should compute unsigned triangle area', () => {
    expect(triangleArea([createPoint(0, 0), createPoint(0, 2), createPoint(2, 0)])).toBe(2);
  });
});
