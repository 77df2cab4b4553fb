import { describe, it, expect } from '@jest/globals';
import { createFacet, distance, formatFacet, triangleArea } from '../shared/geometry/facet';
import type { Point } from '../shared/types/mesh';
import { createPoint, createVec3 } from '../shared/types/mesh';

// |AB x AC| / 2
const crossProductArea = (a: Point, b: Point, c: Point): number => {
  const u = [b.x - a.x, b.y - a.y, b.z - a.z];
  const v = [c.x - a.x, c.y - a.y, c.z - a.z];
  const cx = u[1] * v[2] - u[2] * v[1];
  const cy = u[2] * v[0] - u[0] * v[2];
  const cz = u[0] * v[1] - u[1] * v[0];
  return Math.sqrt(cx * cx + cy * cy + cz * cz) / 2;
};

describe('distance', () => {
  it('should compute the euclidean distance', () => {
    expect(distance(createPoint(1, 2, 3), createPoint(4, 6, 3))).toBe(5);
  });
});

describe('triangleArea', () => {
  it('should give 0.5 for the unit right triangle', () => {
    const area = triangleArea(createPoint(0, 0, 0), createPoint(1, 0, 0), createPoint(0, 1, 0));
    expect(area).toBeCloseTo(0.5, 12);
  });

  it('should match the cross-product area for general triangles', () => {
    const triangles: Array<[Point, Point, Point]> = [
      [createPoint(1, 2, 3), createPoint(4, 0, -1), createPoint(-2, 5, 0.5)],
      [createPoint(0, 0, 0), createPoint(3, 0, 0), createPoint(0, 4, 0)],
      [createPoint(-1.25, 7, 2), createPoint(10, -3.5, 8), createPoint(0.5, 0.5, -6)],
    ];

    for (const [a, b, c] of triangles) {
      const expected = crossProductArea(a, b, c);
      const relative = Math.abs(triangleArea(a, b, c) - expected) / expected;
      expect(relative).toBeLessThan(1e-9);
    }
  });

  it('should return exactly 0 for collinear vertices', () => {
    const area = triangleArea(createPoint(0, 0, 0), createPoint(1, 0, 0), createPoint(2, 0, 0));
    expect(area).toBe(0);
  });

  it('should never return NaN for near-degenerate triangles', () => {
    for (let i = 1; i <= 50; i++) {
      const t = i * 0.1;
      const area = triangleArea(
        createPoint(0.1, 0.2, 0.3),
        createPoint(0.1 + t, 0.2 + 2 * t, 0.3 + 3 * t),
        createPoint(0.1 + 0.7 * t, 0.2 + 1.4 * t, 0.3 + 2.1 * t)
      );
      expect(Number.isNaN(area)).toBe(false);
      expect(area).toBeGreaterThanOrEqual(0);
      expect(area).toBeLessThan(1e-4);
    }
  });

  it('should return 0 when all vertices coincide', () => {
    const p = createPoint(3, 3, 3);
    expect(triangleArea(p, p, p)).toBe(0);
  });
});

describe('createFacet', () => {
  const normal = createVec3(0, 0, 2);
  const a = createPoint(0, 0, 0);
  const b = createPoint(2, 0, 0);
  const c = createPoint(0, 2, 0);

  it('should keep the normal as given and vertices in input order', () => {
    const facet = createFacet(normal, [a, b, c]);
    expect(facet.normal).toEqual({ x: 0, y: 0, z: 2 });
    expect(facet.vertices).toEqual([a, b, c]);
  });

  it('should compute the area once at construction', () => {
    const facet = createFacet(normal, [a, b, c]);
    expect(facet.area).toBeCloseTo(2, 12);
    expect(Object.isFrozen(facet)).toBe(true);
    expect(Object.isFrozen(facet.vertices)).toBe(true);
  });

  it('should format as normal plus vertices', () => {
    const facet = createFacet(normal, [a, b, c]);
    expect(formatFacet(facet)).toBe('N: (0, 0, 2), A: (0, 0, 0) B: (2, 0, 0) C: (0, 2, 0)');
  });
});
