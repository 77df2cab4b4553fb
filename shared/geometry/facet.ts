/**
 * Facet: one triangle of an STL surface
 */

import type { Point, Triangle, Vec3 } from '../types/mesh';
import { formatVec3 } from '../types/mesh';

export interface Facet {
  readonly normal: Vec3;
  readonly vertices: Triangle;
  readonly area: number;
}

export const distance = (p: Point, q: Point): number =>
  Math.sqrt((q.x - p.x) ** 2 + (q.y - p.y) ** 2 + (q.z - p.z) ** 2);

/**
 * Heron's formula. The radicand is clamped at 0 so collinear and
 * near-collinear vertices give 0 instead of NaN.
 */
export const triangleArea = (a: Point, b: Point, c: Point): number => {
  const ab = distance(a, b);
  const bc = distance(b, c);
  const ca = distance(c, a);
  const s = 0.5 * (ab + bc + ca);
  const radicand = s * (s - ab) * (s - bc) * (s - ca);
  return Math.sqrt(Math.max(0, radicand));
};

/**
 * Build a facet from its normal and vertices A, B, C (in input order).
 * The normal is kept as given, it is not normalized.
 */
export const createFacet = (normal: Vec3, vertices: Triangle): Facet => {
  const [a, b, c] = vertices;
  return Object.freeze({
    normal,
    vertices: Object.freeze([a, b, c] as const),
    area: triangleArea(a, b, c),
  });
};

export const formatFacet = (facet: Facet): string => {
  const [a, b, c] = facet.vertices;
  return `N: ${formatVec3(facet.normal)}, A: ${formatVec3(a)} B: ${formatVec3(b)} C: ${formatVec3(c)}`;
};
