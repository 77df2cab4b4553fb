/**
 * Immutable STL mesh data types
 * All types are readonly to ensure immutability
 */

export interface Vec3 {
  readonly x: number;
  readonly y: number;
  readonly z: number;
}

/**
 * A vertex position. Equality is by exact coordinate value.
 */
export type Point = Vec3;

export type Triangle = readonly [Point, Point, Point];

export interface Extents {
  readonly minX: number;
  readonly maxX: number;
  readonly minY: number;
  readonly maxY: number;
  readonly minZ: number;
  readonly maxZ: number;
}

/**
 * Pure functions for creating immutable structures
 */
export const createVec3 = (x: number, y: number, z: number): Vec3 =>
  Object.freeze({ x, y, z });

export const createPoint = createVec3;

// Extents start at the origin, not at the first vertex seen
export const ZERO_EXTENTS: Extents = Object.freeze({
  minX: 0,
  maxX: 0,
  minY: 0,
  maxY: 0,
  minZ: 0,
  maxZ: 0,
});

/**
 * Widen extents so they include the given point
 */
export const includePoint = (extents: Extents, p: Point): Extents =>
  Object.freeze({
    minX: Math.min(extents.minX, p.x),
    maxX: Math.max(extents.maxX, p.x),
    minY: Math.min(extents.minY, p.y),
    maxY: Math.max(extents.maxY, p.y),
    minZ: Math.min(extents.minZ, p.z),
    maxZ: Math.max(extents.maxZ, p.z),
  });

/**
 * Map key for a point. String(-0) is "0", so 0 and -0 share a key.
 */
export const pointKey = (p: Point): string => `${p.x} ${p.y} ${p.z}`;

export const formatVec3 = (v: Vec3): string => `(${v.x}, ${v.y}, ${v.z})`;
