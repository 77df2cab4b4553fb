/**
 * Convert a loaded Surface into a summary report and its text rendering
 */

import type { Point, Vec3 } from '../types/mesh';
import { formatVec3 } from '../types/mesh';
import type { Surface } from '../geometry/surface';

export type SurfaceReport = {
  readonly name: string | null;
  readonly triangleCount: number;
  readonly area: string;
  readonly boundingBox: {
    readonly dimensions: Vec3;
    readonly corners: readonly Point[];
  };
  readonly boundingBoxVolume: number;
};

export const toReport = (surface: Surface): SurfaceReport => ({
  name: surface.name ?? null,
  triangleCount: surface.facetCount,
  area: surface.area(),
  boundingBox: {
    dimensions: surface.findDims(),
    corners: surface.findBounds(),
  },
  boundingBoxVolume: surface.getBoundingBoxVolume(),
});

export const toText = (report: SurfaceReport): readonly string[] => [
  `Number of Triangles: ${report.triangleCount}`,
  `Surface Area: ${report.area}`,
  'Bounding Box:',
  ...report.boundingBox.corners.map(formatVec3),
  `Bounding box volume: ${report.boundingBoxVolume}`,
];
