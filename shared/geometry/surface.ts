/**
 * Surface: the aggregate built while an STL source is loaded.
 * Mutated facet by facet during a load, read-only afterwards.
 */

import type { Extents, Point, Vec3 } from '../types/mesh';
import { ZERO_EXTENTS, createPoint, createVec3, includePoint, pointKey } from '../types/mesh';
import type { Facet } from './facet';

const NO_FACETS: readonly Facet[] = Object.freeze([]);

// toFixed switches to exponent notation from 1e21 up
const AREA_FORMAT = new Intl.NumberFormat('en-US', {
  useGrouping: false,
  minimumFractionDigits: 6,
  maximumFractionDigits: 6,
});

export class Surface {
  private surfaceName: string | undefined = undefined;
  private totalArea = 0;
  private extents: Extents = ZERO_EXTENTS;
  private readonly facets: Facet[] = [];
  private readonly vertexIndex = new Map<string, Facet[]>();

  get name(): string | undefined {
    return this.surfaceName;
  }

  get facetCount(): number {
    return this.facets.length;
  }

  setName(name: string): void {
    this.surfaceName = name;
  }

  /**
   * Fold one facet into the running totals.
   * Only the first vertex (A) widens the extents.
   */
  addFacet(facet: Facet): void {
    this.totalArea += facet.area;
    this.extents = includePoint(this.extents, facet.vertices[0]);
    this.facets.push(facet);

    for (const vertex of facet.vertices) {
      const key = pointKey(vertex);
      const entry = this.vertexIndex.get(key);
      if (entry) {
        entry.push(facet);
      } else {
        this.vertexIndex.set(key, [facet]);
      }
    }
  }

  getFacets(): readonly Facet[] {
    return [...this.facets];
  }

  /**
   * Facets indexed under this exact vertex, in load order
   */
  findFacets(vertex: Point): readonly Facet[] {
    const entry = this.vertexIndex.get(pointKey(vertex));
    return entry ? [...entry] : NO_FACETS;
  }

  /**
   * Total area as fixed-point text with 6 decimals
   */
  area(): string {
    return AREA_FORMAT.format(this.totalArea);
  }

  areaSum(): number {
    return this.totalArea;
  }

  getExtents(): Extents {
    return this.extents;
  }

  findDims(): Vec3 {
    const { minX, maxX, minY, maxY, minZ, maxZ } = this.extents;
    return createVec3(maxX - minX, maxY - minY, maxZ - minZ);
  }

  /**
   * Corners of the box spanning the origin to findDims()
   */
  findBounds(): readonly Point[] {
    const { x, y, z } = this.findDims();
    return [
      createPoint(0, 0, 0),
      createPoint(0, 0, z),
      createPoint(0, y, 0),
      createPoint(0, y, z),
      createPoint(x, 0, 0),
      createPoint(x, 0, z),
      createPoint(x, y, 0),
      createPoint(x, y, z),
    ];
  }

  getBoundingBoxVolume(): number {
    const { x, y, z } = this.findDims();
    return x * y * z;
  }
}
