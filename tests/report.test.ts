import { describe, it, expect } from '@jest/globals';
import { toReport, toText } from '../shared/converters/report';
import { parseSTL } from '../shared/parsers/stl';
import { Surface } from '../shared/geometry/surface';
import { unwrap } from '../shared/utils/result';

const TRIANGLE = [
  'solid tri',
  'facet normal 0 0 1',
  'outer loop',
  'vertex 0 0 0',
  'vertex 1 0 0',
  'vertex 0 1 0',
  'endloop',
  'endfacet',
  'endsolid tri',
].join('\n');

describe('toReport', () => {
  it('should summarise a loaded surface', () => {
    const report = toReport(unwrap(parseSTL(TRIANGLE)));
    expect(report.name).toBe('tri');
    expect(report.triangleCount).toBe(1);
    expect(report.area).toBe('0.500000');
    expect(report.boundingBox.dimensions).toEqual({ x: 1, y: 1, z: 0 });
    expect(report.boundingBox.corners).toHaveLength(8);
    expect(report.boundingBoxVolume).toBe(0);
  });

  it('should use null for an unnamed surface', () => {
    expect(toReport(new Surface()).name).toBeNull();
  });
});

describe('toText', () => {
  it('should print counts, area, corners and volume', () => {
    expect(toText(toReport(unwrap(parseSTL(TRIANGLE))))).toEqual([
      'Number of Triangles: 1',
      'Surface Area: 0.500000',
      'Bounding Box:',
      '(0, 0, 0)',
      '(0, 0, 0)',
      '(0, 1, 0)',
      '(0, 1, 0)',
      '(1, 0, 0)',
      '(1, 0, 0)',
      '(1, 1, 0)',
      '(1, 1, 0)',
      'Bounding box volume: 0',
    ]);
  });
});
