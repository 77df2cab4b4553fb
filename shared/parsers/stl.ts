/**
 * ASCII STL parser
 * Each line becomes a tagged StlLine; a transition function folds the lines
 * into a Surface. Returns Result<Surface, ParseError> for monadic error handling.
 */

import type { Point, Vec3 } from '../types/mesh';
import type { Result } from '../utils/result';
import { Ok, Err, andThen, map, mapErr } from '../utils/result';
import { createFacet } from '../geometry/facet';
import { Surface } from '../geometry/surface';
import { parseVec3 } from '../validators/validators';
import { readLines, splitLines } from './lines';

export type ParseError = {
  readonly message: string;
  readonly line: number;
};

export type StlLine =
  | { readonly kind: 'solid'; readonly name: string }
  | { readonly kind: 'facet'; readonly normal: Vec3 }
  | { readonly kind: 'vertex'; readonly point: Point }
  | { readonly kind: 'endfacet' }
  | { readonly kind: 'ignored' };

/**
 * Facet data collected between `facet` and `endfacet`.
 * A null normal with no vertices is the idle state.
 */
export type PendingFacet = {
  readonly normal: Vec3 | null;
  readonly vertices: readonly Point[];
};

const IDLE: PendingFacet = Object.freeze({ normal: null, vertices: [] });

const IGNORED: StlLine = Object.freeze({ kind: 'ignored' });

/**
 * Tokenize one line: the first word is the kind, the rest are arguments
 */
export const parseLine = (text: string, lineNum: number): Result<StlLine, ParseError> => {
  const trimmed = text.trim();
  if (trimmed === '') {
    return Ok(IGNORED);
  }

  const [kind, ...args] = trimmed.split(/\s+/);
  const withLine = (err: { message: string }): ParseError => ({
    message: err.message,
    line: lineNum,
  });

  switch (kind) {
    case 'solid':
      return Ok<StlLine>({ kind: 'solid', name: args.join(' ') });

    case 'facet':
      // first argument is the literal "normal"
      return mapErr(
        map(parseVec3(args.slice(1), 'Facet normal'), (normal): StlLine => ({ kind: 'facet', normal })),
        withLine
      );

    case 'vertex':
      return mapErr(
        map(parseVec3(args, 'Vertex'), (point): StlLine => ({ kind: 'vertex', point })),
        withLine
      );

    case 'endfacet':
      return Ok<StlLine>({ kind: 'endfacet' });

    default:
      // outer, endloop, endsolid and anything unknown
      return Ok(IGNORED);
  }
};

/**
 * Apply one parsed line to the pending facet, adding completed facets
 * to the surface
 */
export const advance = (
  surface: Surface,
  pending: PendingFacet,
  line: StlLine,
  lineNum: number
): Result<PendingFacet, ParseError> => {
  switch (line.kind) {
    case 'solid':
      surface.setName(line.name);
      return Ok(pending);

    case 'facet':
      return Ok({ normal: line.normal, vertices: [] });

    case 'vertex':
      return Ok({ ...pending, vertices: [...pending.vertices, line.point] });

    case 'endfacet': {
      const { normal, vertices } = pending;
      // fail fast instead of building a facet without a normal
      if (normal === null) {
        return Err({ message: 'endfacet without a preceding facet normal', line: lineNum });
      }
      if (vertices.length !== 3) {
        return Err({
          message: `Facet must have exactly 3 vertices, got ${vertices.length}`,
          line: lineNum,
        });
      }
      surface.addFacet(createFacet(normal, [vertices[0], vertices[1], vertices[2]]));
      return Ok(IDLE);
    }

    case 'ignored':
      return Ok(pending);
  }
};

/**
 * Load a surface from a line sequence in a single forward pass.
 * Stops at the first error; a facet left open at the end is dropped.
 */
export const loadSurface = (
  lines: Iterable<string>,
  surface: Surface = new Surface()
): Result<Surface, ParseError> => {
  let pending = IDLE;
  let lineNum = 0;

  for (const text of lines) {
    lineNum += 1;
    const current = lineNum;
    const result = andThen(parseLine(text, current), line =>
      advance(surface, pending, line, current)
    );
    if (!result.ok) {
      return result;
    }
    pending = result.value;
  }

  return Ok(surface);
};

/**
 * Main STL parser
 */
export const parseSTL = (content: string): Result<Surface, ParseError> =>
  loadSurface(splitLines(content));

/**
 * Parse an STL file from disk. File errors are thrown, not returned.
 */
export const readSTL = (path: string): Result<Surface, ParseError> =>
  loadSurface(readLines(path));
