/**
 * Shared types for bipartite graphs and the views derived from them.
 */

import { InvalidArgumentError } from './errors';

// ============================================================================
// Vertices
// ============================================================================

/**
 * Positive integer vertex id. Sources and destinations are numbered
 * independently, both starting at FIRST_VERTEX_ID.
 */
export type VertexId = number;

/** Smallest valid vertex id in either vertex class */
export const FIRST_VERTEX_ID: VertexId = 1;

/** The two vertex classes of a bipartite graph */
export enum VertexKind {
  SRC = 'src',
  DST = 'dst',
}

/**
 * Converts an external vertex-class tag into a VertexKind.
 *
 * @throws InvalidArgumentError for anything other than 'src' or 'dst'
 */
export function parseVertexKind(tag: string): VertexKind {
  switch (tag) {
    case VertexKind.SRC:
      return VertexKind.SRC;
    case VertexKind.DST:
      return VertexKind.DST;
    default:
      throw new InvalidArgumentError(
        `type (${tag}) must be either '${VertexKind.SRC}' or '${VertexKind.DST}'`,
      );
  }
}

/**
 * Checks that a value is a usable vertex id (a positive integer).
 */
export function isVertexId(value: number): boolean {
  return Number.isInteger(value) && value >= FIRST_VERTEX_ID;
}

/**
 * Contiguous range of vertex ids `1..length`.
 *
 * Iterating yields ids in ascending order without allocating an array.
 */
export class VertexRange implements Iterable<VertexId> {
  constructor(readonly length: number) {}

  get first(): VertexId {
    return FIRST_VERTEX_ID;
  }

  get last(): VertexId {
    return this.length;
  }

  has(vertex: VertexId): boolean {
    return isVertexId(vertex) && vertex <= this.length;
  }

  *[Symbol.iterator](): Iterator<VertexId> {
    for (let vertex = FIRST_VERTEX_ID; vertex <= this.length; vertex++) {
      yield vertex;
    }
  }

  toArray(): VertexId[] {
    return Array.from(this);
  }
}

// ============================================================================
// Directed views
// ============================================================================

/**
 * Neighbour-enumeration contract shared by every directed view in this
 * library (contracted matching-oriented graphs and condensation graphs).
 *
 * Neighbour sequences are computed on demand. They are not deduplicated
 * unless a concrete view says otherwise.
 */
export interface DirectedGraphView {
  readonly vertexCount: number;
  vertices(): VertexRange;
  outNeighbors(vertex: VertexId): Iterable<VertexId>;
  inNeighbors(vertex: VertexId): Iterable<VertexId>;
}

/** Directed edge as a `[from, to]` pair */
export type DirectedEdge = readonly [from: VertexId, to: VertexId];

/**
 * Counts the items of an iterable without materialising it.
 */
export function countIterable<T>(items: Iterable<T>): number {
  let count = 0;
  for (const _item of items) {
    count++;
  }
  return count;
}

/**
 * Linear membership test over an iterable.
 */
export function iterableIncludes<T>(items: Iterable<T>, needle: T): boolean {
  for (const item of items) {
    if (item === needle) {
      return true;
    }
  }
  return false;
}
