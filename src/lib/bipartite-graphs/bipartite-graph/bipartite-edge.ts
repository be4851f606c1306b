import type { VertexId } from '../types';

/**
 * Edge of a bipartite graph, from a source vertex to a destination vertex.
 */
export class BipartiteEdge {
  constructor(
    readonly src: VertexId,
    readonly dst: VertexId,
  ) {}

  equals(other: BipartiteEdge): boolean {
    return this.src === other.src && this.dst === other.dst;
  }

  toString(): string {
    return `[src: ${this.src}] => [dst: ${this.dst}]`;
  }
}
