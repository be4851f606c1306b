/**
 * Directed, contracted, matching-oriented view of a bipartite graph
 *
 * Pairs an undirected bipartite graph with a matching of its destination
 * vertices and exposes, without storing anything new, the directed graph
 * obtained by:
 *
 * 1. Orientation: matched edges point from destination to source, every
 *    other edge from source to destination.
 * 2. Contraction: each matched destination is merged with its source.
 *
 * DiCMOBiGraph yields the induced graph on the sources,
 * TransposedDiCMOBiGraph the mirror image on the destinations. Either graph
 * is acyclic if and only if the oriented bipartite graph is, which is what
 * block-triangular decomposition of sparse systems relies on.
 *
 * Seen as the incidence graph of a hypergraph, the matching picks one head
 * per hyperedge, and the view expands each directed hyperedge into ordinary
 * edges from its tails to its head.
 *
 * The edge count is computed on first request and cached. The cache is not
 * invalidated when the graph or matching change afterwards.
 */

import type Graph from 'graphology';

import type { BipartiteGraph } from '../bipartite-graph/bipartite-graph';
import { createSimpleDirectedGraph } from '../interop/directed-graph';
import { Matching } from '../matching/matching';
import { isMatched } from '../matching/types';
import type { DirectedEdge, DirectedGraphView, VertexId, VertexRange } from '../types';
import { countIterable, iterableIncludes } from '../types';

/**
 * Edge-count cache shared between a view and its inverse view
 */
interface EdgeCountCache {
  value: number | null;
}

export interface DiCMOBiGraphOptions {
  /** Take the destinations, not the sources, as the vertex set */
  readonly transposed?: boolean;
}

// ============================================================================
// Shared behaviour
// ============================================================================

export abstract class MatchingOrientedGraph<M, U> implements DirectedGraphView {
  constructor(
    readonly graph: BipartiteGraph<M>,
    readonly matching: Matching<U>,
    protected readonly edgeCountCache: EdgeCountCache,
  ) {}

  abstract readonly transposed: boolean;
  abstract get vertexCount(): number;
  abstract vertices(): VertexRange;
  abstract outNeighbors(vertex: VertexId): Iterable<VertexId>;
  abstract inNeighbors(vertex: VertexId): Iterable<VertexId>;
  abstract hasEdge(from: VertexId, to: VertexId): boolean;
  abstract edges(): Generator<DirectedEdge>;

  /**
   * View with sources and destinations swapped, aliasing this one.
   * Requires both the graph and the matching to be complete.
   */
  abstract invview(): MatchingOrientedGraph<M, U>;

  protected abstract countEdges(): number;

  /** Number of directed edges, cached on first request */
  get edgeCount(): number {
    if (this.edgeCountCache.value === null) {
      this.edgeCountCache.value = this.countEdges();
    }
    return this.edgeCountCache.value;
  }

  outDegree(vertex: VertexId): number {
    return countIterable(this.outNeighbors(vertex));
  }

  inDegree(vertex: VertexId): number {
    return countIterable(this.inNeighbors(vertex));
  }
}

// ============================================================================
// Vertex set: sources
// ============================================================================

export class DiCMOBiGraph<M = never, U = never> extends MatchingOrientedGraph<M, U> {
  readonly transposed = false;
  private inverseView: TransposedDiCMOBiGraph<M, U> | null = null;

  /**
   * Plain directed graph with `vertexCount` vertices and no edges, for
   * utilities that build a same-shaped empty graph (subgraph extraction).
   */
  static withVertexCount(vertexCount: number): Graph {
    return createSimpleDirectedGraph(vertexCount);
  }

  get vertexCount(): number {
    return this.graph.nsrcs;
  }

  vertices(): VertexRange {
    return this.graph.srcVertices();
  }

  /**
   * For each destination of `vertex` matched to some other source, that
   * source. Unmatched destinations were contracted away and the destination
   * matched to `vertex` itself carries the reversed edge; both are skipped.
   */
  *outNeighbors(vertex: VertexId): Generator<VertexId> {
    for (const dst of this.graph.srcNeighbors(vertex)) {
      const src = this.matching.get(dst);
      if (isMatched(src) && src !== vertex) {
        yield src;
      }
    }
  }

  inNeighbors(vertex: VertexId): Iterable<VertexId> {
    return this.invview().inNeighbors(vertex);
  }

  hasEdge(from: VertexId, to: VertexId): boolean {
    return iterableIncludes(this.outNeighbors(from), to);
  }

  *edges(): Generator<DirectedEdge> {
    for (const vertex of this.vertices()) {
      for (const neighbor of this.outNeighbors(vertex)) {
        yield [vertex, neighbor];
      }
    }
  }

  invview(): TransposedDiCMOBiGraph<M, U> {
    if (this.inverseView === null) {
      this.inverseView = new TransposedDiCMOBiGraph<M, U>(
        this.graph.invview(),
        this.matching.invview(),
        this.edgeCountCache,
      );
    }
    return this.inverseView;
  }

  protected countEdges(): number {
    let total = 0;
    for (const vertex of this.vertices()) {
      total += this.outDegree(vertex);
    }
    return total;
  }
}

// ============================================================================
// Vertex set: destinations
// ============================================================================

export class TransposedDiCMOBiGraph<M = never, U = never> extends MatchingOrientedGraph<M, U> {
  readonly transposed = true;
  private inverseView: DiCMOBiGraph<M, U> | null = null;

  get vertexCount(): number {
    return this.graph.ndsts;
  }

  vertices(): VertexRange {
    return this.graph.dstVertices();
  }

  /**
   * `vertex` is contracted with its matched source and inherits every other
   * destination of that source. An unmatched destination has none.
   */
  *inNeighbors(vertex: VertexId): Generator<VertexId> {
    const src = this.matching.get(vertex);
    if (!isMatched(src)) {
      return;
    }
    for (const dst of this.graph.srcNeighbors(src)) {
      if (dst !== vertex) {
        yield dst;
      }
    }
  }

  outNeighbors(vertex: VertexId): Iterable<VertexId> {
    return this.invview().outNeighbors(vertex);
  }

  hasEdge(from: VertexId, to: VertexId): boolean {
    return iterableIncludes(this.inNeighbors(to), from);
  }

  *edges(): Generator<DirectedEdge> {
    for (const vertex of this.vertices()) {
      for (const neighbor of this.inNeighbors(vertex)) {
        yield [neighbor, vertex];
      }
    }
  }

  invview(): DiCMOBiGraph<M, U> {
    if (this.inverseView === null) {
      this.inverseView = new DiCMOBiGraph<M, U>(
        this.graph.invview(),
        this.matching.invview(),
        this.edgeCountCache,
      );
    }
    return this.inverseView;
  }

  protected countEdges(): number {
    let total = 0;
    for (const vertex of this.vertices()) {
      total += this.inDegree(vertex);
    }
    return total;
  }
}

// ============================================================================
// Construction
// ============================================================================

/**
 * Pairs `graph` with `matching`. Without a matching, an empty one of
 * `ndsts` entries is used and the edge count is known to be zero.
 */
export function createDiCMOBiGraph<M, U = never>(
  graph: BipartiteGraph<M>,
  matching?: Matching<U>,
  options?: { readonly transposed?: false },
): DiCMOBiGraph<M, U>;
export function createDiCMOBiGraph<M, U = never>(
  graph: BipartiteGraph<M>,
  matching: Matching<U> | undefined,
  options: { readonly transposed: true },
): TransposedDiCMOBiGraph<M, U>;
export function createDiCMOBiGraph<M, U = never>(
  graph: BipartiteGraph<M>,
  matching: Matching<U> | undefined,
  options: DiCMOBiGraphOptions,
): DiCMOBiGraph<M, U> | TransposedDiCMOBiGraph<M, U>;
export function createDiCMOBiGraph<M, U = never>(
  graph: BipartiteGraph<M>,
  matching?: Matching<U>,
  options: DiCMOBiGraphOptions = {},
): DiCMOBiGraph<M, U> | TransposedDiCMOBiGraph<M, U> {
  const cache: EdgeCountCache = { value: matching === undefined ? 0 : null };
  const pairedMatching = matching ?? Matching.empty<U>(graph.ndsts);

  return options.transposed === true
    ? new TransposedDiCMOBiGraph<M, U>(graph, pairedMatching, cache)
    : new DiCMOBiGraph<M, U>(graph, pairedMatching, cache);
}
