/**
 * Materialises directed views as graphology graphs.
 *
 * The views in this library compute neighbours on demand. Code that wants a
 * concrete graph (layout, export, generic graphology algorithms) goes
 * through here. Node keys are vertex ids rendered as strings.
 */

import Graph from 'graphology';

import { InvalidArgumentError, VertexRangeError } from '../errors';
import type { DirectedGraphView, VertexId } from '../types';
import { FIRST_VERTEX_ID } from '../types';

/** Graph type for materialised views - always directed. */
const GRAPH_TYPE = 'directed' as const;

/**
 * Node key of a vertex id.
 */
export function vertexKey(vertex: VertexId): string {
  return String(vertex);
}

/**
 * Simple directed graph with vertices `1..vertexCount` and no edges.
 */
export function createSimpleDirectedGraph(vertexCount: number): Graph {
  if (!Number.isInteger(vertexCount) || vertexCount < 0) {
    throw new InvalidArgumentError(`invalid vertex count ${vertexCount}`);
  }

  const graph = new Graph({ type: GRAPH_TYPE, multi: false, allowSelfLoops: false });
  for (let vertex = FIRST_VERTEX_ID; vertex <= vertexCount; vertex++) {
    graph.addNode(vertexKey(vertex));
  }
  return graph;
}

/**
 * Copies every out-edge of `view` into a directed multigraph, keeping edge
 * multiplicity (condensation views are not deduplicated).
 */
export function toDirectedGraph(view: DirectedGraphView): Graph {
  const graph = new Graph({ type: GRAPH_TYPE, multi: true, allowSelfLoops: true });

  for (const vertex of view.vertices()) {
    graph.addNode(vertexKey(vertex));
  }
  for (const vertex of view.vertices()) {
    for (const neighbor of view.outNeighbors(vertex)) {
      graph.addEdge(vertexKey(vertex), vertexKey(neighbor));
    }
  }

  return graph;
}

/**
 * Subgraph of `view` induced by `vertices`, as a simple directed graph.
 *
 * Vertex `vertices[i]` becomes vertex `i + 1`. Parallel edges collapse.
 *
 * @throws VertexRangeError if a vertex is outside the view
 * @throws InvalidArgumentError if a vertex is listed twice
 */
export function inducedSubgraph(
  view: DirectedGraphView,
  vertices: readonly VertexId[],
): Graph {
  const positions = new Map<VertexId, VertexId>();

  vertices.forEach((vertex, index) => {
    if (!view.vertices().has(vertex)) {
      throw new VertexRangeError(
        `vertex ${vertex} out of range 1..${view.vertexCount}`,
      );
    }
    if (positions.has(vertex)) {
      throw new InvalidArgumentError(`vertex ${vertex} listed twice`);
    }
    positions.set(vertex, index + 1);
  });

  const subgraph = createSimpleDirectedGraph(vertices.length);

  vertices.forEach((vertex, index) => {
    const from = index + 1;
    for (const neighbor of view.outNeighbors(vertex)) {
      const to = positions.get(neighbor);
      if (to !== undefined && to !== from) {
        subgraph.mergeEdge(vertexKey(from), vertexKey(to));
      }
    }
  });

  return subgraph;
}
