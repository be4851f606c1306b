import { faker } from '@faker-js/faker';
import { describe, expect, test } from 'vitest';

import { BipartiteGraph } from '../bipartite-graph/bipartite-graph';
import {
  createSampleGraph,
  generateRandomGraph,
  PROPERTY_TEST_SEED,
  RANDOM_GRAPHS_COUNT,
} from '../bipartite.fixtures';
import { NotCompletedError } from '../errors';
import { Matching } from '../matching/matching';
import { maximumMatching } from '../matching/maximum-matching';
import { isMatched } from '../matching/types';
import { createDiCMOBiGraph, DiCMOBiGraph, TransposedDiCMOBiGraph } from './dicmobigraph';

// ============================================================================
// Fixtures
// ============================================================================

/**
 * src 1 -> [1, 2], src 2 -> [2, 3], src 3 -> [1], perfectly matched as
 * dst 1 -> src 3, dst 2 -> src 1, dst 3 -> src 2.
 */
function createChain(): { graph: BipartiteGraph; matching: Matching } {
  const graph = BipartiteGraph.fromAdjacency([[1, 2], [2, 3], [1]], 3).complete();
  const matching = Matching.fromEntries([3, 1, 2]).complete();
  return { graph, matching };
}

/** Source view of the sample graph under its maximum matching */
const SAMPLE_SOURCE_EDGES = [
  [2, 1],
  [4, 3],
  [5, 1],
  [6, 1],
  [6, 3],
];

const CHAIN_SOURCE_EDGES = [
  [1, 3],
  [2, 1],
];

/** Same edges, listed by target as a transposed view lists them */
const CHAIN_SOURCE_EDGES_BY_TARGET = [
  [2, 1],
  [1, 3],
];

const CHAIN_DESTINATION_EDGES = [
  [1, 2],
  [2, 3],
];

// ============================================================================
// Source view
// ============================================================================

describe('DiCMOBiGraph', () => {
  const createSampleView = (): DiCMOBiGraph => {
    const graph = createSampleGraph();
    return createDiCMOBiGraph(graph, maximumMatching(graph).complete());
  };

  test('vertex set is the sources', () => {
    const view = createSampleView();

    expect(view.transposed).toBe(false);
    expect(view.vertexCount).toBe(6);
    expect(view.vertices().toArray()).toEqual([1, 2, 3, 4, 5, 6]);
  });

  test('out-neighbours follow the matching and skip the own mate', () => {
    const view = createSampleView();

    expect([...view.outNeighbors(1)]).toEqual([]);
    expect([...view.outNeighbors(2)]).toEqual([1]);
    expect([...view.outNeighbors(6)]).toEqual([1, 3]);
    expect(view.outDegree(6)).toBe(2);
  });

  test('in-neighbours share the mate of the vertex', () => {
    const view = createSampleView();

    expect([...view.inNeighbors(1)]).toEqual([2, 5, 6]);
    expect([...view.inNeighbors(3)]).toEqual([4, 6]);
    expect([...view.inNeighbors(2)]).toEqual([]);
    expect(view.inDegree(1)).toBe(3);
  });

  test('edges, edge count and edge lookup agree', () => {
    const view = createSampleView();

    expect([...view.edges()]).toEqual(SAMPLE_SOURCE_EDGES);
    expect(view.edgeCount).toBe(SAMPLE_SOURCE_EDGES.length);
    expect(view.hasEdge(6, 3)).toBe(true);
    expect(view.hasEdge(1, 2)).toBe(false);
  });

  test('in-neighbours need a completed matching', () => {
    const graph = createSampleGraph();
    const view = createDiCMOBiGraph(graph, maximumMatching(graph));

    expect([...view.outNeighbors(2)]).toEqual([1]);
    expect(() => [...view.inNeighbors(1)]).toThrow(NotCompletedError);
  });

  test('without a matching there are no edges', () => {
    const view = createDiCMOBiGraph(createSampleGraph());

    expect(view.matching.length).toBe(2);
    expect(view.edgeCount).toBe(0);
    expect([...view.outNeighbors(6)]).toEqual([]);
  });

  test('edge count is cached on first request', () => {
    const { graph, matching } = createChain();
    const view = createDiCMOBiGraph(graph, matching);

    expect(view.edgeCount).toBe(CHAIN_SOURCE_EDGES.length);

    graph.addEdge(3, 2);

    expect([...view.edges()].length).toBe(CHAIN_SOURCE_EDGES.length + 1);
    expect(view.edgeCount).toBe(CHAIN_SOURCE_EDGES.length);
  });

  test('withVertexCount builds an empty simple digraph', () => {
    const graph = DiCMOBiGraph.withVertexCount(3);

    expect(graph.type).toBe('directed');
    expect(graph.order).toBe(3);
    expect(graph.size).toBe(0);
    expect(graph.nodes()).toEqual(['1', '2', '3']);
  });
});

// ============================================================================
// Destination view
// ============================================================================

describe('TransposedDiCMOBiGraph', () => {
  test('vertex set is the destinations', () => {
    const { graph, matching } = createChain();
    const view = createDiCMOBiGraph(graph, matching, { transposed: true });

    expect(view).toBeInstanceOf(TransposedDiCMOBiGraph);
    expect(view.transposed).toBe(true);
    expect(view.vertexCount).toBe(3);
  });

  test('in-neighbours are the other destinations of the mate', () => {
    const { graph, matching } = createChain();
    const view = createDiCMOBiGraph(graph, matching, { transposed: true });

    expect([...view.inNeighbors(1)]).toEqual([]);
    expect([...view.inNeighbors(2)]).toEqual([1]);
    expect([...view.inNeighbors(3)]).toEqual([2]);
  });

  test('out-neighbours mirror the in-neighbours', () => {
    const { graph, matching } = createChain();
    const view = createDiCMOBiGraph(graph, matching, { transposed: true });

    expect([...view.outNeighbors(1)]).toEqual([2]);
    expect([...view.outNeighbors(2)]).toEqual([3]);
    expect([...view.outNeighbors(3)]).toEqual([]);
    expect([...view.edges()]).toEqual(CHAIN_DESTINATION_EDGES);
    expect(view.hasEdge(1, 2)).toBe(true);
    expect(view.hasEdge(2, 1)).toBe(false);
  });

  test('an unmatched destination has no in-neighbours', () => {
    const { graph } = createChain();
    const view = createDiCMOBiGraph(graph, Matching.fromEntries([null, 1, 2]), {
      transposed: true,
    });

    expect([...view.inNeighbors(1)]).toEqual([]);
    expect([...view.inNeighbors(2)]).toEqual([1]);
  });
});

// ============================================================================
// Inverse views
// ============================================================================

describe('invview', () => {
  test('flips the class and keeps the edges', () => {
    const { graph, matching } = createChain();
    const view = createDiCMOBiGraph(graph, matching);
    const inverse = view.invview();

    expect(inverse).toBeInstanceOf(TransposedDiCMOBiGraph);
    expect(inverse.vertexCount).toBe(3);
    expect([...inverse.edges()]).toEqual(CHAIN_SOURCE_EDGES_BY_TARGET);
    expect([...view.invview().invview().edges()]).toEqual(CHAIN_SOURCE_EDGES);
    expect(view.invview()).toBe(inverse);
  });

  test('shares the edge-count cache', () => {
    const { graph, matching } = createChain();
    const view = createDiCMOBiGraph(graph, matching);

    expect(view.edgeCount).toBe(2);
    graph.addEdge(3, 2);

    expect(view.invview().edgeCount).toBe(2);
  });
});

// ============================================================================
// Random graphs
// ============================================================================

describe('DiCMOBiGraph on random graphs', () => {
  test('never loops and counts the unmatched edges into matched destinations', () => {
    faker.seed(PROPERTY_TEST_SEED);

    for (let graphNumber = 0; graphNumber < RANDOM_GRAPHS_COUNT; graphNumber++) {
      const graph = generateRandomGraph();
      const matching = maximumMatching(graph).complete();
      const view = createDiCMOBiGraph(graph, matching);

      let expectedEdgeCount = 0;
      for (const edge of graph.edges()) {
        const mate = matching.get(edge.dst);
        if (isMatched(mate) && mate !== edge.src) {
          expectedEdgeCount++;
        }
      }

      for (const vertex of view.vertices()) {
        expect([...view.outNeighbors(vertex)]).not.toContain(vertex);
      }
      for (const [from, to] of view.edges()) {
        expect([...view.inNeighbors(to)]).toContain(from);
      }
      expect(view.edgeCount).toBe(expectedEdgeCount);
    }
  });
});
