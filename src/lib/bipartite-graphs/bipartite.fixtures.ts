/**
 * Test fixtures for bipartite graphs and matchings
 *
 * Contains:
 * - The six-source, two-destination sample graph used across suites
 * - A seeded random graph generator for property tests
 * - Matching validation helpers
 */

import { faker } from '@faker-js/faker';

import type { AdjacencyTable } from './bipartite-graph/bipartite-graph';
import { BipartiteGraph } from './bipartite-graph/bipartite-graph';
import type { Matching } from './matching/matching';
import { isMatched } from './matching/types';

// ============================================================================
// Sample graph
// ============================================================================

/** Forward adjacency of the sample graph: six sources over two destinations */
export const SAMPLE_FORWARD: readonly (readonly number[])[] = [
  [1],
  [1],
  [2],
  [2],
  [1],
  [1, 2],
];

/** Backward adjacency of the sample graph */
export const SAMPLE_BACKWARD: readonly (readonly number[])[] = [
  [1, 2, 5, 6],
  [3, 4, 6],
];

export const SAMPLE_SRC_COUNT = 6;
export const SAMPLE_DST_COUNT = 2;
export const SAMPLE_EDGE_COUNT = 7;

/**
 * Fresh mutable copy of an adjacency table literal.
 */
export function cloneTable(table: readonly (readonly number[])[]): AdjacencyTable {
  return table.map((list) => [...list]);
}

/**
 * Sample graph, complete unless `complete` is false.
 */
export function createSampleGraph(complete = true): BipartiteGraph {
  const forward = cloneTable(SAMPLE_FORWARD);
  return complete
    ? BipartiteGraph.fromAdjacency(forward, cloneTable(SAMPLE_BACKWARD))
    : BipartiteGraph.fromAdjacency(forward, SAMPLE_DST_COUNT);
}

// ============================================================================
// Random graphs
// ============================================================================

/** Seed for reproducible property tests */
export const PROPERTY_TEST_SEED = 20240611;

/** Number of random graphs per property */
export const RANDOM_GRAPHS_COUNT = 25;

/** Vertex count bounds for random graphs (per class) */
export const VERTEX_COUNT_FAKEOPTS = { min: 1, max: 8 };

/** Probability of each possible edge in a random graph */
const EDGE_PROBABILITY = 0.3;

/**
 * Random complete graph drawn from faker's current seed.
 */
export function generateRandomGraph(): BipartiteGraph {
  const nsrcs = faker.number.int(VERTEX_COUNT_FAKEOPTS);
  const ndsts = faker.number.int(VERTEX_COUNT_FAKEOPTS);
  const forward: AdjacencyTable = [];

  for (let src = 1; src <= nsrcs; src++) {
    const neighbors: number[] = [];
    for (let dst = 1; dst <= ndsts; dst++) {
      if (faker.datatype.boolean(EDGE_PROBABILITY)) {
        neighbors.push(dst);
      }
    }
    forward.push(neighbors);
  }

  return BipartiteGraph.fromAdjacency(forward, ndsts).complete();
}

// ============================================================================
// Matching validation
// ============================================================================

/**
 * Checks that every matched pair is an edge and no source is used twice.
 */
export function isMatchingValid<U>(
  graph: BipartiteGraph,
  matching: Matching<U>,
): boolean {
  const usedSources = new Set<number>();
  let dst = 0;

  for (const entry of matching) {
    dst++;
    if (!isMatched(entry)) {
      continue;
    }
    if (!graph.hasEdge(entry, dst) || usedSources.has(entry)) {
      return false;
    }
    usedSources.add(entry);
  }

  return true;
}

/**
 * Size of a maximum matching by exhaustive search, for small graphs.
 */
export function bruteForceMatchingSize(graph: BipartiteGraph): number {
  const usedDsts = new Set<number>();

  const search = (src: number): number => {
    if (src > graph.nsrcs) {
      return 0;
    }
    let best = search(src + 1);
    for (const dst of graph.srcNeighbors(src)) {
      if (usedDsts.has(dst)) {
        continue;
      }
      usedDsts.add(dst);
      best = Math.max(best, 1 + search(src + 1));
      usedDsts.delete(dst);
    }
    return best;
  };

  return search(1);
}
