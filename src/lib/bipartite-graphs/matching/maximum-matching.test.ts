/**
 * Unit tests for maximum-cardinality bipartite matching
 *
 * Fixed graphs pin the matching the scan order produces. Random graphs
 * check validity and compare the size with an exhaustive search.
 */

import { faker } from '@faker-js/faker';
import { describe, expect, test } from 'vitest';

import { BipartiteGraph } from '../bipartite-graph/bipartite-graph';
import {
  bruteForceMatchingSize,
  createSampleGraph,
  generateRandomGraph,
  isMatchingValid,
  PROPERTY_TEST_SEED,
  RANDOM_GRAPHS_COUNT,
  SAMPLE_DST_COUNT,
  SAMPLE_SRC_COUNT,
} from '../bipartite.fixtures';
import { maximalMatching, maximumMatching } from './maximum-matching';
import { isMatched } from './types';

// ============================================================================
// Expected values
// ============================================================================

/** Sources 1 and 3 win destinations 1 and 2, everything else stays free */
const EXPECTED_SAMPLE_MATCHING = [1, 3, null, null, null, null];

/** Perfect matching of the three-source chain graph */
const EXPECTED_CHAIN_MATCHING = [3, 1, 2];

// ============================================================================
// Fixed graphs
// ============================================================================

describe('maximumMatching', () => {
  test('matches both destinations of the sample graph', () => {
    const graph = createSampleGraph();
    const matching = maximumMatching(graph);

    expect(matching.length).toBe(Math.max(SAMPLE_SRC_COUNT, SAMPLE_DST_COUNT));
    expect(matching.toArray()).toEqual(EXPECTED_SAMPLE_MATCHING);
    expect(matching.matchedCount()).toBe(SAMPLE_DST_COUNT);
    expect([1, 2, 5, 6]).toContain(matching.get(1));
    expect([3, 4, 6]).toContain(matching.get(2));
  });

  test('does not need a complete graph', () => {
    const matching = maximumMatching(createSampleGraph(false));

    expect(matching.toArray()).toEqual(EXPECTED_SAMPLE_MATCHING);
  });

  test('finds augmenting paths through earlier sources', () => {
    const graph = BipartiteGraph.fromAdjacency([[1, 2], [2, 3], [1]], 3);

    expect(maximumMatching(graph).toArray()).toEqual(EXPECTED_CHAIN_MATCHING);
  });

  test('skips rejected sources', () => {
    const matching = maximumMatching(createSampleGraph(), {
      srcFilter: (src) => src !== 1,
    });

    expect(matching.get(1)).toBe(2);
    expect(matching.get(2)).toBe(3);
  });

  test('leaves rejected destinations unmatched', () => {
    const matching = maximumMatching(createSampleGraph(), {
      dstFilter: (dst) => dst !== 1,
    });

    expect(isMatched(matching.get(1))).toBe(false);
    expect(matching.get(2)).toBe(3);
    expect(matching.matchedCount()).toBe(1);
  });

  test('rejected destinations stay plainly unassigned', () => {
    const matching = maximumMatching<string>(createSampleGraph(), {
      dstFilter: (dst) => dst !== 1,
    });

    expect(matching.toArray()).toEqual([null, 3, null, null, null, null]);
  });

  test('handles a graph without edges', () => {
    const matching = maximumMatching(BipartiteGraph.empty(2, 3));

    expect(matching.length).toBe(3);
    expect(matching.matchedCount()).toBe(0);
  });

  test('result can be completed and inverted', () => {
    const matching = maximumMatching(createSampleGraph()).complete();

    expect(matching.inverseEntry(1)).toBe(1);
    expect(matching.inverseEntry(3)).toBe(2);
    expect(matching.inverseEntry(6)).toBe(null);
  });

  test('maximalMatching is the same routine', () => {
    expect(maximalMatching).toBe(maximumMatching);
  });
});

// ============================================================================
// Random graphs
// ============================================================================

describe('maximumMatching on random graphs', () => {
  test('is valid, bounded and maximum', () => {
    faker.seed(PROPERTY_TEST_SEED);

    for (let graphNumber = 0; graphNumber < RANDOM_GRAPHS_COUNT; graphNumber++) {
      const graph = generateRandomGraph();
      const matching = maximumMatching(graph);
      const size = matching.matchedCount();

      expect(isMatchingValid(graph, matching)).toBe(true);
      expect(size).toBeLessThanOrEqual(Math.min(graph.nsrcs, graph.ndsts));
      expect(size).toBe(bruteForceMatchingSize(graph));
    }
  });
});
