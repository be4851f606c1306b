import { describe, expect, test } from 'vitest';

import { BipartiteGraph } from '../bipartite-graph/bipartite-graph';
import { createSampleGraph } from '../bipartite.fixtures';
import { tryAugment } from './augmenting-path';
import { Matching } from './matching';
import type { ColorBuffer } from './types';
import { ALWAYS_TRUE, UNASSIGNED, unassignedWith } from './types';

/**
 * Three sources where source 3 can only be matched by shifting both others:
 *   src 1 -> [1, 2], src 2 -> [2, 3], src 3 -> [1]
 */
function createChainGraph(): BipartiteGraph {
  return BipartiteGraph.fromAdjacency([[1, 2], [2, 3], [1]], 3);
}

function freshColors(length: number): ColorBuffer {
  return new Array<boolean>(length).fill(false);
}

describe('tryAugment', () => {
  test('direct phase takes the first free destination', () => {
    const graph = BipartiteGraph.fromAdjacency([[1, 2]], 2);
    const matching = Matching.empty(2);

    expect(tryAugment(matching, graph, 1, ALWAYS_TRUE, freshColors(2))).toBe(true);
    expect(matching.toArray()).toEqual([1, UNASSIGNED]);
  });

  test('reroute phase moves the holder to a free destination', () => {
    const graph = BipartiteGraph.fromAdjacency([[1, 2], [1]], 2);
    const matching = Matching.fromEntries([1, null]);

    expect(tryAugment(matching, graph, 2, ALWAYS_TRUE, freshColors(2))).toBe(true);
    expect(matching.toArray()).toEqual([2, 1]);
  });

  test('long augmenting paths are flipped end to end', () => {
    const graph = createChainGraph();
    const matching = Matching.fromEntries([1, 2, null]);
    const dcolor = freshColors(3);
    const scolor = freshColors(3);

    expect(tryAugment(matching, graph, 3, ALWAYS_TRUE, dcolor, scolor)).toBe(true);

    expect(matching.toArray()).toEqual([3, 1, 2]);
    expect(scolor).toEqual([true, true, true]);
    expect(dcolor).toEqual([true, true, false]);
  });

  test('a failed search leaves the matching unchanged', () => {
    const graph = createSampleGraph();
    const matching = Matching.fromEntries([1, null]);

    expect(tryAugment(matching, graph, 2, ALWAYS_TRUE, freshColors(2))).toBe(false);
    expect(matching.toArray()).toEqual([1, null]);
  });

  test('rejected destinations are never taken', () => {
    const graph = BipartiteGraph.fromAdjacency([[1, 2]], 2);
    const matching = Matching.empty(2);

    const augmented = tryAugment(matching, graph, 1, (dst) => dst !== 1, freshColors(2));

    expect(augmented).toBe(true);
    expect(matching.toArray()).toEqual([UNASSIGNED, 1]);
  });

  test('colored destinations are not revisited', () => {
    const graph = BipartiteGraph.fromAdjacency([[1, 2], [1]], 2);
    const matching = Matching.fromEntries([1, null]);
    const dcolor = [true, false];

    expect(tryAugment(matching, graph, 2, ALWAYS_TRUE, dcolor)).toBe(false);
    expect(matching.toArray()).toEqual([1, null]);
  });

  test('destinations tagged with a reason are not taken directly', () => {
    const graph = BipartiteGraph.fromAdjacency([[1, 2]], 2);
    const matching = Matching.fromEntries<string>([unassignedWith('selected'), null]);

    expect(tryAugment(matching, graph, 1, ALWAYS_TRUE, freshColors(2))).toBe(true);
    expect(matching.toArray()).toEqual([{ reason: 'selected' }, 1]);
  });

  test('destinations tagged with a reason block rerouting', () => {
    const graph = BipartiteGraph.fromAdjacency([[1], [1, 2]], 2);
    const matching = Matching.fromEntries<string>([1, unassignedWith('pinned')]);

    expect(tryAugment(matching, graph, 2, ALWAYS_TRUE, freshColors(2))).toBe(false);
    expect(matching.toArray()).toEqual([1, { reason: 'pinned' }]);
  });

  test('keeps a completed matching consistent', () => {
    const graph = createChainGraph();
    const matching = Matching.fromEntries([1, 2, null]).complete();

    tryAugment(matching, graph, 3, ALWAYS_TRUE, freshColors(3));

    expect(matching.invview().toArray()).toEqual([2, 3, 1]);
  });
});
