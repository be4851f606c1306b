/**
 * Maximum-cardinality bipartite matching
 *
 * Tries every admissible source once, in ascending id order, reusing a
 * single destination colour buffer that is reset before each root. A source
 * stays unmatched only if no augmenting path exists when it is tried, and
 * none appears later: the result is maximum subject to the filters.
 *
 * Complexity: O(V·(V + E))
 */

import type { BipartiteGraph } from '../bipartite-graph/bipartite-graph';
import type { MatchingResultInfo, MatchingStartInfo } from '../bipartite-logger';
import { bipartiteLogger, IS_BIPARTITE_DEBUG_ENABLED } from '../bipartite-logger';
import { tryAugment } from './augmenting-path';
import { Matching } from './matching';
import type { ColorBuffer, VertexFilter } from './types';
import { ALWAYS_TRUE } from './types';

export interface MaximumMatchingOptions {
  /** Sources rejected by this filter stay unmatched */
  readonly srcFilter?: VertexFilter;

  /** Destinations rejected by this filter stay unmatched */
  readonly dstFilter?: VertexFilter;
}

/**
 * Computes a maximum-cardinality matching of destinations to sources.
 *
 * The returned matching is indexed by destination id and sized
 * `max(nsrcs, ndsts)` so it can be completed and inverted without growing.
 */
export function maximumMatching<U = never, M = never>(
  graph: BipartiteGraph<M>,
  options: MaximumMatchingOptions = {},
): Matching<U> {
  const { srcFilter = ALWAYS_TRUE, dstFilter = ALWAYS_TRUE } = options;

  if (IS_BIPARTITE_DEBUG_ENABLED) {
    const startInfo: MatchingStartInfo = {
      srcCount: graph.nsrcs,
      dstCount: graph.ndsts,
      edgeCount: graph.edgeCount,
    };
    bipartiteLogger
      .withMetadata(startInfo)
      .debug('Starting maximum matching');
  }

  const matching = Matching.empty<U>(Math.max(graph.nsrcs, graph.ndsts));
  const dcolor: ColorBuffer = new Array<boolean>(graph.ndsts).fill(false);

  let triedSrcCount = 0;
  let augmentedCount = 0;

  for (const src of graph.srcVertices()) {
    if (!srcFilter(src)) {
      continue;
    }
    triedSrcCount++;

    dcolor.fill(false);
    const augmented = tryAugment(matching, graph, src, dstFilter, dcolor);
    if (augmented) {
      augmentedCount++;
    }
  }

  if (IS_BIPARTITE_DEBUG_ENABLED) {
    const resultInfo: MatchingResultInfo = {
      triedSrcCount,
      augmentedCount,
      matchedCount: matching.matchedCount(),
    };
    bipartiteLogger
      .withMetadata(resultInfo)
      .debug('Maximum matching completed');
  }

  return matching;
}

/**
 * Alias kept for the name this routine usually goes by. The name is a
 * misnomer: the result is maximum, not merely inclusion-maximal.
 */
export const maximalMatching = maximumMatching;
