/**
 * Augmenting-path search for bipartite matching
 *
 * Grows a matching by one pair rooted at a source vertex, using the
 * direct-then-reroute order:
 * 1. Take the first admissible destination of the source holding plain
 *    UNASSIGNED. A destination tagged with a reason is never taken.
 * 2. Otherwise, for each admissible destination not yet coloured, colour it
 *    and try to reroute the source that currently holds it, recursively.
 *
 * The scan order decides which maximum matching is found among several, so
 * both phases walk neighbours in ascending id order.
 *
 * The search is a depth-first traversal kept on an explicit stack (depth is
 * bounded by the destination count), visiting vertices in exactly the order
 * the recursive formulation would.
 */

import type { BipartiteGraph } from '../bipartite-graph/bipartite-graph';
import type { VertexId } from '../types';
import type { Matching } from './matching';
import type { ColorBuffer, VertexFilter } from './types';
import { isMatched, isUnassigned } from './types';

/**
 * One level of the reroute search
 */
interface RerouteFrame {
  /** Source being rerouted at this level */
  readonly src: VertexId;

  /** Position of the next neighbour to scan in the reroute phase */
  cursor: number;

  /** Destination whose holder is being rerouted one level deeper */
  pendingDst: VertexId | null;
}

/**
 * Direct phase: assigns the first admissible UNASSIGNED destination of `src`.
 */
function assignFreeDestination<U, M>(
  matching: Matching<U>,
  graph: BipartiteGraph<M>,
  src: VertexId,
  dstFilter: VertexFilter,
): boolean {
  for (const dst of graph.srcNeighbors(src)) {
    if (dstFilter(dst) && isUnassigned(matching.get(dst))) {
      matching.set(dst, src);
      return true;
    }
  }
  return false;
}

/**
 * Writes the augmenting path back, innermost level first.
 */
function flipPath<U>(
  matching: Matching<U>,
  frames: readonly RerouteFrame[],
): void {
  for (let level = frames.length - 1; level >= 0; level--) {
    const frame = frames[level];
    if (frame.pendingDst === null) {
      throw new Error(`Reroute frame for source ${frame.src} has no pending destination`);
    }
    matching.set(frame.pendingDst, frame.src);
  }
}

/**
 * Tries to grow `matching` by an augmenting path starting at `src`.
 *
 * On failure the matching is unchanged. The colour buffers are caller-owned
 * scratch: they are written either way and must be reset before a search
 * from an unrelated root.
 *
 * @param dcolor - destination visitation flags, indexed by `id - 1`
 * @param scolor - optional source visitation flags, indexed by `id - 1`
 * @returns true if the matching was augmented
 */
export function tryAugment<U, M>(
  matching: Matching<U>,
  graph: BipartiteGraph<M>,
  src: VertexId,
  dstFilter: VertexFilter,
  dcolor: ColorBuffer,
  scolor?: ColorBuffer,
): boolean {
  const enter = (vertex: VertexId): boolean => {
    if (scolor !== undefined) {
      scolor[vertex - 1] = true;
    }
    return assignFreeDestination(matching, graph, vertex, dstFilter);
  };

  if (enter(src)) {
    return true;
  }

  const frames: RerouteFrame[] = [{ src, cursor: 0, pendingDst: null }];

  while (frames.length > 0) {
    const frame = frames[frames.length - 1];
    const neighbors = graph.srcNeighbors(frame.src);
    let descended = false;

    while (frame.cursor < neighbors.length && !descended) {
      const dst = neighbors[frame.cursor];
      frame.cursor++;

      const isAdmissible = dstFilter(dst) && !dcolor[dst - 1];
      if (!isAdmissible) {
        continue;
      }
      dcolor[dst - 1] = true;

      const holder = matching.get(dst);
      if (!isMatched(holder)) {
        continue;
      }

      frame.pendingDst = dst;
      if (enter(holder)) {
        flipPath(matching, frames);
        return true;
      }

      frames.push({ src: holder, cursor: 0, pendingDst: null });
      descended = true;
    }

    if (!descended) {
      frames.pop();
    }
  }

  return false;
}
