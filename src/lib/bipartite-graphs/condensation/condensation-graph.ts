/**
 * Condensation graphs: strongly connected components as vertices
 *
 * Both variants are built once from a frozen partition of the underlying
 * vertices into components, and neither stores neighbour relations between
 * components. Neighbours are derived from the underlying graph on every
 * query, so edge multiplicity follows the number of underlying crossing
 * edges: these are non-strict multigraph views with no edge count.
 *
 * Components are numbered from 1 in partition order. A trivial component is
 * stored as a bare vertex id, a non-trivial one as a list of ids.
 */

import type { BipartiteGraph } from '../bipartite-graph/bipartite-graph';
import { InvalidArgumentError, VertexRangeError } from '../errors';
import type { DirectedGraphView, VertexId } from '../types';
import { isVertexId, VertexRange } from '../types';

/** One strongly connected component: a bare id, or its member list */
export type SccComponent = VertexId | readonly VertexId[];

/** Partition of vertices into strongly connected components */
export type SccPartition = readonly SccComponent[];

/** Membership value of a vertex the partition does not cover */
export const NO_COMPONENT = 0;

// ============================================================================
// Shared behaviour
// ============================================================================

export abstract class CondensationGraph implements DirectedGraphView {
  /** Component index of each underlying vertex, at `vertex - 1` */
  protected readonly assignment: number[];

  constructor(
    readonly components: SccPartition,
    memberCount: number,
  ) {
    this.assignment = new Array<number>(memberCount).fill(NO_COMPONENT);

    components.forEach((component, index) => {
      for (const vertex of membersOf(component)) {
        if (!isVertexId(vertex) || vertex > memberCount) {
          throw new VertexRangeError(
            `component ${index + 1} member ${vertex} out of range 1..${memberCount}`,
          );
        }
        if (this.assignment[vertex - 1] !== NO_COMPONENT) {
          throw new InvalidArgumentError(
            `vertex ${vertex} belongs to more than one component`,
          );
        }
        this.assignment[vertex - 1] = index + 1;
      }
    });
  }

  abstract outNeighbors(component: number): Iterable<number>;
  abstract inNeighbors(component: number): Iterable<number>;

  get vertexCount(): number {
    return this.components.length;
  }

  vertices(): VertexRange {
    return new VertexRange(this.components.length);
  }

  /**
   * Component holding underlying vertex `vertex`, or NO_COMPONENT.
   */
  componentOf(vertex: VertexId): number {
    if (!isVertexId(vertex) || vertex > this.assignment.length) {
      throw new VertexRangeError(
        `vertex ${vertex} out of range 1..${this.assignment.length}`,
      );
    }
    return this.assignment[vertex - 1];
  }

  /**
   * Underlying vertices of component `component`.
   */
  protected members(component: number): Iterable<VertexId> {
    if (!this.vertices().has(component)) {
      throw new VertexRangeError(
        `component ${component} out of range 1..${this.components.length}`,
      );
    }
    return membersOf(this.components[component - 1]);
  }
}

function membersOf(component: SccComponent): readonly VertexId[] {
  return typeof component === 'number' ? [component] : component;
}

// ============================================================================
// Over a contracted matching-oriented view
// ============================================================================

/**
 * Condensation of a directed view (typically a DiCMOBiGraph). Components
 * need not be in topological order.
 *
 * Out-neighbours of a component are the components reached by the
 * out-edges of its members, one entry per crossing edge, references back to
 * the component itself excluded. In-neighbours mirror this.
 */
export class MatchedCondensationGraph<
  G extends DirectedGraphView = DirectedGraphView,
> extends CondensationGraph {
  constructor(
    readonly graph: G,
    components: SccPartition,
  ) {
    super(components, graph.vertexCount);
  }

  *outNeighbors(component: number): Generator<number> {
    for (const vertex of this.members(component)) {
      yield* this.crossingComponents(component, this.graph.outNeighbors(vertex));
    }
  }

  *inNeighbors(component: number): Generator<number> {
    for (const vertex of this.members(component)) {
      yield* this.crossingComponents(component, this.graph.inNeighbors(vertex));
    }
  }

  private *crossingComponents(
    component: number,
    neighbors: Iterable<VertexId>,
  ): Generator<number> {
    for (const neighbor of neighbors) {
      const target = this.assignment[neighbor - 1];
      if (target !== NO_COMPONENT && target !== component) {
        yield target;
      }
    }
  }
}

// ============================================================================
// Over a bipartite graph
// ============================================================================

/**
 * Condensation over the destination vertices of a completed bipartite
 * graph, two destinations being adjacent when they share a source.
 *
 * Components must be listed in topological order: out-neighbours are the
 * adjacent components with a greater index, in-neighbours those with a
 * smaller one. The order is assumed, not checked.
 */
export class InducedCondensationGraph<M = never> extends CondensationGraph {
  constructor(
    readonly graph: BipartiteGraph<M>,
    components: SccPartition,
  ) {
    super(components, graph.ndsts);
    graph.requireComplete();
  }

  *outNeighbors(component: number): Generator<number> {
    for (const target of this.adjacentComponents(component)) {
      if (target > component) {
        yield target;
      }
    }
  }

  *inNeighbors(component: number): Generator<number> {
    for (const target of this.adjacentComponents(component)) {
      if (target !== NO_COMPONENT && target < component) {
        yield target;
      }
    }
  }

  /**
   * Component of every destination sharing a source with a member,
   * members themselves included.
   */
  private *adjacentComponents(component: number): Generator<number> {
    for (const dst of this.members(component)) {
      for (const src of this.graph.dstNeighbors(dst)) {
        for (const neighbor of this.graph.srcNeighbors(src)) {
          yield this.assignment[neighbor - 1];
        }
      }
    }
  }
}
