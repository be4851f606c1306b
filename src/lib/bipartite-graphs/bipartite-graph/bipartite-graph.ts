/**
 * Bipartite graph with lazily completable backward adjacency
 *
 * Maps source vertices, labelled `1..nsrcs`, to the destination vertices
 * they depend on, labelled `1..ndsts`. Forward adjacency (source to
 * destinations) is always stored. Backward adjacency (destination to
 * sources) is optional: without it only the destination count is kept and
 * backward queries throw NotCompletedError until `complete()` is called.
 * A completed graph answers backward queries in O(1) at the cost of slower
 * edge insertion.
 *
 * Every adjacency list is sorted and duplicate free. Graphs returned by
 * `invview()` are views: they share storage (adjacency lists, edge count and
 * metadata) with the graph they came from, so a mutation through one is
 * visible through all of them.
 *
 * Example:
 *   // six sources over two destinations
 *   const graph = BipartiteGraph.fromAdjacency(
 *     [[1], [1], [2], [2], [1], [1, 2]],
 *     [[1, 2, 5, 6], [3, 4, 6]],
 *   );
 */

import type {
  CompletionInfo,
  VertexDeletionInfo,
} from '../bipartite-logger';
import { bipartiteLogger, IS_BIPARTITE_DEBUG_ENABLED } from '../bipartite-logger';
import {
  EdgeNotFoundError,
  InvalidArgumentError,
  NotCompletedError,
  VertexRangeError,
} from '../errors';
import type { VertexId } from '../types';
import { isVertexId, VertexKind, VertexRange } from '../types';
import { BipartiteEdge } from './bipartite-edge';
import {
  indexInSorted,
  isStrictlyAscending,
  NOT_IN_LIST,
  searchSortedFirst,
  sortUnique,
} from './sorted-list';

// ============================================================================
// Types
// ============================================================================

/** Per-vertex adjacency lists, index `id - 1` holds vertex `id` */
export type AdjacencyTable = number[][];

/** Per-edge metadata, shaped like the forward adjacency it belongs to */
export type MetadataTable<M> = M[][];

/**
 * Storage shared by a graph and all of its inverse views.
 *
 * The metadata table is aligned with the forward adjacency of the graph that
 * was originally constructed (the "owner"), whichever view mutates it.
 */
interface SharedStore<M> {
  edgeCount: number;
  metadata: MetadataTable<M> | null;
}

export interface FromAdjacencyOptions<M> {
  /** Overrides the edge count inferred from the forward table */
  readonly edgeCount?: number;

  /** Per-edge metadata aligned with the forward table */
  readonly metadata?: MetadataTable<M>;
}

export interface EmptyGraphOptions {
  /** Store backward adjacency from the start (default: true) */
  readonly complete?: boolean;

  /** Attach an empty metadata table */
  readonly withMetadata?: boolean;
}

export interface DeleteVerticesOptions {
  /**
   * Physically remove the vertices after clearing their edges. Remaining
   * vertices of the same class are renumbered to stay contiguous.
   */
  readonly removeVertices?: boolean;
}

/** Neighbour id paired with the metadata of the connecting edge */
export type NeighborWithMetadata<M> = readonly [neighbor: VertexId, metadata: M];

// ============================================================================
// Constants
// ============================================================================

/** Marks a removed id in the renumbering table */
const REMOVED_VERTEX = 0;

// ============================================================================
// Helpers
// ============================================================================

function emptyLists(count: number): AdjacencyTable {
  return Array.from({ length: count }, (): number[] => []);
}

function largestId(table: AdjacencyTable): number {
  let largest = 0;
  for (const list of table) {
    for (const id of list) {
      largest = Math.max(largest, id);
    }
  }
  return largest;
}

function sumOfLengths(table: AdjacencyTable): number {
  let total = 0;
  for (const list of table) {
    total += list.length;
  }
  return total;
}

function validateTable(table: AdjacencyTable, limit: number, side: string): void {
  table.forEach((list, index) => {
    const owner = index + 1;
    if (!isStrictlyAscending(list)) {
      throw new InvalidArgumentError(
        `${side} adjacency of vertex ${owner} is not sorted and duplicate free`,
      );
    }
    for (const id of list) {
      if (!isVertexId(id) || id > limit) {
        throw new VertexRangeError(
          `${side} adjacency of vertex ${owner} references ${id}, outside 1..${limit}`,
        );
      }
    }
  });
}

function tablesEqual(left: AdjacencyTable, right: AdjacencyTable): boolean {
  if (left.length !== right.length) {
    return false;
  }
  return left.every((list, index) => {
    const other = right[index];
    return (
      list.length === other.length && list.every((id, at) => id === other[at])
    );
  });
}

// ============================================================================
// BipartiteGraph
// ============================================================================

export class BipartiteGraph<M = never> {
  private constructor(
    private readonly store: SharedStore<M>,
    private readonly forward: AdjacencyTable,
    private backward: AdjacencyTable | null,
    private dstCount: number,
    private readonly transposed: boolean,
  ) {}

  // --------------------------------------------------------------------------
  // Construction
  // --------------------------------------------------------------------------

  /**
   * Builds a graph from explicit adjacency.
   *
   * `backward` is either the backward adjacency table or, to defer it, the
   * number of destination vertices. When omitted the destination count is
   * the largest destination id in `forward`. The given arrays become the
   * graph's storage; they are validated (range, order) but not copied.
   * A given backward table is assumed to be the transpose of `forward`.
   */
  static fromAdjacency<M = never>(
    forward: AdjacencyTable,
    backward: AdjacencyTable | number = largestId(forward),
    options: FromAdjacencyOptions<M> = {},
  ): BipartiteGraph<M> {
    const isBackwardTable = typeof backward !== 'number';
    const dstCount = isBackwardTable ? backward.length : backward;

    if (!Number.isInteger(dstCount) || dstCount < 0) {
      throw new InvalidArgumentError(`invalid destination count ${dstCount}`);
    }

    validateTable(forward, dstCount, 'forward');
    if (isBackwardTable) {
      validateTable(backward, forward.length, 'backward');
    }

    const metadata = options.metadata ?? null;
    if (metadata !== null) {
      const isAligned =
        metadata.length === forward.length &&
        metadata.every((row, index) => row.length === forward[index].length);
      if (!isAligned) {
        throw new InvalidArgumentError(
          'metadata table must mirror the shape of the forward adjacency',
        );
      }
    }

    const edgeCount = options.edgeCount ?? sumOfLengths(forward);
    const store: SharedStore<M> = { edgeCount, metadata };

    return new BipartiteGraph(
      store,
      forward,
      isBackwardTable ? backward : null,
      dstCount,
      false,
    );
  }

  /**
   * Builds a graph with `nsrcs` sources, `ndsts` destinations and no edges.
   * Backward adjacency is stored unless `complete: false` is passed.
   */
  static empty<M = never>(
    nsrcs: number,
    ndsts: number,
    options: EmptyGraphOptions = {},
  ): BipartiteGraph<M> {
    const { complete = true, withMetadata = false } = options;
    const metadata: MetadataTable<M> | null = withMetadata
      ? Array.from({ length: nsrcs }, (): M[] => [])
      : null;

    return new BipartiteGraph<M>(
      { edgeCount: 0, metadata },
      emptyLists(nsrcs),
      complete ? emptyLists(ndsts) : null,
      ndsts,
      false,
    );
  }

  /**
   * Deep copy. The copy shares nothing with this graph or its views.
   */
  copy(): BipartiteGraph<M> {
    const metadata = this.store.metadata;
    return new BipartiteGraph<M>(
      {
        edgeCount: this.store.edgeCount,
        metadata: metadata === null ? null : metadata.map((row) => [...row]),
      },
      this.forward.map((list) => [...list]),
      this.backward === null ? null : this.backward.map((list) => [...list]),
      this.dstCount,
      this.transposed,
    );
  }

  // --------------------------------------------------------------------------
  // Completion
  // --------------------------------------------------------------------------

  get isComplete(): boolean {
    return this.backward !== null;
  }

  /**
   * Materialises the backward adjacency in place in O(E). No-op if present.
   */
  complete(): this {
    if (this.backward !== null) {
      return this;
    }

    const backward = emptyLists(this.dstCount);
    this.forward.forEach((list, index) => {
      const src = index + 1;
      for (const dst of list) {
        backward[dst - 1].push(src);
      }
    });
    this.backward = backward;

    if (IS_BIPARTITE_DEBUG_ENABLED) {
      const completionInfo: CompletionInfo = {
        srcCount: this.nsrcs,
        dstCount: this.ndsts,
        edgeCount: this.edgeCount,
      };
      bipartiteLogger
        .withMetadata(completionInfo)
        .debug('Backward adjacency materialised');
    }

    return this;
  }

  /**
   * @throws NotCompletedError when the graph has no backward adjacency
   */
  requireComplete(): void {
    this.completedBackward();
  }

  /**
   * View of this graph with sources and destinations swapped. The view
   * aliases this graph. Requires completion.
   */
  invview(): BipartiteGraph<M> {
    const backward = this.completedBackward();
    return new BipartiteGraph(
      this.store,
      backward,
      this.forward,
      this.forward.length,
      !this.transposed,
    );
  }

  private completedBackward(): AdjacencyTable {
    if (this.backward === null) {
      throw new NotCompletedError(
        'The graph has no back edges. Use `complete()`.',
      );
    }
    return this.backward;
  }

  // --------------------------------------------------------------------------
  // Vertex queries
  // --------------------------------------------------------------------------

  get nsrcs(): number {
    return this.forward.length;
  }

  get ndsts(): number {
    return this.backward === null ? this.dstCount : this.backward.length;
  }

  /** Total number of vertices in both classes */
  get vertexCount(): number {
    return this.nsrcs + this.ndsts;
  }

  get edgeCount(): number {
    return this.store.edgeCount;
  }

  get hasMetadata(): boolean {
    return this.store.metadata !== null;
  }

  srcVertices(): VertexRange {
    return new VertexRange(this.nsrcs);
  }

  dstVertices(): VertexRange {
    return new VertexRange(this.ndsts);
  }

  vertices(): readonly [srcs: VertexRange, dsts: VertexRange] {
    return [this.srcVertices(), this.dstVertices()];
  }

  hasSrcVertex(vertex: VertexId): boolean {
    return isVertexId(vertex) && vertex <= this.nsrcs;
  }

  hasDstVertex(vertex: VertexId): boolean {
    return isVertexId(vertex) && vertex <= this.ndsts;
  }

  // --------------------------------------------------------------------------
  // Neighbour queries
  // --------------------------------------------------------------------------

  /**
   * Destinations of source `src`, ascending. The returned array is the
   * graph's own storage and must not be modified.
   */
  srcNeighbors(src: VertexId): readonly VertexId[] {
    this.assertSrc(src);
    return this.forward[src - 1];
  }

  /**
   * Sources of destination `dst`, ascending. Requires completion. The
   * returned array is the graph's own storage and must not be modified.
   */
  dstNeighbors(dst: VertexId): readonly VertexId[] {
    const backward = this.completedBackward();
    this.assertDst(dst);
    return backward[dst - 1];
  }

  srcNeighborsWithMetadata(src: VertexId): NeighborWithMetadata<M>[] {
    return this.srcNeighbors(src).map(
      (dst): NeighborWithMetadata<M> => [dst, this.edgeMetadata(src, dst)],
    );
  }

  dstNeighborsWithMetadata(dst: VertexId): NeighborWithMetadata<M>[] {
    return this.dstNeighbors(dst).map(
      (src): NeighborWithMetadata<M> => [src, this.edgeMetadata(src, dst)],
    );
  }

  hasEdge(src: VertexId, dst: VertexId): boolean {
    if (!this.hasSrcVertex(src) || !this.hasDstVertex(dst)) {
      return false;
    }
    return indexInSorted(this.forward[src - 1], dst) !== NOT_IN_LIST;
  }

  hasBipartiteEdge(edge: BipartiteEdge): boolean {
    return this.hasEdge(edge.src, edge.dst);
  }

  /**
   * Metadata of the edge `src => dst`.
   *
   * @throws InvalidArgumentError when the graph carries no metadata
   * @throws EdgeNotFoundError when the edge is absent
   */
  edgeMetadata(src: VertexId, dst: VertexId): M {
    const metadata = this.requireMetadata();
    const [ownerSrc, ownerDst] = this.transposed ? [dst, src] : [src, dst];
    const ownerList = this.transposed
      ? this.completedBackward()[ownerSrc - 1]
      : this.forward[ownerSrc - 1];
    const index = indexInSorted(ownerList, ownerDst);

    if (index === NOT_IN_LIST) {
      throw new EdgeNotFoundError(
        `graph does not have edge ${new BipartiteEdge(src, dst).toString()}`,
      );
    }
    return metadata[ownerSrc - 1][index];
  }

  // --------------------------------------------------------------------------
  // Edge mutation
  // --------------------------------------------------------------------------

  /**
   * Adds the edge `src => dst`.
   *
   * @returns true if the edge was added, false if it was already present
   * @throws VertexRangeError if either endpoint is out of range
   * @throws InvalidArgumentError if metadata is missing on a graph that carries
   * it, or given to a graph that does not
   */
  addEdge(src: VertexId, dst: VertexId, metadata?: M): boolean {
    this.assertEdgeInRange(src, dst);
    const table = this.store.metadata;
    if (table !== null && metadata === undefined) {
      throw new InvalidArgumentError(
        `edge ${new BipartiteEdge(src, dst).toString()} needs metadata`,
      );
    }
    if (table === null && metadata !== undefined) {
      throw new InvalidArgumentError(
        `edge ${new BipartiteEdge(src, dst).toString()} has metadata but the graph carries none`,
      );
    }

    const list = this.forward[src - 1];
    const index = searchSortedFirst(list, dst);
    const isPresent = index < list.length && list[index] === dst;
    if (isPresent) {
      return false;
    }

    list.splice(index, 0, dst);
    this.store.edgeCount++;

    let backIndex = NOT_IN_LIST;
    if (this.backward !== null) {
      const backList = this.backward[dst - 1];
      backIndex = searchSortedFirst(backList, src);
      backList.splice(backIndex, 0, src);
    }

    if (table !== null && metadata !== undefined) {
      if (this.transposed) {
        table[dst - 1].splice(backIndex, 0, metadata);
      } else {
        table[src - 1].splice(index, 0, metadata);
      }
    }

    return true;
  }

  addBipartiteEdge(edge: BipartiteEdge, metadata?: M): boolean {
    return this.addEdge(edge.src, edge.dst, metadata);
  }

  /**
   * Removes the edge `src => dst`.
   *
   * @throws VertexRangeError if either endpoint is out of range
   * @throws EdgeNotFoundError if the edge is absent
   */
  removeEdge(src: VertexId, dst: VertexId): true {
    this.assertEdgeInRange(src, dst);

    const list = this.forward[src - 1];
    const index = indexInSorted(list, dst);
    if (index === NOT_IN_LIST) {
      throw new EdgeNotFoundError(
        `graph does not have edge ${new BipartiteEdge(src, dst).toString()}`,
      );
    }

    list.splice(index, 1);
    this.store.edgeCount--;

    let backIndex = NOT_IN_LIST;
    if (this.backward !== null) {
      const backList = this.backward[dst - 1];
      backIndex = indexInSorted(backList, src);
      backList.splice(backIndex, 1);
    }

    const table = this.store.metadata;
    if (table !== null) {
      if (this.transposed) {
        table[dst - 1].splice(backIndex, 1);
      } else {
        table[src - 1].splice(index, 1);
      }
    }

    return true;
  }

  removeBipartiteEdge(edge: BipartiteEdge): true {
    return this.removeEdge(edge.src, edge.dst);
  }

  /**
   * Replaces every neighbour of `src`.
   *
   * The new list is sorted and deduplicated (keeping the metadata of the
   * first occurrence). Arguments are validated before anything is written,
   * so the replacement itself cannot fail halfway.
   *
   * @throws VertexRangeError for an out-of-range source or neighbour
   * @throws InvalidArgumentError if metadata is missing or misaligned, or given
   * to a graph that carries none
   */
  setNeighbors(src: VertexId, neighbors: readonly VertexId[], metadata?: readonly M[]): void {
    this.assertSrc(src);
    for (const dst of neighbors) {
      this.assertDst(dst);
    }

    if (this.store.metadata !== null) {
      const isAligned = metadata !== undefined && metadata.length === neighbors.length;
      if (!isAligned) {
        throw new InvalidArgumentError(
          'setNeighbors needs one metadata entry per neighbour on a graph with metadata',
        );
      }
    } else if (metadata !== undefined) {
      throw new InvalidArgumentError('setNeighbors got metadata for a graph that carries none');
    }

    const sorted = sortUnique(neighbors, metadata);
    this.replaceNeighbors(src, sorted.values, sorted.payloads);
  }

  /**
   * Removes every edge, keeping all vertices.
   */
  clear(): void {
    for (const list of this.forward) {
      list.length = 0;
    }
    if (this.backward !== null) {
      for (const list of this.backward) {
        list.length = 0;
      }
    }
    if (this.store.metadata !== null) {
      for (const row of this.store.metadata) {
        row.length = 0;
      }
    }
    this.store.edgeCount = 0;
  }

  private replaceNeighbors(src: VertexId, next: number[], nextMetadata: M[]): void {
    const previous = this.forward[src - 1];
    const table = this.store.metadata;
    const backward = this.backward;

    this.store.edgeCount += next.length - previous.length;

    if (backward !== null) {
      for (const dst of previous) {
        const backList = backward[dst - 1];
        const index = indexInSorted(backList, src);
        if (index !== NOT_IN_LIST) {
          backList.splice(index, 1);
          if (this.transposed && table !== null) {
            table[dst - 1].splice(index, 1);
          }
        }
      }

      next.forEach((dst, position) => {
        const backList = backward[dst - 1];
        const index = searchSortedFirst(backList, src);
        const isPresent = index < backList.length && backList[index] === src;
        if (!isPresent) {
          backList.splice(index, 0, src);
          if (this.transposed && table !== null) {
            table[dst - 1].splice(index, 0, nextMetadata[position]);
          }
        }
      });
    }

    this.forward[src - 1] = next;
    if (!this.transposed && table !== null) {
      table[src - 1] = nextMetadata;
    }
  }

  // --------------------------------------------------------------------------
  // Vertex mutation
  // --------------------------------------------------------------------------

  /**
   * Appends a vertex of the given class with no edges.
   *
   * @returns id of the new vertex
   */
  addVertex(kind: VertexKind): VertexId {
    switch (kind) {
      case VertexKind.SRC: {
        this.forward.push([]);
        if (!this.transposed && this.store.metadata !== null) {
          this.store.metadata.push([]);
        }
        return this.forward.length;
      }
      case VertexKind.DST: {
        if (this.backward === null) {
          this.dstCount++;
          return this.dstCount;
        }
        this.backward.push([]);
        if (this.transposed && this.store.metadata !== null) {
          this.store.metadata.push([]);
        }
        return this.backward.length;
      }
      default: {
        const unknownKind: never = kind;
        throw new InvalidArgumentError(
          `type (${String(unknownKind)}) must be either '${VertexKind.SRC}' or '${VertexKind.DST}'`,
        );
      }
    }
  }

  /**
   * Removes every edge incident on the given sources. With
   * `removeVertices` the sources themselves are deleted and the remaining
   * sources renumbered (O(V + E)).
   *
   * @throws VertexRangeError if any id is out of range (before any change)
   */
  deleteSrcs(srcs: readonly VertexId[], options: DeleteVerticesOptions = {}): this {
    const { removeVertices = false } = options;
    for (const src of srcs) {
      this.assertSrc(src);
    }

    for (const src of srcs) {
      this.replaceNeighbors(src, [], []);
    }

    if (removeVertices) {
      this.removeClearedSrcs(srcs);
    }

    if (IS_BIPARTITE_DEBUG_ENABLED) {
      const deletionInfo: VertexDeletionInfo = {
        deletedIds: [...srcs],
        removedVertices: removeVertices,
        remainingSrcCount: this.nsrcs,
      };
      bipartiteLogger
        .withMetadata(deletionInfo)
        .debug('Source vertices deleted');
    }

    return this;
  }

  /**
   * Destination counterpart of deleteSrcs, carried out on the inverse view.
   * Requires completion.
   */
  deleteDsts(dsts: readonly VertexId[], options: DeleteVerticesOptions = {}): this {
    this.invview().deleteSrcs(dsts, options);
    return this;
  }

  private removeClearedSrcs(srcs: readonly VertexId[]): void {
    const renumbering = Array.from({ length: this.nsrcs }, (_, index) => index + 1);
    for (const src of srcs) {
      renumbering[src - 1] = REMOVED_VERTEX;
    }

    let offset = 0;
    renumbering.forEach((id, index) => {
      if (id === REMOVED_VERTEX) {
        offset++;
      } else {
        renumbering[index] = id - offset;
      }
    });

    if (this.backward !== null) {
      this.backward.forEach((list, index, table) => {
        table[index] = list
          .map((src) => renumbering[src - 1])
          .filter((src) => src !== REMOVED_VERTEX);
      });
    }

    const removedDescending = [...new Set(srcs)].sort((left, right) => right - left);
    const table = this.store.metadata;
    for (const src of removedDescending) {
      this.forward.splice(src - 1, 1);
      if (!this.transposed && table !== null) {
        table.splice(src - 1, 1);
      }
    }
  }

  // --------------------------------------------------------------------------
  // Edge iteration
  // --------------------------------------------------------------------------

  /** All edges, ordered by source then destination */
  edges(): Generator<BipartiteEdge> {
    return this.srcEdges();
  }

  /** All edges, ordered by source then destination */
  *srcEdges(): Generator<BipartiteEdge> {
    for (let index = 0; index < this.forward.length; index++) {
      const src = index + 1;
      for (const dst of this.forward[index]) {
        yield new BipartiteEdge(src, dst);
      }
    }
  }

  /** All edges, ordered by destination then source. Requires completion. */
  *dstEdges(): Generator<BipartiteEdge> {
    const backward = this.completedBackward();
    for (let index = 0; index < backward.length; index++) {
      const dst = index + 1;
      for (const src of backward[index]) {
        yield new BipartiteEdge(src, dst);
      }
    }
  }

  // --------------------------------------------------------------------------
  // Comparison
  // --------------------------------------------------------------------------

  /**
   * Structural equality: same edge count, forward and backward contents.
   * A deferred backward table only equals a deferred one of the same size.
   */
  isEqual(other: BipartiteGraph<M>): boolean {
    if (this.edgeCount !== other.edgeCount) {
      return false;
    }
    if (!tablesEqual(this.forward, other.forward)) {
      return false;
    }
    if (this.backward === null || other.backward === null) {
      return (
        this.backward === null &&
        other.backward === null &&
        this.dstCount === other.dstCount
      );
    }
    return tablesEqual(this.backward, other.backward);
  }

  // --------------------------------------------------------------------------
  // Guards
  // --------------------------------------------------------------------------

  private requireMetadata(): MetadataTable<M> {
    if (this.store.metadata === null) {
      throw new InvalidArgumentError('the graph carries no edge metadata');
    }
    return this.store.metadata;
  }

  private assertSrc(src: VertexId): void {
    if (!this.hasSrcVertex(src)) {
      throw new VertexRangeError(`source ${src} out of range 1..${this.nsrcs}`);
    }
  }

  private assertDst(dst: VertexId): void {
    if (!this.hasDstVertex(dst)) {
      throw new VertexRangeError(
        `destination ${dst} out of range 1..${this.ndsts}`,
      );
    }
  }

  private assertEdgeInRange(src: VertexId, dst: VertexId): void {
    if (!this.hasSrcVertex(src) || !this.hasDstVertex(dst)) {
      throw new VertexRangeError(
        `edge (${new BipartiteEdge(src, dst).toString()}) out of range.`,
      );
    }
  }
}
