export { BipartiteEdge } from './bipartite-graph/bipartite-edge';
export { BipartiteGraph } from './bipartite-graph/bipartite-graph';
export type {
  AdjacencyTable,
  DeleteVerticesOptions,
  EmptyGraphOptions,
  FromAdjacencyOptions,
  MetadataTable,
  NeighborWithMetadata,
} from './bipartite-graph/bipartite-graph';
export {
  CondensationGraph,
  InducedCondensationGraph,
  MatchedCondensationGraph,
  NO_COMPONENT,
} from './condensation/condensation-graph';
export type {
  SccComponent,
  SccPartition,
} from './condensation/condensation-graph';
export {
  createDiCMOBiGraph,
  DiCMOBiGraph,
  MatchingOrientedGraph,
  TransposedDiCMOBiGraph,
} from './dicmobigraph/dicmobigraph';
export type { DiCMOBiGraphOptions } from './dicmobigraph/dicmobigraph';
export {
  BipartiteGraphError,
  EdgeNotFoundError,
  InvalidArgumentError,
  NotCompletedError,
  VertexRangeError,
} from './errors';
export type { BipartiteErrorCode } from './errors';
export {
  createSimpleDirectedGraph,
  inducedSubgraph,
  toDirectedGraph,
  vertexKey,
} from './interop/directed-graph';
export * from './matching';
export {
  FIRST_VERTEX_ID,
  isVertexId,
  parseVertexKind,
  VertexKind,
  VertexRange,
} from './types';
export type { DirectedEdge, DirectedGraphView, VertexId } from './types';
