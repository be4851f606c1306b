export { tryAugment } from './augmenting-path';
export { Matching } from './matching';
export {
  maximalMatching,
  maximumMatching,
  type MaximumMatchingOptions,
} from './maximum-matching';
export {
  ALWAYS_TRUE,
  isMatched,
  isUnassigned,
  UNASSIGNED,
  unassignedWith,
} from './types';
export type {
  ColorBuffer,
  MatchEntry,
  Unassigned,
  UnassignedWith,
  VertexFilter,
} from './types';
