/**
 * Types for bipartite matchings.
 *
 * A matching entry is one of:
 * - a source vertex id (the destination is matched to that source),
 * - UNASSIGNED (plain unmatched),
 * - an UnassignedWith<U> wrapper (unmatched, with a caller-defined reason).
 */

import type { VertexId } from '../types';

/** Plain "no mate" marker */
export const UNASSIGNED = null;

export type Unassigned = typeof UNASSIGNED;

/** Unmatched entry carrying a caller-defined payload */
export interface UnassignedWith<U> {
  readonly reason: U;
}

/** One slot of a matching */
export type MatchEntry<U = never> = VertexId | Unassigned | UnassignedWith<U>;

/**
 * Wraps a payload as an unmatched entry.
 */
export function unassignedWith<U>(reason: U): UnassignedWith<U> {
  return { reason };
}

export function isMatched<U>(entry: MatchEntry<U>): entry is VertexId {
  return typeof entry === 'number';
}

export function isUnassigned<U>(entry: MatchEntry<U>): entry is Unassigned {
  return entry === UNASSIGNED;
}

/**
 * Predicate deciding whether a vertex may take part in a matching
 */
export type VertexFilter = (vertex: VertexId) => boolean;

/** Default filter admitting every vertex */
export const ALWAYS_TRUE: VertexFilter = () => true;

/**
 * Caller-owned visitation scratch buffer, indexed by `id - 1`
 */
export type ColorBuffer = boolean[];
