/**
 * Partial injective mapping from destination vertices to source vertices
 *
 * The forward table is indexed by destination id. An optional inverse
 * table, indexed by source id, mirrors it. While the inverse exists,
 * assignments keep the mapping injective by evicting the previous holder
 * of a source. Without it, `set` writes the forward slot only.
 *
 * `invview()` returns a matching that shares both tables with this one,
 * forward and inverse swapped.
 */

import { InvalidArgumentError, NotCompletedError, VertexRangeError } from '../errors';
import type { VertexId } from '../types';
import { isVertexId } from '../types';
import type { MatchEntry } from './types';
import { isMatched, UNASSIGNED } from './types';

/**
 * Appends UNASSIGNED slots until the table can hold `vertex`.
 */
function growTo<U>(table: MatchEntry<U>[], vertex: VertexId): void {
  while (table.length < vertex) {
    table.push(UNASSIGNED);
  }
}

function largestAssigned<U>(table: readonly MatchEntry<U>[]): number {
  let largest = 0;
  for (const entry of table) {
    if (isMatched(entry)) {
      largest = Math.max(largest, entry);
    }
  }
  return largest;
}

function assertEntry<U>(entry: MatchEntry<U>): void {
  if (typeof entry === 'number' && !isVertexId(entry)) {
    throw new VertexRangeError(`${entry} is not a valid vertex id`);
  }
}

export class Matching<U = never> implements Iterable<MatchEntry<U>> {
  private constructor(
    private readonly forward: MatchEntry<U>[],
    private inverse: MatchEntry<U>[] | null,
  ) {}

  /**
   * Matching of `size` unassigned destinations, without inverse.
   */
  static empty<U = never>(size: number): Matching<U> {
    if (!Number.isInteger(size) || size < 0) {
      throw new InvalidArgumentError(`invalid matching size ${size}`);
    }
    const forward = Array.from({ length: size }, (): MatchEntry<U> => UNASSIGNED);
    return new Matching<U>(forward, null);
  }

  /**
   * Wraps existing tables. The arrays become the matching's storage.
   * A given inverse is assumed consistent with `entries`.
   */
  static fromEntries<U = never>(
    entries: MatchEntry<U>[],
    inverse: MatchEntry<U>[] | null = null,
  ): Matching<U> {
    entries.forEach(assertEntry);
    inverse?.forEach(assertEntry);
    return new Matching<U>(entries, inverse);
  }

  copy(): Matching<U> {
    return new Matching<U>(
      [...this.forward],
      this.inverse === null ? null : [...this.inverse],
    );
  }

  // --------------------------------------------------------------------------
  // Queries
  // --------------------------------------------------------------------------

  get length(): number {
    return this.forward.length;
  }

  get hasInverse(): boolean {
    return this.inverse !== null;
  }

  /**
   * Entry of destination `dst`. Ids past the end of the table have never
   * been assigned and read as UNASSIGNED.
   *
   * @throws VertexRangeError if `dst` is not a positive integer
   */
  get(dst: VertexId): MatchEntry<U> {
    if (!isVertexId(dst)) {
      throw new VertexRangeError(`${dst} is not a valid vertex id`);
    }
    return dst <= this.forward.length ? this.forward[dst - 1] : UNASSIGNED;
  }

  /**
   * Destination currently matched to source `src`. Requires completion.
   */
  inverseEntry(src: VertexId): MatchEntry<U> {
    return this.invview().get(src);
  }

  /** Number of destinations matched to a source */
  matchedCount(): number {
    let count = 0;
    for (const entry of this.forward) {
      if (isMatched(entry)) {
        count++;
      }
    }
    return count;
  }

  [Symbol.iterator](): Iterator<MatchEntry<U>> {
    return this.forward[Symbol.iterator]();
  }

  toArray(): MatchEntry<U>[] {
    return [...this.forward];
  }

  // --------------------------------------------------------------------------
  // Mutation
  // --------------------------------------------------------------------------

  /**
   * Assigns `value` to destination `dst`.
   *
   * With an inverse, the order of operations is fixed: evict whichever
   * destination holds `value`, release the destination's previous source,
   * grow the inverse, then write inverse and forward slots.
   *
   * @throws VertexRangeError if `dst` is outside the table or `value` is
   * not a valid vertex id
   */
  set(dst: VertexId, value: MatchEntry<U>): void {
    if (!isVertexId(dst) || dst > this.forward.length) {
      throw new VertexRangeError(
        `destination ${dst} out of range 1..${this.forward.length}`,
      );
    }
    assertEntry(value);

    const inverse = this.inverse;
    if (inverse !== null) {
      const previous = this.forward[dst - 1];

      if (isMatched(value) && value <= inverse.length) {
        const holder = inverse[value - 1];
        if (isMatched(holder)) {
          this.forward[holder - 1] = UNASSIGNED;
        }
      }
      if (isMatched(previous)) {
        inverse[previous - 1] = UNASSIGNED;
      }
      if (isMatched(value)) {
        growTo(inverse, value);
        inverse[value - 1] = dst;
      }
    }

    this.forward[dst - 1] = value;
  }

  /**
   * Appends a destination slot holding `value`, updating the inverse (and
   * evicting a previous holder) exactly as `set` does.
   */
  push(value: MatchEntry<U>): void {
    assertEntry(value);
    this.forward.push(UNASSIGNED);
    this.set(this.forward.length, value);
  }

  // --------------------------------------------------------------------------
  // Completion
  // --------------------------------------------------------------------------

  /**
   * Builds the inverse table in place with one forward scan. Its length is
   * `size`, by default the largest assigned source id. No-op if present.
   *
   * @throws VertexRangeError if `size` is below an assigned source id
   */
  complete(size: number = largestAssigned(this.forward)): this {
    if (this.inverse !== null) {
      return this;
    }

    const largest = largestAssigned(this.forward);
    if (size < largest) {
      throw new VertexRangeError(
        `inverse size ${size} cannot hold assigned source ${largest}`,
      );
    }

    const inverse = Array.from({ length: size }, (): MatchEntry<U> => UNASSIGNED);
    this.forward.forEach((entry, index) => {
      if (isMatched(entry)) {
        inverse[entry - 1] = index + 1;
      }
    });
    this.inverse = inverse;

    return this;
  }

  /**
   * @throws NotCompletedError when no inverse table exists
   */
  requireComplete(): void {
    this.completedInverse();
  }

  /**
   * Matching with forward and inverse swapped, aliasing this one.
   * Requires completion.
   */
  invview(): Matching<U> {
    const inverse = this.completedInverse();
    return new Matching<U>(inverse, this.forward);
  }

  private completedInverse(): MatchEntry<U>[] {
    if (this.inverse === null) {
      throw new NotCompletedError(
        'Backwards matching not defined. `complete()` the matching first.',
      );
    }
    return this.inverse;
  }
}
