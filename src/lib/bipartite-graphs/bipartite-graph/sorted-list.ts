/**
 * Binary-search helpers for the sorted, duplicate-free adjacency lists that
 * back a bipartite graph.
 */

/** Sentinel returned when a value is absent from a sorted list */
export const NOT_IN_LIST = -1;

/**
 * Index of the first element that is not less than `value`
 * (`list.length` when every element is smaller).
 */
export function searchSortedFirst(list: readonly number[], value: number): number {
  let low = 0;
  let high = list.length;

  while (low < high) {
    const middle = (low + high) >>> 1;
    if (list[middle] < value) {
      low = middle + 1;
    } else {
      high = middle;
    }
  }

  return low;
}

/**
 * Index of `value` in the list, or NOT_IN_LIST.
 */
export function indexInSorted(list: readonly number[], value: number): number {
  const index = searchSortedFirst(list, value);
  const isPresent = index < list.length && list[index] === value;
  return isPresent ? index : NOT_IN_LIST;
}

/**
 * Whether the list is strictly ascending (sorted and duplicate free).
 */
export function isStrictlyAscending(list: readonly number[]): boolean {
  for (let index = 1; index < list.length; index++) {
    if (list[index - 1] >= list[index]) {
      return false;
    }
  }
  return true;
}

/**
 * Sorted copy of `values` with duplicates dropped. When `payloads` is given
 * it is reordered alongside, keeping the payload of the first occurrence of
 * each value.
 */
export function sortUnique<P>(
  values: readonly number[],
  payloads?: readonly P[],
): { values: number[]; payloads: P[] } {
  const order = values.map((_, index) => index);
  order.sort((left, right) => values[left] - values[right] || left - right);

  const sortedValues: number[] = [];
  const sortedPayloads: P[] = [];

  for (const index of order) {
    const value = values[index];
    const isDuplicate =
      sortedValues.length > 0 && sortedValues[sortedValues.length - 1] === value;
    if (isDuplicate) {
      continue;
    }
    sortedValues.push(value);
    if (payloads !== undefined) {
      sortedPayloads.push(payloads[index]);
    }
  }

  return { values: sortedValues, payloads: sortedPayloads };
}
