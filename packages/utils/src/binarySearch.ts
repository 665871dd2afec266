/**
 * Index of the first item whose key is strictly greater than `value`, or `items.length` if there is none.
 * Items with a key equal to `value` all sit before the returned index.
 *
 * `items` must be sorted by `getter` in non-decreasing order.
 */
export function upperBound<T>(items: readonly T[], value: number, getter: (item: T) => number): number {
  let min = 0;
  let max = items.length;
  while (min < max) {
    const mid = Math.floor((min + max) / 2);
    if (getter(items[mid]) <= value) {
      min = mid + 1;
    } else {
      max = mid;
    }
  }
  return min;
}
