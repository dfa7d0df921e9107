/**
 * Substring filtering over named items
 */

export interface Named {
  readonly name: string;
}

export function matchesAll(name: string, filters: readonly string[]): boolean {
  return filters.every((filter) => name.includes(filter));
}

/**
 * Yields the items whose name contains every filter. With no filters every
 * item is yielded, in order.
 */
export function* applyFilters<T extends Named>(
  items: Iterable<T>,
  filters: readonly string[],
): Generator<T, void, undefined> {
  for (const item of items) {
    if (matchesAll(item.name, filters)) {
      yield item;
    }
  }
}
