/**
 * Case-insensitive substring filter. Keeps the relative order of `items`;
 * an empty query hands back the same array.
 */
export function filterItems<T>(items: T[], query: string, keyFn: (item: T) => string): T[] {
  if (!query) return items;
  const needle = query.toLowerCase();
  return items.filter((item) => keyFn(item).toLowerCase().includes(needle));
}
