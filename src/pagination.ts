/**
 * Helpers for draining Azure SDK paging iterators.
 */

/**
 * Collect every item from an async iterable (Azure SDK paging iterator),
 * mapping each raw item to the domain type and dropping those the optional
 * filter rejects.
 */
export async function collectAll<TRaw, TOut>(
  iterator: AsyncIterable<TRaw>,
  mapFn: (item: TRaw) => TOut,
  filterFn?: (item: TOut) => boolean,
): Promise<TOut[]> {
  const items: TOut[] = [];
  for await (const raw of iterator) {
    const mapped = mapFn(raw);
    if (!filterFn || filterFn(mapped)) items.push(mapped);
  }
  return items;
}

/** Resource group segment of an ARM resource id. */
export function resourceGroupFromId(id: string | undefined): string {
  return id?.match(/\/resourceGroups\/([^/]+)/i)?.[1] ?? "";
}
