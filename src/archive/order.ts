/**
 * Explicit ordering for listings: newest first, undated last, then by URL.
 */

interface Orderable {
  date?: Date;
  url: string;
}

export function compareByDateDesc(a: Orderable, b: Orderable): number {
  const at = a.date?.getTime();
  const bt = b.date?.getTime();
  if (at !== undefined && bt !== undefined && at !== bt) return bt - at;
  if (at === undefined && bt !== undefined) return 1;
  if (at !== undefined && bt === undefined) return -1;
  return a.url < b.url ? -1 : a.url > b.url ? 1 : 0;
}

/** Case-insensitive name order, exact string as tie-breaker */
export function compareNames(a: string, b: string): number {
  const byBase = a.localeCompare(b, "en", { sensitivity: "base" });
  if (byBase !== 0) return byBase;
  return a < b ? -1 : a > b ? 1 : 0;
}
