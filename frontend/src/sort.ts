export type Sortable = string | number | boolean | null | undefined;

/** Nulls go last in either direction; strings use German collation. */
export function comparePrimitive(a: Sortable, b: Sortable, asc: boolean): number {
  if (a == null || b == null) {
    if (a == null && b == null) return 0;
    return a == null ? 1 : -1;
  }

  const result =
    typeof a === "string" && typeof b === "string" ? a.localeCompare(b, "de") : Number(a) - Number(b);

  return asc ? result : -result;
}
