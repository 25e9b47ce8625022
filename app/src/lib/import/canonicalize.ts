import type { RawTable } from "./types";

export const canonicalizeColumnName = (name: string): string =>
  name.trim().toLowerCase().replace(/ /g, "_");

/**
 * Canonicalizes every header and suffixes collisions (`name_2`, `name_3`, ...)
 * so column names stay unique.
 */
export const canonicalizeHeaders = (headers: string[]): string[] => {
  const seen = new Set<string>();
  return headers.map((header) => {
    const base = canonicalizeColumnName(header);
    let candidate = base;
    let suffix = 2;
    while (seen.has(candidate)) {
      candidate = `${base}_${suffix}`;
      suffix += 1;
    }
    seen.add(candidate);
    return candidate;
  });
};

export const canonicalizeRawTable = (table: RawTable): RawTable => ({
  ...table,
  headers: canonicalizeHeaders(table.headers)
});
