import type { StatTable } from "@/lib/domain/types";

// Source names the age column may arrive under, in precedence order.
// The suffixed variants come from joins that produced duplicate columns.
export const AGE_COLUMN_ALIASES = ["age", "age_x", "age_y"] as const;

export const NATIONALITY_COLUMN_ALIASES = ["country", "nationality"] as const;

export function resolveColumn(
  columns: readonly string[],
  candidates: readonly string[]
): string | null {
  for (const c of candidates) {
    if (columns.includes(c)) return c;
  }
  return null;
}

export function resolveAgeColumn(columns: readonly string[]): string | null {
  return resolveColumn(columns, AGE_COLUMN_ALIASES);
}

export function resolveNationalityColumn(columns: readonly string[]): string | null {
  return resolveColumn(columns, NATIONALITY_COLUMN_ALIASES);
}

export function isAgeColumn(column: string): boolean {
  return AGE_COLUMN_ALIASES.some((alias) => alias === column);
}

/**
 * Exposes the winning age variant under the canonical `age` name.
 * The suffixed source column is kept; a table that already has `age` is returned as is.
 */
export function withCanonicalAge(table: StatTable): StatTable {
  const source = resolveAgeColumn(table.columns);
  if (!source || source === "age") return table;
  return {
    columns: [...table.columns, "age"],
    rows: table.rows.map((r) => ({ ...r, age: r[source] ?? null })),
  };
}

export function normalizeNameKey(name: string): string {
  return name
    .normalize("NFKD")
    .replace(/[\u0300-\u036f]/g, "") // strip diacritics
    .toUpperCase()
    .replace(/\./g, "")
    .replace(/\s+/g, " ")
    .trim();
}
