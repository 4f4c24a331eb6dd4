import type { AgeRange, NationalityMode, StatTable } from "@/lib/domain/types";
import { resolveAgeColumn, resolveNationalityColumn } from "@/lib/ingest/aliases";

export type TableFilters = {
  ageRange?: AgeRange | null;
  nationality?: NationalityMode;
  homeCountry: string;
};

// Inclusive bounds; once a range applies, rows without an age are dropped
export function filterByAgeRange(table: StatTable, [min, max]: AgeRange): StatTable {
  const ageCol = resolveAgeColumn(table.columns);
  if (!ageCol) return table;
  return {
    columns: table.columns,
    rows: table.rows.filter((r) => {
      const age = r[ageCol];
      return typeof age === "number" && age >= min && age <= max;
    }),
  };
}

export function filterByNationality(
  table: StatTable,
  mode: NationalityMode,
  homeCountry: string
): StatTable {
  const col = resolveNationalityColumn(table.columns);
  if (!col || mode === "all") return table;
  const keep =
    mode === "home"
      ? (v: unknown) => v === homeCountry
      : (v: unknown) => v !== null && v !== undefined && v !== homeCountry;
  return { columns: table.columns, rows: table.rows.filter((r) => keep(r[col])) };
}

// Age range, then nationality. The minutes threshold is applied per leaderboard.
export function applyFilters(table: StatTable, filters: TableFilters): StatTable {
  let out = table;
  if (filters.ageRange) out = filterByAgeRange(out, filters.ageRange);
  if (filters.nationality) out = filterByNationality(out, filters.nationality, filters.homeCountry);
  return out;
}
