import Papa from "papaparse";
import type { LoadReport, StatRow } from "@/lib/domain/types";
import { TEXT_COLUMNS } from "@/lib/config";
import { coerceNumber, coerceText } from "./schemas";
import { withCanonicalAge } from "./aliases";

export type ParseOptions = {
  // Columns kept as text; defaults to player/team/country
  textColumns?: readonly string[];
};

export const MINUTES_COLUMN = "minutesPlayed";
export const NINETIES_COLUMN = "90s";

// CSV text -> typed stat table. Bad cells become null, malformed rows are reported, not dropped.
export function parseStatsCsv(text: string, options: ParseOptions = {}): LoadReport {
  const textColumns = new Set<string>(options.textColumns ?? TEXT_COLUMNS);

  const result = Papa.parse<Record<string, unknown>>(text.replace(/^\uFEFF/, ""), {
    header: true,
    dynamicTyping: false,
    skipEmptyLines: true,
    transformHeader: (h) => h.trim(),
  });

  const columns = (result.meta.fields ?? []).filter((f) => f !== "");
  const rows: StatRow[] = result.data.map((raw) => {
    const row: StatRow = {};
    for (const col of columns) {
      row[col] = textColumns.has(col) ? coerceText(raw[col]) : coerceNumber(raw[col]);
    }
    return row;
  });

  if (columns.includes(MINUTES_COLUMN)) {
    for (const row of rows) {
      const mins = row[MINUTES_COLUMN];
      row[NINETIES_COLUMN] = typeof mins === "number" ? mins / 90 : null;
    }
    if (!columns.includes(NINETIES_COLUMN)) columns.push(NINETIES_COLUMN);
  }

  return {
    table: withCanonicalAge({ columns, rows }),
    rowCount: rows.length,
    errors: result.errors.map((e) => ({
      row: typeof e.row === "number" ? e.row + 1 : -1,
      message: `${e.code}: ${e.message}`,
    })),
  };
}

// Inverse of parseStatsCsv for writing results back out
export function toCsv(table: { columns: readonly string[]; rows: StatRow[] }): string {
  return Papa.unparse(
    {
      fields: [...table.columns],
      data: table.rows.map((r) => table.columns.map((c) => r[c] ?? "")),
    },
    { newline: "\n" }
  );
}
