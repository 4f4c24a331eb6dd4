import type { CellValue, DisplayRow, Leaderboard, StatRow, StatTable } from "@/lib/domain/types";
import { LEADERBOARD_SIZE } from "@/lib/config";
import { formatNumber, titleCase } from "@/lib/format/number";
import { isAgeColumn } from "@/lib/ingest/aliases";
import { MINUTES_COLUMN } from "@/lib/ingest/parse";

export const RANK_COLUMN = "Rk";

// Columns shown as-is rather than through formatNumber
const RAW_COLUMNS = new Set([RANK_COLUMN, "player", "team", "country", "Country", "Nationality"]);

export type TopTableOptions = {
  metric: string;
  per90?: boolean;
  minMinutes?: number;
  ascending?: boolean;
  extraColumns?: readonly string[];
  limit?: number;
};

export function per90Value(value: CellValue, minutes: CellValue): number | null {
  if (typeof value !== "number" || typeof minutes !== "number" || minutes === 0) return null;
  return value / (minutes / 90);
}

export function metricColumnLabel(metric: string): string {
  return titleCase(metric.replace(/_/g, " "));
}

function columnLabel(column: string, rankingColumn: string, metric: string): string {
  if (column === rankingColumn) return metricColumnLabel(metric);
  if (isAgeColumn(column)) return "Age";
  if (column === "country") return "Country";
  if (column === "nationality") return "Nationality";
  return column;
}

function sortKey(row: StatRow, column: string): number | null {
  const v = row[column];
  return typeof v === "number" && !Number.isNaN(v) ? v : null;
}

// Stable; rows without a value go last in either direction
export function sortRowsBy(rows: StatRow[], column: string, ascending: boolean): StatRow[] {
  return rows.slice().sort((a, b) => {
    const ka = sortKey(a, column);
    const kb = sortKey(b, column);
    if (ka === null && kb === null) return 0;
    if (ka === null) return 1;
    if (kb === null) return -1;
    return ascending ? ka - kb : kb - ka;
  });
}

function textCell(v: CellValue | undefined): string {
  return v === null || v === undefined ? "" : String(v);
}

/**
 * Ranks the table on one metric and shapes the top rows for display.
 *
 * The caller checks the metric exists; passing an unknown column is a programming error.
 * The input table is never modified.
 */
export function buildTopTable(table: StatTable, opts: TopTableOptions): Leaderboard {
  const {
    metric,
    per90 = false,
    minMinutes = 0,
    ascending = false,
    extraColumns = [],
    limit = LEADERBOARD_SIZE,
  } = opts;
  if (!table.columns.includes(metric)) {
    throw new RangeError(`Unknown metric column "${metric}"`);
  }

  const hasMinutes = table.columns.includes(MINUTES_COLUMN);
  let work: StatRow[] = table.rows.slice();

  if (hasMinutes && minMinutes > 0) {
    work = work.filter((r) => {
      const mins = r[MINUTES_COLUMN];
      return typeof mins === "number" && mins >= minMinutes;
    });
  }

  let rankingColumn = metric;
  if (per90 && hasMinutes) {
    rankingColumn = `${metric}_per90`;
    work = work.map((r) => ({ ...r, [rankingColumn]: per90Value(r[metric], r[MINUTES_COLUMN]) }));
  }

  const top = sortRowsBy(work, rankingColumn, ascending).slice(0, Math.max(0, limit));

  const sourceColumns = ["player", "team", rankingColumn];
  const labels = [RANK_COLUMN];
  for (const col of sourceColumns) labels.push(columnLabel(col, rankingColumn, metric));
  for (const col of extraColumns) {
    if (!table.columns.includes(col) || sourceColumns.includes(col)) continue;
    const label = columnLabel(col, rankingColumn, metric);
    if (labels.includes(label)) continue;
    sourceColumns.push(col);
    labels.push(label);
  }

  const rows: DisplayRow[] = top.map((r, i) => {
    const out: DisplayRow = { [RANK_COLUMN]: i + 1 };
    sourceColumns.forEach((col, j) => {
      const label = labels[j + 1];
      out[label] = RAW_COLUMNS.has(label) ? textCell(r[col]) : formatNumber(r[col]);
    });
    return out;
  });

  return {
    columns: labels,
    rows,
    rankingColumn,
    label: metricColumnLabel(metric),
  };
}
