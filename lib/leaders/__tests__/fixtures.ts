import type { StatRow, StatTable } from "@/lib/domain/types";

// Table whose columns are the union of the row keys, in first-seen order
export function makeTable(rows: StatRow[]): StatTable {
  const columns: string[] = [];
  for (const r of rows) {
    for (const k of Object.keys(r)) if (!columns.includes(k)) columns.push(k);
  }
  return { columns, rows };
}

export function numberedPlayers(n: number, extra: (i: number) => StatRow = () => ({})): StatRow[] {
  return Array.from({ length: n }, (_, i) => ({
    player: `Player ${i + 1}`,
    team: `Team ${(i % 3) + 1}`,
    ...extra(i + 1),
  }));
}
