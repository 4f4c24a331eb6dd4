import * as React from "react";
import { createColumnHelper, flexRender, getCoreRowModel, useReactTable } from "@tanstack/react-table";
import { Trophy } from "lucide-react";
import type { DisplayRow, Leaderboard } from "@/lib/domain/types";
import { RANK_COLUMN } from "@/lib/leaders/build";
import { Card, CardContent, CardDescription, CardHeader, CardTitle } from "@/components/ui/card";
import { Table, TableBody, TableCell, TableHead, TableHeader, TableRow } from "@/components/ui/table";

const columnHelper = createColumnHelper<DisplayRow>();

// Header text for the built-in columns; everything else shows its label
const HEADERS: Record<string, string> = {
  [RANK_COLUMN]: "#",
  player: "Player",
  team: "Team",
};

export function createLeaderboardColumns(leaderboard: Leaderboard) {
  return leaderboard.columns.map((label) =>
    columnHelper.accessor((row) => row[label] ?? "", {
      id: label,
      header: HEADERS[label] ?? label,
      cell: ({ getValue }) => String(getValue()),
    })
  );
}

interface LeaderboardCardProps {
  title: string;
  subtitle: string;
  leaderboard: Leaderboard;
  per90?: boolean;
}

export function LeaderboardCard({ title, subtitle, leaderboard, per90 = false }: LeaderboardCardProps) {
  const columns = React.useMemo(() => createLeaderboardColumns(leaderboard), [leaderboard]);
  const table = useReactTable({
    data: leaderboard.rows,
    columns,
    getCoreRowModel: getCoreRowModel(),
  });

  return (
    <Card data-testid={`leaderboard-${leaderboard.rankingColumn}`}>
      <CardHeader>
        <CardTitle>
          <Trophy className="opta-icon" aria-hidden />
          {title}
        </CardTitle>
        <CardDescription>
          {subtitle}
          {per90 ? " · per 90" : ""}
        </CardDescription>
      </CardHeader>
      <CardContent>
        {leaderboard.rows.length === 0 ? (
          <div className="opta-empty">No players match the current filters.</div>
        ) : (
          <Table>
            <TableHeader>
              {table.getHeaderGroups().map((hg) => (
                <TableRow key={hg.id}>
                  {hg.headers.map((h) => (
                    <TableHead key={h.id}>
                      {h.isPlaceholder ? null : flexRender(h.column.columnDef.header, h.getContext())}
                    </TableHead>
                  ))}
                </TableRow>
              ))}
            </TableHeader>
            <TableBody>
              {table.getRowModel().rows.map((row) => (
                <TableRow key={row.id}>
                  {row.getVisibleCells().map((cell) => (
                    <TableCell key={cell.id}>{flexRender(cell.column.columnDef.cell, cell.getContext())}</TableCell>
                  ))}
                </TableRow>
              ))}
            </TableBody>
          </Table>
        )}
      </CardContent>
    </Card>
  );
}
