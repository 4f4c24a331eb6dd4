// Domain models for loaded stat tables and rendered leaderboards

export type CellValue = string | number | null;

export type StatRow = Record<string, CellValue>;

export type StatTable = {
  columns: string[]; // header order, derived columns appended
  rows: StatRow[];
};

export type DisplayValue = string | number;

export type DisplayRow = Record<string, DisplayValue>;

export type Leaderboard = {
  columns: string[]; // display labels, in order
  rows: DisplayRow[];
  rankingColumn: string; // source column used for sorting (metric or metric_per90)
  label: string; // display label of the ranking column
};

export type NationalityMode = "all" | "home" | "foreign";

export type AgeRange = [number, number];

export type PlayerInfo = {
  age: number | null;
  position: string | null;
  nationality: string | null;
};

export type Accumulation = "total" | "per90" | "perMatch";

export type LoadReport = {
  table: StatTable;
  rowCount: number;
  errors: { row: number; message: string }[];
};
