import type { AgeRange, NationalityMode, StatTable } from "@/lib/domain/types";
import { DEFAULT_MIN_MINUTES, FALLBACK_AGE_RANGE, MINUTES_STEP } from "@/lib/config";
import { resolveAgeColumn } from "@/lib/ingest/aliases";
import { MINUTES_COLUMN } from "@/lib/ingest/parse";

export type Controls = {
  minMinutes: number;
  ageRange: AgeRange;
  nationality: NationalityMode;
  per90: boolean;
};

export type ControlBounds = {
  minutes: { min: number; max: number; step: number };
  age: AgeRange;
  ageColumn: string | null;
  hasMinutes: boolean;
  defaults: Controls;
};

export const NATIONALITY_OPTIONS: { value: NationalityMode; label: string }[] = [
  { value: "all", label: "All players" },
  { value: "home", label: "Home-grown players" },
  { value: "foreign", label: "Foreign players" },
];

function numbersIn(table: StatTable, column: string): number[] {
  const out: number[] = [];
  for (const r of table.rows) {
    const v = r[column];
    if (typeof v === "number" && !Number.isNaN(v)) out.push(v);
  }
  return out;
}

// Slider ranges and starting values for the sidebar, derived from the loaded table
export function deriveControlBounds(table: StatTable): ControlBounds {
  const hasMinutes = table.columns.includes(MINUTES_COLUMN);
  const minutes = hasMinutes ? numbersIn(table, MINUTES_COLUMN) : [];
  const maxMinutes = minutes.length > 0 ? Math.max(0, Math.trunc(Math.max(...minutes))) : 0;

  const ageColumn = resolveAgeColumn(table.columns);
  let age: AgeRange = FALLBACK_AGE_RANGE;
  if (ageColumn) {
    const ages = numbersIn(table, ageColumn);
    if (ages.length > 0) {
      const lo = Math.trunc(Math.min(...ages));
      const hi = Math.trunc(Math.max(...ages));
      if (lo < hi) age = [lo, hi];
    }
  }

  return {
    minutes: { min: 0, max: maxMinutes, step: MINUTES_STEP },
    age,
    ageColumn,
    hasMinutes,
    defaults: {
      minMinutes: Math.min(DEFAULT_MIN_MINUTES, maxMinutes),
      ageRange: [age[0], age[1]],
      nationality: "all",
      per90: hasMinutes,
    },
  };
}
