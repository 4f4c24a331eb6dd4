import type { Leaderboard, StatTable } from "@/lib/domain/types";
import { LEADERBOARD_SIZE } from "@/lib/config";
import { resolveAgeColumn, resolveNationalityColumn } from "@/lib/ingest/aliases";
import { applyFilters } from "@/lib/leaders/filters";
import { buildTopTable } from "@/lib/leaders/build";
import type { Controls } from "./controls";
import { METRIC_GROUPS, metricTitle, type MetricGroup } from "./metrics";

export type LeaderboardCardModel = {
  metric: string;
  title: string;
  subtitle: string;
  per90: boolean;
  leaderboard: Leaderboard;
};

export type DashboardSection = {
  group: string;
  cards: LeaderboardCardModel[];
};

export type DashboardModel = {
  title: string;
  description: string;
  controls: Controls;
  homeCountry: string;
  playersInView: number;
  sections: DashboardSection[];
};

export type DashboardOptions = {
  homeCountry: string;
  groups?: MetricGroup[];
  title?: string;
  description?: string;
};

export function buildDashboard(
  table: StatTable,
  controls: Controls,
  options: DashboardOptions
): DashboardModel {
  const { homeCountry, groups = METRIC_GROUPS } = options;
  const filtered = applyFilters(table, {
    ageRange: controls.ageRange,
    nationality: controls.nationality,
    homeCountry,
  });

  const extraColumns: string[] = [];
  const ageCol = resolveAgeColumn(filtered.columns);
  if (ageCol) extraColumns.push(ageCol);
  const natCol = resolveNationalityColumn(filtered.columns);
  if (natCol) extraColumns.push(natCol);

  const sections: DashboardSection[] = groups.map((group) => ({
    group: group.name,
    cards: group.metrics
      // metrics missing from this file are skipped, not rendered empty
      .filter(({ metric }) => filtered.columns.includes(metric))
      .map(({ metric, isPercentage }) => {
        const per90 = controls.per90 && !isPercentage;
        const title = metricTitle(metric);
        return {
          metric,
          title,
          subtitle: `Top ${LEADERBOARD_SIZE} · ${title}`,
          per90,
          leaderboard: buildTopTable(filtered, {
            metric,
            per90,
            minMinutes: controls.minMinutes,
            ascending: false,
            extraColumns,
          }),
        };
      }),
  }));

  return {
    title: options.title ?? "Super Lig Player Stats",
    description:
      options.description ??
      "Top 10 player rankings across key metrics, styled in the spirit of Opta Analyst's Premier League stats tables.",
    controls,
    homeCountry,
    playersInView: filtered.rows.length,
    sections,
  };
}
