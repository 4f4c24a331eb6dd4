import { titleCase } from "@/lib/format/number";

export type MetricSpec = {
  metric: string;
  isPercentage: boolean; // rates are never normalized per 90
};

export type MetricGroup = {
  name: string;
  metrics: MetricSpec[];
};

const count = (metric: string): MetricSpec => ({ metric, isPercentage: false });
const pct = (metric: string): MetricSpec => ({ metric, isPercentage: true });

export const METRIC_GROUPS: MetricGroup[] = [
  {
    name: "Attacking",
    metrics: [count("goals"), count("assists"), count("totalShots"), count("shotsOnTarget"), count("expectedGoals")],
  },
  {
    name: "Possession & Passing",
    metrics: [
      pct("accuratePassesPercentage"),
      count("keyPasses"),
      count("accurateFinalThirdPasses"),
      pct("accurateLongBallsPercentage"),
    ],
  },
  {
    name: "Defending",
    metrics: [
      count("tackles"),
      count("interceptions"),
      count("clearances"),
      count("groundDuelsWon"),
      pct("groundDuelsWonPercentage"),
      count("totalDuelsWon"),
      pct("totalDuelsWonPercentage"),
    ],
  },
];

// "accurateLongBallsPercentage" -> "Accuratelongballs %"
export function metricTitle(metric: string): string {
  return titleCase(metric.replace("Percentage", " %").replace(/_/g, " "));
}
