import type { CellValue, PlayerInfo, StatRow, StatTable } from "@/lib/domain/types";
import { DEFAULT_LEAGUE, DEFAULT_SEASON, DEFAULT_TACKLERS_TOP_N, PROFILE_TEXT_COLUMNS } from "@/lib/config";
import { LiveSourceError, UpstreamShapeError, errorMessage } from "@/lib/errors";
import { normalizeNameKey, resolveAgeColumn } from "@/lib/ingest/aliases";
import type { TableCache } from "@/lib/ingest/cache";
import { loadStatsTable, statsFileExists } from "@/lib/ingest/load";
import { sortRowsBy } from "@/lib/leaders/build";
import type { LiveStatsSource } from "@/lib/scrape/types";

export const TACKLER_COLUMNS = ["player", "team", "age", "tackles", "position", "nationality"] as const;

export type TopTacklersOptions = {
  season?: string;
  topN?: number;
  minAge?: number | null;
  maxAge?: number | null;
};

export type TopTacklersDeps = {
  csvPath: string;
  source: LiveStatsSource;
  league?: string;
  cache?: TableCache;
};

// Unlike the dashboard filter, rows without an age are kept
function withinAgeBounds(age: CellValue | undefined, minAge?: number | null, maxAge?: number | null): boolean {
  if (typeof age !== "number") return true;
  if (typeof minAge === "number" && age < minAge) return false;
  if (typeof maxAge === "number" && age > maxAge) return false;
  return true;
}

function hasTackles(r: StatRow): boolean {
  return typeof r.tackles === "number" && !Number.isNaN(r.tackles);
}

function project(rows: StatRow[], ageCol: string | null): StatTable {
  return {
    columns: [...TACKLER_COLUMNS],
    rows: rows.map((r) => ({
      player: r.player ?? null,
      team: r.team ?? null,
      age: ageCol ? (r[ageCol] ?? null) : null,
      tackles: r.tackles ?? null,
      position: r.position ?? null,
      nationality: r.nationality ?? null,
    })),
  };
}

function rankTacklers(rows: StatRow[], ageCol: string | null, opts: TopTacklersOptions): StatRow[] {
  const topN = opts.topN ?? DEFAULT_TACKLERS_TOP_N;
  const eligible = rows.filter(
    (r) => (ageCol ? withinAgeBounds(r[ageCol], opts.minAge, opts.maxAge) : true) && hasTackles(r)
  );
  return sortRowsBy(eligible, "tackles", false).slice(0, Math.max(0, topN));
}

export function topTacklersFromTable(table: StatTable, opts: TopTacklersOptions = {}): StatTable {
  const ageCol = resolveAgeColumn(table.columns);
  return project(rankTacklers(table.rows, ageCol, opts), ageCol);
}

async function fetchLeague(source: LiveStatsSource, season: string, league: string, csvPath: string): Promise<StatTable> {
  try {
    return await source.fetchLeagueStats(season, league, "total");
  } catch (e) {
    if (e instanceof UpstreamShapeError) {
      throw new LiveSourceError(
        `Live scrape failed while fetching ${league} ${season} from Sofascore ` +
          `(missing '${e.key}' key in API response). The Sofascore API has likely changed. ` +
          `Either update the scraper / try again later, or create '${csvPath}' so the local table is used instead.`,
        e
      );
    }
    throw e;
  }
}

async function enrichPlayers(source: LiveStatsSource, players: string[]): Promise<Map<string, PlayerInfo>> {
  const info = new Map<string, PlayerInfo>();
  for (const player of players) {
    try {
      info.set(normalizeNameKey(player), await source.fetchPlayerInfo(player));
    } catch (e) {
      // page not found or ambiguous name: keep the league values
      console.warn(`[tacklers] skipping player info for ${player}: ${errorMessage(e)}`);
    }
  }
  return info;
}

export async function topTacklersFromSource(
  source: LiveStatsSource,
  csvPath: string,
  opts: TopTacklersOptions = {},
  league: string = DEFAULT_LEAGUE
): Promise<StatTable> {
  const season = opts.season ?? DEFAULT_SEASON;
  const leagueTable = await fetchLeague(source, season, league, csvPath);
  const rows = leagueTable.rows.filter(hasTackles);

  const players = [...new Set(rows.map((r) => r.player).filter((p): p is string => typeof p === "string"))];
  const info = await enrichPlayers(source, players);
  console.info(`[tacklers] enriched ${info.size}/${players.length} players from live source`);

  const merged = rows.map((r): StatRow => {
    const extra = typeof r.player === "string" ? info.get(normalizeNameKey(r.player)) : undefined;
    return {
      ...r,
      age: extra?.age ?? r.age ?? null,
      position: extra?.position ?? r.position ?? null,
      nationality: extra?.nationality ?? r.nationality ?? null,
    };
  });

  return project(rankTacklers(merged, "age", opts), "age");
}

/**
 * Top tacklers for a season.
 *
 * Reads the local joined table when it exists and only falls back to the live
 * source when it does not. Output columns are always TACKLER_COLUMNS.
 */
export async function topTacklers(opts: TopTacklersOptions, deps: TopTacklersDeps): Promise<StatTable> {
  if (await statsFileExists(deps.csvPath)) {
    const table = await loadStatsTable(deps.csvPath, { textColumns: PROFILE_TEXT_COLUMNS, cache: deps.cache });
    return topTacklersFromTable(table, opts);
  }
  console.info(`[tacklers] ${deps.csvPath} not found, falling back to live source`);
  return topTacklersFromSource(deps.source, deps.csvPath, opts, deps.league);
}
