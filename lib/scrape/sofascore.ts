import { z } from "zod";
import type { Accumulation, PlayerInfo, StatRow, StatTable } from "@/lib/domain/types";
import { SOFASCORE_BASE_URL, SOFASCORE_PAGE_SIZE } from "@/lib/config";
import { PlayerNotFoundError, UpstreamShapeError } from "@/lib/errors";
import { coerceNumber, coerceText } from "@/lib/ingest/schemas";
import type { LiveStatsSource } from "./types";

// League name -> Sofascore unique-tournament id
export const SOFASCORE_LEAGUES: Record<string, number> = {
  "Turkish Super Lig": 52,
  EPL: 17,
  "La Liga": 8,
  Bundesliga: 35,
  "Serie A": 23,
  "Ligue 1": 34,
};

const SeasonsSchema = z.object({
  seasons: z.array(z.object({ id: z.number(), name: z.string().optional(), year: z.string() })),
});

const StatEntrySchema = z
  .object({
    player: z.object({
      id: z.number().optional(),
      name: z.string(),
      position: z.string().nullish(),
    }),
    team: z.object({ name: z.string() }).nullish(),
  })
  .passthrough();

const StatsPageSchema = z.object({
  results: z.array(StatEntrySchema),
  page: z.number().optional(),
  pages: z.number().optional(),
});

const SearchSchema = z.object({
  results: z.array(
    z.object({
      type: z.string(),
      entity: z.object({ id: z.number(), name: z.string().optional() }).passthrough(),
    })
  ),
});

const PlayerDetailSchema = z.object({
  player: z.object({
    name: z.string(),
    position: z.string().nullish(),
    country: z.object({ name: z.string() }).nullish(),
    dateOfBirthTimestamp: z.number().nullish(),
  }),
});

export type SofascoreClientOptions = {
  baseUrl?: string;
  fetchImpl?: typeof fetch;
  pageSize?: number;
  fields?: string[]; // statistic columns to request, e.g. ["tackles"]
  now?: () => Date;
};

export function ageAt(birthTimestampSec: number, now: Date): number {
  const born = new Date(birthTimestampSec * 1000);
  let age = now.getUTCFullYear() - born.getUTCFullYear();
  const hadBirthday =
    now.getUTCMonth() > born.getUTCMonth() ||
    (now.getUTCMonth() === born.getUTCMonth() && now.getUTCDate() >= born.getUTCDate());
  if (!hadBirthday) age -= 1;
  return age;
}

export class SofascoreClient implements LiveStatsSource {
  private readonly baseUrl: string;
  private readonly fetchImpl: typeof fetch;
  private readonly pageSize: number;
  private readonly fields: string[];
  private readonly now: () => Date;

  constructor(opts: SofascoreClientOptions = {}) {
    this.baseUrl = (opts.baseUrl ?? SOFASCORE_BASE_URL).replace(/\/$/, "");
    this.fetchImpl = opts.fetchImpl ?? ((input: RequestInfo | URL, init?: RequestInit) => fetch(input, init));
    this.pageSize = opts.pageSize ?? SOFASCORE_PAGE_SIZE;
    this.fields = opts.fields ?? ["tackles"];
    this.now = opts.now ?? (() => new Date());
  }

  async fetchLeagueStats(season: string, league: string, accumulation: Accumulation): Promise<StatTable> {
    const tournamentId = SOFASCORE_LEAGUES[league];
    if (tournamentId === undefined) {
      throw new Error(`Unsupported league "${league}". Known: ${Object.keys(SOFASCORE_LEAGUES).join(", ")}`);
    }

    const seasonsPath = `/unique-tournament/${tournamentId}/seasons`;
    const { seasons } = this.expect(SeasonsSchema, await this.getJson(seasonsPath), seasonsPath);
    const match = seasons.find((s) => s.year === season);
    if (!match) {
      throw new Error(
        `Season "${season}" not found for ${league}. Available: ${seasons.map((s) => s.year).join(", ")}`
      );
    }

    const statsPath = `/unique-tournament/${tournamentId}/season/${match.id}/statistics`;
    const rows: StatRow[] = [];
    let page = 1;
    let pages = 1;
    do {
      const body = await this.getJson(statsPath, {
        limit: String(this.pageSize),
        offset: String((page - 1) * this.pageSize),
        accumulation,
        fields: this.fields.join(","),
      });
      const parsed = this.expect(StatsPageSchema, body, statsPath);
      for (const entry of parsed.results) {
        const row: StatRow = {
          player: entry.player.name,
          team: entry.team?.name ?? null,
          position: coerceText(entry.player.position),
          age: null,
        };
        for (const field of this.fields) row[field] = coerceNumber(entry[field]);
        rows.push(row);
      }
      pages = parsed.pages ?? page;
      page += 1;
    } while (page <= pages);

    const columns = ["player", "team", ...this.fields.filter((f) => f !== "position" && f !== "age"), "position", "age"];
    return { columns, rows };
  }

  async fetchPlayerInfo(playerName: string): Promise<PlayerInfo> {
    const searchPath = "/search/all";
    const search = this.expect(SearchSchema, await this.getJson(searchPath, { q: playerName, page: "0" }), searchPath);
    const hit = search.results.find((r) => r.type === "player");
    if (!hit) throw new PlayerNotFoundError(playerName);

    const detailPath = `/player/${hit.entity.id}`;
    const { player } = this.expect(PlayerDetailSchema, await this.getJson(detailPath), detailPath);
    return {
      age: typeof player.dateOfBirthTimestamp === "number" ? ageAt(player.dateOfBirthTimestamp, this.now()) : null,
      position: player.position ?? null,
      nationality: player.country?.name ?? null,
    };
  }

  private async getJson(pathname: string, params?: Record<string, string>): Promise<unknown> {
    const qs = params ? `?${new URLSearchParams(params).toString()}` : "";
    const url = `${this.baseUrl}${pathname}${qs}`;
    const res = await this.fetchImpl(url, { headers: { Accept: "application/json" } });
    if (!res.ok) {
      throw new Error(`Sofascore request failed: ${res.status} ${url}`);
    }
    return res.json();
  }

  // Any mismatch against the expected shape is reported as upstream drift
  private expect<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, body: unknown, pathname: string): T {
    const parsed = schema.safeParse(body);
    if (parsed.success) return parsed.data;
    const issue = parsed.error.issues[0];
    const key = issue && issue.path.length > 0 ? issue.path.join(".") : "body";
    throw new UpstreamShapeError(key, pathname);
  }
}
