import type { Accumulation, PlayerInfo, StatTable } from "@/lib/domain/types";

/**
 * Live stats provider used when no local table exists.
 *
 * Implementations throw UpstreamShapeError when a response is missing structure
 * they depend on, so callers can tell API drift apart from network failures.
 */
export interface LiveStatsSource {
  fetchLeagueStats(season: string, league: string, accumulation: Accumulation): Promise<StatTable>;
  fetchPlayerInfo(playerName: string): Promise<PlayerInfo>;
}
