import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { promises as fs } from "fs";
import os from "os";
import path from "path";
import type { PlayerInfo, StatTable } from "@/lib/domain/types";
import { LiveSourceError, UpstreamShapeError } from "@/lib/errors";
import type { LiveStatsSource } from "@/lib/scrape/types";
import { TACKLER_COLUMNS, topTacklers, topTacklersFromTable } from "@/lib/tacklers/extract";

function fakeSource(
  league: () => Promise<StatTable>,
  info: (name: string) => Promise<PlayerInfo> = async () => ({ age: null, position: null, nationality: null })
) {
  const source = {
    fetchLeagueStats: vi.fn(league),
    fetchPlayerInfo: vi.fn(info),
  } satisfies LiveStatsSource;
  return source;
}

const unused = () => fakeSource(async () => ({ columns: [], rows: [] }));

const tempDirs: string[] = [];

async function tempDir(): Promise<string> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), "tacklers-"));
  tempDirs.push(dir);
  return dir;
}

beforeEach(() => {
  vi.spyOn(console, "info").mockImplementation(() => {});
  vi.spyOn(console, "warn").mockImplementation(() => {});
});

afterEach(async () => {
  vi.restoreAllMocks();
  await Promise.all(tempDirs.splice(0).map((dir) => fs.rm(dir, { recursive: true, force: true })));
});

describe("topTacklers from the local table", () => {
  it("returns the top N sorted by tackles with fixed columns", async () => {
    const dir = await tempDir();
    const csvPath = path.join(dir, "tackles_joined.csv");
    const lines = ["player,team,age_x,tackles"];
    for (let i = 1; i <= 20; i++) lines.push(`P${i},Team${i % 4},${20 + (i % 10)},${i * 2}`);
    await fs.writeFile(csvPath, lines.join("\n"), "utf8");

    const source = unused();
    const out = await topTacklers({ topN: 15 }, { csvPath, source });

    expect(out.columns).toEqual(["player", "team", "age", "tackles", "position", "nationality"]);
    expect(out.rows).toHaveLength(15);
    const tackles = out.rows.map((r) => r.tackles);
    expect(tackles).toEqual([40, 38, 36, 34, 32, 30, 28, 26, 24, 22, 20, 18, 16, 14, 12]);
    expect(out.rows[0]).toEqual({ player: "P20", team: "Team0", age: 20, tackles: 40, position: null, nationality: null });
    expect(source.fetchLeagueStats).not.toHaveBeenCalled();
  });

  it("keeps position and nationality as text", async () => {
    const dir = await tempDir();
    const csvPath = path.join(dir, "joined.csv");
    await fs.writeFile(csvPath, "player,team,age,tackles,position,nationality\nAli,GS,24,30,M,Türkiye\n", "utf8");
    const out = await topTacklers({ topN: 5 }, { csvPath, source: unused() });
    expect(out.rows).toEqual([{ player: "Ali", team: "GS", age: 24, tackles: 30, position: "M", nationality: "Türkiye" }]);
  });
});

describe("topTacklersFromTable", () => {
  const table: StatTable = {
    columns: ["player", "team", "age", "tackles"],
    rows: [
      { player: "A", team: "X", age: 17, tackles: 50 },
      { player: "B", team: "X", age: null, tackles: 40 },
      { player: "C", team: "Y", age: 25, tackles: 30 },
      { player: "D", team: "Y", age: 22, tackles: null },
      { player: "E", team: "Y", age: 34, tackles: 45 },
    ],
  };

  it("lets rows without an age through the age bounds", () => {
    const out = topTacklersFromTable(table, { topN: 10, minAge: 18, maxAge: 30 });
    expect(out.rows.map((r) => r.player)).toEqual(["B", "C"]);
  });

  it("drops rows without tackles", () => {
    const out = topTacklersFromTable(table, { topN: 10 });
    expect(out.rows.map((r) => r.player)).toEqual(["A", "E", "B", "C"]);
  });

  it("fills age with null when the table has no age column", () => {
    const out = topTacklersFromTable({ columns: ["player", "team", "tackles"], rows: [{ player: "A", team: "X", tackles: 3 }] });
    expect(out.columns).toEqual([...TACKLER_COLUMNS]);
    expect(out.rows[0]).toEqual({ player: "A", team: "X", age: null, tackles: 3, position: null, nationality: null });
  });
});

describe("topTacklers live fallback", () => {
  const leagueTable: StatTable = {
    columns: ["player", "team", "tackles", "position", "age"],
    rows: [
      { player: "Ali", team: "GS", tackles: 40, position: null, age: null },
      { player: "Can", team: "FB", tackles: 55, position: "D", age: 27 },
      { player: "Deniz", team: "BJK", tackles: null, position: null, age: null },
    ],
  };

  it("enriches players and tolerates failed lookups", async () => {
    const csvPath = path.join(await tempDir(), "missing.csv");
    const source = fakeSource(
      async () => leagueTable,
      async (name) => {
        if (name === "Ali") return { age: 24, position: "M", nationality: "Türkiye" };
        throw new Error("player page not found");
      }
    );

    const out = await topTacklers({ season: "25/26", topN: 15 }, { csvPath, source });

    expect(source.fetchLeagueStats).toHaveBeenCalledWith("25/26", "Turkish Super Lig", "total");
    expect(source.fetchPlayerInfo).toHaveBeenCalledTimes(2);
    expect(out.columns).toEqual([...TACKLER_COLUMNS]);
    expect(out.rows).toEqual([
      { player: "Can", team: "FB", age: 27, tackles: 55, position: "D", nationality: null },
      { player: "Ali", team: "GS", age: 24, tackles: 40, position: "M", nationality: "Türkiye" },
    ]);
    expect(console.warn).toHaveBeenCalledWith("[tacklers] skipping player info for Can: player page not found");
  });

  it("applies age bounds after enrichment", async () => {
    const csvPath = path.join(await tempDir(), "missing.csv");
    const source = fakeSource(
      async () => leagueTable,
      async (name) => ({ age: name === "Ali" ? 35 : null, position: null, nationality: null })
    );
    const out = await topTacklers({ topN: 15, maxAge: 30 }, { csvPath, source });
    expect(out.rows.map((r) => r.player)).toEqual(["Can"]);
  });

  it("explains upstream drift and points at the local file", async () => {
    const csvPath = path.join(await tempDir(), "tackles_joined.csv");
    const source = fakeSource(async () => {
      throw new UpstreamShapeError("seasons");
    });
    const run = () => topTacklers({ topN: 15 }, { csvPath, source });

    await expect(run()).rejects.toBeInstanceOf(LiveSourceError);
    await expect(run()).rejects.toThrow("missing 'seasons' key in API response");
    await expect(run()).rejects.toThrow("The Sofascore API has likely changed");
    await expect(run()).rejects.toThrow(`create '${csvPath}'`);
    expect(source.fetchPlayerInfo).not.toHaveBeenCalled();
  });

  it("passes other failures through unchanged", async () => {
    const csvPath = path.join(await tempDir(), "tackles_joined.csv");
    const source = fakeSource(async () => {
      throw new Error("network down");
    });
    const err = await topTacklers({}, { csvPath, source }).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(Error);
    expect(err).not.toBeInstanceOf(LiveSourceError);
    expect(err).toHaveProperty("message", "network down");
  });
});
