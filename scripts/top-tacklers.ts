import { promises as fs } from "fs";
import { readEnv } from "@/lib/config";
import { parseTacklerArgs } from "@/lib/cli/args";
import { errorMessage } from "@/lib/errors";
import { toCsv } from "@/lib/ingest/parse";
import { SofascoreClient } from "@/lib/scrape/sofascore";
import { topTacklers } from "@/lib/tacklers/extract";

async function main(): Promise<void> {
  const env = readEnv();
  const args = parseTacklerArgs(process.argv.slice(2));

  const table = await topTacklers(
    { season: args.season, topN: args.top, minAge: args.minAge, maxAge: args.maxAge },
    {
      csvPath: args.csv ?? env.STATS_CSV,
      league: args.league,
      source: new SofascoreClient({ baseUrl: env.SOFASCORE_BASE_URL }),
    }
  );

  console.table(table.rows.map(({ player, team, age, tackles }) => ({ player, team, age, tackles })));

  if (args.out) {
    await fs.writeFile(args.out, toCsv(table), "utf8");
    console.info(`[tacklers] wrote ${table.rows.length} rows to ${args.out}`);
  }
}

main().catch((e: unknown) => {
  console.error(`[tacklers] ${errorMessage(e)}`);
  process.exitCode = 1;
});
