import { promises as fs } from "fs";
import path from "path";
import { PROFILE_TEXT_COLUMNS, readEnv } from "@/lib/config";
import { parseDashboardArgs } from "@/lib/cli/args";
import { buildDashboard } from "@/lib/dashboard/build";
import { deriveControlBounds } from "@/lib/dashboard/controls";
import { errorMessage } from "@/lib/errors";
import { loadStatsTable } from "@/lib/ingest/load";
import { renderDashboardHtml } from "@/lib/render/html";
import { createControlsStore, selectControls } from "@/lib/state/controls-store";

async function main(): Promise<void> {
  const env = readEnv();
  const args = parseDashboardArgs(process.argv.slice(2));
  const csvPath = args.csv ?? env.STATS_CSV;
  const homeCountry = args.homeCountry ?? env.HOME_COUNTRY;

  // No fallback here: a missing table is fatal
  const table = await loadStatsTable(csvPath, { textColumns: PROFILE_TEXT_COLUMNS });

  const store = createControlsStore(deriveControlBounds(table));
  const { setMinMinutes, setAgeRange, setNationality, setPer90 } = store.getState();
  if (args.minMinutes !== undefined) setMinMinutes(args.minMinutes);
  if (args.ageMin !== undefined || args.ageMax !== undefined) {
    const [lo, hi] = store.getState().ageRange;
    setAgeRange([args.ageMin ?? lo, args.ageMax ?? hi]);
  }
  if (args.nationality) setNationality(args.nationality);
  if (args.per90) setPer90(true);
  if (args.noPer90) setPer90(false);

  const model = buildDashboard(table, selectControls(store.getState()), { homeCountry });
  const out = path.resolve(args.out);
  await fs.writeFile(out, renderDashboardHtml(model), "utf8");

  const cards = model.sections.reduce((n, s) => n + s.cards.length, 0);
  console.info(`[dashboard] ${table.rows.length} rows from ${csvPath}, ${model.playersInView} after filters`);
  console.info(`[dashboard] wrote ${cards} leaderboards to ${out}`);
}

main().catch((e: unknown) => {
  console.error(`[dashboard] ${errorMessage(e)}`);
  process.exitCode = 1;
});
