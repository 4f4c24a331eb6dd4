import { promises as fs } from "fs";
import path from "path";
import type { StatTable } from "@/lib/domain/types";
import { StatsFileError } from "@/lib/errors";
import { parseStatsCsv, type ParseOptions } from "./parse";
import type { TableCache } from "./cache";

export type LoadOptions = ParseOptions & {
  cache?: TableCache;
};

export async function statsFileExists(file: string): Promise<boolean> {
  try {
    const stat = await fs.stat(file);
    return stat.isFile();
  } catch {
    return false;
  }
}

async function readStatsFile(file: string, options: ParseOptions): Promise<StatTable> {
  let text: string;
  try {
    text = await fs.readFile(file, "utf8");
  } catch (e) {
    throw new StatsFileError(file, e);
  }
  const report = parseStatsCsv(text, options);
  if (report.errors.length > 0) {
    console.warn(
      `[ingest] ${path.basename(file)}: ${report.errors.length} malformed row(s); first: row ${report.errors[0].row} ${report.errors[0].message}`
    );
  }
  return report.table;
}

// Reads and coerces a stats CSV. With a cache, repeated loads of the same file share one parse.
export function loadStatsTable(file: string, options: LoadOptions = {}): Promise<StatTable> {
  const { cache, ...parseOptions } = options;
  if (!cache) return readStatsFile(file, parseOptions);
  const key = cacheKey(file, parseOptions);
  return cache.get(key, () => readStatsFile(file, parseOptions));
}

function cacheKey(file: string, options: ParseOptions): string {
  const resolved = path.resolve(file);
  if (!options.textColumns) return resolved;
  return `${resolved}?text=${[...options.textColumns].join(",")}`;
}
