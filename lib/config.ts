import { z } from "zod";
import type { AgeRange } from "@/lib/domain/types";

export const DEFAULT_CSV_PATH = "tackles_joined.csv";
export const DEFAULT_SEASON = "25/26";
export const DEFAULT_LEAGUE = "Turkish Super Lig";
export const DEFAULT_HOME_COUNTRY = "Türkiye";

export const LEADERBOARD_SIZE = 10;
export const DEFAULT_TACKLERS_TOP_N = 15;

export const DEFAULT_MIN_MINUTES = 300;
export const MINUTES_STEP = 90;
export const FALLBACK_AGE_RANGE: AgeRange = [16, 45];

export const SOFASCORE_BASE_URL = "https://api.sofascore.com/api/v1";
export const SOFASCORE_PAGE_SIZE = 100;

// Columns kept as text by the loader; everything else is coerced to numbers
export const TEXT_COLUMNS = ["player", "team", "country"] as const;

const EnvSchema = z.object({
  STATS_CSV: z.string().trim().min(1).default(DEFAULT_CSV_PATH),
  SOFASCORE_BASE_URL: z.string().trim().url().default(SOFASCORE_BASE_URL),
  HOME_COUNTRY: z.string().trim().min(1).default(DEFAULT_HOME_COUNTRY),
});

export type AppEnv = z.infer<typeof EnvSchema>;

export function readEnv(env: Record<string, string | undefined> = process.env): AppEnv {
  const parsed = EnvSchema.safeParse({
    STATS_CSV: env.STATS_CSV || undefined,
    SOFASCORE_BASE_URL: env.SOFASCORE_BASE_URL || undefined,
    HOME_COUNTRY: env.HOME_COUNTRY || undefined,
  });
  if (!parsed.success) {
    throw new Error(
      "Invalid environment: " +
        parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ")
    );
  }
  return parsed.data;
}

// Player-profile text columns both entry points keep when loading
export const PROFILE_TEXT_COLUMNS = [...TEXT_COLUMNS, "position", "nationality"] as const;
