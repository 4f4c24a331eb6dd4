import { parseArgs } from "node:util";
import { z } from "zod";
import { DEFAULT_LEAGUE, DEFAULT_SEASON, DEFAULT_TACKLERS_TOP_N } from "@/lib/config";
import { formatIssues } from "@/lib/ingest/schemas";

const optInt = z.coerce.number().int().optional();
const optNonNegInt = z.coerce.number().int().nonnegative().optional();

const DashboardArgsSchema = z
  .object({
    csv: z.string().min(1).optional(),
    out: z.string().min(1).default("dashboard.html"),
    minMinutes: optNonNegInt,
    ageMin: optInt,
    ageMax: optInt,
    nationality: z.enum(["all", "home", "foreign"]).optional(),
    per90: z.boolean().optional(),
    noPer90: z.boolean().optional(),
    homeCountry: z.string().min(1).optional(),
  })
  .refine((a) => !(a.per90 && a.noPer90), { message: "--per90 and --no-per90 are mutually exclusive" });

export type DashboardArgs = z.infer<typeof DashboardArgsSchema>;

const TacklerArgsSchema = z
  .object({
    csv: z.string().min(1).optional(),
    season: z.string().min(1).default(DEFAULT_SEASON),
    league: z.string().min(1).default(DEFAULT_LEAGUE),
    top: z.coerce.number().int().positive().default(DEFAULT_TACKLERS_TOP_N),
    minAge: optInt,
    maxAge: optInt,
    out: z.string().min(1).optional(),
  })
  .refine((a) => a.minAge === undefined || a.maxAge === undefined || a.minAge <= a.maxAge, {
    message: "--min-age must not exceed --max-age",
  });

export type TacklerArgs = z.infer<typeof TacklerArgsSchema>;

function validate<S extends z.ZodTypeAny>(schema: S, values: unknown): z.infer<S> {
  const parsed = schema.safeParse(values);
  if (!parsed.success) throw new Error(`Invalid arguments: ${formatIssues(parsed.error)}`);
  return parsed.data;
}

export function parseDashboardArgs(argv: string[]): DashboardArgs {
  const { values } = parseArgs({
    args: argv,
    options: {
      csv: { type: "string" },
      out: { type: "string" },
      "min-minutes": { type: "string" },
      "age-min": { type: "string" },
      "age-max": { type: "string" },
      nationality: { type: "string" },
      per90: { type: "boolean" },
      "no-per90": { type: "boolean" },
      "home-country": { type: "string" },
    },
    strict: true,
  });
  return validate(DashboardArgsSchema, {
    csv: values.csv,
    out: values.out,
    minMinutes: values["min-minutes"],
    ageMin: values["age-min"],
    ageMax: values["age-max"],
    nationality: values.nationality,
    per90: values.per90,
    noPer90: values["no-per90"],
    homeCountry: values["home-country"],
  });
}

export function parseTacklerArgs(argv: string[]): TacklerArgs {
  const { values } = parseArgs({
    args: argv,
    options: {
      csv: { type: "string" },
      season: { type: "string" },
      league: { type: "string" },
      top: { type: "string" },
      "min-age": { type: "string" },
      "max-age": { type: "string" },
      out: { type: "string" },
    },
    strict: true,
  });
  return validate(TacklerArgsSchema, {
    csv: values.csv,
    season: values.season,
    league: values.league,
    top: values.top,
    minAge: values["min-age"],
    maxAge: values["max-age"],
    out: values.out,
  });
}
