import { resolve } from "path";
import { z } from "zod";
import { ConfigError } from "@/lib/errors";

const DEFAULT_ROOT_URL = "https://environment.data.gov.uk/flood-monitoring/id/stations";

// Upstream reports roughly 100 readings per station per day
const READINGS_PER_DAY = 100;

const envSchema = z.object({
  FLOOD_API_ROOT_URL: z.string().url().default(DEFAULT_ROOT_URL),
  FLOOD_API_ITEMS_LIMIT: z.coerce.number().int().min(READINGS_PER_DAY).default(1400),
  FLOOD_API_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  STATION_IDS_FILE: z.string().min(1).default("data/station_ids.txt"),
  PLOTS_DIR: z.string().min(1).default("output/plots"),
  DATA_DIR: z.string().min(1).default("output/data"),
});

export interface MonitorConfig {
  rootUrl: string;
  itemsLimit: number;
  requestTimeoutMs: number;
  lookbackDaysLimit: number;
  stationIdsFile: string;
  plotsDir: string;
  readingsDir: string;
}

export function loadConfig(
  env: Record<string, string | undefined> = process.env,
  cwd: string = process.cwd()
): MonitorConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid configuration: ${detail}`);
  }

  const vars = parsed.data;
  return {
    rootUrl: vars.FLOOD_API_ROOT_URL.replace(/\/+$/, ""),
    itemsLimit: vars.FLOOD_API_ITEMS_LIMIT,
    requestTimeoutMs: vars.FLOOD_API_TIMEOUT_MS,
    lookbackDaysLimit: Math.floor(vars.FLOOD_API_ITEMS_LIMIT / READINGS_PER_DAY),
    stationIdsFile: resolve(cwd, vars.STATION_IDS_FILE),
    plotsDir: resolve(cwd, vars.PLOTS_DIR),
    readingsDir: resolve(cwd, vars.DATA_DIR, "readings"),
  };
}
