import { parseArgs } from "util";
import { SystemViewer } from "@/lib/chart/display";
import { ValidationError } from "@/lib/errors";
import type { MonitorRequest } from "@/lib/pipeline";

export interface CliOptions {
  stationId: string;
  daysBack: number;
  updateStationIds: boolean;
  saveFigure: boolean;
  saveCsv: boolean;
}

export type CliCommand = { kind: "help"; text: string } | { kind: "run"; options: CliOptions };

export function usage(lookbackDaysLimit: number): string {
  return [
    "Usage: npm run monitor -- --station-id <id> [options]",
    "",
    "Fetch and plot flood monitoring data for a given station.",
    "",
    "Options:",
    "  -s, --station-id <id>       ID of the monitoring station (required)",
    `  -d, --days-back <n>         Number of days to look back (between 1 and ${lookbackDaysLimit}, default 1)`,
    "  -u, --update-station-ids    Update the station IDs file before processing",
    "  -S, --save-not-display      Save the plot instead of displaying it",
    "  -c, --save-csv              Save the data to CSV files",
    "  -h, --help                  Show this help",
  ].join("\n");
}

export function parseDaysBack(value: string, lookbackDaysLimit: number): number {
  if (!/^\d+$/.test(value.trim())) {
    throw new ValidationError(`${value} is not a valid integer`);
  }
  const days = Number(value);
  if (days < 1 || days > lookbackDaysLimit) {
    throw new ValidationError(`${value} is not in required range 1-${lookbackDaysLimit}`);
  }
  return days;
}

const flags = {
  "station-id": { type: "string", short: "s" },
  "days-back": { type: "string", short: "d", default: "1" },
  "update-station-ids": { type: "boolean", short: "u", default: false },
  "save-not-display": { type: "boolean", short: "S", default: false },
  "save-csv": { type: "boolean", short: "c", default: false },
  help: { type: "boolean", short: "h", default: false },
} as const;

function parseFlags(argv: string[]) {
  try {
    return parseArgs({ args: argv, options: flags, strict: true, allowPositionals: false }).values;
  } catch (err) {
    throw new ValidationError(err instanceof Error ? err.message : String(err), { cause: err });
  }
}

export function parseCliArgs(argv: string[], lookbackDaysLimit: number): CliCommand {
  const values = parseFlags(argv);

  if (values.help) {
    return { kind: "help", text: usage(lookbackDaysLimit) };
  }

  const stationId = values["station-id"]?.trim();
  if (!stationId) {
    throw new ValidationError("the following arguments are required: --station-id/-s");
  }

  return {
    kind: "run",
    options: {
      stationId,
      daysBack: parseDaysBack(values["days-back"] ?? "1", lookbackDaysLimit),
      updateStationIds: values["update-station-ids"] ?? false,
      saveFigure: values["save-not-display"] ?? false,
      saveCsv: values["save-csv"] ?? false,
    },
  };
}

export function toMonitorRequest(options: CliOptions): MonitorRequest {
  return {
    stationId: options.stationId,
    daysBack: options.daysBack,
    refreshStationIds: options.updateStationIds,
    saveCsv: options.saveCsv,
    display: options.saveFigure ? undefined : new SystemViewer(),
  };
}
