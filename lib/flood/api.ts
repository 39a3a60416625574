// Server-side only — do not import from client components
import { UTCDate } from "@date-fns/utc";
import { format, subDays } from "date-fns";
import { z } from "zod";
import type { MonitorConfig } from "@/lib/config";
import { DataFormatError, NetworkError } from "@/lib/errors";
import type { ReadingsResponse, StationListResponse } from "@/types/readings";

type ApiConfig = Pick<MonitorConfig, "rootUrl" | "itemsLimit" | "requestTimeoutMs">;

// Upstream expects the window start truncated to the minute
const SINCE_FORMAT = "yyyy-MM-dd'T'HH:mm':00Z'";

const stationListSchema = z.object({
  items: z.array(z.object({ "@id": z.string() })),
});

const readingsSchema = z.object({
  items: z.array(z.unknown()),
});

async function fetchJson(url: string, timeoutMs: number): Promise<unknown> {
  let res: Response;
  try {
    res = await fetch(url, { signal: AbortSignal.timeout(timeoutMs) });
  } catch (err) {
    throw new NetworkError(`Flood API request failed: ${url}`, { cause: err });
  }
  if (!res.ok) {
    throw new NetworkError(`Flood API error: ${res.status} ${res.statusText}`);
  }

  try {
    return await res.json();
  } catch (err) {
    throw new NetworkError(`Flood API returned non-JSON response: ${url}`, { cause: err });
  }
}

export function readingsSince(now: Date, daysBack: number): string {
  return format(subDays(new UTCDate(now.getTime()), daysBack), SINCE_FORMAT);
}

export function readingsEndpoint(
  config: ApiConfig,
  stationId: string,
  daysBack: number,
  now: Date
): string {
  const since = readingsSince(now, daysBack);
  return (
    `${config.rootUrl}/${encodeURIComponent(stationId)}/readings` +
    `?since=${since}&_sorted&_limit=${config.itemsLimit}`
  );
}

export async function fetchStationIds(config: ApiConfig): Promise<string[]> {
  const data = await fetchJson(config.rootUrl, config.requestTimeoutMs);
  const parsed = stationListSchema.safeParse(data);
  if (!parsed.success) {
    throw new DataFormatError("Unexpected station list response from flood API");
  }

  const body: StationListResponse = parsed.data;
  return body.items
    .map((item) => item["@id"].split("/").pop() ?? "")
    .filter((id) => id !== "");
}

export async function fetchStationReadings(
  config: ApiConfig,
  stationId: string,
  daysBack: number,
  now: Date = new Date()
): Promise<ReadingsResponse> {
  const url = readingsEndpoint(config, stationId, daysBack, now);
  const data = await fetchJson(url, config.requestTimeoutMs);
  const parsed = readingsSchema.safeParse(data);
  if (!parsed.success) {
    throw new DataFormatError(`Unexpected readings response for station ${stationId}`);
  }
  return parsed.data;
}
