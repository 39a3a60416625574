import { describe, it, expect, vi } from "vitest";
import { fetchStationIds, fetchStationReadings, readingsEndpoint, readingsSince } from "./api";
import { SAMPLE_READINGS_RESPONSE, STATION_ID } from "./fixtures";
import { DataFormatError, NetworkError } from "@/lib/errors";

const ROOT_URL = "https://flood.example.test/id/stations";
const config = { rootUrl: ROOT_URL, itemsLimit: 1400, requestTimeoutMs: 5000 };
const NOW = new Date("2024-03-15T10:37:45Z");

function stubFetch(response: Response) {
  const fetchMock = vi.fn(async () => response);
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}

const json = (body: unknown) => new Response(JSON.stringify(body), { status: 200 });

describe("readingsSince", () => {
  it("truncates the window start to the minute in UTC", () => {
    expect(readingsSince(NOW, 1)).toBe("2024-03-14T10:37:00Z");
    expect(readingsSince(NOW, 7)).toBe("2024-03-08T10:37:00Z");
  });
});

describe("readingsEndpoint", () => {
  it("requests a sorted, limited window of readings", () => {
    expect(readingsEndpoint(config, STATION_ID, 2, NOW)).toBe(
      `${ROOT_URL}/1029TH/readings?since=2024-03-13T10:37:00Z&_sorted&_limit=1400`
    );
  });
});

describe("fetchStationIds", () => {
  it("returns the last segment of every station @id", async () => {
    const fetchMock = stubFetch(
      json({ items: [{ "@id": `${ROOT_URL}/1029TH` }, { "@id": "stations/E2043" }] })
    );

    expect(await fetchStationIds(config)).toEqual(["1029TH", "E2043"]);
    expect(fetchMock).toHaveBeenCalledWith(ROOT_URL, { signal: expect.any(AbortSignal) });
  });

  it("rejects an unexpected payload", async () => {
    stubFetch(json({ stations: [] }));
    await expect(fetchStationIds(config)).rejects.toThrow(DataFormatError);
  });
});

describe("fetchStationReadings", () => {
  it("fetches the readings window for a station", async () => {
    const fetchMock = stubFetch(json(SAMPLE_READINGS_RESPONSE));

    const body = await fetchStationReadings(config, STATION_ID, 2, NOW);

    expect(body).toEqual(SAMPLE_READINGS_RESPONSE);
    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(fetchMock).toHaveBeenCalledWith(
      `${ROOT_URL}/1029TH/readings?since=2024-03-13T10:37:00Z&_sorted&_limit=1400`,
      { signal: expect.any(AbortSignal) }
    );
  });

  it("turns an error status into a NetworkError", async () => {
    stubFetch(new Response("down", { status: 503, statusText: "Service Unavailable" }));

    await expect(fetchStationReadings(config, STATION_ID, 1, NOW)).rejects.toThrow(
      "Flood API error: 503 Service Unavailable"
    );
  });

  it("turns a non-JSON body into a NetworkError", async () => {
    stubFetch(new Response("<html>oops</html>", { status: 200 }));

    await expect(fetchStationReadings(config, STATION_ID, 1, NOW)).rejects.toThrow(NetworkError);
  });

  it("propagates transport failures without retrying", async () => {
    const fetchMock = vi.fn(async () => {
      throw new TypeError("fetch failed");
    });
    vi.stubGlobal("fetch", fetchMock);

    const err = await fetchStationReadings(config, STATION_ID, 1, NOW).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(NetworkError);
    expect(err).toHaveProperty("cause", expect.any(TypeError));
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });
});
