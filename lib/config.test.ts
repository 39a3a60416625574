import { describe, it, expect } from "vitest";
import { loadConfig } from "./config";
import { ConfigError } from "./errors";

describe("loadConfig", () => {
  it("falls back to defaults resolved against the working directory", () => {
    expect(loadConfig({}, "/srv/flood")).toEqual({
      rootUrl: "https://environment.data.gov.uk/flood-monitoring/id/stations",
      itemsLimit: 1400,
      requestTimeoutMs: 10_000,
      lookbackDaysLimit: 14,
      stationIdsFile: "/srv/flood/data/station_ids.txt",
      plotsDir: "/srv/flood/output/plots",
      readingsDir: "/srv/flood/output/data/readings",
    });
  });

  it("reads overrides from the environment", () => {
    const config = loadConfig(
      {
        FLOOD_API_ROOT_URL: "https://flood.example.test/stations/",
        FLOOD_API_ITEMS_LIMIT: "750",
        FLOOD_API_TIMEOUT_MS: "2500",
        PLOTS_DIR: "/var/plots",
      },
      "/srv/flood"
    );

    expect(config.rootUrl).toBe("https://flood.example.test/stations");
    expect(config.itemsLimit).toBe(750);
    expect(config.lookbackDaysLimit).toBe(7);
    expect(config.requestTimeoutMs).toBe(2500);
    expect(config.plotsDir).toBe("/var/plots");
  });

  it("rejects invalid values", () => {
    expect(() => loadConfig({ FLOOD_API_ITEMS_LIMIT: "lots" }, "/srv/flood")).toThrow(ConfigError);
    expect(() => loadConfig({ FLOOD_API_ROOT_URL: "not a url" }, "/srv/flood")).toThrow(
      /^Invalid configuration: FLOOD_API_ROOT_URL/
    );
  });
});
