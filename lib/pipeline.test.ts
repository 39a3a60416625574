import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdtemp, readFile, rm, writeFile } from "fs/promises";
import { existsSync } from "fs";
import { tmpdir } from "os";
import { basename, join } from "path";
import { MonitorPipeline, plotFileName } from "./pipeline";
import type { MonitorDependencies } from "./pipeline";
import type { MonitorConfig } from "./config";
import type { DisplayTarget } from "./chart/render";
import { DataFormatError, NetworkError, ValidationError } from "./errors";
import { SAMPLE_READINGS_RESPONSE, SAMPLE_STATION_IDS, STAGE_MEASURE } from "./flood/fixtures";

const NOW = new Date("2024-03-15T10:37:45Z");

describe("MonitorPipeline", () => {
  let dir: string;
  let config: MonitorConfig;
  let deps: MonitorDependencies;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "pipeline-test-"));
    config = {
      rootUrl: "https://flood.example.test/id/stations",
      itemsLimit: 1400,
      requestTimeoutMs: 5000,
      lookbackDaysLimit: 14,
      stationIdsFile: join(dir, "data", "station_ids.txt"),
      plotsDir: join(dir, "plots"),
      readingsDir: join(dir, "data", "readings"),
    };
    deps = {
      fetchStationIds: vi.fn(async () => ["1029TH", "E2043"]),
      fetchStationReadings: vi.fn(async () => SAMPLE_READINGS_RESPONSE),
      now: () => NOW,
    };
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  async function writeAllowList(): Promise<void> {
    await writeFile(join(dir, "station_ids.txt"), SAMPLE_STATION_IDS);
    config.stationIdsFile = join(dir, "station_ids.txt");
  }

  it("fetches, extracts, saves CSVs and writes the plot", async () => {
    await writeAllowList();

    const result = await new MonitorPipeline(config, deps).run({
      stationId: "1029TH",
      daysBack: 2,
      saveCsv: true,
    });

    expect(deps.fetchStationReadings).toHaveBeenCalledWith(config, "1029TH", 2, NOW);
    expect(deps.fetchStationIds).not.toHaveBeenCalled();
    expect(result.dataset.size).toBe(2);
    expect(result.plotPath).toBe(join(config.plotsDir, "station_1029TH_2024-03-15T10-37-45-000.svg"));
    expect(result.csvPaths.map((p) => basename(p))).toEqual([
      `station_1029TH_${STAGE_MEASURE}_2024-03-15T10-37-45-000.csv`,
      "station_1029TH_1029TH-level-downstage-i-15_min-mASD_2024-03-15T10-37-45-000.csv",
    ]);

    const svg = await readFile(join(config.plotsDir, "station_1029TH_2024-03-15T10-37-45-000.svg"), "utf-8");
    expect(svg.match(/class="panel"/g)).toHaveLength(2);
  });

  it("skips CSV output unless requested", async () => {
    await writeAllowList();

    const result = await new MonitorPipeline(config, deps).run({ stationId: "1029TH", daysBack: 1 });

    expect(result.csvPaths).toEqual([]);
    expect(existsSync(config.readingsDir)).toBe(false);
  });

  it("shows the chart on a display target instead of saving it", async () => {
    await writeAllowList();
    const display: DisplayTarget = { show: vi.fn(async () => undefined) };

    const result = await new MonitorPipeline(config, deps).run({ stationId: "1029TH", daysBack: 1, display });

    expect(display.show).toHaveBeenCalledTimes(1);
    expect(result.plotPath).toBeNull();
    expect(existsSync(config.plotsDir)).toBe(false);
  });

  it("rejects an unknown station before fetching readings", async () => {
    await writeAllowList();

    const run = new MonitorPipeline(config, deps).run({ stationId: "NOPE1", daysBack: 1 });

    await expect(run).rejects.toThrow(ValidationError);
    await expect(run).rejects.toThrow("Invalid station ID: NOPE1");
    expect(deps.fetchStationReadings).not.toHaveBeenCalled();
  });

  it("fails when the allow-list is missing and no refresh was requested", async () => {
    await expect(
      new MonitorPipeline(config, deps).run({ stationId: "1029TH", daysBack: 1 })
    ).rejects.toThrow(ValidationError);
  });

  it("refreshes the allow-list first when asked", async () => {
    const result = await new MonitorPipeline(config, deps).run({
      stationId: "E2043",
      daysBack: 1,
      refreshStationIds: true,
    });

    expect(await readFile(config.stationIdsFile, "utf-8")).toBe("1029TH\nE2043\n");
    expect(result.stationId).toBe("E2043");
  });

  it("rejects a lookback window outside the configured range", async () => {
    await writeAllowList();
    const pipeline = new MonitorPipeline(config, deps);

    await expect(pipeline.run({ stationId: "1029TH", daysBack: 0 })).rejects.toThrow(ValidationError);
    await expect(pipeline.run({ stationId: "1029TH", daysBack: 15 })).rejects.toThrow(
      "Days back must be an integer between 1 and 14, got 15"
    );
  });

  it("aborts the remaining stages when one fails", async () => {
    await writeAllowList();
    deps.fetchStationReadings = vi.fn(async () => ({
      items: [{ measure: "m/level-stage", dateTime: "not-a-date", value: 1 }],
    }));

    await expect(
      new MonitorPipeline(config, deps).run({ stationId: "1029TH", daysBack: 1, saveCsv: true })
    ).rejects.toThrow(DataFormatError);
    expect(existsSync(config.plotsDir)).toBe(false);
  });

  it("propagates upstream failures", async () => {
    await writeAllowList();
    deps.fetchStationReadings = vi.fn(async () => {
      throw new NetworkError("Flood API error: 500 Internal Server Error");
    });

    await expect(
      new MonitorPipeline(config, deps).run({ stationId: "1029TH", daysBack: 1 })
    ).rejects.toThrow(NetworkError);
  });
});

describe("plotFileName", () => {
  it("embeds station and generation timestamp", () => {
    expect(plotFileName("52119", "2024-03-15T10-37-45")).toBe("station_52119_2024-03-15T10-37-45.svg");
  });
});
