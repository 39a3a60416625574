import { join } from "path";
import { renderChart } from "@/lib/chart/render";
import type { DisplayTarget } from "@/lib/chart/render";
import type { MonitorConfig } from "@/lib/config";
import { ValidationError } from "@/lib/errors";
import { fetchStationIds, fetchStationReadings } from "@/lib/flood/api";
import { saveReadingsCsv } from "@/lib/flood/csv";
import { extractReadings } from "@/lib/flood/readings";
import { loadStationIds, saveStationIds, validateStationId } from "@/lib/flood/stations";
import { fileTimestamp } from "@/lib/time";
import type { ReadingsResponse, StationDataset } from "@/types/readings";

export interface MonitorRequest {
  stationId: string;
  daysBack: number;
  refreshStationIds?: boolean;
  saveCsv?: boolean;
  /** Show the chart instead of saving it under the plots directory. */
  display?: DisplayTarget;
}

export interface MonitorResult {
  stationId: string;
  daysBack: number;
  generatedAt: Date;
  dataset: StationDataset;
  plotPath: string | null;
  csvPaths: string[];
}

export interface MonitorDependencies {
  fetchStationIds: (config: MonitorConfig) => Promise<string[]>;
  fetchStationReadings: (
    config: MonitorConfig,
    stationId: string,
    daysBack: number,
    now: Date
  ) => Promise<ReadingsResponse>;
  now: () => Date;
}

const defaultDependencies: MonitorDependencies = {
  fetchStationIds,
  fetchStationReadings,
  now: () => new Date(),
};

export function plotFileName(stationId: string, timestamp: string): string {
  return `station_${stationId}_${timestamp}.svg`;
}

/** fetch → validate → extract → (persist) → render, for one station per run. */
export class MonitorPipeline {
  private readonly deps: MonitorDependencies;

  constructor(
    private readonly config: MonitorConfig,
    deps: Partial<MonitorDependencies> = {}
  ) {
    this.deps = { ...defaultDependencies, ...deps };
  }

  private checkDaysBack(daysBack: number): void {
    const limit = this.config.lookbackDaysLimit;
    if (!Number.isInteger(daysBack) || daysBack < 1 || daysBack > limit) {
      throw new ValidationError(`Days back must be an integer between 1 and ${limit}, got ${daysBack}`);
    }
  }

  async run(request: MonitorRequest): Promise<MonitorResult> {
    const { stationId, daysBack } = request;
    this.checkDaysBack(daysBack);

    if (request.refreshStationIds) {
      const ids = await this.deps.fetchStationIds(this.config);
      await saveStationIds(this.config.stationIdsFile, ids);
      console.info(`Saved ${ids.length} station IDs to ${this.config.stationIdsFile}`);
    }

    const validIds = await loadStationIds(this.config.stationIdsFile);
    validateStationId(stationId, validIds, this.config.stationIdsFile);

    const generatedAt = this.deps.now();
    const timestamp = fileTimestamp(generatedAt);

    const response = await this.deps.fetchStationReadings(this.config, stationId, daysBack, generatedAt);
    const dataset = extractReadings(response);
    console.info(`Station ${stationId}: ${dataset.size} measure(s), ${response.items.length} reading(s)`);

    const csvPaths = request.saveCsv
      ? await saveReadingsCsv(dataset, {
          outputDir: this.config.readingsDir,
          stationId,
          timestamp,
        })
      : [];

    let plotPath: string | null = null;
    if (request.display) {
      await renderChart(dataset, request.display);
    } else {
      plotPath = join(this.config.plotsDir, plotFileName(stationId, timestamp));
      await renderChart(dataset, plotPath);
    }

    return { stationId, daysBack, generatedAt, dataset, plotPath, csvPaths };
  }
}
