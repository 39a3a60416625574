import { mkdir, readFile, writeFile } from "fs/promises";
import { join } from "path";
import { DataFormatError, IOFailure } from "@/lib/errors";
import { parseTimestamp } from "@/lib/time";
import type { MeasureSeries, Reading, StationDataset } from "@/types/readings";

export interface CsvTarget {
  outputDir: string;
  stationId: string;
  timestamp: string;
}

export interface MeasureCsv {
  measure: string;
  readings: Reading[];
}

export function csvFileName(stationId: string, measure: string, timestamp: string): string {
  return `station_${stationId}_${measure}_${timestamp}.csv`;
}

function csvField(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

function sortedRows(measure: string, series: MeasureSeries): Array<[number, number]> {
  const rows = series.map((reading): [number, number] => {
    const ms = parseTimestamp(reading.dateTime);
    if (ms === null) {
      throw new DataFormatError(`Unparseable timestamp "${reading.dateTime}" in ${measure}`);
    }
    return [ms, reading.value];
  });
  // Array.prototype.sort is stable, so equal timestamps keep upstream order
  return rows.sort((a, b) => a[0] - b[0]);
}

export function toCsv(measure: string, series: MeasureSeries): string {
  const lines = [`datetime,${csvField(measure)}`];
  for (const [ms, value] of sortedRows(measure, series)) {
    lines.push(`${new Date(ms).toISOString()},${value}`);
  }
  return lines.join("\n") + "\n";
}

/** Writes one CSV per measure and returns the paths in dataset order. */
export async function saveReadingsCsv(
  dataset: StationDataset,
  target: CsvTarget
): Promise<string[]> {
  const files = [...dataset].map(([measure, series]) => ({
    path: join(target.outputDir, csvFileName(target.stationId, measure, target.timestamp)),
    body: toCsv(measure, series),
  }));

  try {
    await mkdir(target.outputDir, { recursive: true });
  } catch (err) {
    throw new IOFailure(`Could not create directory ${target.outputDir}`, { cause: err });
  }

  const written: string[] = [];
  for (const file of files) {
    try {
      await writeFile(file.path, file.body, "utf-8");
    } catch (err) {
      throw new IOFailure(`Could not write ${file.path}`, { cause: err });
    }
    written.push(file.path);
  }
  return written;
}

function parseHeader(line: string): string {
  const match = /^datetime,(.*)$/.exec(line);
  if (!match) {
    throw new DataFormatError(`Not a readings CSV header: ${line}`);
  }
  const field = match[1];
  return field.startsWith('"') ? field.slice(1, -1).replace(/""/g, '"') : field;
}

export async function readReadingsCsv(filePath: string): Promise<MeasureCsv> {
  let text: string;
  try {
    text = await readFile(filePath, "utf-8");
  } catch (err) {
    throw new IOFailure(`Could not read ${filePath}`, { cause: err });
  }

  const [header = "", ...rows] = text.split(/\r?\n/).filter((line) => line !== "");
  const measure = parseHeader(header);
  const readings = rows.map((row, index): Reading => {
    const [dateTime = "", raw = ""] = row.split(",");
    const value = Number(raw);
    if (raw === "" || Number.isNaN(value) || parseTimestamp(dateTime) === null) {
      throw new DataFormatError(`Malformed row ${index + 1} in ${filePath}: ${row}`);
    }
    return { dateTime, value };
  });
  return { measure, readings };
}
