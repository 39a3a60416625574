import { z } from "zod";
import { DataFormatError } from "@/lib/errors";
import type { RawReading, Reading, StationDataset } from "@/types/readings";

const rawReadingSchema = z.object({
  measure: z.string().min(1),
  dateTime: z.string().min(1),
  value: z.number(),
});

const responseSchema = z.object({
  items: z.array(z.unknown()),
});

/** Measure URLs end in the measure name, e.g. `.../measures/1029TH-level-stage-i-15_min-mASD`. */
export function measureName(measure: string): string {
  return measure.split("/").pop() ?? measure;
}

function parseItem(item: unknown, index: number): RawReading {
  const parsed = rawReadingSchema.safeParse(item);
  if (!parsed.success) {
    const fields = parsed.error.issues.map((issue) => issue.path.join(".") || "(item)");
    throw new DataFormatError(
      `Malformed reading at index ${index}: missing or invalid ${fields.join(", ")}`
    );
  }
  return parsed.data;
}

export function extractReadings(response: unknown): StationDataset {
  const parsed = responseSchema.safeParse(response);
  if (!parsed.success) {
    throw new DataFormatError("Readings response has no items array");
  }

  // Validate everything before building, so a bad record never yields a partial dataset
  const items = parsed.data.items.map(parseItem);

  const dataset = new Map<string, Reading[]>();
  for (const item of items) {
    const name = measureName(item.measure);
    const series = dataset.get(name) ?? [];
    series.push({ dateTime: item.dateTime, value: item.value });
    dataset.set(name, series);
  }
  return dataset;
}
