export interface Reading {
  dateTime: string; // ISO-8601, as returned upstream
  value: number;
}

export type MeasureSeries = readonly Reading[];

/** Measure name → readings, in the order measures were first seen. */
export type StationDataset = ReadonlyMap<string, MeasureSeries>;

// Upstream flood-monitoring API payloads
export interface StationListItem {
  "@id": string;
}

export interface StationListResponse {
  items: StationListItem[];
}

export interface RawReading {
  measure: string;
  dateTime: string;
  value: number;
}

export interface ReadingsResponse {
  items: unknown[];
}
