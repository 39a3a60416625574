import { scaleUtc } from "d3";
import { colorForRank } from "@/lib/chart/colors";
import { RenderFailure } from "@/lib/errors";
import { calendarDay, dateTimeLabel, parseTimestamp, timeOfDay } from "@/lib/time";
import type { MeasureSeries } from "@/types/readings";

export type Strategy = "multi-day" | "intraday";

// More distinct days than this switches to full date+time axes
const INTRADAY_MAX_DAYS = 2;
const MULTI_DAY_MAJOR_TICKS = 6;
const MINOR_PER_MAJOR = 4;

export interface PlotPoint {
  x: number; // epoch ms (multi-day) or time-of-day category index (intraday)
  value: number;
  label: string;
}

export interface DaySeries {
  day: string;
  color: string;
  points: PlotPoint[];
}

export interface Tick {
  x: number;
  label: string;
}

export interface XAxisLayout {
  label: string;
  domain: [number, number];
  major: Tick[];
  minor: number[];
  rotation: 45 | 90;
  minorGrid: boolean;
}

export interface PanelLayout {
  title: string;
  yLabel: string;
  strategy: Strategy;
  days: DaySeries[];
  xAxis: XAxisLayout;
}

interface TimedReading {
  ms: number;
  value: number;
}

interface DayGroup {
  day: string;
  readings: TimedReading[];
}

export function chooseStrategy(dayCount: number): Strategy {
  return dayCount > INTRADAY_MAX_DAYS ? "multi-day" : "intraday";
}

/** The physical quantity, e.g. "stage" from "level-stage". */
export function yAxisLabel(measure: string): string {
  return measure.split("-").pop() ?? measure;
}

function sortReadings(measure: string, series: MeasureSeries): TimedReading[] {
  const readings = series.map((reading) => {
    const ms = parseTimestamp(reading.dateTime);
    if (ms === null) {
      throw new RenderFailure(`Unparseable timestamp "${reading.dateTime}" in ${measure}`);
    }
    return { ms, value: reading.value };
  });
  // Stable: readings with identical timestamps keep their upstream order
  return readings.sort((a, b) => a.ms - b.ms);
}

function groupByDay(readings: TimedReading[]): DayGroup[] {
  const groups: DayGroup[] = [];
  for (const reading of readings) {
    const day = calendarDay(reading.ms);
    const last = groups[groups.length - 1];
    if (last && last.day === day) {
      last.readings.push(reading);
    } else {
      groups.push({ day, readings: [reading] });
    }
  }
  return groups;
}

function multiDayAxis(groups: DayGroup[]): XAxisLayout {
  const first = groups[0].readings[0].ms;
  const lastGroup = groups[groups.length - 1].readings;
  const last = lastGroup[lastGroup.length - 1].ms;

  const scale = scaleUtc().domain([new Date(first), new Date(last)]);
  const major = scale.ticks(MULTI_DAY_MAJOR_TICKS).map((d) => ({
    x: d.getTime(),
    label: dateTimeLabel(d.getTime()),
  }));
  const majorSet = new Set(major.map((t) => t.x));
  const minor = scale
    .ticks(MULTI_DAY_MAJOR_TICKS * MINOR_PER_MAJOR)
    .map((d) => d.getTime())
    .filter((x) => !majorSet.has(x));

  return {
    label: "Date & Time",
    domain: [first, last],
    major,
    minor,
    rotation: 45,
    minorGrid: true,
  };
}

function multiDayPanel(groups: DayGroup[]): Pick<PanelLayout, "days" | "xAxis"> {
  const days = groups.map((group, rank) => ({
    day: group.day,
    color: colorForRank(rank, groups.length),
    points: group.readings.map((r) => ({ x: r.ms, value: r.value, label: dateTimeLabel(r.ms) })),
  }));
  return { days, xAxis: multiDayAxis(groups) };
}

/** Evenly spaced minor positions strictly between consecutive majors. */
export function minorBetween(majors: number[], divisions: number = MINOR_PER_MAJOR): number[] {
  const minor: number[] = [];
  for (let i = 0; i < majors.length - 1; i++) {
    const step = (majors[i + 1] - majors[i]) / divisions;
    for (let k = 1; k < divisions; k++) {
      minor.push(majors[i] + step * k);
    }
  }
  return minor;
}

/**
 * Hourly ticks over time-of-day categories: a major tick sits on every
 * category labelled "HH:00". Without any top-of-hour reading every category
 * is labelled instead.
 */
export function hourlyTicks(categories: string[]): { major: Tick[]; minor: number[] } {
  const all = categories.map((label, x) => ({ x, label }));
  const hourly = all.filter((tick) => tick.label.endsWith(":00"));
  if (hourly.length === 0) {
    return { major: all, minor: [] };
  }
  return { major: hourly, minor: minorBetween(hourly.map((t) => t.x)) };
}

function intradayPanel(groups: DayGroup[]): Pick<PanelLayout, "days" | "xAxis"> {
  // Category positions follow first appearance, so equal times on different days align
  const categories: string[] = [];
  const positions = new Map<string, number>();
  const position = (label: string): number => {
    const known = positions.get(label);
    if (known !== undefined) return known;
    categories.push(label);
    positions.set(label, categories.length - 1);
    return categories.length - 1;
  };

  const days = groups.map((group, rank) => {
    // Bridge to the next day's first reading so the line runs on across midnight
    const next = groups[rank + 1];
    const plotted = next ? [...group.readings, next.readings[0]] : group.readings;
    return {
      day: group.day,
      color: colorForRank(rank, groups.length),
      points: plotted.map((r) => {
        const label = timeOfDay(r.ms);
        return { x: position(label), value: r.value, label };
      }),
    };
  });

  const { major, minor } = hourlyTicks(categories);
  const domain: [number, number] =
    categories.length === 0 ? [0, 1] : [-0.5, categories.length - 0.5];

  return {
    days,
    xAxis: { label: "Time", domain, major, minor, rotation: 90, minorGrid: false },
  };
}

export function layoutPanel(measure: string, series: MeasureSeries): PanelLayout {
  const groups = groupByDay(sortReadings(measure, series));
  const strategy = chooseStrategy(groups.length);
  const body = strategy === "multi-day" ? multiDayPanel(groups) : intradayPanel(groups);
  return { title: measure, yLabel: yAxisLabel(measure), strategy, ...body };
}
