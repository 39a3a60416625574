/**
 * SVG rendering of station datasets: one panel per measure, stacked
 * vertically, each panel the same size however many measures there are.
 */

import { mkdir, writeFile } from "fs/promises";
import { dirname } from "path";
import { extent, line, scaleLinear } from "d3";
import { layoutPanel } from "@/lib/chart/layout";
import type { PanelLayout, PlotPoint } from "@/lib/chart/layout";
import { IOFailure, RenderFailure } from "@/lib/errors";
import type { StationDataset } from "@/types/readings";

export interface RenderOptions {
  width?: number;
  panelHeight?: number;
}

export interface DisplayTarget {
  show(figure: Figure): Promise<void>;
}

/** A display target, or the path of the SVG file to write. */
export type ChartDestination = DisplayTarget | string;

const FIGURE_WIDTH = 1000;
const PANEL_HEIGHT = 400;
const MARGIN = { top: 36, right: 190, bottom: 120, left: 72 };
const Y_TICKS = 6;
const GRID_COLOR = "#000000";
const TEXT_COLOR = "#1f2937";
const FONT = 'font-family="sans-serif"';

const escapeXml = (str: string): string =>
  str
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&apos;");

const fmt = (n: number): string => (Number.isInteger(n) ? String(n) : n.toFixed(2));

function valueDomain(panel: PanelLayout): [number, number] {
  const values = panel.days.flatMap((d) => d.points.map((p) => p.value));
  const [min, max] = extent(values);
  if (min === undefined || max === undefined) return [0, 1];
  if (min === max) return [min - 0.5, max + 0.5];
  return [min, max];
}

function drawPanel(panel: PanelLayout, offsetY: number, width: number, height: number): string {
  const left = MARGIN.left;
  const right = width - MARGIN.right;
  const top = MARGIN.top;
  const bottom = height - MARGIN.bottom;

  const x = scaleLinear().domain(panel.xAxis.domain).range([left, right]);
  const y = scaleLinear().domain(valueDomain(panel)).nice().range([bottom, top]);
  const path = line<PlotPoint>()
    .x((p) => x(p.x))
    .y((p) => y(p.value));

  const parts: string[] = [];
  parts.push(
    `<g class="panel" data-strategy="${panel.strategy}" transform="translate(0,${offsetY})">`
  );

  // Title and axis labels
  parts.push(
    `<text class="title" x="${(left + right) / 2}" y="${top - 14}" text-anchor="middle" ${FONT} font-size="14" font-weight="bold" fill="${TEXT_COLOR}">${escapeXml(panel.title)}</text>`
  );
  parts.push(
    `<text class="y-label" transform="translate(18,${(top + bottom) / 2}) rotate(-90)" text-anchor="middle" ${FONT} font-size="12" fill="${TEXT_COLOR}">${escapeXml(panel.yLabel)}</text>`
  );
  parts.push(
    `<text class="x-label" x="${(left + right) / 2}" y="${height - 8}" text-anchor="middle" ${FONT} font-size="12" fill="${TEXT_COLOR}">${escapeXml(panel.xAxis.label)}</text>`
  );

  // Minor grid (multi-day) or minor tick marks (intraday)
  for (const mx of panel.xAxis.minor) {
    const px = fmt(x(mx));
    if (panel.xAxis.minorGrid) {
      parts.push(
        `<line class="grid-minor" x1="${px}" y1="${top}" x2="${px}" y2="${bottom}" stroke="${GRID_COLOR}" stroke-opacity="0.2" stroke-dasharray="1,3"/>`
      );
    } else {
      parts.push(
        `<line class="tick-minor" x1="${px}" y1="${bottom}" x2="${px}" y2="${bottom + 3}" stroke="${TEXT_COLOR}"/>`
      );
    }
  }

  // Major grid, ticks and labels
  for (const yt of y.ticks(Y_TICKS)) {
    const py = fmt(y(yt));
    parts.push(
      `<line class="grid-major" x1="${left}" y1="${py}" x2="${right}" y2="${py}" stroke="${GRID_COLOR}" stroke-opacity="0.3"/>`
    );
    parts.push(
      `<text x="${left - 6}" y="${py}" text-anchor="end" dominant-baseline="middle" ${FONT} font-size="10" fill="${TEXT_COLOR}">${escapeXml(String(yt))}</text>`
    );
  }
  const rotation = panel.xAxis.rotation;
  for (const tick of panel.xAxis.major) {
    const px = fmt(x(tick.x));
    parts.push(
      `<line class="grid-major" x1="${px}" y1="${top}" x2="${px}" y2="${bottom}" stroke="${GRID_COLOR}" stroke-opacity="0.3"/>`
    );
    parts.push(
      `<line class="tick-major" x1="${px}" y1="${bottom}" x2="${px}" y2="${bottom + 6}" stroke="${TEXT_COLOR}"/>`
    );
    parts.push(
      `<text class="tick-label" transform="translate(${px},${bottom + 10}) rotate(-${rotation})" text-anchor="end" dominant-baseline="middle" ${FONT} font-size="10" fill="${TEXT_COLOR}">${escapeXml(tick.label)}</text>`
    );
  }

  // Axes
  parts.push(`<line x1="${left}" y1="${top}" x2="${left}" y2="${bottom}" stroke="${TEXT_COLOR}"/>`);
  parts.push(`<line x1="${left}" y1="${bottom}" x2="${right}" y2="${bottom}" stroke="${TEXT_COLOR}"/>`);

  // One series per calendar day
  for (const day of panel.days) {
    const d = path(day.points);
    if (d) {
      parts.push(
        `<path class="series" data-day="${day.day}" d="${d}" fill="none" stroke="${day.color}" stroke-width="1.5"/>`
      );
    }
    if (day.points.length === 1) {
      const [p] = day.points;
      parts.push(
        `<circle class="point" cx="${fmt(x(p.x))}" cy="${fmt(y(p.value))}" r="3" fill="${day.color}"/>`
      );
    }
  }

  // Legend outside the top-right corner of the plot area
  const legendX = right + 16;
  parts.push(
    `<text class="legend-title" x="${legendX}" y="${top + 4}" ${FONT} font-size="12" font-weight="bold" fill="${TEXT_COLOR}">Date</text>`
  );
  panel.days.forEach((day, i) => {
    const ly = top + 24 + i * 18;
    parts.push(
      `<line x1="${legendX}" y1="${ly}" x2="${legendX + 20}" y2="${ly}" stroke="${day.color}" stroke-width="2"/>`
    );
    parts.push(
      `<text class="legend-entry" x="${legendX + 26}" y="${ly}" dominant-baseline="middle" ${FONT} font-size="11" fill="${TEXT_COLOR}">${day.day}</text>`
    );
  });

  parts.push("</g>");
  return parts.join("");
}

/** A composed chart. Must be closed once its output has been produced. */
export class Figure {
  readonly width: number;
  readonly panelHeight: number;
  private svg: string | null = null;
  private closed = false;

  constructor(
    readonly panels: readonly PanelLayout[],
    options: RenderOptions = {}
  ) {
    this.width = options.width ?? FIGURE_WIDTH;
    this.panelHeight = options.panelHeight ?? PANEL_HEIGHT;
  }

  get height(): number {
    return Math.max(this.panels.length, 1) * this.panelHeight;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  toSVG(): string {
    if (this.closed) {
      throw new RenderFailure("Figure has already been closed");
    }
    if (this.svg === null) {
      const body = this.panels
        .map((panel, i) => drawPanel(panel, i * this.panelHeight, this.width, this.panelHeight))
        .join("");
      this.svg =
        `<svg xmlns="http://www.w3.org/2000/svg" width="${this.width}" height="${this.height}" viewBox="0 0 ${this.width} ${this.height}">` +
        `<rect width="${this.width}" height="${this.height}" fill="#ffffff"/>` +
        body +
        "</svg>";
    }
    return this.svg;
  }

  close(): void {
    this.svg = null;
    this.closed = true;
  }
}

export function composeFigure(dataset: StationDataset, options?: RenderOptions): Figure {
  const panels = [...dataset].map(([measure, series]) => layoutPanel(measure, series));
  return new Figure(panels, options);
}

async function writeFigure(figure: Figure, filePath: string): Promise<void> {
  try {
    await mkdir(dirname(filePath), { recursive: true });
  } catch (err) {
    throw new IOFailure(`Could not create directory ${dirname(filePath)}`, { cause: err });
  }
  try {
    await writeFile(filePath, figure.toSVG(), "utf-8");
  } catch (err) {
    throw new IOFailure(`Could not write chart to ${filePath}`, { cause: err });
  }
}

/** Renders every measure of the dataset to a file or a display, then closes the figure. */
export async function renderChart(
  dataset: StationDataset,
  destination: ChartDestination,
  options?: RenderOptions
): Promise<void> {
  const figure = composeFigure(dataset, options);
  try {
    if (typeof destination === "string") {
      await writeFigure(figure, destination);
    } else {
      await destination.show(figure);
    }
  } finally {
    figure.close();
  }
}
