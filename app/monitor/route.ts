import { NextResponse } from "next/server";
import { loadConfig } from "@/lib/config";
import { ValidationError, errorMessage, httpStatusFor } from "@/lib/errors";
import { renderResultsPage } from "@/lib/html";
import { MonitorPipeline } from "@/lib/pipeline";

export const dynamic = "force-dynamic";

function parseDaysBack(raw: string | null): number {
  if (raw === null || raw === "") return 1;
  if (!/^\d+$/.test(raw)) {
    throw new ValidationError(`days_back must be a whole number, got "${raw}"`);
  }
  return Number(raw);
}

export async function GET(request: Request) {
  const { searchParams } = new URL(request.url);
  const stationId = searchParams.get("station_id")?.trim() ?? "";

  try {
    if (stationId === "") {
      throw new ValidationError("station_id is required");
    }
    const daysBack = parseDaysBack(searchParams.get("days_back"));
    console.info(`Processing request for station ${stationId}, days_back=${daysBack}`);

    const pipeline = new MonitorPipeline(loadConfig());
    const result = await pipeline.run({ stationId, daysBack, saveCsv: true });
    if (result.plotPath === null) {
      throw new Error("Pipeline finished without writing a plot");
    }

    const html = renderResultsPage({
      stationId,
      daysBack,
      plotPath: result.plotPath,
      csvPaths: result.csvPaths,
    });
    return new NextResponse(html, {
      headers: { "Content-Type": "text/html; charset=utf-8" },
    });
  } catch (err) {
    const status = httpStatusFor(err);
    if (status >= 500) {
      console.error(`Failed to process station ${stationId}:`, err);
    } else {
      console.warn(`Rejected request for station ${stationId}: ${errorMessage(err)}`);
    }
    return NextResponse.json({ error: errorMessage(err) }, { status });
  }
}
