import { basename } from "path";

const escapeHtml = (str: string): string =>
  str
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");

export interface ResultsPage {
  stationId: string;
  daysBack: number;
  plotPath: string;
  csvPaths: string[];
}

export function renderResultsPage({ stationId, daysBack, plotPath, csvPaths }: ResultsPage): string {
  const plotFile = encodeURIComponent(basename(plotPath));
  const items = csvPaths
    .map((p) => {
      const name = basename(p);
      return `<li><a href="/data/${encodeURIComponent(name)}">${escapeHtml(name)}</a></li>`;
    })
    .join("\n        ");

  return `<!DOCTYPE html>
<html>
  <head>
    <meta charset="utf-8" />
    <title>Station ${escapeHtml(stationId)}</title>
  </head>
  <body>
    <h1>Results for Station ${escapeHtml(stationId)}</h1>
    <p>Last ${daysBack} day(s)</p>
    <h2>Plot</h2>
    <img src="/plot/${plotFile}" alt="Station readings plot" />
    <h2>Data Files</h2>
    <ul>
        ${items}
    </ul>
    <p><a href="/">Back to form</a></p>
  </body>
</html>
`;
}
