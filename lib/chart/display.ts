import { spawn } from "child_process";
import { mkdir, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import type { DisplayTarget, Figure } from "@/lib/chart/render";
import { IOFailure } from "@/lib/errors";

export function openerFor(platform: NodeJS.Platform, file: string): [string, string[]] {
  if (platform === "darwin") return ["open", [file]];
  if (platform === "win32") return ["cmd", ["/c", "start", "", file]];
  return ["xdg-open", [file]];
}

/** Writes the figure to the one scratch file the viewer reads, replacing the previous chart. */
export async function writeScratchChart(figure: Figure, dir: string): Promise<string> {
  await mkdir(dir, { recursive: true });
  const file = join(dir, "chart.svg");
  await writeFile(file, figure.toSVG(), "utf-8");
  return file;
}

/**
 * Shows a figure in the platform's default SVG viewer. The viewer reads a
 * scratch copy under the OS temp directory, overwritten on every run.
 */
export class SystemViewer implements DisplayTarget {
  constructor(
    private readonly platform: NodeJS.Platform = process.platform,
    private readonly scratchDir: string = join(tmpdir(), "flood-monitor")
  ) {}

  async show(figure: Figure): Promise<void> {
    const file = await writeScratchChart(figure, this.scratchDir);

    const [command, args] = openerFor(this.platform, file);
    await new Promise<void>((resolve, reject) => {
      const child = spawn(command, args, { detached: true, stdio: "ignore" });
      child.once("error", (err) => {
        reject(new IOFailure(`Could not launch chart viewer "${command}"`, { cause: err }));
      });
      child.once("spawn", () => {
        child.unref();
        resolve();
      });
    });
  }
}
