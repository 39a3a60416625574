import { mkdir, readFile, writeFile } from "fs/promises";
import { dirname } from "path";
import { IOFailure, ValidationError } from "@/lib/errors";

export async function saveStationIds(filePath: string, stationIds: readonly string[]): Promise<void> {
  try {
    await mkdir(dirname(filePath), { recursive: true });
    await writeFile(filePath, stationIds.map((id) => `${id}\n`).join(""), "utf-8");
  } catch (err) {
    throw new IOFailure(`Could not write station IDs to ${filePath}`, { cause: err });
  }
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

export async function loadStationIds(filePath: string): Promise<Set<string>> {
  let text: string;
  try {
    text = await readFile(filePath, "utf-8");
  } catch (err) {
    if (isMissingFile(err)) {
      throw new ValidationError(
        `Station IDs file not found at ${filePath}. Run with --update-station-ids to create it.`,
        { cause: err }
      );
    }
    throw new IOFailure(`Could not read station IDs from ${filePath}`, { cause: err });
  }

  const ids = text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line !== "");
  return new Set(ids);
}

export function validateStationId(
  stationId: string,
  validIds: ReadonlySet<string>,
  source: string
): void {
  if (!validIds.has(stationId)) {
    throw new ValidationError(
      `Invalid station ID: ${stationId}. Must be one of the IDs listed in ${source}`
    );
  }
}
