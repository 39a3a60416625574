// Server-side only — do not import from client components
import { readFile } from "fs/promises";
import { basename, join } from "path";
import { NextResponse } from "next/server";

/**
 * Responds with `filename` from `dir`, or 404 when it does not exist or names
 * anything other than a plain file inside `dir`.
 */
export async function serveFile(
  dir: string,
  filename: string,
  contentType: string,
  notFound: string
): Promise<Response> {
  if (filename === "" || basename(filename) !== filename || filename.startsWith(".")) {
    return NextResponse.json({ error: notFound }, { status: 404 });
  }

  try {
    const body = await readFile(join(dir, filename), "utf-8");
    return new NextResponse(body, {
      headers: { "Content-Type": contentType, "Cache-Control": "no-store" },
    });
  } catch (err) {
    console.error(`Error serving ${filename}:`, err);
    return NextResponse.json({ error: notFound }, { status: 404 });
  }
}
