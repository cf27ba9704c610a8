import { writeFile, mkdir } from "node:fs/promises";
import { join } from "node:path";

export type ReportExt = "csv" | "md" | "json";

export function sanitizeKeyword(keyword: string): string {
  return keyword
    .toLowerCase()
    .replace(/[^a-z0-9]+/gi, "_")
    .replace(/^_+|_+$/g, "")
    .slice(0, 60);
}

const pad = (n: number) => String(n).padStart(2, "0");

/** Local time as `YYYYMMDD_HHMMSS`. */
export function fileTimestamp(d: Date): string {
  const date = `${d.getFullYear()}${pad(d.getMonth() + 1)}${pad(d.getDate())}`;
  const time = `${pad(d.getHours())}${pad(d.getMinutes())}${pad(d.getSeconds())}`;
  return `${date}_${time}`;
}

export function makeFilename(keyword: string, ext: ReportExt, at: Date = new Date()): string {
  const kw = sanitizeKeyword(keyword) || "query";
  return `web_research_${kw}_${fileTimestamp(at)}.${ext}`;
}

export async function saveText(dir: string, filename: string, contents: string): Promise<string> {
  await mkdir(dir, { recursive: true });
  const path = join(dir, filename);
  await writeFile(path, contents, "utf-8");
  return path;
}
