/**
 * JSONL files: one JSON value per line, appended and read back whole.
 */

import { appendFile, mkdir, readFile } from "fs/promises";
import { dirname } from "path";

export interface JsonlLine {
  /** 1-based line number in the file. */
  lineNumber: number;
  value: unknown;
}

/**
 * Ensures directory exists (mkdir -p), then appends one JSON line.
 */
export async function appendJsonl(path: string, event: unknown): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await appendFile(path, JSON.stringify(event) + "\n");
}

/**
 * Parses every non-blank line. A missing file reads as empty; lines that are not JSON
 * go to `onMalformed` and are left out.
 */
export async function readJsonl(
  path: string,
  onMalformed: (lineNumber: number) => void = () => {}
): Promise<JsonlLine[]> {
  let raw: string;
  try {
    raw = await readFile(path, "utf-8");
  } catch (e) {
    if (e instanceof Error && "code" in e && e.code === "ENOENT") return [];
    throw e;
  }
  const out: JsonlLine[] = [];
  raw.split("\n").forEach((line, i) => {
    if (!line.trim()) return;
    try {
      out.push({ lineNumber: i + 1, value: JSON.parse(line) });
    } catch {
      onMalformed(i + 1);
    }
  });
  return out;
}
